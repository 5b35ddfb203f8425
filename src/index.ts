import { readGateEnv, requireBootApp } from "./config/env";
import { FileConfigSource } from "./config/file_config_source";
import { createBootGate, nodeProcessController } from "./gates/boot_gate";
import { describeError } from "./gates/boot_gate_error";
import { createLogger } from "./logging/logger";
import { buildServer } from "./server";
import { openSqliteRepository } from "./store/sqlite_repository";

// Replaced by the configured logger once the environment is valid.
let log = createLogger();

async function main() {
  const env = readGateEnv();
  log = createLogger(env.LOG_LEVEL);

  const app = requireBootApp(env);
  const gate = createBootGate({
    config: new FileConfigSource(env.BOOT_GATE_CONFIG),
    openRepository: openSqliteRepository(),
    processController: nodeProcessController(env.BOOT_GATE_HALT_EXIT_CODE),
    log,
  });

  // Does not return when migrations ran and halting is on.
  const result = await gate.run({ app }, env.BOOT_GATE_HALT_ON_MIGRATION);
  if (result.kind === "failed") {
    log.error({ evt: "boot_gate.failed", ...result.error.toJSON() }, "boot_gate.failed");
    process.exit(1);
  }

  const server = buildServer({
    logger: true,
    gate: {
      app,
      outcome: result.kind,
      appliedIds: result.kind === "migrated" ? result.ids : [],
      checkedAt: new Date().toISOString(),
    },
  });

  await server.listen({ port: env.PORT, host: "0.0.0.0" });
}

main().catch((err) => {
  log.error({ evt: "boot.fatal", error: describeError(err) }, "boot.fatal");
  process.exit(1);
});
