import { readGateEnv, requireBootApp, type GateEnv } from "../config/env";
import { FileConfigSource } from "../config/file_config_source";
import { createBootGate, nodeProcessController } from "../gates/boot_gate";
import { describeError } from "../gates/boot_gate_error";
import { createLogger, type GateLogger } from "../logging/logger";
import { collectMigrationStatus } from "../migrations/migration_status";
import { openSqliteRepository, processRepositoryPools, type RepositoryPools } from "../store/sqlite_repository";

type MigrateCommandDeps = {
  env?: NodeJS.ProcessEnv;
  log?: GateLogger;
  pools?: RepositoryPools;
};

/**
 * One-shot migration command. Returns the exit code.
 *
 *   migrate            apply pending units and exit
 *   migrate --status   list units as up/down without touching any database
 */
export async function runMigrateCommand(
  argv: readonly string[],
  deps: MigrateCommandDeps = {}
): Promise<number> {
  let env: GateEnv;
  try {
    env = readGateEnv(deps.env ?? process.env);
  } catch (error) {
    const log = deps.log ?? createLogger();
    log.error({ evt: "migrate.invalid_env", error: describeError(error) }, "migrate.invalid_env");
    return 1;
  }

  const log = deps.log ?? createLogger(env.LOG_LEVEL);
  const pools = deps.pools ?? processRepositoryPools;

  try {
    const app = requireBootApp(env);
    const config = new FileConfigSource(env.BOOT_GATE_CONFIG);

    if (argv.includes("--status")) {
      const reports = await collectMigrationStatus({ app, config, log });
      return reports.every((report) => report.ok) ? 0 : 1;
    }

    const gate = createBootGate({
      config,
      openRepository: openSqliteRepository(pools),
      processController: nodeProcessController(env.BOOT_GATE_HALT_EXIT_CODE),
      log,
    });
    const result = await gate.run({ app }, false);

    switch (result.kind) {
      case "noop":
        log.info({ evt: "migrate.up_to_date", app }, "migrate.up_to_date");
        return 0;
      case "migrated":
        log.info({ evt: "migrate.applied", app, ids: result.ids }, "migrate.applied");
        return 0;
      case "failed":
        log.error({ evt: "migrate.failed", ...result.error.toJSON() }, "migrate.failed");
        return 1;
    }
  } catch (error) {
    log.error({ evt: "migrate.fatal", error: describeError(error) }, "migrate.fatal");
    return 1;
  } finally {
    pools.stopAll();
  }
}
