import type { ConfigSource } from "../config/config_source";
import type { GateLogger } from "../logging/logger";
import { DEFAULT_RUNTIME_SERVICES } from "../runtime/default_services";
import { ServiceRegistry, type RuntimeService } from "../runtime/service_registry";
import type { OpenRepository } from "../store/repository";
import type { BootGateError } from "./boot_gate_error";
import { loadBootTarget } from "./dependency_loader";
import { runRepositoryMigrations } from "./migration_runner";
import { decideGateOutcome } from "./outcome_decider";
import { startRepositories } from "./repository_starter";
import { bootstrapServices } from "./service_bootstrapper";

export type BootTarget = {
  app: string;
};

export type GateResult =
  | { kind: "noop" }
  | { kind: "migrated"; ids: number[] }
  | { kind: "failed"; error: BootGateError };

export type GatePhase =
  | "start"
  | "loaded"
  | "bootstrapped"
  | "repositories_ready"
  | "migrations_run"
  | "noop"
  | "migrated"
  | "halted"
  | "failed";

export interface ProcessController {
  /** Ends the process. Never returns. */
  halt(): never;
}

export const nodeProcessController = (exitCode = 0): ProcessController => ({
  halt: () => process.exit(exitCode),
});

export type BootGateDeps = {
  config: ConfigSource;
  openRepository: OpenRepository;
  processController: ProcessController;
  log: GateLogger;
  services?: readonly RuntimeService[];
  serviceRegistry?: ServiceRegistry;
};

export type BootGate = {
  run: (target: BootTarget, haltOnMigration?: boolean) => Promise<GateResult>;
  /** True when units were applied, false when none were. Throws on failure. */
  migrated: (target: BootTarget, haltOnMigration?: boolean) => Promise<boolean>;
};

/**
 * Boot gate
 *
 * Ordering:
 * 1. Load the target application's configuration
 * 2. Start runtime services (best effort)
 * 3. Start one pool per configured repository (best effort)
 * 4. Apply pending migrations, repository by repository
 * 5. Decide: noop, migrated, or halt the process
 *
 * Halting is the default when anything was applied, so caches and
 * workers built against the old schema never serve traffic. A supervisor
 * restarts the process into the migrated schema.
 */
export function createBootGate(deps: BootGateDeps): BootGate {
  const services = deps.services ?? DEFAULT_RUNTIME_SERVICES;
  const registry = deps.serviceRegistry ?? new ServiceRegistry();
  const { log } = deps;

  const run = async (target: BootTarget, haltOnMigration = true): Promise<GateResult> => {
    const { app } = target;
    let phase: GatePhase = "start";
    const enter = (next: GatePhase) => {
      log.info({ evt: "boot_gate.phase", app, from: phase, to: next }, "boot_gate.phase");
      phase = next;
    };

    const loaded = await loadBootTarget(deps.config, app, log);
    if (!loaded.ok) {
      enter("failed");
      return { kind: "failed", error: loaded.error };
    }
    enter("loaded");

    await bootstrapServices(services, registry, log);
    enter("bootstrapped");

    const repos = await startRepositories({
      app,
      config: deps.config,
      openRepository: deps.openRepository,
      log,
    });
    enter("repositories_ready");

    const migrations = await runRepositoryMigrations(repos, log);
    if (!migrations.ok) {
      enter("failed");
      return { kind: "failed", error: migrations.error };
    }
    enter("migrations_run");

    const decision = decideGateOutcome({ appliedIds: migrations.ids, haltOnMigration });
    switch (decision) {
      case "noop":
        enter("noop");
        return { kind: "noop" };
      case "migrated":
        enter("migrated");
        return { kind: "migrated", ids: migrations.ids };
      case "halt":
        enter("halted");
        log.warn(
          { evt: "boot_gate.halting", app, applied: migrations.ids },
          "boot_gate.halting"
        );
        return deps.processController.halt();
    }
  };

  const migrated = async (target: BootTarget, haltOnMigration = true): Promise<boolean> => {
    const result = await run(target, haltOnMigration);
    switch (result.kind) {
      case "noop":
        return false;
      case "migrated":
        return true;
      case "failed":
        throw result.error;
    }
  };

  return { run, migrated };
}
