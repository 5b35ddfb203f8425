import type { GateLogger } from "../logging/logger";
import type { Repository } from "../store/repository";
import { BootGateError, describeError } from "./boot_gate_error";

export type MigrationRunResult =
  | { ok: true; ids: number[] }
  | { ok: false; error: BootGateError };

/**
 * Migrates repositories in order and concatenates the applied ids.
 * Stops at the first repository that fails.
 */
export async function runRepositoryMigrations(
  repos: readonly Repository[],
  log: GateLogger
): Promise<MigrationRunResult> {
  log.info({ evt: "boot_gate.migrations_running", repos: repos.length }, "boot_gate.migrations_running");

  const ids: number[] = [];
  for (const repo of repos) {
    log.info(
      { evt: "boot_gate.repo_migrating", repo: repo.id, path: repo.migrationsPath },
      "boot_gate.repo_migrating"
    );

    let applied: number[];
    try {
      applied = await repo.migrate();
    } catch (error) {
      const inner = error instanceof BootGateError ? error.details : undefined;
      const failure = new BootGateError({
        code: "migration_failure",
        message: `migrating ${repo.id} failed: ${describeError(error)}`,
        repo: repo.id,
        migrationId: inner?.migrationId,
        appliedIds: [...ids, ...(inner?.appliedIds ?? [])],
        cause: inner?.cause ?? describeError(error),
      });
      log.error(
        {
          evt: "boot_gate.migration_failed",
          repo: repo.id,
          migrationId: failure.details.migrationId,
          appliedIds: failure.details.appliedIds,
          error: failure.message,
        },
        "boot_gate.migration_failed"
      );
      return { ok: false, error: failure };
    }

    log.info({ evt: "boot_gate.repo_migrated", repo: repo.id, applied }, "boot_gate.repo_migrated");
    ids.push(...applied);
  }

  log.info({ evt: "boot_gate.migrations_run", count: ids.length }, "boot_gate.migrations_run");
  return { ok: true, ids };
}
