import * as fs from "node:fs";
import Database from "better-sqlite3";

import type { ConfigSource } from "../config/config_source";
import { BootGateError, describeError } from "../gates/boot_gate_error";
import type { GateLogger } from "../logging/logger";
import { migrationsPathFor } from "../store/repository";
import { listMigrationStatus, type MigrationStatusEntry } from "./migrator";

export type RepositoryStatusReport =
  | { repo: string; ok: true; path: string; entries: MigrationStatusEntry[] }
  | { repo: string; ok: false; error: string };

function readRepositoryStatus(
  repoId: string,
  config: ConfigSource
): { path: string; entries: MigrationStatusEntry[] } {
  const repoConfig = config.getRepositoryConfig(repoId);
  if (!repoConfig) {
    throw new Error(`no configuration for repository ${repoId}`);
  }

  const path = migrationsPathFor(config, repoId, repoConfig);
  if (repoConfig.database === ":memory:") {
    throw new Error(`repository ${repoId} uses an in-memory database; nothing is recorded`);
  }
  if (!fs.existsSync(repoConfig.database)) {
    throw new Error(`database file not found: ${repoConfig.database}`);
  }

  const db = new Database(repoConfig.database, { readonly: true, fileMustExist: true });
  try {
    return { path, entries: listMigrationStatus(db, path) };
  } finally {
    db.close();
  }
}

/**
 * Lists every configured repository's units as up or down.
 *
 * Read-only: databases are opened read-only and must already exist. A
 * repository that cannot be read is reported and the walk moves on.
 */
export async function collectMigrationStatus(args: {
  app: string;
  config: ConfigSource;
  log: GateLogger;
}): Promise<RepositoryStatusReport[]> {
  const { app, config, log } = args;

  const loaded = await config.load(app);
  if (loaded.status === "failed") {
    throw new BootGateError({
      code: "not_loaded",
      message: `application ${app} could not be loaded: ${loaded.reason}`,
      app,
      cause: loaded.reason,
    });
  }

  const reports: RepositoryStatusReport[] = [];
  for (const repoId of config.getRepositoryIds(app)) {
    try {
      const { path, entries } = readRepositoryStatus(repoId, config);
      log.info({ evt: "migrate.status", repo: repoId, path, entries }, "migrate.status");
      reports.push({ repo: repoId, ok: true, path, entries });
    } catch (error) {
      log.warn(
        { evt: "migrate.status_repo_unavailable", repo: repoId, error: describeError(error) },
        "migrate.status_repo_unavailable"
      );
      reports.push({ repo: repoId, ok: false, error: describeError(error) });
    }
  }

  return reports;
}
