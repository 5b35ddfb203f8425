import { join } from "node:path";

import type { ConfigSource, RepositoryConfig } from "../config/config_source";
import type { StartOutcome } from "../gates/start_outcome";

export type RepositoryStartOptions = {
  poolSize: number;
};

/**
 * A named data-access unit. Started pools belong to the process once
 * started; nothing in the gate stops them.
 */
export interface Repository {
  readonly id: string;
  readonly config: RepositoryConfig;
  readonly migrationsPath: string;
  start(opts: RepositoryStartOptions): Promise<StartOutcome>;
  /** Applies pending units in ascending order and returns their ids. */
  migrate(): Promise<number[]>;
}

export type OpenRepository = (repoId: string, config: ConfigSource) => Repository;

/**
 * `MyApp.Repo` -> `repo`, `ReadReplicaRepo` -> `read_replica_repo`,
 * `HTTPCacheRepo` -> `http_cache_repo`.
 */
export function underscore(name: string): string {
  return name
    .replace(/([A-Z]+)([A-Z][a-z])/g, "$1_$2")
    .replace(/([a-z\d])([A-Z])/g, "$1_$2")
    .replace(/[-\s]+/g, "_")
    .toLowerCase();
}

export function repositoryBaseName(repoId: string): string {
  const segments = repoId.split(".").filter(Boolean);
  return segments[segments.length - 1] ?? repoId;
}

/**
 * Path of `filename` inside the repository's slot of its owning
 * application's private directory.
 */
export function privPathFor(
  source: ConfigSource,
  repoId: string,
  repoConfig: RepositoryConfig,
  filename: string
): string {
  const privDir = source.privDir(repoConfig.ownerApp);
  if (!privDir) {
    throw new Error(`no private directory for application ${repoConfig.ownerApp} (repo ${repoId})`);
  }
  return join(privDir, underscore(repositoryBaseName(repoId)), filename);
}

export function migrationsPathFor(
  source: ConfigSource,
  repoId: string,
  repoConfig: RepositoryConfig
): string {
  return privPathFor(source, repoId, repoConfig, "migrations");
}
