import type { ConfigSource, RepositoryConfig } from "../config/config_source";
import { BootGateError, describeError } from "../gates/boot_gate_error";
import { alreadyRunning, startFailed, startedFresh, type StartOutcome } from "../gates/start_outcome";
import { runPendingMigrations } from "../migrations/migrator";
import { migrationsPathFor, type Repository, type RepositoryStartOptions } from "./repository";
import { SqlitePool } from "./sqlite_pool";

/**
 * Started pools keyed by repository id.
 */
export class RepositoryPools {
  private pools = new Map<string, SqlitePool>();

  get(repoId: string): SqlitePool | null {
    return this.pools.get(repoId) ?? null;
  }

  set(repoId: string, pool: SqlitePool): void {
    this.pools.set(repoId, pool);
  }

  stop(repoId: string): void {
    this.pools.get(repoId)?.close();
    this.pools.delete(repoId);
  }

  stopAll(): void {
    for (const repoId of [...this.pools.keys()]) {
      this.stop(repoId);
    }
  }
}

export const processRepositoryPools = new RepositoryPools();

export class SqliteRepository implements Repository {
  readonly migrationsPath: string;

  constructor(
    readonly id: string,
    readonly config: RepositoryConfig,
    source: ConfigSource,
    private readonly pools: RepositoryPools = processRepositoryPools
  ) {
    this.migrationsPath = migrationsPathFor(source, id, config);
  }

  async start(opts: RepositoryStartOptions): Promise<StartOutcome> {
    const existing = this.pools.get(this.id);
    if (existing) {
      return alreadyRunning({ database: existing.database, poolSize: existing.size });
    }

    try {
      const pool = new SqlitePool(this.config.database, opts.poolSize);
      this.pools.set(this.id, pool);
      return startedFresh({ database: pool.database, poolSize: pool.size });
    } catch (error) {
      return startFailed(describeError(error));
    }
  }

  async migrate(): Promise<number[]> {
    return runPendingMigrations(this.requirePool().acquire(), this.migrationsPath);
  }

  private requirePool(): SqlitePool {
    const pool = this.pools.get(this.id);
    if (!pool) {
      throw new BootGateError({
        code: "migration_failure",
        message: `repository ${this.id} is not started`,
        repo: this.id,
      });
    }
    return pool;
  }
}

export function openSqliteRepository(
  pools: RepositoryPools = processRepositoryPools
): (repoId: string, source: ConfigSource) => Repository {
  return (repoId, source) => {
    const config = source.getRepositoryConfig(repoId);
    if (!config) {
      throw new Error(`no configuration for repository ${repoId}`);
    }
    return new SqliteRepository(repoId, config, source, pools);
  };
}
