export type RepositoryConfig = {
  /** Application that owns the repository; its private directory holds the migrations. */
  ownerApp: string;
  /** SQLite database file, or ":memory:". */
  database: string;
};

export type ApplicationConfig = {
  privDir?: string;
  repos?: string[];
};

export type LoadOutcome =
  | { status: "loaded" }
  | { status: "already_loaded" }
  | { status: "failed"; reason: string };

/**
 * Registry of application configuration.
 *
 * `load` must succeed for an application before its repositories are
 * read; the getters only see loaded applications.
 */
export interface ConfigSource {
  load(app: string): Promise<LoadOutcome>;
  getRepositoryIds(app: string): string[];
  getRepositoryConfig(repoId: string): RepositoryConfig | null;
  privDir(app: string): string | null;
}

export type MemoryConfigInput = {
  applications: Record<string, ApplicationConfig>;
  repos: Record<string, RepositoryConfig>;
};

export class MemoryConfigSource implements ConfigSource {
  private loaded = new Set<string>();

  constructor(private readonly input: MemoryConfigInput) {}

  async load(app: string): Promise<LoadOutcome> {
    if (this.loaded.has(app)) return { status: "already_loaded" };
    if (!Object.hasOwn(this.input.applications, app)) {
      return { status: "failed", reason: `unknown application: ${app}` };
    }
    this.loaded.add(app);
    return { status: "loaded" };
  }

  getRepositoryIds(app: string): string[] {
    if (!this.loaded.has(app)) return [];
    return [...(this.input.applications[app]?.repos ?? [])];
  }

  getRepositoryConfig(repoId: string): RepositoryConfig | null {
    if (!Object.hasOwn(this.input.repos, repoId)) return null;
    return this.input.repos[repoId];
  }

  privDir(app: string): string | null {
    if (!Object.hasOwn(this.input.applications, app)) return null;
    return this.input.applications[app].privDir ?? null;
  }
}
