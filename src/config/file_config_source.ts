import { readFile } from "node:fs/promises";
import { dirname, isAbsolute, join, resolve } from "node:path";
import { z } from "zod";

import type { ConfigSource, LoadOutcome, RepositoryConfig } from "./config_source";

export const RepositoryConfigSchema = z.object({
  ownerApp: z.string().min(1),
  database: z.string().min(1),
});

export const ApplicationConfigSchema = z.object({
  privDir: z.string().min(1).optional(),
  repos: z.array(z.string().min(1)).default([]),
});

export const BootGateConfigFile = z.object({
  applications: z.record(z.string(), ApplicationConfigSchema),
  repos: z.record(z.string(), RepositoryConfigSchema).default({}),
});

export type BootGateConfigFile = z.infer<typeof BootGateConfigFile>;

/**
 * Reads applications and repositories from a JSON file.
 *
 * Relative `privDir` and `database` paths resolve against the directory
 * holding the file. The file is read on the first `load` and kept.
 */
export class FileConfigSource implements ConfigSource {
  private readonly filePath: string;
  private readonly baseDir: string;
  private document: BootGateConfigFile | null = null;
  private loaded = new Set<string>();

  constructor(filePath: string) {
    this.filePath = resolve(filePath);
    this.baseDir = dirname(this.filePath);
  }

  async load(app: string): Promise<LoadOutcome> {
    if (this.loaded.has(app)) return { status: "already_loaded" };

    let document: BootGateConfigFile;
    try {
      document = await this.readDocument();
    } catch (error) {
      return { status: "failed", reason: error instanceof Error ? error.message : String(error) };
    }

    if (!Object.hasOwn(document.applications, app)) {
      return { status: "failed", reason: `unknown application: ${app}` };
    }

    this.loaded.add(app);
    return { status: "loaded" };
  }

  getRepositoryIds(app: string): string[] {
    if (!this.document || !this.loaded.has(app)) return [];
    return [...this.document.applications[app].repos];
  }

  getRepositoryConfig(repoId: string): RepositoryConfig | null {
    if (!this.document || !Object.hasOwn(this.document.repos, repoId)) return null;
    const repo = this.document.repos[repoId];
    return {
      ownerApp: repo.ownerApp,
      database: repo.database === ":memory:" ? repo.database : this.resolvePath(repo.database),
    };
  }

  privDir(app: string): string | null {
    if (!this.document || !Object.hasOwn(this.document.applications, app)) return null;
    const configured = this.document.applications[app].privDir;
    return configured ? this.resolvePath(configured) : join(this.baseDir, "priv", app);
  }

  private async readDocument(): Promise<BootGateConfigFile> {
    if (this.document) return this.document;

    const raw = await readFile(this.filePath, "utf8");
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new Error(`config file is not valid JSON: ${this.filePath} (${String(error)})`);
    }

    const parsed = BootGateConfigFile.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
        .join("; ");
      throw new Error(`config file is invalid: ${this.filePath} (${issues})`);
    }

    this.document = parsed.data;
    return this.document;
  }

  private resolvePath(path: string): string {
    return isAbsolute(path) ? path : join(this.baseDir, path);
  }
}
