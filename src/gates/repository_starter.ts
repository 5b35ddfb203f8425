import type { ConfigSource } from "../config/config_source";
import type { GateLogger } from "../logging/logger";
import type { OpenRepository, Repository } from "../store/repository";
import { BootGateError, describeError } from "./boot_gate_error";
import { isStarted, startFailed, type StartOutcome } from "./start_outcome";

// Schema work only; application traffic brings its own pools.
export const MIGRATION_POOL_SIZE = 1;

type StartRepositoriesArgs = {
  app: string;
  config: ConfigSource;
  openRepository: OpenRepository;
  log: GateLogger;
};

/**
 * Starts a pool for every repository configured under `app`, in
 * configuration order. Returns the repositories that came up; the rest
 * are logged and left out of this run.
 */
export async function startRepositories(args: StartRepositoriesArgs): Promise<Repository[]> {
  const { app, config, openRepository, log } = args;
  const repoIds = config.getRepositoryIds(app);
  log.info({ evt: "boot_gate.repos_starting", app, repos: repoIds }, "boot_gate.repos_starting");

  const ready: Repository[] = [];
  for (const repoId of repoIds) {
    log.info({ evt: "boot_gate.repo_starting", repo: repoId }, "boot_gate.repo_starting");

    let repo: Repository | null = null;
    let outcome: StartOutcome;
    try {
      repo = openRepository(repoId, config);
      outcome = await repo.start({ poolSize: MIGRATION_POOL_SIZE });
    } catch (error) {
      outcome = startFailed(describeError(error));
    }

    if (!repo || !isStarted(outcome)) {
      const cause = outcome.status === "failed" ? outcome.error : "repository unavailable";
      const failure = new BootGateError({
        code: "dependency_start_failure",
        message: `repository ${repoId} failed to start: ${cause}`,
        app,
        repo: repoId,
        cause,
      });
      log.warn(
        { evt: "boot_gate.dependency_start_failure", ...failure.toJSON() },
        "boot_gate.dependency_start_failure"
      );
      continue;
    }

    const evt =
      outcome.status === "started_fresh" ? "boot_gate.repo_started" : "boot_gate.repo_already_started";
    log.info({ evt, repo: repoId, ...outcome.detail }, evt);
    ready.push(repo);
  }

  log.info(
    { evt: "boot_gate.repos_started", ready: ready.map((repo) => repo.id) },
    "boot_gate.repos_started"
  );
  return ready;
}
