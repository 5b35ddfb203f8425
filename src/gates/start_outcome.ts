export type StartOutcome =
  | { status: "started_fresh"; detail?: Record<string, unknown> }
  | { status: "already_running"; detail?: Record<string, unknown> }
  | { status: "failed"; error: string };

export const startedFresh = (detail?: Record<string, unknown>): StartOutcome => ({
  status: "started_fresh",
  ...(detail ? { detail } : {}),
});

export const alreadyRunning = (detail?: Record<string, unknown>): StartOutcome => ({
  status: "already_running",
  ...(detail ? { detail } : {}),
});

export const startFailed = (error: string): StartOutcome => ({ status: "failed", error });

export function isStarted(
  outcome: StartOutcome
): outcome is Exclude<StartOutcome, { status: "failed" }> {
  return outcome.status !== "failed";
}
