import type { ConfigSource, LoadOutcome } from "../config/config_source";
import type { GateLogger } from "../logging/logger";
import { BootGateError, describeError } from "./boot_gate_error";

export type LoadResult = { ok: true; outcome: LoadOutcome } | { ok: false; error: BootGateError };

/**
 * Makes the target application's configuration available. Fresh and
 * repeated loads both pass.
 */
export async function loadBootTarget(
  config: ConfigSource,
  app: string,
  log: GateLogger
): Promise<LoadResult> {
  log.info({ evt: "boot_gate.app_loading", app }, "boot_gate.app_loading");

  let outcome: LoadOutcome;
  try {
    outcome = await config.load(app);
  } catch (error) {
    outcome = { status: "failed", reason: describeError(error) };
  }

  switch (outcome.status) {
    case "loaded":
      log.info({ evt: "boot_gate.app_loaded", app }, "boot_gate.app_loaded");
      return { ok: true, outcome };
    case "already_loaded":
      log.info({ evt: "boot_gate.app_already_loaded", app }, "boot_gate.app_already_loaded");
      return { ok: true, outcome };
    case "failed": {
      log.error(
        { evt: "boot_gate.app_load_failed", app, reason: outcome.reason },
        "boot_gate.app_load_failed"
      );
      return {
        ok: false,
        error: new BootGateError({
          code: "not_loaded",
          message: `application ${app} could not be loaded: ${outcome.reason}`,
          app,
          cause: outcome.reason,
        }),
      };
    }
  }
}
