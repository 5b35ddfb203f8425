import { describeError } from "../gates/boot_gate_error";
import { alreadyRunning, startFailed, startedFresh, type StartOutcome } from "../gates/start_outcome";

export type RuntimeService = {
  name: string;
  /** Throws when the service cannot run in this process. */
  start: () => Promise<Record<string, unknown> | undefined>;
};

/**
 * Tracks which runtime services have been started in this process.
 */
export class ServiceRegistry {
  private started = new Map<string, Record<string, unknown> | undefined>();

  async ensureStarted(service: RuntimeService): Promise<StartOutcome> {
    if (this.started.has(service.name)) {
      return alreadyRunning(this.started.get(service.name));
    }

    try {
      const detail = await service.start();
      this.started.set(service.name, detail);
      return startedFresh(detail);
    } catch (error) {
      return startFailed(describeError(error));
    }
  }

  isStarted(name: string): boolean {
    return this.started.has(name);
  }
}
