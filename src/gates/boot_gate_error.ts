export type BootGateErrorCode =
  | "not_loaded"
  | "dependency_start_failure"
  | "migration_failure";

export interface BootGateErrorDetails {
  code: BootGateErrorCode;
  message: string;
  app?: string;
  repo?: string;
  service?: string;
  migrationId?: number;
  // Ids committed in this run before the failure
  appliedIds?: number[];
  cause?: string;
}

export class BootGateError extends Error {
  public readonly code: BootGateErrorCode;
  public readonly details: BootGateErrorDetails;

  constructor(details: BootGateErrorDetails) {
    super(details.message);
    this.name = "BootGateError";
    this.code = details.code;
    this.details = details;
  }

  toJSON() {
    return {
      error: this.code,
      message: this.message,
      details: {
        ...this.details,
        cause: this.details.cause?.substring(0, 500),
      },
    };
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
