import { ERROR_CODES, type ErrorCode } from "../src/core/errors/canonical_error_codes";

export type NoticeLevel = "warning" | "info";

export interface ErrorMetadata {
  readonly level: NoticeLevel;
  readonly cliExitCode: number;
}

export const ERROR_POLICY_REGISTRY = {
  [ERROR_CODES.E_USER_MISUSE]: { level: "warning", cliExitCode: 0 },
  [ERROR_CODES.E_STORE_UNREADABLE]: { level: "info", cliExitCode: 0 },
  [ERROR_CODES.E_VCS_NO_REMOTE]: { level: "info", cliExitCode: 0 },
  [ERROR_CODES.E_VCS_COMMIT_FAILED]: { level: "warning", cliExitCode: 0 },
  [ERROR_CODES.E_VCS_PUSH_FAILED]: { level: "warning", cliExitCode: 0 },
  [ERROR_CODES.E_CONFIGURATION]: { level: "warning", cliExitCode: 1 },
} satisfies Record<ErrorCode, ErrorMetadata>;

export class TrackerError extends Error {
  readonly errorCode: ErrorCode;

  constructor(
    message: string,
    input: {
      readonly errorCode: ErrorCode;
      readonly cause?: unknown;
    }
  ) {
    super(message);
    this.name = "TrackerError";
    this.errorCode = input.errorCode;
    if ("cause" in input) {
      (this as Error & { cause?: unknown }).cause = input.cause;
    }
  }
}

export function asMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/** Console line for a non-fatal condition, e.g. "[warning] Git push failed: ...". */
export function formatNotice(code: ErrorCode, message: string): string {
  return `[${ERROR_POLICY_REGISTRY[code].level}] ${message}`;
}

export function toTrackerError(error: unknown, fallbackCode: ErrorCode): TrackerError {
  if (error instanceof TrackerError) {
    return error;
  }
  return new TrackerError(asMessage(error), { errorCode: fallbackCode, cause: error });
}
