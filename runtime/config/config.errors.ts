import { ERROR_CODES } from "../../src/core/errors/canonical_error_codes";

export class ConfigurationError extends Error {
  readonly kind = "ConfigurationError";
  readonly errorCode = ERROR_CODES.E_CONFIGURATION;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = "ConfigurationError";
    if (options && "cause" in options) {
      (this as Error & { cause?: unknown }).cause = options.cause;
    }
  }
}
