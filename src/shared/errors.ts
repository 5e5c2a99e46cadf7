export type ConfigurationErrorCode =
  | "RATE_OUT_OF_RANGE"
  | "BRACKET_BOUNDS_INVALID"
  | "BRACKET_OVERLAP"
  | "BRACKET_NOT_FOUND"
  | "SCHEDULE_WOULD_BE_EMPTY";

/** Raised at the administrative mutation boundary; the settings it was checking stay untouched. */
export class ConfigurationError extends Error {
  readonly code: ConfigurationErrorCode;
  readonly details: Record<string, unknown> | null;

  constructor(code: ConfigurationErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "ConfigurationError";
    this.code = code;
    this.details = details ?? null;
  }
}

export class CalculationError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = "CalculationError";
    this.code = code;
  }
}
