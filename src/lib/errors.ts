/**
 * Standardized Error Handling
 *
 * Every fatal condition raised while rebuilding an experiment carries a code
 * from the table below. Codes are grouped by kind:
 * - missing_input: an input file the caller asked for does not exist
 * - schema: the extract's columns or cells do not match the expected layout
 * - structural_integrity: the data contradicts itself (a player in two
 *   groups, a sale without a cumulative increase, ...)
 *
 * Recoverable conditions are not errors; they go to the build report.
 */

export type DataErrorKind = "missing_input" | "schema" | "structural_integrity";

/**
 * Standard error codes mapped to their kind
 */
export const ErrorCodes = {
  // Missing input
  MISSING_INPUT: { kind: "missing_input", code: "missing_input" },

  // Schema
  SCHEMA_MISMATCH: { kind: "schema", code: "schema_mismatch" },
  INVALID_CELL: { kind: "schema", code: "invalid_cell" },
  CSV_PARSE_FAILED: { kind: "schema", code: "csv_parse_failed" },

  // Structural integrity
  GROUP_CONFLICT: { kind: "structural_integrity", code: "group_conflict" },
  SOLD_TRANSITION_INVALID: {
    kind: "structural_integrity",
    code: "sold_transition_invalid",
  },
  SOLD_NOT_MONOTONIC: {
    kind: "structural_integrity",
    code: "sold_not_monotonic",
  },
  DUPLICATE_OBSERVATION: {
    kind: "structural_integrity",
    code: "duplicate_observation",
  },
  DUPLICATE_LABEL: { kind: "structural_integrity", code: "duplicate_label" },
} as const satisfies Record<string, { kind: DataErrorKind; code: string }>;

export type DataErrorCode = keyof typeof ErrorCodes;

export class MarketDataError extends Error {
  public readonly code: string;
  public readonly kind: DataErrorKind;
  public readonly details: Record<string, unknown>;

  constructor(
    errorCode: DataErrorCode,
    message: string,
    details: Record<string, unknown> = {},
  ) {
    const { code, kind } = ErrorCodes[errorCode];
    super(`${code}: ${message}`);
    this.name = "MarketDataError";
    this.code = code;
    this.kind = kind;
    this.details = details;
  }
}

/**
 * Helper to throw a coded error; never returns.
 */
export function throwDataError(
  errorCode: DataErrorCode,
  message: string,
  details?: Record<string, unknown>,
): never {
  throw new MarketDataError(errorCode, message, details);
}

export function isMarketDataError(err: unknown): err is MarketDataError {
  return err instanceof MarketDataError;
}

/**
 * Render any thrown value as a message string.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Normalize a thrown value into an Error instance for logging.
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
