/**
 * Earnings Quality — Error Taxonomy
 *
 * Data conditions (missing fields, short history, small denominators,
 * score overflow) are carried as row data and flags, never thrown.
 * Only precondition violations raise an EngineError.
 */

export type EngineErrorCode =
  | "MISSING_INPUT_FIELD"
  | "INSUFFICIENT_HISTORY"
  | "DEGENERATE_DENOMINATOR"
  | "SCORE_OVERFLOW"
  | "INVALID_SERIES"
  | "INVALID_PERIOD_LABEL"
  | "INVALID_CONFIG"
  | "INVALID_INPUT";

export class EngineError extends Error {
  constructor(
    public readonly code: EngineErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "EngineError";
  }
}

/**
 * Classify a thrown value into a structured EngineErrorCode.
 */
export function classifyEngineError(err: unknown): EngineErrorCode {
  if (err instanceof EngineError) return err.code;
  return "INVALID_SERIES";
}
