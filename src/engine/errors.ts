export type ConversionErrorCode =
  | "MISSING_SELLER_STATE"
  | "NO_ROWS"
  | "UNSUPPORTED_FILE"
  | "UNREADABLE_FILE";

/**
 * Batch-level failure. Field and per-file problems never throw this;
 * they fall back to defaults or become ConversionWarnings.
 */
export class ConversionError extends Error {
  readonly code: ConversionErrorCode;

  constructor(code: ConversionErrorCode, message: string) {
    super(message);
    this.name = "ConversionError";
    this.code = code;
  }
}

export function isConversionError(err: unknown): err is ConversionError {
  return err instanceof ConversionError;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
