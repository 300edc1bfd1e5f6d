/**
 * Stable error codes for programmatic error handling.
 * Scripts should match on these codes, not error message strings.
 */
export type ErrorCode =
  | 'HOME_UNAVAILABLE'
  | 'STORE_UNAVAILABLE'
  | 'STORAGE_ERROR'
  | 'CORRUPTED_PRIORITY'
  | 'CORRUPTED_DATE'
  | 'INVALID_PRIORITY'
  | 'INVALID_DATE'
  | 'INVALID_ID'
  | 'TODO_NOT_FOUND';

const CORRUPTION_CODES: ReadonlySet<ErrorCode> = new Set<ErrorCode>(['CORRUPTED_PRIORITY', 'CORRUPTED_DATE']);

/**
 * CltodoError - Error class with stable error codes.
 *
 * @example
 * ```typescript
 * throw new CltodoError(
 *   'INVALID_DATE',
 *   `Invalid date: ${value}`,
 *   { value }
 * );
 * ```
 */
export class CltodoError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'CltodoError';

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, CltodoError.prototype);
  }

  /**
   * True when the error reports a stored row that cannot be loaded.
   */
  get isCorruption(): boolean {
    return CORRUPTION_CODES.has(this.code);
  }

  /**
   * Returns a JSON representation of the error for --json output.
   */
  toJSON() {
    return {
      error: true,
      code: this.code,
      message: this.message,
      context: this.context
    };
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
