/**
 * Error codes for comparisons that cannot be evaluated for the given operands.
 */
export enum CompareErrorCode {
  UNSUPPORTED_TYPE = 'unsupported_type',
  TYPE_MISMATCH = 'type_mismatch',
  UNHASHABLE = 'unhashable',
}

/**
 * Comparison error returned (never thrown) by engine operations.
 * The assertion layer decides whether it becomes a test failure.
 */
export class CompareError extends Error {
  public readonly code: CompareErrorCode;

  public constructor(message: string, code: CompareErrorCode) {
    super(message);
    this.name = 'CompareError';
    this.code = code;

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, CompareError.prototype);
  }

  /**
   * Convert the error to a JSON representation (useful for logging/debugging)
   * @returns JSON object containing error details
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
    };
  }

  public static unsupportedType(message: string): CompareError {
    return new CompareError(message, CompareErrorCode.UNSUPPORTED_TYPE);
  }

  public static typeMismatch(message: string): CompareError {
    return new CompareError(message, CompareErrorCode.TYPE_MISMATCH);
  }

  public static unhashable(typeName: string): CompareError {
    return new CompareError(
      `unsupported element type for comparison: ${typeName} cannot be used as a key`,
      CompareErrorCode.UNHASHABLE,
    );
  }
}
