// ============================================================================
// @numerals/core — Error Types
// ============================================================================

/**
 * Base error class for all numeral codec errors.
 */
export class NumeralError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NumeralError';
  }
}

// ---------------------------------------------------------------------------
// Configuration Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when the requested options cannot express the input, or when an
 * alphabet / sign symbol is unusable.
 */
export class ConfigurationError extends NumeralError {
  public readonly option?: string;

  constructor(message: string, option?: string) {
    super(message);
    this.name = 'ConfigurationError';
    this.option = option;
  }
}

// ---------------------------------------------------------------------------
// Input Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when input contains symbols outside the accepted set, or when the
 * sign marker is misplaced.
 */
export class InvalidInputError extends NumeralError {
  public readonly input?: string;
  public readonly symbol?: string;

  constructor(message: string, options?: { input?: string; symbol?: string }) {
    super(message);
    this.name = 'InvalidInputError';
    this.input = options?.input;
    this.symbol = options?.symbol;
  }
}

/**
 * Thrown when strict-mode grammar validation rejects a numeral.
 */
export class FormatError extends NumeralError {
  public readonly input: string;

  constructor(input: string) {
    super(`"${input}" is not a canonical Roman numeral.`);
    this.name = 'FormatError';
    this.input = input;
  }
}

/**
 * Thrown when input is well-formed but uses a notation the decoder cannot
 * resolve (Claudian / apostrophus large numbers).
 */
export class UnsupportedError extends NumeralError {
  public readonly input: string;

  constructor(input: string, message?: string) {
    super(message ?? `Decoding large-number notation is not supported: "${input}".`);
    this.name = 'UnsupportedError';
    this.input = input;
  }
}
