/**
 * Raised when a date or time cell carries a value that cannot be parsed.
 * The caller decides whether to skip the cell or abort the read.
 */
export class InvalidValueError extends Error {
  readonly code = 'INVALID_VALUE';

  constructor(readonly value: string) {
    super(`Invalid cell value: "${value}"`);
    this.name = 'InvalidValueError';
  }
}
