/**
 * Raised when an argument is outside the domain a formula is defined on
 * (e.g. hs-CRP ≤ −1, where ln(crp + 1) is undefined).
 *
 * The computation aborts; no partial result is returned.
 */
export class InvalidInputError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = 'InvalidInputError';
    this.field = field;
  }
}

export function isInvalidInputError(error: unknown): error is InvalidInputError {
  return error instanceof InvalidInputError;
}
