/**
 * Raised when a value falls outside the domain an operation accepts.
 * `field` names the argument and `value` carries what was passed in.
 */
export class InvalidInputError extends Error {
  readonly field: string;
  readonly value: unknown;

  constructor(field: string, value: unknown, requirement: string) {
    super(`${field} ${requirement} (got ${String(value)})`);
    this.name = 'InvalidInputError';
    this.field = field;
    this.value = value;
  }
}

export class InvalidOddsError extends InvalidInputError {
  constructor(field: string, value: unknown, requirement: string) {
    super(field, value, requirement);
    this.name = 'InvalidOddsError';
  }
}

export class InvalidProbabilityError extends InvalidInputError {
  constructor(field: string, value: unknown, requirement: string) {
    super(field, value, requirement);
    this.name = 'InvalidProbabilityError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
