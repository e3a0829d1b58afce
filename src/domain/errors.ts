export type FinanceErrorCode =
  | 'VALIDATION'
  | 'NOT_FOUND'
  | 'AUTHORIZATION'
  | 'FORMAT'
  | 'STORAGE';

/** Base class for every error the CLI renders as a plain message. */
export abstract class FinanceError extends Error {
  abstract readonly code: FinanceErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends FinanceError {
  readonly code = 'VALIDATION';
}

export class NotFoundError extends FinanceError {
  readonly code = 'NOT_FOUND';
}

export class AuthorizationError extends FinanceError {
  readonly code = 'AUTHORIZATION';
}

export class FormatError extends FinanceError {
  readonly code = 'FORMAT';
}

export class StorageError extends FinanceError {
  readonly code = 'STORAGE';
}

export function isFinanceError(e: unknown): e is FinanceError {
  return e instanceof FinanceError;
}
