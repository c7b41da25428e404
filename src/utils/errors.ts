export type ConverterErrorKind =
  | 'ValidationError'
  | 'IOError'
  | 'TimeoutError'
  | 'ConversionError'
  | 'EnvironmentError'
  | 'UnexpectedError';

/**
 * Base class for every failure the conversion endpoint reports.
 * `kind` and `statusCode` drive the HTTP error response.
 */
export abstract class ConverterError extends Error {
  abstract readonly kind: ConverterErrorKind;
  abstract readonly statusCode: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends ConverterError {
  readonly kind = 'ValidationError';
  readonly statusCode = 400;
}

export class IOError extends ConverterError {
  readonly kind = 'IOError';
  readonly statusCode = 500;
}

export class TimeoutError extends ConverterError {
  readonly kind = 'TimeoutError';
  readonly statusCode = 504;
}

export class ConversionError extends ConverterError {
  readonly kind = 'ConversionError';
  readonly statusCode = 500;
}

/** The container runtime (or the tool inside it) could not run at all. */
export class EnvironmentError extends ConverterError {
  readonly kind = 'EnvironmentError';
  readonly statusCode = 500;
}

export class UnexpectedError extends ConverterError {
  readonly kind = 'UnexpectedError';
  readonly statusCode = 500;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function toConverterError(err: unknown): ConverterError {
  if (err instanceof ConverterError) return err;
  return new UnexpectedError(`An unexpected error occurred: ${errorMessage(err)}`, { cause: err });
}

export interface ErrorBody {
  error: ConverterErrorKind;
  detail: string;
}

export function toErrorBody(err: ConverterError): ErrorBody {
  return { error: err.kind, detail: err.message };
}
