export type ErrorKind =
  | 'InvalidArgument'
  | 'AlreadyExists'
  | 'ConfigParseError'
  | 'RequestFailed';

export class ApiRequestError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ApiRequestError';
    this.kind = kind;
  }
}

export function invalidArgument(message: string): ApiRequestError {
  return new ApiRequestError('InvalidArgument', message);
}

export function isApiRequestError(error: unknown): error is ApiRequestError {
  return error instanceof ApiRequestError;
}
