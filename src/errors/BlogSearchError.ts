export type BlogSearchErrorKind =
  | 'InvalidQuery'
  | 'InvalidArgument'
  | 'RequestTimeout'
  | 'EmptyResponse'
  | 'DeserializationFailure'
  | 'ServiceUnavailable'
  | 'UnknownApiKey'
  | 'UnauthorizedApiKey'
  | 'UnknownApiError'
  | 'GenericRequestFailure';

/**
 * クライアントが呼び出し元に返す全エラーの基底クラス。
 * `kind` で種類を判別でき、元の例外は `cause` に保持される。
 */
export class BlogSearchError extends Error {
  constructor(
    public readonly kind: BlogSearchErrorKind,
    message: string,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'BlogSearchError';
  }
}

export class InvalidQueryError extends BlogSearchError {
  constructor(message: string) {
    super('InvalidQuery', message);
    this.name = 'InvalidQueryError';
  }
}

export class InvalidArgumentError extends BlogSearchError {
  constructor(public readonly argumentName: string) {
    super('InvalidArgument', `Argument "${argumentName}" must not be null`);
    this.name = 'InvalidArgumentError';
  }
}

export class RequestTimeoutError extends BlogSearchError {
  constructor(cause?: unknown) {
    super('RequestTimeout', 'The request has timed out', cause);
    this.name = 'RequestTimeoutError';
  }
}

export class EmptyResponseError extends BlogSearchError {
  constructor(cause?: unknown) {
    super('EmptyResponse', 'empty response from server', cause);
    this.name = 'EmptyResponseError';
  }
}

export class DeserializationFailureError extends BlogSearchError {
  constructor(cause: unknown) {
    super(
      'DeserializationFailure',
      "Couldn't deserialize API response. See the cause for details",
      cause
    );
    this.name = 'DeserializationFailureError';
  }
}

export class ServiceUnavailableError extends BlogSearchError {
  constructor(cause?: unknown) {
    super(
      'ServiceUnavailable',
      'Twingly Search API reports that the service is unavailable',
      cause
    );
    this.name = 'ServiceUnavailableError';
  }
}

export class UnknownApiKeyError extends BlogSearchError {
  constructor(cause?: unknown) {
    super('UnknownApiKey', 'The supplied API key does not exist', cause);
    this.name = 'UnknownApiKeyError';
  }
}

export class UnauthorizedApiKeyError extends BlogSearchError {
  constructor(cause?: unknown) {
    super(
      'UnauthorizedApiKey',
      'The supplied API key is not authorized for this query',
      cause
    );
    this.name = 'UnauthorizedApiKeyError';
  }
}

export class UnknownApiError extends BlogSearchError {
  constructor(
    public readonly responseBody: string,
    cause?: unknown
  ) {
    super(
      'UnknownApiError',
      `Twingly Search API returned an unknown error: ${responseBody}`,
      cause
    );
    this.name = 'UnknownApiError';
  }
}

export class GenericRequestError extends BlogSearchError {
  constructor(cause: unknown, message?: string) {
    super(
      'GenericRequestFailure',
      message ||
        `Request to Twingly Search API failed: ${
          cause instanceof Error ? cause.message : String(cause)
        }`,
      cause
    );
    this.name = 'GenericRequestError';
  }
}

// パーサー内部用。クライアントの外には出さずに ErrorMapper で変換する
export class DeserializationError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'DeserializationError';
  }
}

export function isBlogSearchError(error: unknown): error is BlogSearchError {
  return error instanceof BlogSearchError;
}
