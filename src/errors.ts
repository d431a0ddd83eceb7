/**
 * Error taxonomy shared by the assembler, the store and the HTTP layer.
 *
 * `status` is the HTTP status the API answers with; `retryable` tells a
 * caller whether the same request may succeed later ("try again") or is
 * wrong as submitted ("bad input").
 */

export type ErrorCode =
  | 'validation_error'
  | 'parse_error'
  | 'insufficient_comments'
  | 'generation_error'
  | 'insufficient_generation'
  | 'evaluation_failed'
  | 'fetch_failed'
  | 'not_found'
  | 'duplicate_post'
  | 'unauthorized';

export class ReplicantError extends Error {
  readonly status: number;
  readonly code: ErrorCode;
  readonly retryable: boolean;

  constructor(
    message: string,
    status: number,
    code: ErrorCode,
    options: { retryable?: boolean; cause?: unknown } = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ReplicantError';
    this.status = status;
    this.code = code;
    this.retryable = options.retryable ?? false;
  }
}

export class ValidationError extends ReplicantError {
  constructor(message: string) {
    super(message, 400, 'validation_error');
    this.name = 'ValidationError';
  }
}

/** Upstream Reddit data did not have the expected shape */
export class ParseError extends ReplicantError {
  constructor(message: string, cause?: unknown) {
    super(message, 422, 'parse_error', { cause });
    this.name = 'ParseError';
  }
}

export class InsufficientCommentsError extends ReplicantError {
  readonly required: number;
  readonly available: number;

  constructor(required: number, available: number) {
    super(
      `Post has ${available} usable comments, ${required} are required for a round`,
      422,
      'insufficient_comments'
    );
    this.name = 'InsufficientCommentsError';
    this.required = required;
    this.available = available;
  }
}

export class GenerationError extends ReplicantError {
  constructor(message: string, options: { cause?: unknown; code?: ErrorCode; retryable?: boolean } = {}) {
    super(message, 502, options.code ?? 'generation_error', {
      retryable: options.retryable ?? true,
      cause: options.cause,
    });
    this.name = 'GenerationError';
  }
}

export class InsufficientGenerationError extends GenerationError {
  readonly requested: number;
  readonly received: number;

  constructor(requested: number, received: number) {
    super(
      `Generated ${received} of ${requested} synthetic comments after a compensating request`,
      { code: 'insufficient_generation' }
    );
    this.name = 'InsufficientGenerationError';
    this.requested = requested;
    this.received = received;
  }
}

/** The judge model could not score a stored round */
export class EvaluationError extends ReplicantError {
  constructor(message: string, cause?: unknown) {
    super(message, 502, 'evaluation_failed', { retryable: true, cause });
    this.name = 'EvaluationError';
  }
}

export class FetchError extends ReplicantError {
  constructor(message: string, cause?: unknown) {
    super(message, 502, 'fetch_failed', { retryable: true, cause });
    this.name = 'FetchError';
  }
}

export class NotFoundError extends ReplicantError {
  constructor(message: string) {
    super(message, 404, 'not_found');
    this.name = 'NotFoundError';
  }
}

export class DuplicatePostError extends ReplicantError {
  constructor(url: string) {
    super(`This Reddit post has already been processed: ${url}`, 409, 'duplicate_post');
    this.name = 'DuplicatePostError';
  }
}

export class UnauthorizedError extends ReplicantError {
  constructor(message = 'Missing or unknown token') {
    super(message, 401, 'unauthorized');
    this.name = 'UnauthorizedError';
  }
}

export function isReplicantError(value: unknown): value is ReplicantError {
  return value instanceof ReplicantError;
}
