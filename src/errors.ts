export interface ErrorContext {
  /** Endpoint name (e.g. "routers") or the raw path for ad-hoc requests */
  endpoint?: string;
  /** Query parameters sent with the failing request */
  query?: Record<string, string>;
  /** Number of attempts made before giving up */
  attempts?: number;
}

/** Base class for every error raised by the client */
export class NcmError extends Error {
  readonly endpoint?: string;
  readonly query?: Record<string, string>;
  readonly attempts?: number;

  constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.endpoint = context.endpoint;
    this.query = context.query;
    this.attempts = context.attempts;
  }
}

/** Missing or incomplete credentials. Raised before any network call. */
export class ConfigurationError extends NcmError {}

/** The server answered with a non-2xx status */
export class ApiError extends NcmError {
  /** Server's Retry-After hint, when it sent one */
  readonly retryAfterMs?: number;

  constructor(
    message: string,
    readonly status: number | undefined,
    readonly body: unknown,
    context: ErrorContext & { retryAfterMs?: number } = {},
  ) {
    super(message, context);
    this.retryAfterMs = context.retryAfterMs;
  }
}

/** 401 / 403 */
export class AuthError extends ApiError {}

/** 404 on a single-resource read */
export class NotFoundError extends ApiError {}

/** 429 after retries ran out */
export class RateLimitError extends ApiError {}

/** 5xx after retries ran out */
export class ServerError extends ApiError {}

/** Any other 4xx, or a query rejected before it was sent (status undefined) */
export class RequestError extends ApiError {}

/** Connection failure or timeout */
export class TransportError extends NcmError {}

/**
 * A walk or chunk set stopped early. `records` holds everything fetched
 * before the failure; `cause` is the error that stopped it.
 */
export class PartialResultError<T = unknown> extends NcmError {
  /** Index of the failing chunk when the walk was part of a chunked query */
  readonly chunk?: number;

  constructor(
    readonly records: T[],
    readonly pages: number,
    cause: unknown,
    context: ErrorContext & { chunk?: number } = {},
  ) {
    super(
      `Fetch stopped after ${records.length} records (${pages} pages): ${describeCause(cause)}`,
      context,
      { cause },
    );
    this.chunk = context.chunk;
  }
}

/** Whether the dispatcher may retry after this error */
export function isRetryable(err: unknown): boolean {
  return (
    err instanceof TransportError ||
    err instanceof RateLimitError ||
    err instanceof ServerError
  );
}

/** JSON-friendly detail for printing an error at the CLI / MCP surfaces */
export function errorDetail(err: unknown): Record<string, unknown> {
  if (err instanceof PartialResultError) {
    return {
      error: err.message,
      partial: true,
      fetched: err.records.length,
      chunk: err.chunk,
      detail: errorDetail(err.cause),
    };
  }
  if (err instanceof ApiError) {
    return {
      error: err.message,
      status: err.status,
      endpoint: err.endpoint,
      attempts: err.attempts,
      detail: err.body,
    };
  }
  if (err instanceof NcmError) {
    return { error: err.message, endpoint: err.endpoint, attempts: err.attempts };
  }
  return { error: err instanceof Error ? err.message : String(err) };
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
