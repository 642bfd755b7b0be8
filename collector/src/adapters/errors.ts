/**
 * Errors raised by the search API client
 */

export class HttpError extends Error {
  constructor(public readonly status: number, message: string) {
    super(message);
    this.name = "HttpError";
  }
}

/** 429 from the API; retried with backoff */
export class RateLimitError extends HttpError {
  constructor(message = "Rate limit exceeded") {
    super(429, message);
    this.name = "RateLimitError";
  }
}

/** 5xx from the API; retried with backoff */
export class ServerError extends HttpError {
  constructor(status: number) {
    super(status, `Server error: ${status}`);
    this.name = "ServerError";
  }
}

export class AuthenticationError extends HttpError {
  constructor(status: number, message: string) {
    super(status, message);
    this.name = "AuthenticationError";
  }
}

export function isRetryable(error: unknown): boolean {
  return error instanceof RateLimitError || error instanceof ServerError;
}
