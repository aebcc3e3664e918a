/**
 * Error thrown when fetching a page fails: network failure, timeout,
 * HTTP error status, redirect trouble or a non-HTML response.
 */
export class FetchError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly statusCode?: number,
    public readonly headers?: Record<string, string>,
  ) {
    super(message);
    this.name = 'FetchError';
  }
}

/**
 * Coerce an unknown thrown value into an Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
