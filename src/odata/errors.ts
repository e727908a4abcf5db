/**
 * Error taxonomy for a sync run.
 * Every failure the pager or a sink can surface extends `SyncError`, so callers
 * can tell "could not query" apart from programming errors.
 */
export class SyncError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The request never produced a response (DNS, connection reset, timeout). */
export class NetworkError extends SyncError {
  constructor(
    readonly url: string,
    cause: unknown
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Request to ${url} failed: ${detail}`, { cause });
  }
}

export class HttpStatusError extends SyncError {
  constructor(
    readonly status: number,
    readonly body: string,
    readonly url: string
  ) {
    super(`HTTP ${status} from ${url}`);
  }
}

/** 401/403: the credentials are wrong or lack access. User-correctable. */
export class AuthenticationError extends HttpStatusError {
  constructor(status: number, body: string, url: string) {
    super(status, body, url);
    this.message = `Authentication failed (HTTP ${status}) for ${url}; check the configured credentials`;
  }
}

/** The server rejected the requested field set and no single field could be blamed. */
export class SchemaMismatchError extends SyncError {
  constructor(
    message: string,
    readonly field?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class DecodeError extends SyncError {
  constructor(
    readonly url: string,
    detail: string,
    options?: { cause?: unknown }
  ) {
    super(`Unexpected response from ${url}: ${detail}`, options);
  }
}

export class IterationLimitExceeded extends SyncError {
  constructor(readonly maxPages: number) {
    super(`Stopped after ${maxPages} pages without reaching a stopping condition`);
  }
}

export const isAuthFailure = (status: number): boolean => status === 401 || status === 403;
