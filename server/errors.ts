// =============================================================================
// Error taxonomy
//
// Every failure the client, normalizer or exporter raises is a FlightDataError.
// The transport layer picks the subclass from the HTTP status; callers can
// branch on `instanceof` without inspecting messages.
// =============================================================================

import type { FlightSummary } from './types.js';

export type ErrorDetails = {
  statusCode?: number;
  endpoint?: string;
  retries?: number;
  cause?: unknown;
};

export class FlightDataError extends Error {
  readonly statusCode: number | null;
  readonly endpoint: string | null;
  readonly retries: number;

  constructor(message: string, details: ErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = new.target.name;
    this.statusCode = details.statusCode ?? null;
    this.endpoint = details.endpoint ?? null;
    this.retries = details.retries ?? 0;
  }
}

/** Missing, bad or expired API token. */
export class AuthenticationError extends FlightDataError {}

export class NotFoundError extends FlightDataError {}

/** Still throttled after the retry budget ran out. */
export class RateLimitError extends FlightDataError {
  readonly retryAfterMs: number | null;

  constructor(message: string, details: ErrorDetails & { retryAfterMs?: number | null } = {}) {
    super(message, details);
    this.retryAfterMs = details.retryAfterMs ?? null;
  }
}

/** 4xx other than auth, not-found and rate limiting. Never retried. */
export class ClientError extends FlightDataError {}

/** 5xx after the retry budget ran out. */
export class ServerError extends FlightDataError {}

/** Network, DNS, TLS or timeout failure before a response arrived. */
export class ConnectionError extends FlightDataError {}

/** Malformed caller input: dates, bounding boxes, coordinates, identifiers. */
export class ValidationError extends FlightDataError {}

export class AmbiguousFlightError extends FlightDataError {
  readonly candidates: readonly FlightSummary[];

  constructor(message: string, candidates: readonly FlightSummary[]) {
    super(message);
    this.candidates = candidates;
  }
}

/** A file artifact could not be written. Fatal to the bundle it belongs to. */
export class ExportError extends FlightDataError {
  readonly artifact: string;

  constructor(artifact: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to write ${artifact}: ${reason}`, { cause });
    this.artifact = artifact;
  }
}

// =============================================================================
// HTTP status → error class
// =============================================================================

const THROTTLE_PATTERN = /rate.?limit|too many requests|throttl/i;

export type StatusClass =
  | 'ok'
  | 'rate-limit'
  | 'server'
  | 'auth'
  | 'not-found'
  | 'validation'
  | 'client';

/**
 * Classify a response. `bodyMessage` is the upstream error text, used to spot
 * throttling signalled with a non-429 status.
 */
export function classifyHttpStatus(status: number, bodyMessage = ''): StatusClass {
  if (status >= 200 && status < 300) return 'ok';
  if (status === 429) return 'rate-limit';
  if ((status === 403 || status === 402) && THROTTLE_PATTERN.test(bodyMessage)) return 'rate-limit';
  if (status >= 500) return 'server';
  if (status === 401 || status === 403) return 'auth';
  if (status === 404) return 'not-found';
  if ((status === 400 || status === 422) && /validation/i.test(bodyMessage)) return 'validation';
  return 'client';
}

export function errorForStatus(
  status: number,
  message: string,
  details: ErrorDetails & { retryAfterMs?: number | null } = {},
): FlightDataError {
  const withStatus = { ...details, statusCode: status };
  switch (classifyHttpStatus(status, message)) {
    case 'rate-limit':
      return new RateLimitError(message, withStatus);
    case 'server':
      return new ServerError(message, withStatus);
    case 'auth':
      return new AuthenticationError(message, withStatus);
    case 'not-found':
      return new NotFoundError(message, withStatus);
    case 'validation':
      return new ValidationError(message, withStatus);
    default:
      return new ClientError(message, withStatus);
  }
}

// =============================================================================
// Error → HTTP response body (for the Express surface)
// =============================================================================

export type HttpErrorResponse = {
  status: number;
  body: Record<string, unknown>;
};

export function mapErrorToHttp(error: unknown): HttpErrorResponse {
  if (error instanceof AmbiguousFlightError) {
    return {
      status: 409,
      body: {
        error: error.message,
        candidates: error.candidates.map((c, index) => ({
          index,
          flightId: c.flightId,
          flightNumber: c.flightNumber,
          takeoff: c.takeoff,
          origin: c.origin,
          destination: c.destination,
        })),
      },
    };
  }
  if (error instanceof ValidationError) return { status: 400, body: { error: error.message } };
  if (error instanceof NotFoundError) return { status: 404, body: { error: error.message } };
  if (error instanceof RateLimitError) {
    const body: Record<string, unknown> = { error: 'Upstream rate limit exceeded' };
    if (error.retryAfterMs !== null) body.retryAfter = Math.ceil(error.retryAfterMs / 1000);
    return { status: 429, body };
  }
  // Only upstream 4xx text is safe to echo back; 5xx and auth failures stay generic
  if (error instanceof ClientError) return { status: 400, body: { error: error.message } };
  if (error instanceof AuthenticationError) {
    return { status: 502, body: { error: 'Upstream rejected the configured API token' } };
  }
  if (error instanceof ServerError || error instanceof ConnectionError) {
    return { status: 502, body: { error: 'Upstream unavailable' } };
  }
  return { status: 500, body: { error: 'Internal server error' } };
}
