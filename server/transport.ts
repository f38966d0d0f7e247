// =============================================================================
// HTTP transport — authenticated JSON requests with retry/backoff
//
//   429 (or a throttling message)  → exponential backoff with jitter,
//                                    up to maxRateLimitRetries, then RateLimitError
//   5xx / network failure          → fixed small number of retries,
//                                    then ServerError / ConnectionError
//   other 4xx                      → fail immediately
// =============================================================================

import {
  ConnectionError,
  FlightDataError,
  RateLimitError,
  ServerError,
  classifyHttpStatus,
  errorForStatus,
} from './errors.js';
import { createLogger, type Logger } from './logger.js';

export type QueryValue = string | number | boolean | readonly (string | number)[] | null | undefined;
export type QueryParams = Record<string, QueryValue>;

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type TransportOptions = {
  token: string;
  baseUrl?: string;
  fetchImpl?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  maxRateLimitRetries?: number;
  maxServerRetries?: number;
  baseDelayMs?: number;
  timeoutMs?: number;
  logger?: Logger;
};

export type RequestStats = {
  endpoint: string;
  status: number | null;
  retries: number;
  delays: number[];
};

const DEFAULT_BASE_URL = 'https://fr24api.flightradar24.com';

export const defaultSleep = (ms: number): Promise<void> =>
  new Promise(resolve => setTimeout(resolve, ms));

/**
 * Builds the query string. Arrays become comma-joined values, nullish values
 * are left out.
 */
export function buildQuery(params: QueryParams = {}): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === null || value === undefined) continue;
    if (Array.isArray(value)) {
      if (value.length > 0) search.set(key, value.join(','));
      continue;
    }
    search.set(key, String(value));
  }
  const qs = search.toString();
  return qs ? `?${qs}` : '';
}

/** Delay before retry number `attempt` (0-based): base·2^attempt plus jitter in [0, base). */
export function backoffDelay(attempt: number, baseDelayMs: number, random: () => number): number {
  const jitter = Math.floor(random() * baseDelayMs);
  return baseDelayMs * 2 ** attempt + Math.min(jitter, Math.max(baseDelayMs - 1, 0));
}

/** Retry-After as seconds or an HTTP date. */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | null {
  if (!header) return null;
  const seconds = Number(header);
  if (Number.isFinite(seconds) && seconds >= 0) return Math.round(seconds * 1000);
  const at = Date.parse(header);
  if (Number.isNaN(at)) return null;
  return Math.max(0, at - now);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function extractMessage(body: unknown, fallback: string): string {
  if (typeof body === 'string' && body.trim()) return body.trim().slice(0, 300);
  if (isRecord(body)) {
    for (const key of ['message', 'error', 'details', 'detail']) {
      const value = body[key];
      if (typeof value === 'string' && value.trim()) return value.trim();
    }
  }
  return fallback;
}

async function readBody(res: Response): Promise<unknown> {
  const text = await res.text();
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

export class FlightDataTransport {
  private readonly token: string;
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;
  private readonly maxRateLimitRetries: number;
  private readonly maxServerRetries: number;
  private readonly baseDelayMs: number;
  private readonly timeoutMs: number;
  private readonly log: Logger;

  /** Stats for the most recent request, for callers that report retries. */
  lastRequest: RequestStats | null = null;

  constructor(options: TransportOptions) {
    this.token = options.token;
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
    this.maxRateLimitRetries = options.maxRateLimitRetries ?? 5;
    this.maxServerRetries = options.maxServerRetries ?? 2;
    this.baseDelayMs = options.baseDelayMs ?? 1000;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.log = options.logger ?? createLogger({ tag: 'Transport' });
  }

  /** GET `endpoint` and return the parsed JSON body (null for an empty body). */
  async request(endpoint: string, params: QueryParams = {}): Promise<unknown> {
    const url = `${this.baseUrl}${endpoint}${buildQuery(params)}`;
    const stats: RequestStats = { endpoint, status: null, retries: 0, delays: [] };
    this.lastRequest = stats;

    let rateLimitRetries = 0;
    let serverRetries = 0;

    for (;;) {
      let res: Response;
      let body: unknown;
      // A reset or timeout while the body streams in is a network failure too
      try {
        res = await this.fetchImpl(url, {
          method: 'GET',
          headers: {
            Accept: 'application/json',
            'Accept-Version': 'v1',
            Authorization: `Bearer ${this.token}`,
          },
          signal: AbortSignal.timeout(this.timeoutMs),
        });
        body = await readBody(res);
      } catch (err) {
        if (serverRetries < this.maxServerRetries) {
          const delay = backoffDelay(serverRetries, this.baseDelayMs, this.random);
          serverRetries++;
          await this.retryAfter(stats, delay, `network error: ${String(err)}`);
          continue;
        }
        this.log.error(`GET ${endpoint} failed: ${String(err)} (retries=${stats.retries})`);
        throw new ConnectionError(`Could not reach ${endpoint}: ${err instanceof Error ? err.message : String(err)}`, {
          endpoint,
          retries: stats.retries,
          cause: err,
        });
      }

      stats.status = res.status;
      const kind = classifyHttpStatus(res.status, extractMessage(body, ''));

      if (kind === 'ok') {
        this.log.debug(`GET ${endpoint} -> ${res.status} (retries=${stats.retries})`);
        return body;
      }

      const message = extractMessage(body, `HTTP ${res.status} from ${endpoint}`);

      if (kind === 'rate-limit') {
        const retryAfterMs = parseRetryAfter(res.headers.get('retry-after'));
        if (rateLimitRetries < this.maxRateLimitRetries) {
          const computed = backoffDelay(rateLimitRetries, this.baseDelayMs, this.random);
          const previous = stats.delays.length > 0 ? stats.delays[stats.delays.length - 1] : 0;
          // Retry-After is a floor; the schedule still grows every attempt
          const delay = Math.max(computed, retryAfterMs ?? 0, previous + 1);
          rateLimitRetries++;
          await this.retryAfter(stats, delay, `rate limited (HTTP ${res.status})`);
          continue;
        }
        this.log.error(`GET ${endpoint} -> ${res.status}, rate limit retries exhausted (retries=${stats.retries})`);
        throw new RateLimitError(message, {
          endpoint,
          statusCode: res.status,
          retries: stats.retries,
          retryAfterMs,
        });
      }

      if (kind === 'server' && serverRetries < this.maxServerRetries) {
        const delay = backoffDelay(serverRetries, this.baseDelayMs, this.random);
        serverRetries++;
        await this.retryAfter(stats, delay, `HTTP ${res.status}`);
        continue;
      }

      const error: FlightDataError = kind === 'server'
        ? new ServerError(message, { endpoint, statusCode: res.status, retries: stats.retries })
        : errorForStatus(res.status, message, { endpoint, retries: stats.retries });
      this.log.warn(`GET ${endpoint} -> ${res.status} ${error.name}: ${message} (retries=${stats.retries})`);
      throw error;
    }
  }

  private async retryAfter(stats: RequestStats, delay: number, reason: string): Promise<void> {
    stats.retries++;
    stats.delays.push(delay);
    this.log.warn(`GET ${stats.endpoint} ${reason}; retry ${stats.retries} in ${delay}ms`);
    await this.sleep(delay);
  }
}
