import { logger } from '../../utils/logger';
import {
  errorMessage,
  ExternalServiceError,
  RateLimitedError,
  TransportError,
} from '../../utils/errors';

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';

export interface TransportRequest {
  method: HttpMethod;
  path: string;
  query?: Record<string, string | number | undefined>;
  body?: unknown;
}

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface RetryingTransportOptions {
  baseUrl: string;
  apiKey: string;
  maxAttempts?: number;
  baseDelayMs?: number;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

const DEFAULT_MAX_ATTEMPTS = 5;
const DEFAULT_BASE_DELAY_MS = 1000;
const JITTER_MS = 1000;

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class RetryingTransport {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly timeoutMs?: number;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(options: RetryingTransportOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.apiKey = options.apiKey;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    this.baseDelayMs = options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
  }

  /**
   * Resolves with the parsed JSON body, or null for an empty body.
   * Only 429 is retried; every other failure surfaces on the first attempt.
   */
  async request(req: TransportRequest): Promise<unknown> {
    const url = this.buildUrl(req);
    const label = `${req.method} ${req.path}`;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      logger.debug('Booking API request', { request: label, attempt });

      let res: Response;
      let text: string;
      try {
        res = await this.fetchImpl(url, {
          method: req.method,
          headers: { 'Content-Type': 'application/json' },
          body: req.body === undefined ? undefined : JSON.stringify(req.body),
          signal: this.timeoutMs ? AbortSignal.timeout(this.timeoutMs) : undefined,
        });
        text = await res.text();
      } catch (error) {
        logger.error('Booking API unreachable', { request: label, error: errorMessage(error) });
        throw new TransportError(`${label} failed: ${errorMessage(error)}`, error);
      }

      if (res.status === 429) {
        if (attempt === this.maxAttempts) {
          logger.error('Booking API rate limit retries exhausted', { request: label, attempts: attempt });
          throw new RateLimitedError(attempt, text);
        }

        const delay = this.backoffDelay(attempt + 1);
        logger.warn('Booking API rate limited, backing off', {
          request: label,
          attempt,
          delay: Math.round(delay),
        });
        await this.sleep(delay);
        continue;
      }

      if (!res.ok) {
        throw new ExternalServiceError(res.status, extractMessage(text), text);
      }

      return parseBody(text, res.status);
    }

    throw new RateLimitedError(this.maxAttempts);
  }

  /** Delay before attempt `k` (k >= 2): base * 2^(k-2) plus up to one second of jitter. */
  backoffDelay(nextAttempt: number): number {
    return this.baseDelayMs * Math.pow(2, nextAttempt - 2) + this.random() * JITTER_MS;
  }

  private buildUrl(req: TransportRequest): string {
    const url = new URL(`${this.baseUrl}${req.path}`);
    url.searchParams.set('apiKey', this.apiKey);
    for (const [key, value] of Object.entries(req.query ?? {})) {
      if (value !== undefined) url.searchParams.set(key, String(value));
    }
    return url.toString();
  }
}

function parseBody(text: string, status: number): unknown {
  if (text.trim() === '') return null;
  try {
    return JSON.parse(text);
  } catch {
    throw new ExternalServiceError(status, 'Malformed response from booking API', text);
  }
}

function extractMessage(text: string): string {
  const parsed = tryParseJson(text);
  if (parsed && typeof parsed === 'object' && 'message' in parsed && typeof parsed.message === 'string') {
    return parsed.message;
  }
  return 'Unknown error';
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
