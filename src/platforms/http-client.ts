import got from 'got';

import { ApiError, AuthError, NetworkError, NotFoundError, RateLimited } from '../errors.js';
import { logger } from '../logger.js';
import type { Platform } from '../types.js';

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

export interface ApiRequest {
  method: HttpMethod;
  url: string;
  searchParams?: Record<string, string | number>;
  form?: Record<string, string>;
  json?: Record<string, unknown>;
  headers?: Record<string, string>;
}

export interface ApiResponse {
  statusCode: number;
  headers: Record<string, string | string[] | undefined>;
  body: string;
  /** Final URL after redirects */
  url: string;
}

/** Performs one HTTP exchange; never throws for an HTTP status */
export type RequestSender = (request: ApiRequest) => Promise<ApiResponse>;

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Merge parameters into the URL's own query string
 * (`next` page links already carry their paging parameters)
 */
export const withSearchParams = (url: string, searchParams?: Record<string, string | number>): string => {
  if (!searchParams) {
    return url;
  }
  const merged = new URL(url);
  for (const [key, value] of Object.entries(searchParams)) {
    merged.searchParams.set(key, String(value));
  }
  return merged.toString();
};

/**
 * got-backed sender
 * Status codes are returned, not thrown; retries are handled by ApiClient
 */
export const createGotSender = (timeoutMs: number): RequestSender => async request => {
  const response = await got(withSearchParams(request.url, request.searchParams), {
    method: request.method,
    form: request.form,
    json: request.json,
    headers: request.headers,
    throwHttpErrors: false,
    retry: {
      limit: 0 // We handle retries manually for better control
    },
    timeout: {
      request: timeoutMs
    }
  });

  return {
    statusCode: response.statusCode,
    headers: response.headers,
    body: response.body,
    url: response.url
  };
};

/** Source of bearer tokens; implemented by TokenStore */
export interface AccessTokenSource {
  getValidToken(platform: Platform): Promise<string>;
  invalidate(platform: Platform): void;
}

/**
 * Classification of an API error carried in a 2xx body
 * (Deezer reports most failures with HTTP 200)
 */
export type BodyFailure =
  | { kind: 'rate_limited' }
  | { kind: 'unauthorized' }
  | { kind: 'not_found'; message: string }
  | { kind: 'error'; message: string };

export interface ApiClientOptions {
  platform: Platform;
  tokens: AccessTokenSource;
  /** Attach a token to an outgoing request */
  authorize: (request: ApiRequest, accessToken: string) => ApiRequest;
  inspectBody?: (body: unknown) => BodyFailure | null;
  send?: RequestSender;
  sleep?: Sleep;
  now?: () => number;
  requestDelayMs?: number;
  requestTimeoutMs?: number;
  maxRateLimitRetries?: number;
  maxNetworkRetries?: number;
}

export interface RequestOptions {
  /** Public requests carry no token and never trigger authorization */
  auth: boolean;
}

const BASE_RETRY_DELAY_MS = 1000; // Start with 1 second
const MAX_RETRY_DELAY_MS = 300000; // Cap at 5 minutes

const headerValue = (value: string | string[] | undefined): string | undefined =>
  Array.isArray(value) ? value[0] : value;

const parseRetryAfterMs = (value: string | undefined): number | null => {
  if (!value) {
    return null;
  }
  const seconds = Number.parseInt(value, 10);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : null;
};

const parseBody = (text: string): unknown => {
  if (!text) {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
};

// JSON.parse yields any; the caller's type parameter describes the payload
const decodeJson = <T>(text: string): T => JSON.parse(text || 'null');

const describeBody = (body: unknown): string => {
  const text = typeof body === 'string' ? body : JSON.stringify(body);
  return (text ?? '').slice(0, 200);
};

/**
 * Rate-limited JSON API client shared by the platform clients
 * - minimum delay between consecutive requests
 * - HTTP 429: waits Retry-After (or exponential backoff) up to maxRateLimitRetries
 * - transport failures and 5xx: exponential backoff up to maxNetworkRetries
 * - HTTP 401: refreshes the token through the token source and retries once
 */
export class ApiClient {
  readonly platform: Platform;
  private readonly tokens: AccessTokenSource;
  private readonly authorize: (request: ApiRequest, accessToken: string) => ApiRequest;
  private readonly inspectBody: (body: unknown) => BodyFailure | null;
  private readonly send: RequestSender;
  private readonly sleep: Sleep;
  private readonly now: () => number;
  private readonly requestDelayMs: number;
  private readonly maxRateLimitRetries: number;
  private readonly maxNetworkRetries: number;
  private lastRequestAt: number | null = null;

  constructor(options: ApiClientOptions) {
    this.platform = options.platform;
    this.tokens = options.tokens;
    this.authorize = options.authorize;
    this.inspectBody = options.inspectBody ?? (() => null);
    this.send = options.send ?? createGotSender(options.requestTimeoutMs ?? 10000);
    this.sleep = options.sleep ?? sleep;
    this.now = options.now ?? Date.now;
    this.requestDelayMs = options.requestDelayMs ?? 100;
    this.maxRateLimitRetries = options.maxRateLimitRetries ?? 5;
    this.maxNetworkRetries = options.maxNetworkRetries ?? 3;
  }

  async get<T>(url: string, searchParams: Record<string, string | number> | undefined, options: RequestOptions): Promise<T> {
    return this.request<T>({ method: 'GET', url, searchParams }, options);
  }

  async request<T>(request: ApiRequest, options: RequestOptions): Promise<T> {
    let rateLimitRetries = 0;
    let networkRetries = 0;
    let refreshedToken = false;

    for (;;) {
      const prepared = options.auth
        ? this.authorize(request, await this.tokens.getValidToken(this.platform))
        : request;

      await this.throttle();

      let response: ApiResponse;
      try {
        response = await this.send(prepared);
      } catch (error) {
        const errorMsg = error instanceof Error ? error.message : String(error);
        if (networkRetries >= this.maxNetworkRetries) {
          throw new NetworkError(this.platform, networkRetries + 1, errorMsg, { cause: error });
        }
        await this.backoff(networkRetries, request, errorMsg);
        networkRetries++;
        continue;
      }

      const body = parseBody(response.body);
      const failure = this.classify(response, body);

      if (!failure) {
        try {
          return decodeJson<T>(response.body);
        } catch {
          throw new ApiError(this.platform, response.statusCode, `unexpected response body: ${describeBody(body)}`);
        }
      }

      switch (failure.kind) {
        case 'rate_limited': {
          if (rateLimitRetries >= this.maxRateLimitRetries) {
            logger.warn(
              { platform: this.platform, url: request.url, attempts: rateLimitRetries + 1 },
              'rate limit retries exhausted'
            );
            throw new RateLimited(this.platform, rateLimitRetries + 1);
          }
          const retryAfter = headerValue(response.headers['retry-after']);
          const retryAfterMs = parseRetryAfterMs(retryAfter);
          const exponentialDelay = BASE_RETRY_DELAY_MS * Math.pow(2, rateLimitRetries);
          const delayMs = Math.min(retryAfterMs ?? exponentialDelay, MAX_RETRY_DELAY_MS);
          logger.warn(
            {
              platform: this.platform,
              url: request.url,
              attempt: rateLimitRetries + 1,
              maxRetries: this.maxRateLimitRetries,
              delaySeconds: Math.ceil(delayMs / 1000),
              retryAfter: retryAfter || 'not provided'
            },
            'rate limit hit, retrying after delay'
          );
          rateLimitRetries++;
          await this.sleep(delayMs);
          continue;
        }

        case 'unauthorized': {
          if (!options.auth || refreshedToken) {
            throw new AuthError(this.platform, `${this.platform} rejected the access token`);
          }
          logger.info({ platform: this.platform, url: request.url }, 'access token rejected, refreshing');
          this.tokens.invalidate(this.platform);
          refreshedToken = true;
          continue;
        }

        case 'server_error': {
          const errorMsg = `HTTP ${response.statusCode}`;
          if (networkRetries >= this.maxNetworkRetries) {
            throw new NetworkError(this.platform, networkRetries + 1, errorMsg);
          }
          await this.backoff(networkRetries, request, errorMsg);
          networkRetries++;
          continue;
        }

        case 'not_found':
          throw new NotFoundError(this.platform, response.statusCode, failure.message);

        case 'error':
          throw new ApiError(this.platform, response.statusCode, failure.message);
      }
    }
  }

  private classify(
    response: ApiResponse,
    body: unknown
  ): BodyFailure | { kind: 'server_error' } | null {
    const status = response.statusCode;
    if (status === 429) {
      return { kind: 'rate_limited' };
    }
    if (status === 401) {
      return { kind: 'unauthorized' };
    }
    if (status === 403 || status === 404) {
      return { kind: 'not_found', message: describeBody(body) || `HTTP ${status}` };
    }
    if (status >= 500) {
      return { kind: 'server_error' };
    }
    if (status >= 400) {
      return { kind: 'error', message: describeBody(body) || `HTTP ${status}` };
    }
    return this.inspectBody(body);
  }

  private async throttle(): Promise<void> {
    if (this.lastRequestAt !== null) {
      const waitMs = this.lastRequestAt + this.requestDelayMs - this.now();
      if (waitMs > 0) {
        await this.sleep(waitMs);
      }
    }
    this.lastRequestAt = this.now();
  }

  private async backoff(retry: number, request: ApiRequest, errorMsg: string): Promise<void> {
    const delayMs = Math.min(BASE_RETRY_DELAY_MS * Math.pow(2, retry), MAX_RETRY_DELAY_MS); // 1s, 2s, 4s
    logger.warn(
      { platform: this.platform, url: request.url, attempt: retry + 1, maxRetries: this.maxNetworkRetries, delayMs, error: errorMsg },
      'transient error, retrying after delay'
    );
    await this.sleep(delayMs);
  }
}
