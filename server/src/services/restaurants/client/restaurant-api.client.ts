/**
 * Restaurant Dataset API Client
 *
 * Owns the authorization token lifecycle: construct -> refresh on demand -> reuse.
 * Every request carries the token in the `authorizationToken` header.
 *
 * Features:
 * - Timeout protection per attempt (default: 10s)
 * - Automatic retries for 5xx, 429, network errors and timeouts (default: 2 retries)
 * - Exponential backoff
 */

import { z } from 'zod';
import { componentLogger, logger as defaultLogger, type Logger } from '../../../lib/logger/structured-logger.js';
import { isTimeoutError, sleep, withTimeout } from '../../../lib/reliability/timeout-guard.js';

export type HttpMethod = 'GET' | 'POST';

export interface RestaurantApiClientConfig {
  baseUrl: string;
  timeoutMs?: number;
  maxRetries?: number;
  /** Backoff base; attempt n waits base * 2^n */
  retryBaseDelayMs?: number;
  fetchImpl?: typeof fetch;
  now?: () => Date;
  logger?: Logger;
}

export interface RequestOptions {
  body?: unknown;
  headers?: Record<string, string>;
}

export class RestaurantApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly isRetryable: boolean = false
  ) {
    super(message);
    this.name = 'RestaurantApiError';
  }
}

const RegisterResponseSchema = z.object({
  data: z.object({
    authorizationToken: z.string().min(1),
    tokenExpiryAt: z.string().min(1),
  }),
});

// "2024-10-20 18:30:00+0800"
const TOKEN_EXPIRY_PATTERN = /^(\d{4}-\d{2}-\d{2}) (\d{2}:\d{2}:\d{2})([+-]\d{2}):?(\d{2})$/;

/**
 * Parse the register endpoint's `tokenExpiryAt` ("YYYY-MM-DD HH:MM:SS±HHMM").
 */
export function parseTokenExpiry(value: string): Date {
  const match = TOKEN_EXPIRY_PATTERN.exec(value.trim());
  const expiry = match ? new Date(`${match[1]}T${match[2]}${match[3]}:${match[4]}`) : null;
  if (!expiry || Number.isNaN(expiry.getTime())) {
    throw new RestaurantApiError(`Unrecognized token expiry: ${value}`);
  }
  return expiry;
}

export class RestaurantApiClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => Date;
  private readonly logger: Logger;

  private token: string | null = null;
  private tokenExpiry: Date | null = null;

  constructor(config: RestaurantApiClientConfig) {
    this.baseUrl = config.baseUrl.endsWith('/') ? config.baseUrl : `${config.baseUrl}/`;
    this.timeoutMs = config.timeoutMs ?? 10_000;
    this.maxRetries = config.maxRetries ?? 2; // 2 retries = 3 total attempts
    this.retryBaseDelayMs = config.retryBaseDelayMs ?? 1000;
    this.fetchImpl = config.fetchImpl ?? ((input, init) => fetch(input, init));
    this.now = config.now ?? (() => new Date());
    this.logger = componentLogger('RestaurantApiClient', config.logger ?? defaultLogger);
  }

  isTokenValid(): boolean {
    if (this.token && this.tokenExpiry) {
      return this.now().getTime() < this.tokenExpiry.getTime();
    }
    return false;
  }

  /**
   * Fetch a fresh token from `register`
   */
  async refreshToken(): Promise<void> {
    const response = await this.send('GET', this.resolveUrl('register'), {}, false);
    const parsed = RegisterResponseSchema.safeParse(await this.readJson(response, 'register'));
    if (!parsed.success) {
      throw new RestaurantApiError('Malformed register response', response.status);
    }

    this.token = parsed.data.data.authorizationToken;
    this.tokenExpiry = parseTokenExpiry(parsed.data.data.tokenExpiryAt);

    this.logger.info({
      event: 'auth_token_refreshed',
      expiresAt: this.tokenExpiry.toISOString(),
    }, 'Authorization token refreshed');
  }

  /**
   * Authorized request. `target` is a path relative to the base URL or an absolute URL.
   */
  async request(method: HttpMethod, target: string, options: RequestOptions = {}): Promise<Response> {
    if (!this.isTokenValid()) {
      await this.refreshToken();
    }
    return this.send(method, this.resolveUrl(target), options, true);
  }

  async requestJson(method: HttpMethod, target: string, options: RequestOptions = {}): Promise<unknown> {
    const response = await this.request(method, target, options);
    return this.readJson(response, target);
  }

  checkDataValidation(data: readonly unknown[]): Promise<unknown> {
    return this.requestJson('POST', 'test/check-data-validation', { body: { Data: data } });
  }

  checkTopKSort(data: readonly unknown[]): Promise<unknown> {
    return this.requestJson('POST', 'test/check-topk-sort', { body: { data } });
  }

  resolveUrl(target: string): string {
    if (/^https?:\/\//i.test(target)) return target;
    return new URL(target.replace(/^\/+/, ''), this.baseUrl).toString();
  }

  private send(method: HttpMethod, url: string, options: RequestOptions, authorized: boolean): Promise<Response> {
    return this.sendWithRetry(method, url, options, authorized, 0);
  }

  private async sendWithRetry(
    method: HttpMethod,
    url: string,
    options: RequestOptions,
    authorized: boolean,
    attempt: number
  ): Promise<Response> {
    const operation = `${method} ${new URL(url).pathname}`;

    try {
      const response = await this.sendOnce(method, url, options, authorized, operation);

      this.logger.debug({
        event: 'dataset_api_success',
        operation,
        status: response.status,
        attempt: attempt + 1,
      }, 'Request succeeded');

      return response;
    } catch (err) {
      const error = this.toApiError(err);

      this.logger.warn({
        event: 'dataset_api_attempt_failed',
        operation,
        attempt: attempt + 1,
        maxRetries: this.maxRetries,
        error: error.message,
        statusCode: error.statusCode,
        isRetryable: error.isRetryable,
      }, 'Request attempt failed');

      if (error.isRetryable && attempt < this.maxRetries) {
        const delayMs = Math.pow(2, attempt) * this.retryBaseDelayMs;

        this.logger.info({
          event: 'dataset_api_retrying',
          operation,
          nextAttempt: attempt + 2,
          delayMs,
        }, 'Retrying after delay');

        await sleep(delayMs);
        return this.sendWithRetry(method, url, options, authorized, attempt + 1);
      }

      throw error;
    }
  }

  private async sendOnce(
    method: HttpMethod,
    url: string,
    options: RequestOptions,
    authorized: boolean,
    operation: string
  ): Promise<Response> {
    const headers: Record<string, string> = { ...options.headers };
    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }
    if (authorized && this.token) {
      headers['authorizationToken'] = this.token;
    }

    const controller = new AbortController();
    const response = await withTimeout(
      this.fetchImpl(url, {
        method,
        headers,
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: controller.signal,
      }),
      this.timeoutMs,
      operation,
      () => controller.abort()
    );

    if (!response.ok) {
      const errorBody = await response.text();
      throw new RestaurantApiError(
        `${operation} failed: HTTP ${response.status} - ${errorBody.substring(0, 200)}`,
        response.status,
        response.status >= 500 || response.status === 429
      );
    }

    return response;
  }

  private async readJson(response: Response, target: string): Promise<unknown> {
    try {
      return await response.json();
    } catch (err) {
      throw new RestaurantApiError(
        `Invalid JSON from ${target}: ${err instanceof Error ? err.message : String(err)}`,
        response.status
      );
    }
  }

  private toApiError(err: unknown): RestaurantApiError {
    if (err instanceof RestaurantApiError) return err;
    if (isTimeoutError(err)) {
      return new RestaurantApiError(err.message, undefined, true);
    }
    // fetch rejects with TypeError on network failure
    return new RestaurantApiError(
      err instanceof Error ? err.message : String(err),
      undefined,
      err instanceof TypeError
    );
  }
}
