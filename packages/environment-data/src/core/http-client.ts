/**
 * HTTP Client for dataset acquisition
 *
 * Wraps native fetch with:
 * - Exponential backoff with jitter
 * - Per-request timeouts via AbortController
 * - Error classification (status, timeout, network) and retry decisions
 *
 * USAGE:
 * ```typescript
 * const client = new HTTPClient({ maxRetries: 2, timeoutMs: 30000 });
 * const bytes = await client.fetchBuffer('https://example.com/data.csv');
 * ```
 */

import { createLogger } from './utils/logger.js';

const logger = createLogger('http-client');

// ============================================================================
// Configuration Types
// ============================================================================

export interface HTTPClientConfig {
  /** Maximum retry attempts after the first request (default: 2) */
  readonly maxRetries: number;

  /** Initial delay before first retry in milliseconds (default: 1000) */
  readonly initialDelayMs: number;

  /** Exponential backoff multiplier (default: 2) */
  readonly backoffMultiplier: number;

  /** Maximum delay between retries in milliseconds (default: 30000) */
  readonly maxDelayMs: number;

  /** Request timeout in milliseconds (default: 30000) */
  readonly timeoutMs: number;

  /** User-Agent header */
  readonly userAgent: string;

  /** Jitter factor to prevent thundering herd (0-1, default: 0.1) */
  readonly jitterFactor: number;
}

export interface FetchOptions {
  /** Overrides `maxRetries` for this request */
  readonly retries?: number;
}

// ============================================================================
// Error Types
// ============================================================================

export class HTTPError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly url: string
  ) {
    super(message);
    this.name = 'HTTPError';
  }
}

export class HTTPTimeoutError extends Error {
  constructor(
    public readonly url: string,
    public readonly timeoutMs: number
  ) {
    super(`Request timeout after ${timeoutMs}ms: ${url}`);
    this.name = 'HTTPTimeoutError';
  }
}

/**
 * Connection failed, DNS resolution failed, etc.
 */
export class HTTPNetworkError extends Error {
  constructor(
    public readonly url: string,
    cause: Error
  ) {
    super(`Network error: ${cause.message}`, { cause });
    this.name = 'HTTPNetworkError';
  }
}

// ============================================================================
// HTTP Client Implementation
// ============================================================================

export class HTTPClient {
  private readonly config: HTTPClientConfig;

  constructor(config?: Partial<HTTPClientConfig>) {
    this.config = {
      maxRetries: 2,
      initialDelayMs: 1000,
      backoffMultiplier: 2,
      maxDelayMs: 30000,
      timeoutMs: 30000,
      userAgent: 'Okavango-EnvironmentData/1.0',
      jitterFactor: 0.1,
      ...config,
    };
  }

  /**
   * Fetch a response body as raw bytes
   *
   * The timeout covers the whole exchange, body included: a server that
   * stops sending mid-body fails with HTTPTimeoutError like one that never
   * answers.
   *
   * @throws {HTTPError} For HTTP error responses (4xx, 5xx)
   * @throws {HTTPTimeoutError} If request exceeds timeout
   * @throws {HTTPNetworkError} For network failures
   */
  async fetchBuffer(url: string, options?: FetchOptions): Promise<Buffer> {
    const maxRetries = options?.retries ?? this.config.maxRetries;
    const maxAttempts = maxRetries + 1;

    for (let attempt = 1; ; attempt++) {
      const isLastAttempt = attempt >= maxAttempts;
      let failure: Error;

      try {
        return await this.fetchWithTimeout(url);
      } catch (error) {
        failure = error instanceof Error ? error : new Error(String(error));
      }

      if (!this.isRetryableError(failure) || isLastAttempt) {
        throw failure;
      }

      logger.warn('HTTPClient attempt failed', {
        attempt,
        maxAttempts,
        error: failure.message,
        url,
      });

      await this.sleep(this.calculateBackoffDelay(attempt));
    }
  }

  private async fetchWithTimeout(url: string): Promise<Buffer> {
    const { timeoutMs } = this.config;
    const controller = new AbortController();
    const timedOut = new Promise<never>((_, reject) => {
      controller.signal.addEventListener(
        'abort',
        () => reject(new HTTPTimeoutError(url, timeoutMs)),
        { once: true }
      );
    });
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      return await Promise.race([this.download(url, controller.signal), timedOut]);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async download(url: string, signal: AbortSignal): Promise<Buffer> {
    let response: Response;
    try {
      response = await fetch(url, {
        method: 'GET',
        headers: { 'User-Agent': this.config.userAgent },
        redirect: 'follow',
        signal,
      });
    } catch (error) {
      throw this.classifyFailure(url, error);
    }

    if (!response.ok) {
      throw new HTTPError(`HTTP ${response.status}: ${response.statusText}`, response.status, url);
    }

    try {
      return Buffer.from(await response.arrayBuffer());
    } catch (error) {
      throw this.classifyFailure(url, error);
    }
  }

  private classifyFailure(url: string, error: unknown): Error {
    if (error instanceof Error && error.name === 'AbortError') {
      return new HTTPTimeoutError(url, this.config.timeoutMs);
    }
    return new HTTPNetworkError(url, error instanceof Error ? error : new Error(String(error)));
  }

  /**
   * Calculate exponential backoff delay with jitter
   */
  private calculateBackoffDelay(attempt: number): number {
    const exponentialDelay =
      this.config.initialDelayMs * Math.pow(this.config.backoffMultiplier, attempt - 1);
    const cappedDelay = Math.min(exponentialDelay, this.config.maxDelayMs);

    const jitterRange = cappedDelay * this.config.jitterFactor;
    const jitter = Math.random() * 2 * jitterRange - jitterRange;

    return Math.max(0, Math.floor(cappedDelay + jitter));
  }

  private isRetryableStatus(status: number): boolean {
    return (
      status === 408 || // Request Timeout
      status === 429 || // Too Many Requests
      status === 500 || // Internal Server Error
      status === 502 || // Bad Gateway
      status === 503 || // Service Unavailable
      status === 504    // Gateway Timeout
    );
  }

  private isRetryableError(error: Error): boolean {
    if (error instanceof HTTPTimeoutError || error instanceof HTTPNetworkError) {
      return true;
    }

    if (error instanceof HTTPError) {
      return this.isRetryableStatus(error.statusCode);
    }

    // Unknown errors: don't retry (fail fast)
    return false;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

