import { Logger } from '../util/logger';
import { ErrorHandler, AppError, isRetryableTransportError } from '../util/error-handler';
import { CircuitBreaker, CircuitBreakerOptions } from '../util/circuit-breaker';
import { delay } from '../util/async';
import { CIRCUIT_BREAKER, ENGINE_DEFAULTS } from '../constants/fairland-api';

/**
 * Base API Service
 * Request spacing, rate-limit deferral and circuit breaking shared by cloud transports
 */
export abstract class BaseApiService {
  protected logger: Logger;
  protected errorHandler: ErrorHandler;
  protected circuitBreaker: CircuitBreaker;
  protected lastApiCallTime: number = 0;
  protected minApiCallInterval: number;
  protected rateLimitResetTime: number = 0;

  /**
   * @param serviceName Name of the service for logging
   * @param minApiCallInterval Minimum spacing between two requests in ms
   */
  constructor(
    protected readonly serviceName: string,
    logger: Logger,
    minApiCallInterval: number = ENGINE_DEFAULTS.MIN_REQUEST_INTERVAL_MS,
    circuitBreakerOptions?: Partial<CircuitBreakerOptions>
  ) {
    this.logger = logger;
    this.errorHandler = new ErrorHandler(this.logger);
    this.minApiCallInterval = minApiCallInterval;

    // Only transient outages count; auth rejections and bad payloads say nothing about availability
    this.circuitBreaker = new CircuitBreaker(serviceName, this.logger, {
      failureThreshold: CIRCUIT_BREAKER.FAILURE_THRESHOLD,
      resetTimeout: CIRCUIT_BREAKER.RESET_TIMEOUT,
      halfOpenSuccessThreshold: CIRCUIT_BREAKER.HALF_OPEN_SUCCESS_THRESHOLD,
      maxResetTimeout: CIRCUIT_BREAKER.MAX_RESET_TIMEOUT,
      backoffMultiplier: 2,
      isFailure: isRetryableTransportError,
      ...circuitBreakerOptions
    });
  }

  /**
   * Log API call details
   */
  protected logApiCall(method: string, endpoint: string, params?: Record<string, unknown>): void {
    this.logger.api(`${method} ${endpoint}`, {
      method,
      endpoint,
      params: params ?? null,
      timestamp: new Date().toISOString(),
      service: this.serviceName
    });
  }

  /**
   * Create a standardized API error
   */
  protected createApiError(error: unknown, context?: Record<string, unknown>): AppError {
    return this.errorHandler.createAppError(error, {
      service: this.serviceName,
      ...context
    });
  }

  /**
   * Ensure minimum time between API calls
   * @returns Promise that resolves when it's safe to make the next API call
   */
  protected async throttle(): Promise<void> {
    const now = Date.now();
    const timeSinceLastCall = now - this.lastApiCallTime;
    const enforcedDelay = this.rateLimitResetTime > now
      ? this.rateLimitResetTime - now
      : 0;

    const wait = Math.max(this.minApiCallInterval - timeSinceLastCall, enforcedDelay);
    if (wait > 0) {
      this.logger.debug(`Throttling API call to ${this.serviceName}, waiting ${wait}ms`);
      this.lastApiCallTime = now + wait;
      await delay(wait);
      return;
    }

    this.lastApiCallTime = now;
  }

  /**
   * Update throttling state after a rate limit response.
   * @param waitMs Milliseconds suggested by the remote API before retrying
   */
  protected applyRateLimit(waitMs: number): void {
    const now = Date.now();
    const safeWait = Math.min(Math.max(waitMs, this.minApiCallInterval), ENGINE_DEFAULTS.MAX_THROTTLE_WAIT_MS);
    this.rateLimitResetTime = Math.max(this.rateLimitResetTime, now + safeWait);
    this.logger.warn(`Rate limit encountered on ${this.serviceName}, deferring requests for ${safeWait}ms`);
  }

  /**
   * Throttle, then run one request behind the circuit breaker. 429 responses
   * defer the following requests.
   */
  protected async guardedRequest<T>(fn: () => Promise<T>): Promise<T> {
    await this.throttle();
    try {
      return await this.circuitBreaker.execute(fn);
    } catch (error) {
      if (isRetryableTransportError(error) && error.status === 429) {
        this.applyRateLimit(error.retryAfterMs ?? this.minApiCallInterval * 4);
      }
      throw error;
    }
  }
}
