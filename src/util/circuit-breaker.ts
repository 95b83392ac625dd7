/**
 * Circuit Breaker Pattern Implementation
 *
 * Fails fast while the cloud is known to be down, with an exponentially
 * growing reset window between probes.
 */

import { Logger } from './logger';
import { TransportError } from './error-handler';

/**
 * Circuit breaker states
 */
export enum CircuitState {
  CLOSED = 'CLOSED',   // Normal operation, requests pass through
  OPEN = 'OPEN',       // Circuit is open, requests fail fast
  HALF_OPEN = 'HALF_OPEN' // Testing if service is back online
}

export interface CircuitBreakerOptions {
  failureThreshold: number;         // Number of failures before opening circuit
  resetTimeout: number;             // Base time in ms to wait before trying again (half-open)
  halfOpenSuccessThreshold: number; // Number of successes in half-open state to close circuit
  maxResetTimeout?: number;         // Maximum reset timeout (for exponential backoff)
  backoffMultiplier?: number;       // Multiplier for exponential backoff
  /** Decides whether an error counts against the circuit. Defaults to every error. */
  isFailure?: (error: unknown) => boolean;
}

const DEFAULT_OPTIONS: CircuitBreakerOptions = {
  failureThreshold: 5,
  resetTimeout: 30000,
  halfOpenSuccessThreshold: 1,
  maxResetTimeout: 600000,
  backoffMultiplier: 2
};

export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private failures: number = 0;
  private successes: number = 0;
  private lastFailureTime: number = 0;
  private options: CircuitBreakerOptions;
  private logger: Logger;
  private consecutiveOpens: number = 0;
  private currentResetTimeout: number;

  /**
   * @param name Circuit breaker name (for logging)
   */
  constructor(
    private readonly name: string,
    logger: Logger,
    options: Partial<CircuitBreakerOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.logger = logger;
    this.currentResetTimeout = this.options.resetTimeout;
  }

  /**
   * Execute a function with circuit breaker protection
   * @throws TransportError (retryable) if the circuit is open
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.state === CircuitState.OPEN) {
      if (Date.now() - this.lastFailureTime >= this.currentResetTimeout) {
        this.halfOpen();
      } else {
        this.logger.warn(`Circuit ${this.name} is OPEN - failing fast`);
        throw new TransportError(`Service unavailable (circuit ${this.name} is open)`, 'retryable', {
          retryAfterMs: this.currentResetTimeout - (Date.now() - this.lastFailureTime)
        });
      }
    }

    try {
      const result = await fn();
      this.onSuccess();
      return result;
    } catch (error) {
      const counts = this.options.isFailure ? this.options.isFailure(error) : true;
      if (counts) {
        this.onFailure(error);
      }
      throw error;
    }
  }

  private onSuccess(): void {
    if (this.state === CircuitState.HALF_OPEN) {
      this.successes++;
      this.logger.debug(`Circuit ${this.name} success in HALF_OPEN state (${this.successes}/${this.options.halfOpenSuccessThreshold})`);

      if (this.successes >= this.options.halfOpenSuccessThreshold) {
        this.close();
      }
    } else {
      this.consecutiveOpens = 0;
      this.currentResetTimeout = this.options.resetTimeout;
      this.failures = 0;
    }
  }

  private onFailure(error: unknown): void {
    this.failures++;
    this.lastFailureTime = Date.now();

    const errorMessage = error instanceof Error ? error.message : String(error);
    this.logger.warn(`Circuit ${this.name} failure: ${errorMessage} (${this.failures}/${this.options.failureThreshold})`);

    if (this.state === CircuitState.HALF_OPEN) {
      this.open();
    } else if (this.state === CircuitState.CLOSED && this.failures >= this.options.failureThreshold) {
      this.open();
    }
  }

  /**
   * Open the circuit with exponential backoff
   */
  private open(): void {
    // The first opening uses the base timeout, later ones back off
    if (this.consecutiveOpens > 0) {
      this.currentResetTimeout = Math.min(
        this.currentResetTimeout * (this.options.backoffMultiplier ?? 2),
        this.options.maxResetTimeout ?? DEFAULT_OPTIONS.resetTimeout * 20
      );
    }
    this.state = CircuitState.OPEN;
    this.failures = 0;
    this.successes = 0;
    this.lastFailureTime = Date.now();
    this.consecutiveOpens++;

    this.logger.warn(`Circuit ${this.name} OPENED (attempt ${this.consecutiveOpens}, reset in ${this.currentResetTimeout}ms)`);
  }

  private halfOpen(): void {
    this.state = CircuitState.HALF_OPEN;
    this.failures = 0;
    this.successes = 0;
    this.logger.info(`Circuit ${this.name} HALF-OPEN - testing service availability`);
  }

  private close(): void {
    this.state = CircuitState.CLOSED;
    this.failures = 0;
    this.successes = 0;
    this.consecutiveOpens = 0;
    this.currentResetTimeout = this.options.resetTimeout;
    this.logger.info(`Circuit ${this.name} CLOSED - service is operational`);
  }

  getState(): CircuitState {
    return this.state;
  }
}
