/**
 * =============================================================================
 * CIRCUIT BREAKER - Identity Service Calls
 * =============================================================================
 *
 * CLOSED   calls pass through; consecutive failures are counted
 * OPEN     calls are refused until resetTimeout has passed
 * HALF_OPEN calls pass again; successThreshold successes close the
 *          circuit, a single failure reopens it
 *
 * Every call also gets requestTimeout ms before it counts as failed.
 * =============================================================================
 */

import { logger } from '../services/logger.service';

export enum CircuitState {
  CLOSED = 'CLOSED',
  OPEN = 'OPEN',
  HALF_OPEN = 'HALF_OPEN'
}

export interface CircuitBreakerOptions {
  name: string;
  failureThreshold?: number;
  successThreshold?: number;
  /** ms spent OPEN before calls are tried again */
  resetTimeout?: number;
  /** ms a single call may take */
  requestTimeout?: number;
  onStateChange?: (from: CircuitState, to: CircuitState) => void;
}

export class CircuitOpenError extends Error {
  constructor(public readonly circuitName: string) {
    super(`Circuit '${circuitName}' is open`);
    this.name = 'CircuitOpenError';
  }
}

export class CircuitTimeoutError extends Error {
  constructor(public readonly circuitName: string, public readonly timeoutMs: number) {
    super(`Circuit '${circuitName}' call timed out after ${timeoutMs}ms`);
    this.name = 'CircuitTimeoutError';
  }
}

export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private consecutiveFailures = 0;
  private halfOpenSuccesses = 0;
  private openUntil = 0;

  private readonly failureThreshold: number;
  private readonly successThreshold: number;
  private readonly resetTimeout: number;
  private readonly requestTimeout: number;

  constructor(private readonly options: CircuitBreakerOptions) {
    this.failureThreshold = options.failureThreshold ?? 5;
    this.successThreshold = options.successThreshold ?? 2;
    this.resetTimeout = options.resetTimeout ?? 30000;
    this.requestTimeout = options.requestTimeout ?? 10000;
  }

  getState(): CircuitState {
    return this.state;
  }

  async execute<T>(call: () => Promise<T>): Promise<T> {
    if (this.state === CircuitState.OPEN) {
      if (Date.now() < this.openUntil) {
        throw new CircuitOpenError(this.options.name);
      }
      this.moveTo(CircuitState.HALF_OPEN);
    }

    let result: T;
    try {
      result = await this.withTimeout(call);
    } catch (error) {
      this.recordFailure(error);
      throw error;
    }

    this.recordSuccess();
    return result;
  }

  private withTimeout<T>(call: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(
        () => reject(new CircuitTimeoutError(this.options.name, this.requestTimeout)),
        this.requestTimeout
      );

      call().then(
        (value) => {
          clearTimeout(timer);
          resolve(value);
        },
        (error: unknown) => {
          clearTimeout(timer);
          reject(error);
        }
      );
    });
  }

  private recordSuccess(): void {
    this.consecutiveFailures = 0;
    if (this.state !== CircuitState.HALF_OPEN) return;

    this.halfOpenSuccesses++;
    if (this.halfOpenSuccesses >= this.successThreshold) {
      this.moveTo(CircuitState.CLOSED);
    }
  }

  private recordFailure(error: unknown): void {
    this.consecutiveFailures++;

    logger.warn(`Circuit '${this.options.name}' call failed`, {
      failures: this.consecutiveFailures,
      threshold: this.failureThreshold,
      error: error instanceof Error ? error.message : String(error)
    });

    if (this.state === CircuitState.HALF_OPEN || this.consecutiveFailures >= this.failureThreshold) {
      this.moveTo(CircuitState.OPEN);
    }
  }

  private moveTo(next: CircuitState): void {
    const previous = this.state;
    this.state = next;

    if (next === CircuitState.OPEN) {
      this.openUntil = Date.now() + this.resetTimeout;
    } else if (next === CircuitState.HALF_OPEN) {
      this.halfOpenSuccesses = 0;
    } else {
      this.consecutiveFailures = 0;
    }

    if (this.options.onStateChange) {
      this.options.onStateChange(previous, next);
    }
  }
}
