/**
 * Circuit Breaker
 * Fails fast while the exchange is unreachable
 * States: CLOSED (normal) → OPEN (fail-fast) → HALF_OPEN (testing)
 */

import type { CircuitState } from '../../exchange/ExchangeGateway';
import { TransportError } from '../../../common/errors';

export interface CircuitBreakerConfig {
  failureThreshold: number; // Failures within the window before opening
  successThreshold: number; // Successes needed to close from half-open
  timeout: number; // ms to stay open before letting a test request through
  windowSize: number; // Sliding window of recent outcomes
  /** Which errors count against the circuit; others pass through as successes */
  isFailure?: (error: unknown) => boolean;
  onStateChange?: (state: CircuitState) => void;
}

export class CircuitBreaker {
  private state: CircuitState = 'CLOSED';
  private lastFailureTime: number | null = null;
  private halfOpenSuccesses = 0;
  private window: boolean[] = []; // true = success

  private readonly failureThreshold: number;
  private readonly successThreshold: number;
  private readonly timeout: number;
  private readonly windowSize: number;
  private readonly isFailure: (error: unknown) => boolean;
  private readonly onStateChange?: (state: CircuitState) => void;

  constructor(config: CircuitBreakerConfig) {
    this.failureThreshold = config.failureThreshold;
    this.successThreshold = config.successThreshold;
    this.timeout = config.timeout;
    this.windowSize = config.windowSize;
    this.isFailure = config.isFailure ?? (() => true);
    this.onStateChange = config.onStateChange;
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.state === 'OPEN') {
      if (this.lastFailureTime !== null && Date.now() - this.lastFailureTime >= this.timeout) {
        this.transition('HALF_OPEN');
      } else {
        throw new TransportError('EXCHANGE_UNAVAILABLE: Circuit breaker open');
      }
    }

    try {
      const result = await fn();
      this.recordSuccess();
      return result;
    } catch (error) {
      if (this.isFailure(error)) {
        this.recordFailure();
      } else {
        this.recordSuccess();
      }
      throw error;
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  /**
   * State as number for metrics (0=CLOSED, 1=OPEN, 2=HALF_OPEN)
   */
  getStateNumber(): number {
    switch (this.state) {
      case 'CLOSED':
        return 0;
      case 'OPEN':
        return 1;
      case 'HALF_OPEN':
        return 2;
    }
  }

  reset(): void {
    this.window = [];
    this.lastFailureTime = null;
    this.halfOpenSuccesses = 0;
    this.transition('CLOSED');
  }

  private recordSuccess(): void {
    this.push(true);

    if (this.state === 'HALF_OPEN') {
      this.halfOpenSuccesses++;
      if (this.halfOpenSuccesses >= this.successThreshold) {
        this.window = [];
        this.transition('CLOSED');
      }
    }
  }

  private recordFailure(): void {
    this.push(false);
    this.lastFailureTime = Date.now();

    if (this.state === 'HALF_OPEN') {
      this.transition('OPEN');
      return;
    }

    if (this.state === 'CLOSED' && this.shouldOpen()) {
      this.transition('OPEN');
    }
  }

  private push(success: boolean): void {
    this.window.push(success);
    if (this.window.length > this.windowSize) {
      this.window.shift();
    }
  }

  private shouldOpen(): boolean {
    if (this.window.length < this.windowSize) {
      return false;
    }
    const failures = this.window.filter((success) => !success).length;
    return failures >= this.failureThreshold;
  }

  private transition(next: CircuitState): void {
    if (this.state === next) {
      return;
    }
    this.state = next;
    this.halfOpenSuccesses = 0;
    this.onStateChange?.(next);
  }
}

/**
 * Default breaker for Kraken REST; only transport failures trip it
 */
export function createKrakenCircuitBreaker(
  onStateChange?: (state: CircuitState) => void
): CircuitBreaker {
  return new CircuitBreaker({
    failureThreshold: 5,
    successThreshold: 2,
    timeout: 30_000,
    windowSize: 10,
    isFailure: (error) => error instanceof TransportError,
    onStateChange,
  });
}
