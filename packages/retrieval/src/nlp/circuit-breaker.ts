import { createLogger } from "@geonews/logger";

const logger = createLogger({ name: "nlp-circuit-breaker" });

export enum CircuitState {
  CLOSED = "closed",
  OPEN = "open",
  HALF_OPEN = "half-open"
}

export interface CircuitBreakerOptions {
  /** Consecutive failures that open the circuit. */
  failureThreshold: number;
  /** Consecutive half-open successes that close it again. */
  successThreshold: number;
  /** Milliseconds an open circuit waits before letting a probe through. */
  resetTimeoutMs: number;
  now?: () => number;
  onStateChange?: (state: CircuitState) => void;
}

const DEFAULT_OPTIONS: CircuitBreakerOptions = {
  failureThreshold: 5,
  successThreshold: 2,
  resetTimeoutMs: 30_000
};

export class CircuitBreakerOpenError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CircuitBreakerOpenError";
  }
}

export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private failureCount = 0;
  private successCount = 0;
  private openedAt: number | null = null;
  private readonly options: CircuitBreakerOptions;
  private readonly now: () => number;

  constructor(options: Partial<CircuitBreakerOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.now = this.options.now ?? Date.now;
  }

  getState(): CircuitState {
    return this.state;
  }

  canExecute(): boolean {
    if (this.state === CircuitState.CLOSED) {
      return true;
    }

    if (this.state === CircuitState.OPEN) {
      if (
        this.openedAt !== null &&
        this.now() - this.openedAt >= this.options.resetTimeoutMs
      ) {
        this.transitionTo(CircuitState.HALF_OPEN);
        return true;
      }
      return false;
    }

    return true;
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (!this.canExecute()) {
      throw new CircuitBreakerOpenError("NLP circuit breaker is open");
    }

    try {
      const result = await fn();
      this.recordSuccess();
      return result;
    } catch (error) {
      this.recordFailure();
      throw error;
    }
  }

  reset(): void {
    this.state = CircuitState.CLOSED;
    this.failureCount = 0;
    this.successCount = 0;
    this.openedAt = null;
  }

  private recordSuccess(): void {
    this.failureCount = 0;

    if (this.state === CircuitState.HALF_OPEN) {
      this.successCount++;
      if (this.successCount >= this.options.successThreshold) {
        this.successCount = 0;
        this.transitionTo(CircuitState.CLOSED);
      }
    }
  }

  private recordFailure(): void {
    this.successCount = 0;

    if (this.state === CircuitState.HALF_OPEN) {
      this.open();
      return;
    }

    this.failureCount++;
    if (this.failureCount >= this.options.failureThreshold) {
      this.open();
    }
  }

  private open(): void {
    this.openedAt = this.now();
    this.failureCount = 0;
    this.transitionTo(CircuitState.OPEN);
  }

  private transitionTo(newState: CircuitState): void {
    if (this.state === newState) {
      return;
    }
    const oldState = this.state;
    this.state = newState;
    logger.debug({ from: oldState, to: newState }, "Circuit breaker state transition");
    this.options.onStateChange?.(newState);
  }
}
