/**
 * Circuit breaker for the LLM service
 *
 * Opens after `failureThreshold` consecutive server-side failures and rejects
 * calls until `recoveryTimeMs` has passed; then lets calls through in
 * HALF_OPEN and closes again after `halfOpenSuccessThreshold` successes.
 * Recovery time doubles on each consecutive trip, capped at 16x.
 *
 * Only server-side errors (429, 5xx, network) count. Malformed JSON or a
 * bad prompt is the caller's problem and leaves the breaker alone.
 */

export enum CircuitState {
  CLOSED = 'CLOSED',
  OPEN = 'OPEN',
  HALF_OPEN = 'HALF_OPEN',
}

const SERVER_STATUS = /\b(429|500|502|503|504)\b/;
const NETWORK_FAILURE = /ECONNRESET|ETIMEDOUT|ENOTFOUND|ECONNREFUSED|socket hang up|fetch failed/i;
const OVERLOADED = /rate.?limit|server.?(error|overloaded|unavailable)|service.?unavailable|model.*load/i;

function causeText(error: Error): string {
  const cause: unknown = error.cause;
  if (!(cause instanceof Error)) return '';
  const code = 'code' in cause && typeof cause.code === 'string' ? cause.code : '';
  return `${cause.message} ${code}`;
}

/**
 * Whether an error is a server-side or network failure
 */
export function isServerError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const combined = `${error.message} ${causeText(error)}`;
  return SERVER_STATUS.test(combined) || NETWORK_FAILURE.test(combined) || OVERLOADED.test(combined);
}

export interface CircuitBreakerConfig {
  failureThreshold: number;
  recoveryTimeMs: number;
  halfOpenSuccessThreshold: number;
}

const DEFAULT_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  recoveryTimeMs: 60000,
  halfOpenSuccessThreshold: 3,
};

const MAX_RECOVERY_MULTIPLIER_EXPONENT = 4;

export interface CircuitBreakerStatus {
  state: CircuitState;
  failureCount: number;
  lastFailureTime: number | null;
  timeToRecovery: number | null;
}

export class CircuitBreakerOpenError extends Error {
  readonly timeToRecovery: number;

  constructor(message: string, timeToRecovery: number) {
    super(message);
    this.name = 'CircuitBreakerOpenError';
    this.timeToRecovery = timeToRecovery;
  }
}

export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private failureCount = 0;
  private successCount = 0;
  private lastFailureTime: number | null = null;
  private consecutiveTrips = 0;
  private readonly config: CircuitBreakerConfig;

  constructor(config: Partial<CircuitBreakerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  getRecoveryTimeMs(): number {
    const exponent = Math.min(Math.max(0, this.consecutiveTrips - 1), MAX_RECOVERY_MULTIPLIER_EXPONENT);
    return this.config.recoveryTimeMs * Math.pow(2, exponent);
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    this.checkRecovery();

    if (this.state === CircuitState.OPEN) {
      const timeToRecovery = this.getTimeToRecovery();
      throw new CircuitBreakerOpenError(
        `Circuit breaker is OPEN. Try again in ${Math.ceil(timeToRecovery / 1000)}s`,
        timeToRecovery
      );
    }

    try {
      const result = await fn();
      this.recordSuccess();
      return result;
    } catch (error) {
      if (isServerError(error)) {
        this.recordFailure();
      } else {
        console.error(
          `[CircuitBreaker] Client-side error (not counted): ${error instanceof Error ? error.message : String(error)}`
        );
      }
      throw error;
    }
  }

  private checkRecovery(): void {
    if (this.state !== CircuitState.OPEN || this.lastFailureTime === null) return;
    if (Date.now() - this.lastFailureTime >= this.getRecoveryTimeMs()) {
      console.error(`[CircuitBreaker] OPEN -> HALF_OPEN (trip #${this.consecutiveTrips})`);
      this.state = CircuitState.HALF_OPEN;
      this.successCount = 0;
    }
  }

  private recordSuccess(): void {
    if (this.state === CircuitState.HALF_OPEN) {
      this.successCount++;
      if (this.successCount >= this.config.halfOpenSuccessThreshold) {
        console.error('[CircuitBreaker] Recovery confirmed, HALF_OPEN -> CLOSED');
        this.reset(false);
      }
    } else if (this.state === CircuitState.CLOSED) {
      this.failureCount = 0;
    }
  }

  private recordFailure(): void {
    this.failureCount++;
    this.lastFailureTime = Date.now();

    if (this.state === CircuitState.HALF_OPEN || this.failureCount >= this.config.failureThreshold) {
      this.consecutiveTrips++;
      this.state = CircuitState.OPEN;
      this.successCount = 0;
      console.error(
        `[CircuitBreaker] -> OPEN after ${this.failureCount} failures (trip #${this.consecutiveTrips}, recovery ${this.getRecoveryTimeMs()}ms)`
      );
    }
  }

  private getTimeToRecovery(): number {
    if (this.lastFailureTime === null) return 0;
    return Math.max(0, this.getRecoveryTimeMs() - (Date.now() - this.lastFailureTime));
  }

  isOpen(): boolean {
    return this.getState() === CircuitState.OPEN;
  }

  getState(): CircuitState {
    this.checkRecovery();
    return this.state;
  }

  getStatus(): CircuitBreakerStatus {
    const state = this.getState();
    return {
      state,
      failureCount: this.failureCount,
      lastFailureTime: this.lastFailureTime,
      timeToRecovery: state === CircuitState.OPEN ? this.getTimeToRecovery() : null,
    };
  }

  reset(log = true): void {
    this.state = CircuitState.CLOSED;
    this.failureCount = 0;
    this.successCount = 0;
    this.lastFailureTime = null;
    this.consecutiveTrips = 0;
    if (log) console.error('[CircuitBreaker] Manually reset to CLOSED');
  }
}
