import { systemClock } from './clock.js';
import type { Clock } from './clock.js';

export interface CircuitBreakerLimits {
  /** Consecutive failures that open the circuit */
  failureThreshold: number;
  /** How long an open circuit rejects before one trial call goes through */
  openMs: number;
}

type CircuitState =
  | { mode: 'closed'; failures: number }
  | { mode: 'open'; until: number }
  | { mode: 'half_open'; trialRunning: boolean };

export type CircuitSnapshot =
  | { mode: 'closed'; failures: number }
  | { mode: 'open'; retryInMs: number }
  | { mode: 'half_open' };

/**
 * Circuit for one resolver operation. Only failures the caller reports
 * count; a success closes it again.
 */
export class CircuitBreaker {
  private state: CircuitState = { mode: 'closed', failures: 0 };

  constructor(
    private readonly limits: CircuitBreakerLimits,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Claim permission for one call. In half-open state only a single
   * trial call is admitted until it reports back.
   */
  tryAcquire(): boolean {
    switch (this.state.mode) {
      case 'closed':
        return true;
      case 'open':
        if (this.clock.now() < this.state.until) return false;
        this.state = { mode: 'half_open', trialRunning: true };
        return true;
      case 'half_open':
        if (this.state.trialRunning) return false;
        this.state.trialRunning = true;
        return true;
    }
  }

  recordSuccess(): void {
    this.state = { mode: 'closed', failures: 0 };
  }

  recordFailure(): void {
    if (this.state.mode === 'half_open') {
      this.trip();
      return;
    }
    if (this.state.mode === 'closed') {
      const failures = this.state.failures + 1;
      if (failures >= this.limits.failureThreshold) this.trip();
      else this.state = { mode: 'closed', failures };
    }
  }

  /** The call was admitted but its outcome says nothing about the service */
  recordNeutral(): void {
    if (this.state.mode === 'half_open') {
      this.state.trialRunning = false;
    }
  }

  snapshot(): CircuitSnapshot {
    switch (this.state.mode) {
      case 'closed':
        return { mode: 'closed', failures: this.state.failures };
      case 'open':
        return { mode: 'open', retryInMs: Math.max(0, this.state.until - this.clock.now()) };
      case 'half_open':
        return { mode: 'half_open' };
    }
  }

  private trip(): void {
    this.state = { mode: 'open', until: this.clock.now() + this.limits.openMs };
  }
}
