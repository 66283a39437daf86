import type { ResolvedConfig } from '@toolgate/core';
import { getBoolean, getMapping, getNumber } from '@toolgate/core';

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerOptions {
  /** Failures within `failureWindowMs` that open the circuit. */
  failureThreshold: number;
  failureWindowMs: number;
  /** Time spent OPEN before trial calls are let through. */
  cooldownMs: number;
  /** Consecutive HALF_OPEN successes needed to close again. */
  successThreshold: number;
  onStateChange?: (state: CircuitState) => void;
}

export const DEFAULT_BREAKER_OPTIONS: Readonly<CircuitBreakerOptions> = Object.freeze({
  failureThreshold: 5,
  failureWindowMs: 60_000,
  cooldownMs: 30_000,
  successThreshold: 2,
});

/**
 * Read the `circuitBreaker` mapping of a category. Returns undefined when
 * the breaker is switched off with `circuitBreaker: { enabled: false }`.
 */
export function readBreakerOptions(config: ResolvedConfig | undefined): Partial<CircuitBreakerOptions> | undefined {
  const section = config ? getMapping(config, 'circuitBreaker') : undefined;
  if (!section) return {};
  if (getBoolean(section, 'enabled') === false) return undefined;

  const options: Partial<CircuitBreakerOptions> = {};
  for (const key of ['failureThreshold', 'failureWindowMs', 'cooldownMs', 'successThreshold'] as const) {
    const value = getNumber(section, key);
    if (value !== undefined && value > 0) options[key] = value;
  }
  return options;
}

/** Fail-fast switch for one external service. */
export class CircuitBreaker {
  private state: CircuitState = 'CLOSED';
  private failures: number[] = [];
  private successes = 0;
  private openedAt: number | null = null;
  private readonly options: CircuitBreakerOptions;

  constructor(options?: Partial<CircuitBreakerOptions>) {
    this.options = { ...DEFAULT_BREAKER_OPTIONS, ...options };
  }

  getState(): CircuitState {
    if (this.state === 'OPEN') {
      const elapsed = Date.now() - (this.openedAt ?? 0);
      if (elapsed >= this.options.cooldownMs) {
        this.transition('HALF_OPEN');
      }
    }
    return this.state;
  }

  isAllowed(): boolean {
    return this.getState() !== 'OPEN';
  }

  /** Milliseconds until an OPEN circuit lets a trial call through. */
  retryAfterMs(): number {
    if (this.getState() !== 'OPEN') return 0;
    return Math.max(0, (this.openedAt ?? 0) + this.options.cooldownMs - Date.now());
  }

  recordSuccess(): void {
    if (this.state === 'HALF_OPEN') {
      this.successes += 1;
      if (this.successes >= this.options.successThreshold) {
        this.failures = [];
        this.openedAt = null;
        this.transition('CLOSED');
      }
      return;
    }
    this.failures = [];
  }

  recordFailure(): void {
    const now = Date.now();

    if (this.state === 'HALF_OPEN') {
      this.failures = [now];
      this.open(now);
      return;
    }

    this.failures.push(now);
    this.pruneOldFailures(now);

    if (this.state === 'CLOSED' && this.failures.length >= this.options.failureThreshold) {
      this.open(now);
    }
  }

  private open(now: number): void {
    this.openedAt = now;
    this.transition('OPEN');
  }

  private transition(state: CircuitState): void {
    this.state = state;
    this.successes = 0;
    this.options.onStateChange?.(state);
  }

  private pruneOldFailures(now: number): void {
    const cutoff = now - this.options.failureWindowMs;
    this.failures = this.failures.filter((t) => t > cutoff);
  }
}
