/**
 * Circuit Breaker
 *
 * Per-dependency breaker with retry and exponential backoff.
 *
 * CLOSED    → calls go through; `failureThreshold` consecutive failed
 *             calls trip the breaker
 * OPEN      → calls are refused until `recoveryTimeoutMs` has elapsed
 * HALF_OPEN → one trial call; success closes, failure re-opens
 *
 * A "failed call" is one whose retries were all exhausted.
 */

import type { PipelineConfig } from '@/lib/config';
import { DEFAULT_ENGINE_CONFIG } from '@/lib/config';
import { round } from '@/lib/utils/math';
import { createLogger, type Logger } from '@/lib/utils/logger';

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export type CircuitBreakerConfig = PipelineConfig['circuitBreaker'];

export interface DependencyHealth {
  name: string;
  state: CircuitState;
  totalCalls: number;
  failures: number;
  consecutiveFailures: number;
  /** failures / totalCalls, 3 dp */
  failureRate: number;
  lastFailure: string | null;
  lastSuccess: string | null;
  lastError: string | null;
}

interface DependencyState {
  name: string;
  state: CircuitState;
  totalCalls: number;
  failures: number;
  consecutiveFailures: number;
  openedAt: number | null;
  lastFailure: string | null;
  lastSuccess: string | null;
  lastError: string | null;
}

export interface CircuitBreakerOptions {
  logger?: Logger;
  /** Milliseconds since epoch */
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export class CircuitBreaker {
  private config: CircuitBreakerConfig;
  private deps = new Map<string, DependencyState>();
  private log: Logger;
  private now: () => number;
  private sleep: (ms: number) => Promise<void>;

  constructor(
    config: Partial<CircuitBreakerConfig> = {},
    options: CircuitBreakerOptions = {},
  ) {
    this.config = { ...DEFAULT_ENGINE_CONFIG.pipeline.circuitBreaker, ...config };
    this.log = options.logger ?? createLogger('Circuit');
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Whether a call to `name` may proceed. Moves an OPEN breaker to
   * HALF_OPEN once the recovery timeout has passed.
   */
  canCall(name: string): boolean {
    const dep = this.dependency(name);
    if (dep.state !== 'OPEN') return true;

    if (dep.openedAt !== null && this.now() - dep.openedAt > this.config.recoveryTimeoutMs) {
      dep.state = 'HALF_OPEN';
      this.log.info(`${name}: OPEN -> HALF_OPEN (testing recovery)`);
      return true;
    }
    return false;
  }

  recordSuccess(name: string): void {
    const dep = this.dependency(name);
    dep.totalCalls++;
    dep.consecutiveFailures = 0;
    dep.lastSuccess = new Date(this.now()).toISOString();

    if (dep.state === 'HALF_OPEN') {
      dep.state = 'CLOSED';
      dep.openedAt = null;
      this.log.info(`${name}: HALF_OPEN -> CLOSED (recovered)`);
    }
  }

  recordFailure(name: string, error: string): void {
    const dep = this.dependency(name);
    dep.totalCalls++;
    dep.failures++;
    dep.consecutiveFailures++;
    dep.lastFailure = new Date(this.now()).toISOString();
    dep.lastError = error;

    if (dep.state === 'HALF_OPEN') {
      dep.state = 'OPEN';
      dep.openedAt = this.now();
      this.log.warn(`${name}: HALF_OPEN -> OPEN (test failed: ${error})`);
    } else if (dep.state === 'CLOSED' && dep.consecutiveFailures >= this.config.failureThreshold) {
      dep.state = 'OPEN';
      dep.openedAt = this.now();
      this.log.warn(`${name}: CLOSED -> OPEN (${dep.consecutiveFailures} consecutive failures)`);
    }
  }

  /**
   * Run `fn` with retries. Resolves to null when the breaker is open or
   * every attempt failed; never rejects.
   */
  async call<T>(name: string, fn: () => Promise<T>): Promise<T | null> {
    if (!this.canCall(name)) {
      this.log.warn(`Circuit OPEN for ${name}, skipping call`);
      return null;
    }

    const { maxRetries, baseDelayMs, maxDelayMs } = this.config;
    let lastError = '';

    for (let attempt = 0; attempt < maxRetries; attempt++) {
      try {
        const result = await fn();
        this.recordSuccess(name);
        return result;
      } catch (error) {
        lastError = error instanceof Error ? error.message : String(error);
        if (attempt < maxRetries - 1) {
          const delay = Math.min(baseDelayMs * 2 ** attempt, maxDelayMs);
          this.log.warn(
            `${name} attempt ${attempt + 1}/${maxRetries} failed: ${lastError}, retrying in ${delay}ms`,
          );
          await this.sleep(delay);
        }
      }
    }

    this.recordFailure(name, lastError);
    this.log.error(`${name}: all ${maxRetries} attempts failed: ${lastError}`);
    return null;
  }

  getState(name: string): CircuitState {
    return this.dependency(name).state;
  }

  getHealth(): DependencyHealth[] {
    return [...this.deps.values()].map((dep) => ({
      name: dep.name,
      state: dep.state,
      totalCalls: dep.totalCalls,
      failures: dep.failures,
      consecutiveFailures: dep.consecutiveFailures,
      failureRate: dep.totalCalls > 0 ? round(dep.failures / dep.totalCalls, 3) : 0,
      lastFailure: dep.lastFailure,
      lastSuccess: dep.lastSuccess,
      lastError: dep.lastError,
    }));
  }

  formatHealth(): string {
    const label: Record<CircuitState, string> = { CLOSED: 'OK', OPEN: 'DOWN', HALF_OPEN: 'TESTING' };
    const lines = ['API Health'];
    for (const h of this.getHealth()) {
      lines.push(
        `- ${h.name}: [${label[h.state]}] ${h.totalCalls} calls, ${(h.failureRate * 100).toFixed(0)}% failure rate`,
      );
    }
    return lines.join('\n');
  }

  private dependency(name: string): DependencyState {
    let dep = this.deps.get(name);
    if (!dep) {
      dep = {
        name,
        state: 'CLOSED',
        totalCalls: 0,
        failures: 0,
        consecutiveFailures: 0,
        openedAt: null,
        lastFailure: null,
        lastSuccess: null,
        lastError: null,
      };
      this.deps.set(name, dep);
    }
    return dep;
  }
}
