/**
 * Guarded semantic resolver
 *
 * Wraps a SemanticResolver so every call goes through the concurrency
 * gate, the optional throttle and per-operation circuit, a deadline,
 * and retries for transient failures.
 */

import { ResolverError, createSilentLogger } from '@snowmatch/core';
import type {
  BaseModelMatch,
  Logger,
  ModifierContext,
  ModifierResolution,
  SemanticResolver,
  WorkingProductRecord,
} from '@snowmatch/core';
import type { ExternalCallConfig } from '../config/index.js';
import { CallThrottle } from './call-throttle.js';
import { CircuitBreaker } from './circuit-breaker.js';
import { systemClock } from './clock.js';
import type { Clock } from './clock.js';
import { ConcurrencyGate } from './concurrency.js';
import { isTransientResolverError, retryTransient } from './retry.js';
import { withDeadline } from './timeout.js';

export type ResolverOperation = 'matchBaseModel' | 'resolveModifier' | 'checkConsistency';

export interface GuardOptions {
  logger?: Logger;
  /** Used in error messages and logs */
  name?: string;
  clock?: Clock;
}

export class GuardedSemanticResolver implements SemanticResolver {
  private readonly gate: ConcurrencyGate;
  private readonly throttle: CallThrottle | null;
  /** One circuit per operation, so a failing consistency check does not block lookups */
  private readonly circuits = new Map<ResolverOperation, CircuitBreaker>();
  private readonly logger: Logger;
  private readonly name: string;
  private readonly clock: Clock;

  constructor(
    private readonly inner: SemanticResolver,
    private readonly config: ExternalCallConfig,
    options: GuardOptions = {}
  ) {
    this.logger = options.logger ?? createSilentLogger();
    this.name = options.name ?? 'semantic-resolver';
    this.clock = options.clock ?? systemClock;
    this.gate = new ConcurrencyGate(config.maxConcurrency);
    this.throttle = CallThrottle.fromConfig(config.rateLimit, this.clock);
  }

  matchBaseModel(brand: string, targetName: string, candidates: string[]): Promise<BaseModelMatch> {
    return this.call('matchBaseModel', () => this.inner.matchBaseModel(brand, targetName, candidates));
  }

  resolveModifier(brand: string, token: string, context: ModifierContext): Promise<ModifierResolution> {
    return this.call('resolveModifier', () => this.inner.resolveModifier(brand, token, context));
  }

  checkConsistency(record: WorkingProductRecord, originalText: string): Promise<number> {
    return this.call('checkConsistency', () => this.inner.checkConsistency(record, originalText));
  }

  private circuitFor(operation: ResolverOperation): CircuitBreaker | null {
    if (!this.config.circuitBreaker.enabled) return null;
    let circuit = this.circuits.get(operation);
    if (!circuit) {
      circuit = new CircuitBreaker(this.config.circuitBreaker, this.clock);
      this.circuits.set(operation, circuit);
    }
    return circuit;
  }

  private async call<T>(operation: ResolverOperation, fn: () => Promise<T>): Promise<T> {
    const circuit = this.circuitFor(operation);
    if (circuit && !circuit.tryAcquire()) {
      throw new ResolverError({
        code: 'CIRCUIT_OPEN',
        message: `Circuit breaker is open for '${this.name}' ${operation}`,
        collaborator: this.name,
        suggestion: 'The resolver failed repeatedly; the circuit closes again after external.circuitBreaker.openMs.',
        context: { operation, circuit: circuit.snapshot() },
      });
    }

    const start = this.clock.now();
    try {
      const result = await this.gate.run(() =>
        retryTransient(
          async () => {
            const waitedMs = (await this.throttle?.admit()) ?? 0;
            if (waitedMs > 0) {
              this.logger.debug('Resolver call throttled', { resolver: this.name, operation, waitedMs });
            }
            return withDeadline(fn, this.config.timeoutMs, () => this.timeoutError(operation));
          },
          this.config.retries,
          ({ attempt, delayMs, error }) => {
            this.logger.debug('Retrying resolver call', { resolver: this.name, operation, attempt, delayMs, error });
          },
          this.clock
        )
      );

      circuit?.recordSuccess();
      this.logger.debug('Resolver call succeeded', {
        resolver: this.name,
        operation,
        durationMs: this.clock.now() - start,
      });
      return result;
    } catch (err) {
      if (isTransientResolverError(err)) circuit?.recordFailure();
      else circuit?.recordNeutral();

      this.logger.warn('Resolver call failed', {
        resolver: this.name,
        operation,
        durationMs: this.clock.now() - start,
        error: err,
      });
      throw err;
    }
  }

  private timeoutError(operation: ResolverOperation): ResolverError {
    return new ResolverError({
      code: 'TIMEOUT',
      message: `Resolver call '${operation}' timed out after ${this.config.timeoutMs}ms`,
      collaborator: this.name,
      suggestion: 'Increase external.timeoutMs or lower external.maxConcurrency.',
      context: { operation, timeoutMs: this.config.timeoutMs },
    });
  }
}
