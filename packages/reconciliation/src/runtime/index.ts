export { systemClock } from './clock.js';
export type { Clock } from './clock.js';
export { CallThrottle } from './call-throttle.js';
export type { ThrottleLimits } from './call-throttle.js';
export { CircuitBreaker } from './circuit-breaker.js';
export type { CircuitBreakerLimits, CircuitSnapshot } from './circuit-breaker.js';
export { ConcurrencyGate, mapWithConcurrency } from './concurrency.js';
export { backoffDelayMs, isTransientResolverError, retryTransient } from './retry.js';
export type { RetryEvent, RetryPolicy } from './retry.js';
export { withDeadline } from './timeout.js';
export { GuardedSemanticResolver } from './guarded-resolver.js';
export type { GuardOptions, ResolverOperation } from './guarded-resolver.js';
