import { describe, expect, it } from 'vitest';
import { CollaboratorError, ResolverError, createSilentLogger } from '@snowmatch/core';
import type { WorkingProductRecord } from '@snowmatch/core';
import { externalCallSchema } from '../src/config/index.js';
import {
  CallThrottle,
  CircuitBreaker,
  ConcurrencyGate,
  GuardedSemanticResolver,
  backoffDelayMs,
  isTransientResolverError,
  mapWithConcurrency,
  retryTransient,
  withDeadline,
} from '../src/runtime/index.js';
import type { RetryEvent } from '../src/runtime/index.js';
import { FakeResolver, ManualClock } from './fixtures.js';

const noDelay = { baseDelayMs: 0, maxDelayMs: 0, jitter: 0 };

const record: WorkingProductRecord = {
  identity: {
    modelCode: 'LTTA',
    brand: 'Lynx',
    modelYear: 2026,
    modelFamily: 'Rave RE',
    category: 'performance',
    baseModelKey: 'LYNX_RAVE_RE_2026',
    price: 18990,
    currency: 'EUR',
    market: 'FI',
  },
  spec: {},
  optionSets: {},
  axes: {},
};

describe('retryTransient', () => {
  it('retries transient errors until success', async () => {
    let calls = 0;
    const result = await retryTransient(async () => {
      calls++;
      if (calls < 3) throw new ResolverError({ code: 'UNAVAILABLE', message: 'busy' });
      return 'ok';
    }, { attempts: 3, ...noDelay });

    expect(result).toBe('ok');
    expect(calls).toBe(3);
  });

  it('gives up immediately on a malformed response', async () => {
    let calls = 0;
    const failing = retryTransient(async () => {
      calls++;
      throw new ResolverError({ code: 'INVALID_RESPONSE', message: 'garbage' });
    }, { attempts: 3, ...noDelay });

    await expect(failing).rejects.toMatchObject({ code: 'INVALID_RESPONSE' });
    expect(calls).toBe(1);
  });

  it('sleeps the backoff on the clock and reports each retry', async () => {
    const clock = new ManualClock();
    const events: Array<Omit<RetryEvent, 'error'>> = [];

    await expect(
      retryTransient(
        async () => {
          throw new ResolverError({ code: 'TIMEOUT', message: 'slow' });
        },
        { attempts: 3, baseDelayMs: 100, maxDelayMs: 1000, jitter: 0 },
        ({ attempt, delayMs }) => events.push({ attempt, delayMs }),
        clock
      )
    ).rejects.toThrow('slow');

    expect(events).toEqual([
      { attempt: 2, delayMs: 100 },
      { attempt: 3, delayMs: 200 },
    ]);
    expect(clock.sleeps).toEqual([100, 200]);
  });
});

describe('backoffDelayMs', () => {
  it('doubles per retry up to the cap', () => {
    const policy = { attempts: 5, baseDelayMs: 100, maxDelayMs: 300, jitter: 0 };
    expect([1, 2, 3, 4].map((retry) => backoffDelayMs(policy, retry))).toEqual([100, 200, 300, 300]);
  });

  it('spreads the delay by the jitter factor', () => {
    const policy = { attempts: 3, baseDelayMs: 100, maxDelayMs: 1000, jitter: 0.5 };
    expect(backoffDelayMs(policy, 1, () => 1)).toBe(150);
    expect(backoffDelayMs(policy, 1, () => 0)).toBe(50);
  });
});

describe('isTransientResolverError', () => {
  it('classifies errors', () => {
    expect(isTransientResolverError(new CollaboratorError({ code: 'RATE_LIMITED', message: 'x' }))).toBe(true);
    expect(isTransientResolverError(new CollaboratorError({ code: 'VALIDATION_ERROR', message: 'x' }))).toBe(false);
    expect(isTransientResolverError(new ResolverError({ code: 'CIRCUIT_OPEN', message: 'x' }))).toBe(false);
    expect(isTransientResolverError({ status: 503 })).toBe(true);
    expect(isTransientResolverError({ status: 400 })).toBe(false);
    expect(isTransientResolverError({ code: 'ECONNRESET' })).toBe(true);
    expect(isTransientResolverError(new Error('plain'))).toBe(false);
  });
});

describe('withDeadline', () => {
  it('rejects with the timeout error when the task is too slow', async () => {
    const slow = () => new Promise<string>((resolve) => setTimeout(() => resolve('late'), 200));
    await expect(withDeadline(slow, 10, () => new Error('deadline passed'))).rejects.toThrow('deadline passed');
  });

  it('passes through fast results', async () => {
    await expect(withDeadline(async () => 1, 100, () => new Error('deadline passed'))).resolves.toBe(1);
  });
});

describe('ConcurrencyGate', () => {
  it('runs at most limit tasks at once and frees every slot', async () => {
    const gate = new ConcurrencyGate(2);
    let active = 0;
    let maxActive = 0;

    await Promise.all(
      [15, 5, 10, 5, 5].map((ms) =>
        gate.run(async () => {
          active++;
          maxActive = Math.max(maxActive, active);
          await new Promise((resolve) => setTimeout(resolve, ms));
          active--;
        })
      )
    );

    expect(maxActive).toBe(2);
    expect(gate.activeCount).toBe(0);
  });

  it('rejects a zero limit', () => {
    expect(() => new ConcurrencyGate(0)).toThrow('Concurrency limit must be a positive integer (got 0)');
  });
});

describe('mapWithConcurrency', () => {
  it('bounds concurrency and keeps input order', async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const results = await mapWithConcurrency([30, 10, 20, 5, 15], 2, async (ms, index) => {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await new Promise((resolve) => setTimeout(resolve, ms));
      inFlight--;
      return index;
    });

    expect(results).toEqual([0, 1, 2, 3, 4]);
    expect(maxInFlight).toBe(2);
  });

  it('starts no further items after a failure', async () => {
    const started: number[] = [];
    const failing = mapWithConcurrency([1, 2, 3, 4], 1, async (item) => {
      started.push(item);
      if (item === 2) throw new Error('row 2 broke');
      return item;
    });

    await expect(failing).rejects.toThrow('row 2 broke');
    expect(started).toEqual([1, 2]);
  });

  it('returns an empty list for no items', async () => {
    await expect(mapWithConcurrency([], 3, async () => 1)).resolves.toEqual([]);
  });
});

describe('CallThrottle', () => {
  it('holds calls over the budget until the next window', async () => {
    const clock = new ManualClock();
    const throttle = new CallThrottle({ windowMs: 1000, maxRequests: 2 }, clock);

    const waits = await Promise.all(Array.from({ length: 5 }, () => throttle.admit()));

    expect(waits).toEqual([0, 0, 1000, 0, 1000]);
    expect(clock.sleeps).toEqual([1000, 1000]);
    expect(clock.now()).toBe(2000);
  });

  it('starts a fresh window once the old one has passed', async () => {
    const clock = new ManualClock();
    const throttle = new CallThrottle({ windowMs: 1000, maxRequests: 1 }, clock);

    await throttle.admit();
    clock.current = 1500;
    await expect(throttle.admit()).resolves.toBe(0);
    expect(clock.sleeps).toEqual([]);
  });

  it('is disabled unless enabled', () => {
    expect(CallThrottle.fromConfig({ enabled: false, windowMs: 1000, maxRequests: 1 })).toBeNull();
  });
});

describe('CircuitBreaker', () => {
  it('opens after the threshold and admits one trial call', () => {
    const clock = new ManualClock();
    const breaker = new CircuitBreaker({ failureThreshold: 2, openMs: 100 }, clock);

    breaker.recordFailure();
    expect(breaker.tryAcquire()).toBe(true);
    breaker.recordFailure();
    expect(breaker.tryAcquire()).toBe(false);

    clock.current = 50;
    expect(breaker.snapshot()).toEqual({ mode: 'open', retryInMs: 50 });

    clock.current = 100;
    expect(breaker.tryAcquire()).toBe(true);
    expect(breaker.tryAcquire()).toBe(false);
    breaker.recordSuccess();
    expect(breaker.snapshot()).toEqual({ mode: 'closed', failures: 0 });
  });

  it('reopens when the trial call fails and frees the trial on a neutral outcome', () => {
    const clock = new ManualClock();
    const breaker = new CircuitBreaker({ failureThreshold: 1, openMs: 100 }, clock);

    breaker.recordFailure();
    clock.current = 100;
    expect(breaker.tryAcquire()).toBe(true);
    breaker.recordNeutral();
    expect(breaker.tryAcquire()).toBe(true);
    breaker.recordFailure();
    expect(breaker.snapshot()).toEqual({ mode: 'open', retryInMs: 100 });
  });
});

describe('GuardedSemanticResolver', () => {
  const logger = createSilentLogger();

  it('caps concurrent calls to the inner resolver', async () => {
    const inner = new FakeResolver({ delayMs: 10 });
    const guarded = new GuardedSemanticResolver(inner, externalCallSchema.parse({ maxConcurrency: 2 }), { logger });

    await Promise.all(Array.from({ length: 6 }, () => guarded.matchBaseModel('Lynx', 'Rave', ['Rave RE'])));

    expect(inner.callsTo('matchBaseModel')).toBe(6);
    expect(inner.maxInFlight).toBe(2);
  });

  it('turns a slow call into a TIMEOUT after the configured attempts', async () => {
    const inner = new FakeResolver({ delayMs: 100 });
    const guarded = new GuardedSemanticResolver(
      inner,
      externalCallSchema.parse({ timeoutMs: 10, retries: { attempts: 2, ...noDelay } }),
      { logger }
    );

    await expect(guarded.checkConsistency(record, 'text')).rejects.toMatchObject({
      name: 'ResolverError',
      code: 'TIMEOUT',
      message: "Resolver call 'checkConsistency' timed out after 10ms",
    });
    expect(inner.callsTo('checkConsistency')).toBe(2);
  });

  it('opens the circuit for the failing operation only', async () => {
    const inner = new FakeResolver({ baseModel: new ResolverError({ code: 'UNAVAILABLE', message: 'down' }) });
    const guarded = new GuardedSemanticResolver(
      inner,
      externalCallSchema.parse({
        retries: { attempts: 1 },
        circuitBreaker: { enabled: true, failureThreshold: 1, openMs: 60_000 },
      }),
      { logger }
    );

    await expect(guarded.matchBaseModel('Lynx', 'Rave', [])).rejects.toMatchObject({ code: 'UNAVAILABLE' });
    await expect(guarded.matchBaseModel('Lynx', 'Rave', [])).rejects.toMatchObject({ code: 'CIRCUIT_OPEN' });
    await expect(guarded.checkConsistency(record, 'text')).resolves.toBe(0.95);
    expect(inner.callsTo('matchBaseModel')).toBe(1);
  });

  it('keeps the circuit closed on malformed responses', async () => {
    const inner = new FakeResolver({ baseModel: new ResolverError({ code: 'INVALID_RESPONSE', message: 'bad' }) });
    const guarded = new GuardedSemanticResolver(
      inner,
      externalCallSchema.parse({ circuitBreaker: { enabled: true, failureThreshold: 1 } }),
      { logger }
    );

    await expect(guarded.matchBaseModel('Lynx', 'Rave', [])).rejects.toMatchObject({ code: 'INVALID_RESPONSE' });
    await expect(guarded.matchBaseModel('Lynx', 'Rave', [])).rejects.toMatchObject({ code: 'INVALID_RESPONSE' });
    expect(inner.callsTo('matchBaseModel')).toBe(2);
  });

  it('waits out the rate limit instead of failing calls', async () => {
    const clock = new ManualClock();
    const inner = new FakeResolver();
    const guarded = new GuardedSemanticResolver(
      inner,
      externalCallSchema.parse({ rateLimit: { enabled: true, windowMs: 1000, maxRequests: 1 } }),
      { logger, clock }
    );

    const matches = await Promise.all(Array.from({ length: 3 }, () => guarded.matchBaseModel('Lynx', 'Rave', [])));

    expect(matches).toEqual([
      { name: null, confidence: 0 },
      { name: null, confidence: 0 },
      { name: null, confidence: 0 },
    ]);
    expect(inner.callsTo('matchBaseModel')).toBe(3);
    expect(clock.sleeps).toEqual([1000, 1000]);
  });
});
