import {
  FatalOperationError,
  RetryExecutor,
  RetryPolicy,
  RetryStrategy,
  abortableSleep,
  computeDelay,
} from '../../src/engine/retry-executor';
import { CircuitState } from '../../src/engine/circuit-breaker';
import { SeededRandom } from '../../src/util/seeded-random';
import { FakeClock, captureLogs, instantSleep } from '../helpers';

captureLogs();

const EXPONENTIAL: RetryPolicy = {
  maxAttempts: 5,
  baseDelayMs: 100,
  maxDelayMs: 1_000,
  backoffMultiplier: 2,
  jitter: false,
  strategy: RetryStrategy.Exponential,
};

function failing(times: number, value = 'ok'): { calls: () => number; op: () => Promise<string> } {
  let calls = 0;
  return {
    calls: () => calls,
    op: async () => {
      calls++;
      if (calls <= times) throw new Error(`failure ${calls}`);
      return value;
    },
  };
}

describe('computeDelay', () => {
  test('exponential delay before retry k is min(d * m^(k-1), max)', () => {
    expect([1, 2, 3, 4, 5, 6].map((k) => computeDelay(EXPONENTIAL, k))).toEqual([100, 200, 400, 800, 1_000, 1_000]);
  });

  test('linear, fixed and immediate strategies', () => {
    expect([1, 2, 3].map((k) => computeDelay({ ...EXPONENTIAL, strategy: RetryStrategy.Linear }, k))).toEqual([100, 200, 300]);
    expect([1, 2, 3].map((k) => computeDelay({ ...EXPONENTIAL, strategy: RetryStrategy.Fixed }, k))).toEqual([100, 100, 100]);
    expect(computeDelay({ ...EXPONENTIAL, strategy: RetryStrategy.Immediate }, 3)).toBe(0);
  });

  test('jitter stays within ten percent after the cap', () => {
    const policy = { ...EXPONENTIAL, jitter: true };
    expect(computeDelay(policy, 1, () => 0)).toBeCloseTo(90);
    expect(computeDelay(policy, 1, () => 0.5)).toBeCloseTo(100);
    expect(computeDelay(policy, 10, () => 0)).toBeCloseTo(900);
  });

  test('jittered delays are reproducible from a seed', () => {
    const policy = { ...EXPONENTIAL, jitter: true };
    const first = new SeededRandom(42).source();
    const second = new SeededRandom(42).source();
    const a = [1, 2, 3, 4].map((k) => computeDelay(policy, k, first));
    const b = [1, 2, 3, 4].map((k) => computeDelay(policy, k, second));
    expect(a).toEqual(b);
    a.forEach((delay, i) => {
      const base = Math.min(100 * 2 ** i, 1_000);
      expect(delay).toBeGreaterThanOrEqual(base * 0.9);
      expect(delay).toBeLessThanOrEqual(base * 1.1);
    });
  });
});

describe('RetryExecutor', () => {
  let clock: FakeClock;

  function executor(retry: Partial<RetryPolicy> = {}, breaker = {}): RetryExecutor {
    return new RetryExecutor({
      defaults: {
        retry: { ...EXPONENTIAL, maxAttempts: 3, ...retry },
        breaker: { failureThreshold: 5, recoveryTimeoutMs: 1_000, successThreshold: 2, ...breaker },
      },
      clock: clock.now,
      sleep: instantSleep,
    });
  }

  beforeEach(() => {
    clock = new FakeClock();
  });

  test('retries retryable failures and returns the value', async () => {
    const { op, calls } = failing(2);
    const result = await executor().execute('persistence-write', op);
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.value).toBe('ok');
    expect(calls()).toBe(3);
    expect(result.attempts.map((a) => [a.success, a.delayMs])).toEqual([
      [false, 100],
      [false, 200],
      [true, undefined],
    ]);
  });

  test('passes the retry context to each attempt', async () => {
    const seen: Array<[number, string | null, number]> = [];
    await executor().execute('persistence-write', async (ctx) => {
      seen.push([ctx.attemptNumber, ctx.lastErrorKind, ctx.nextDelayMs]);
      if (ctx.attemptNumber < 2) throw new Error('again');
      return 1;
    });
    expect(seen).toEqual([
      [1, null, 0],
      [2, 'retryable', 100],
    ]);
  });

  test('returns attempts_exhausted with the full history', async () => {
    const { op, calls } = failing(10);
    const result = await executor().execute('persistence-write', op);
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.kind).toBe('attempts_exhausted');
    expect(calls()).toBe(3);
    expect(result.error.attempts.map((a) => a.error)).toEqual(['failure 1', 'failure 2', 'failure 3']);
  });

  test('stops at a fatal error without counting it against the breaker', async () => {
    const exec = executor();
    let calls = 0;
    const result = await exec.execute('persistence-write', async () => {
      calls++;
      throw new FatalOperationError('bad request');
    });
    expect(calls).toBe(1);
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.kind).toBe('fatal');
    expect(result.error.message).toBe('bad request');
    expect(exec.getCircuitStatus('persistence-write').consecutiveFailures).toBe(0);
  });

  test('classifyError can mark errors fatal', async () => {
    let calls = 0;
    const result = await executor().execute(
      'persistence-write',
      async () => {
        calls++;
        throw new RangeError('out of range');
      },
      { classifyError: (err) => (err instanceof RangeError ? 'fatal' : 'retryable') },
    );
    expect(calls).toBe(1);
    expect(result.success ? undefined : result.error.kind).toBe('fatal');
  });

  test('a throwing classifyError counts as retryable and frees the half-open trial', async () => {
    const exec = executor({ maxAttempts: 1 }, { failureThreshold: 1 });
    await exec.execute('persistence-write', failing(1).op);
    clock.tick(1_000);

    const trial = await exec.execute('persistence-write', failing(1).op, {
      classifyError: () => {
        throw new Error('classifier bug');
      },
    });
    expect(trial.success ? undefined : trial.error.kind).toBe('attempts_exhausted');
    expect(trial.success ? undefined : trial.error.attempts[0].errorKind).toBe('retryable');
    expect(exec.getCircuitStatus('persistence-write').state).toBe(CircuitState.Open);

    clock.tick(1_000);
    const next = await exec.execute('persistence-write', async () => 'recovered');
    expect(next.success ? next.value : undefined).toBe('recovered');
  });

  test('strategy none makes exactly one attempt', async () => {
    const { op, calls } = failing(1);
    const result = await executor({ strategy: RetryStrategy.None, maxAttempts: 5 }).execute('audit-write', op);
    expect(calls()).toBe(1);
    expect(result.success ? undefined : result.error.kind).toBe('attempts_exhausted');
  });

  test('notification dispatch is short-circuited once the circuit opens', async () => {
    const exec = executor({ maxAttempts: 4, strategy: RetryStrategy.Immediate }, { failureThreshold: 3 });
    const { op, calls } = failing(100);

    const result = await exec.execute('notification-dispatch', op);
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.kind).toBe('circuit_open');
    expect(result.error.attempts).toHaveLength(3);
    expect(calls()).toBe(3);

    const next = await exec.execute('notification-dispatch', op);
    expect(next.success ? undefined : next.error.kind).toBe('circuit_open');
    expect(calls()).toBe(3);
  });

  test('recovers through half-open after the timeout', async () => {
    const exec = executor({ maxAttempts: 1 }, { failureThreshold: 2 });
    await exec.execute('persistence-write', failing(1).op);
    await exec.execute('persistence-write', failing(1).op);
    expect(exec.getCircuitStatus('persistence-write').state).toBe(CircuitState.Open);

    clock.tick(1_000);
    const first = await exec.execute('persistence-write', async () => 'a');
    expect(first.success).toBe(true);
    expect(exec.getCircuitStatus('persistence-write').state).toBe(CircuitState.HalfOpen);

    const second = await exec.execute('persistence-write', async () => 'b');
    expect(second.success).toBe(true);
    expect(exec.getCircuitStatus('persistence-write').state).toBe(CircuitState.Closed);
  });

  test('only one half-open trial runs at a time', async () => {
    const exec = executor({ maxAttempts: 1 }, { failureThreshold: 1 });
    await exec.execute('persistence-write', failing(1).op);
    clock.tick(1_000);

    let release: (value: string) => void = () => undefined;
    const trial = exec.execute('persistence-write', () => new Promise<string>((resolve) => (release = resolve)));
    let invoked = false;
    const concurrent = await exec.execute('persistence-write', async () => {
      invoked = true;
      return 'x';
    });
    expect(invoked).toBe(false);
    expect(concurrent.success ? undefined : concurrent.error.kind).toBe('circuit_open');

    release('done');
    const trialResult = await trial;
    expect(trialResult.success).toBe(true);
  });

  test('aborts remaining attempts when the deadline would pass', async () => {
    const exec = new RetryExecutor({
      defaults: { retry: { ...EXPONENTIAL, baseDelayMs: 20, deadlineMs: 50 } },
      clock: clock.now,
      sleep: async (ms) => {
        clock.tick(ms);
        return true;
      },
    });
    const { op, calls } = failing(10);
    const result = await exec.execute('persistence-write', op);
    expect(calls()).toBe(2);
    expect(result.success ? undefined : result.error.kind).toBe('deadline_exceeded');
  });

  test('does not start when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const { op, calls } = failing(0);
    const result = await executor().execute('persistence-write', op, { signal: controller.signal });
    expect(calls()).toBe(0);
    expect(result.success ? undefined : result.error.kind).toBe('canceled');
  });

  test('cancellation during the backoff stops further attempts', async () => {
    const controller = new AbortController();
    const exec = new RetryExecutor({
      defaults: { retry: EXPONENTIAL },
      clock: clock.now,
      sleep: async (_ms, signal) => {
        controller.abort();
        return !(signal?.aborted ?? false);
      },
    });
    const { op, calls } = failing(10);
    const result = await exec.execute('persistence-write', op, { signal: controller.signal });
    expect(calls()).toBe(1);
    expect(result.success ? undefined : result.error.kind).toBe('canceled');
  });

  test('reports statistics and keeps a bounded history', async () => {
    const exec = executor();
    await exec.execute('audit-write', failing(1).op);
    await exec.execute('audit-write', failing(10).op);

    const stats = exec.getStatistics();
    expect(stats).toMatchObject({
      totalOperations: 2,
      successfulOperations: 1,
      failedOperations: 1,
      successRate: 0.5,
      averageAttempts: 2.5,
      activeOperations: 0,
      failuresByKind: { attempts_exhausted: 1 },
    });

    for (let i = 0; i < 1_000; i++) {
      await exec.execute('audit-write', async () => i);
    }
    expect(exec.getStatistics().totalOperations).toBe(501);
  });

  test('resetCircuit closes an open circuit', async () => {
    const exec = executor({ maxAttempts: 1 }, { failureThreshold: 1 });
    await exec.execute('persistence-write', failing(1).op);
    expect(exec.getCircuitStatus('persistence-write').state).toBe(CircuitState.Open);
    expect(exec.resetCircuit('persistence-write').state).toBe(CircuitState.Closed);
    expect(exec.listCircuits().map((c) => c.operationClass)).toEqual(['persistence-write']);
  });

  test('per-class overrides take precedence over defaults', () => {
    const exec = new RetryExecutor({
      defaults: { retry: { maxAttempts: 2 } },
      classes: { 'audit-write': { retry: { maxAttempts: 7 }, breaker: { failureThreshold: 9 } } },
    });
    expect(exec.configFor('audit-write').retry.maxAttempts).toBe(7);
    expect(exec.configFor('audit-write').breaker.failureThreshold).toBe(9);
    expect(exec.configFor('persistence-write').retry.maxAttempts).toBe(2);
  });
});

describe('abortableSleep', () => {
  test('resolves true after the delay', async () => {
    await expect(abortableSleep(1)).resolves.toBe(true);
  });

  test('resolves false as soon as the signal aborts', async () => {
    const controller = new AbortController();
    const sleeping = abortableSleep(60_000, controller.signal);
    controller.abort();
    await expect(sleeping).resolves.toBe(false);
  });
});
