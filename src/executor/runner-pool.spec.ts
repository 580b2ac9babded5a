import { InfrastructureError } from '../common/errors';
import { AcquireAbortedError, RunnerPool } from './runner-pool';

const LONG = 10_000;

describe('RunnerPool', () => {
  it('starts with every runner available', () => {
    const pool = RunnerPool.create(2, '/work');
    expect(pool.stats()).toEqual({ size: 2, available: 2, waiting: 0 });
  });

  it('hands out each runner to one holder at a time', async () => {
    const pool = RunnerPool.create(2, '/work');
    const a = await pool.acquire({ timeoutMs: LONG });
    const b = await pool.acquire({ timeoutMs: LONG });

    expect(a.runner.id).toBe('runner-1');
    expect(b.runner.id).toBe('runner-2');
    expect(a.runner.workDir).toBe('/work/runner-1');
    expect(pool.stats()).toEqual({ size: 2, available: 0, waiting: 0 });
  });

  it('serves waiters first-come first-served', async () => {
    const pool = RunnerPool.create(1, '/work');
    const held = await pool.acquire({ timeoutMs: LONG });

    const order: string[] = [];
    const first = pool.acquire({ timeoutMs: LONG }).then((lease) => {
      order.push('first');
      return lease;
    });
    const second = pool.acquire({ timeoutMs: LONG }).then((lease) => {
      order.push('second');
      return lease;
    });
    expect(pool.stats().waiting).toBe(2);

    held.release();
    const firstLease = await first;
    expect(order).toEqual(['first']);

    firstLease.release();
    await second;
    expect(order).toEqual(['first', 'second']);
  });

  it('treats a second release as a no-op', async () => {
    const pool = RunnerPool.create(1, '/work');
    const lease = await pool.acquire({ timeoutMs: LONG });
    lease.release();
    lease.release();
    expect(pool.stats()).toEqual({ size: 1, available: 1, waiting: 0 });
  });

  it('fails with an infrastructure error when no runner frees up in time', async () => {
    const pool = RunnerPool.create(1, '/work');
    await pool.acquire({ timeoutMs: LONG });

    await expect(pool.acquire({ timeoutMs: 20 })).rejects.toBeInstanceOf(InfrastructureError);
    expect(pool.stats().waiting).toBe(0);
  });

  it('stops waiting when the signal aborts', async () => {
    const pool = RunnerPool.create(1, '/work');
    const held = await pool.acquire({ timeoutMs: LONG });
    const controller = new AbortController();

    const waiting = pool.acquire({ timeoutMs: LONG, signal: controller.signal });
    controller.abort();
    await expect(waiting).rejects.toBeInstanceOf(AcquireAbortedError);

    // the aborted waiter must not swallow the runner
    held.release();
    expect(pool.stats()).toEqual({ size: 1, available: 1, waiting: 0 });
  });

  it('rejects at once when the signal is already aborted', async () => {
    const pool = RunnerPool.create(1, '/work');
    const controller = new AbortController();
    controller.abort();
    await expect(pool.acquire({ timeoutMs: LONG, signal: controller.signal })).rejects.toBeInstanceOf(
      AcquireAbortedError,
    );
    expect(pool.stats().available).toBe(1);
  });
});
