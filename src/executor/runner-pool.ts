import { join } from 'node:path';
import { InfrastructureError } from '../common/errors';

export interface Runner {
  id: string;
  /** Root under which each job on this runner gets its own workspace */
  workDir: string;
}

export interface RunnerLease {
  readonly runner: Runner;
  /** Idempotent; hands the runner to the oldest waiter, if any. */
  release(): void;
}

export interface AcquireOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface RunnerPoolStats {
  size: number;
  available: number;
  waiting: number;
}

/** Rejection of acquire() when the caller's signal aborts while waiting. */
export class AcquireAbortedError extends Error {
  constructor() {
    super('Runner acquisition aborted');
    this.name = 'AcquireAbortedError';
  }
}

interface Waiter {
  grant(runner: Runner): void;
}

/**
 * Bounded pool of runners. Each runner is checked out by exactly one job at a time;
 * waiters are served first-come first-served.
 */
export class RunnerPool {
  private readonly free: Runner[];
  private readonly waiters: Waiter[] = [];

  constructor(private readonly runners: readonly Runner[]) {
    if (runners.length === 0) throw new Error('Runner pool needs at least one runner');
    this.free = [...runners];
  }

  static create(size: number, workRoot: string): RunnerPool {
    const runners = Array.from({ length: size }, (_, i) => {
      const id = `runner-${i + 1}`;
      return { id, workDir: join(workRoot, id) };
    });
    return new RunnerPool(runners);
  }

  stats(): RunnerPoolStats {
    return { size: this.runners.length, available: this.free.length, waiting: this.waiters.length };
  }

  /**
   * Check out a runner, waiting up to timeoutMs for one to free up.
   * @throws InfrastructureError when no runner frees up in time
   * @throws AcquireAbortedError when options.signal aborts first
   */
  acquire(options: AcquireOptions): Promise<RunnerLease> {
    const { signal, timeoutMs } = options;
    if (signal?.aborted) return Promise.reject(new AcquireAbortedError());

    const runner = this.waiters.length === 0 ? this.free.shift() : undefined;
    if (runner) return Promise.resolve(this.lease(runner));

    return new Promise<RunnerLease>((resolve, reject) => {
      const cleanup = () => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) this.waiters.splice(index, 1);
      };
      const waiter: Waiter = {
        grant: (granted) => {
          cleanup();
          resolve(this.lease(granted));
        },
      };
      const onAbort = () => {
        cleanup();
        reject(new AcquireAbortedError());
      };
      const timer = setTimeout(() => {
        cleanup();
        reject(new InfrastructureError(`No runner became available within ${timeoutMs}ms`));
      }, timeoutMs);

      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  private lease(runner: Runner): RunnerLease {
    let released = false;
    return {
      runner,
      release: () => {
        if (released) return;
        released = true;
        this.handBack(runner);
      },
    };
  }

  private handBack(runner: Runner): void {
    const next = this.waiters[0];
    if (next) {
      next.grant(runner);
      return;
    }
    this.free.push(runner);
  }
}
