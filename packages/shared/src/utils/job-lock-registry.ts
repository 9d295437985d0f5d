import type { LoggerMethods } from '@regroup/logger';

import { ResourceTimeoutError } from '../errors/resource-timeout-error';

/**
 * Default bound on lock acquisition
 */
export const DEFAULT_JOB_LOCK_TIMEOUT_MS = 30_000;

export type ReleaseFn = () => void;

export interface JobLockRegistryOptions {
  /**
   * Maximum wait for a lock in milliseconds (default: 30000)
   */
  timeoutMs?: number;
}

interface Waiter {
  grant: () => void;
  timer: ReturnType<typeof setTimeout>;
}

interface JobLockState {
  held: boolean;
  waiters: Waiter[];
}

/**
 * JobLockRegistry
 *
 * Per-job mutual exclusion for the write path of a job.
 *
 * - Waiters are granted the lock in arrival order
 * - A waiter that exceeds its bound is rejected with ResourceTimeoutError
 * - A job entry is removed as soon as it is neither held nor awaited
 */
export class JobLockRegistry {
  private readonly logger: LoggerMethods;
  private readonly timeoutMs: number;
  private readonly locks = new Map<string, JobLockState>();

  constructor(logger: LoggerMethods, options?: JobLockRegistryOptions) {
    this.logger = logger;
    this.timeoutMs = options?.timeoutMs ?? DEFAULT_JOB_LOCK_TIMEOUT_MS;
  }

  /**
   * Number of jobs currently holding or awaiting a lock
   */
  get size(): number {
    return this.locks.size;
  }

  isLocked(jobId: string): boolean {
    return this.locks.get(jobId)?.held ?? false;
  }

  waitingCount(jobId: string): number {
    return this.locks.get(jobId)?.waiters.length ?? 0;
  }

  /**
   * Acquire the lock of a job
   *
   * @param jobId - Job key
   * @param timeoutMs - Wait bound, defaults to the registry bound
   * @returns Release function; calling it more than once has no effect
   * @throws {ResourceTimeoutError} When the bound elapses first
   */
  acquire(jobId: string, timeoutMs = this.timeoutMs): Promise<ReleaseFn> {
    let state = this.locks.get(jobId);
    if (!state) {
      state = { held: false, waiters: [] };
      this.locks.set(jobId, state);
    }

    if (!state.held) {
      state.held = true;
      return Promise.resolve(this.createRelease(jobId, state));
    }

    const lockState = state;
    this.logger.debug(
      `[JobLockRegistry] Job ${jobId} is locked, waiting (queue: ${lockState.waiters.length + 1})`,
    );

    return new Promise<ReleaseFn>((resolve, reject) => {
      const waiter: Waiter = {
        grant: () => {
          clearTimeout(waiter.timer);
          resolve(this.createRelease(jobId, lockState));
        },
        timer: setTimeout(() => {
          const index = lockState.waiters.indexOf(waiter);
          if (index !== -1) {
            lockState.waiters.splice(index, 1);
          }
          this.pruneIfIdle(jobId, lockState);
          this.logger.warn(
            `[JobLockRegistry] Gave up waiting for job ${jobId} after ${timeoutMs}ms`,
          );
          reject(new ResourceTimeoutError(jobId, timeoutMs));
        }, timeoutMs),
      };
      lockState.waiters.push(waiter);
    });
  }

  /**
   * Run `fn` while holding the lock of a job, releasing it afterwards
   * whether `fn` resolves or throws
   */
  async withLock<T>(
    jobId: string,
    fn: () => Promise<T> | T,
    timeoutMs?: number,
  ): Promise<T> {
    const release = await this.acquire(jobId, timeoutMs);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private createRelease(jobId: string, state: JobLockState): ReleaseFn {
    let released = false;

    return () => {
      if (released) {
        return;
      }
      released = true;

      const next = state.waiters.shift();
      if (next) {
        next.grant();
        return;
      }

      state.held = false;
      this.pruneIfIdle(jobId, state);
    };
  }

  private pruneIfIdle(jobId: string, state: JobLockState): void {
    if (
      !state.held &&
      state.waiters.length === 0 &&
      this.locks.get(jobId) === state
    ) {
      this.locks.delete(jobId);
    }
  }
}
