/**
 * Request Limiter
 *
 * Semaphore-bounded concurrency plus a minimum gap between consecutive request
 * starts, so the aggregate request rate to a provider stays at or below
 * 1 / (minGapMs) no matter how many workers are running.
 */

export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

/** setTimeout-based sleep that resolves early when `signal` aborts. */
export const sleep: Sleeper = (ms, signal) =>
  new Promise((resolve) => {
    if (signal?.aborted || ms <= 0) {
      resolve();
      return;
    }
    const timer = setTimeout(done, ms);
    function done(): void {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });

/** Thrown by `run` when the caller's signal aborts before the task starts. */
export class AbortedError extends Error {
  constructor(message = 'Aborted before start') {
    super(message);
    this.name = 'AbortError';
  }
}

function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) throw new AbortedError();
}

interface Waiter {
  grant: () => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

export interface LimiterOptions {
  concurrency: number;
  minGapMs: number;
  /** Extra random delay, 0..jitterMs, added to each gap */
  jitterMs?: number;
  sleep?: Sleeper;
  now?: () => number;
  random?: () => number;
}

export class RequestLimiter {
  private active = 0;
  private readonly waiters: Waiter[] = [];
  private nextStartAt = 0;

  private readonly concurrency: number;
  private readonly minGapMs: number;
  private readonly jitterMs: number;
  private readonly sleep: Sleeper;
  private readonly now: () => number;
  private readonly random: () => number;

  constructor(options: LimiterOptions) {
    this.concurrency = Math.max(1, Math.floor(options.concurrency));
    this.minGapMs = Math.max(0, options.minGapMs);
    this.jitterMs = Math.max(0, options.jitterMs ?? 0);
    this.sleep = options.sleep ?? sleep;
    this.now = options.now ?? Date.now;
    this.random = options.random ?? Math.random;
  }

  /** Requests currently holding a permit. */
  get inFlight(): number {
    return this.active;
  }

  /** Callers still queued for a permit. */
  get queued(): number {
    return this.waiters.length;
  }

  /**
   * Run `task` once a permit is free and the pacing gap has passed. Once
   * `signal` aborts, a caller that has not started yet rejects with an
   * AbortError and `task` is never called.
   */
  async run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire(signal);
    try {
      throwIfAborted(signal);
      await this.pace(signal);
      throwIfAborted(signal);
      return await task();
    } finally {
      this.release();
    }
  }

  private acquire(signal?: AbortSignal): Promise<void> {
    throwIfAborted(signal);
    if (this.active < this.concurrency) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise((resolve, reject) => {
      const waiter: Waiter = { grant: resolve, signal };
      if (signal) {
        waiter.onAbort = () => {
          const at = this.waiters.indexOf(waiter);
          if (at >= 0) this.waiters.splice(at, 1);
          reject(new AbortedError());
        };
        signal.addEventListener('abort', waiter.onAbort, { once: true });
      }
      this.waiters.push(waiter);
    });
  }

  /** Hands the permit straight to the next waiter, if any. */
  private release(): void {
    const next = this.waiters.shift();
    if (!next) {
      this.active--;
      return;
    }
    if (next.onAbort) next.signal?.removeEventListener('abort', next.onAbort);
    next.grant();
  }

  private async pace(signal?: AbortSignal): Promise<void> {
    const now = this.now();
    const startAt = Math.max(now, this.nextStartAt);
    const jitter = this.jitterMs > 0 ? Math.floor(this.random() * this.jitterMs) : 0;
    this.nextStartAt = startAt + this.minGapMs + jitter;
    if (startAt > now) await this.sleep(startAt - now, signal);
  }
}
