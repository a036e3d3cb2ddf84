import { logger } from '../core/logger';
import { ValidationError } from '../core/errors';
import { abortReason } from './clock';

export interface BulkheadOptions {
  name: string;
  // 0 disables the limit
  limit: number;
}

export interface BulkheadStats {
  name: string;
  active: number;
  queued: number;
  completed: number;
  peakActive: number;
  limit: number;
}

interface Waiter {
  grant: () => void;
}

/**
 * Counting admission gate. Waiters are woken in arrival order, but callers must
 * not rely on any ordering between them.
 */
export class Bulkhead {
  private active = 0;
  private completed = 0;
  private peakActive = 0;
  private queue: Waiter[] = [];

  constructor(private readonly options: BulkheadOptions) {
    if (!Number.isInteger(options.limit) || options.limit < 0) {
      throw ValidationError.invalidParallelism(options.limit);
    }
    logger.debug({
      name: options.name,
      limit: options.limit === 0 ? 'unbounded' : options.limit,
    }, 'Bulkhead created');
  }

  get unbounded(): boolean {
    return this.options.limit === 0;
  }

  /**
   * Wait for a free slot. Rejects with CancelledError if the signal aborts first.
   */
  acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(abortReason(signal));
    }

    if (this.unbounded || this.active < this.options.limit) {
      this.take();
      return Promise.resolve();
    }

    return new Promise((resolve, reject) => {
      const waiter: Waiter = {
        grant: () => {
          signal?.removeEventListener('abort', onAbort);
          this.take();
          resolve();
        },
      };
      const onAbort = () => {
        this.queue = this.queue.filter(queued => queued !== waiter);
        reject(signal ? abortReason(signal) : new Error('Bulkhead wait aborted'));
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      this.queue.push(waiter);
      logger.trace({
        name: this.options.name,
        queued: this.queue.length,
        active: this.active,
      }, 'Waiting for bulkhead slot');
    });
  }

  release(): void {
    if (this.active === 0) {
      throw new Error(`Bulkhead ${this.options.name} released more slots than it granted`);
    }
    this.active--;
    this.completed++;
    this.processQueue();
  }

  /**
   * Execute a function while holding a slot
   */
  async run<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire(signal);
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  private take(): void {
    this.active++;
    this.peakActive = Math.max(this.peakActive, this.active);
  }

  private processQueue(): void {
    if (!this.unbounded && this.active >= this.options.limit) {
      return;
    }

    const next = this.queue.shift();
    if (next) {
      next.grant();
    }
  }

  getStats(): BulkheadStats {
    return {
      name: this.options.name,
      active: this.active,
      queued: this.queue.length,
      completed: this.completed,
      peakActive: this.peakActive,
      limit: this.options.limit,
    };
  }
}
