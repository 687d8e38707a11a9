import { logger } from './logger';

const log = logger.forModule('exclusiveLock');

// ─── Types ────────────────────────────────────────────────────────────────────

interface LockHolder {
  owner: string;
  acquiredAt: number;
}

interface LockWaiter {
  owner: string;
  grant: () => void;
  enqueuedAt: number;
}

export interface LockMetrics {
  totalAcquisitions: number;
  totalReleases: number;
  totalContentions: number;
  maxQueueLength: number;
  queueLength: number;
  maxHoldMs: number;
  heldBy: string | null;
}

export type ReleaseFn = () => void;

// ─── ExclusiveLock ────────────────────────────────────────────────────────────

/**
 * Single-domain FIFO mutex for async callers. A released lock is handed
 * directly to the oldest waiter, so a caller arriving later can never
 * overtake one already queued.
 */
export class ExclusiveLock {
  private holder: LockHolder | null = null;
  private waitQueue: LockWaiter[] = [];
  private ownerSeq = 0;
  private stats = {
    totalAcquisitions: 0,
    totalReleases: 0,
    totalContentions: 0,
    maxQueueLength: 0,
    maxHoldMs: 0,
  };

  constructor(
    private readonly name: string,
    private readonly clock: () => number = Date.now,
  ) {}

  acquire(owner: string = this.generateOwnerId()): Promise<ReleaseFn> {
    if (!this.holder) {
      return Promise.resolve(this.grant(owner));
    }

    this.stats.totalContentions++;
    log.debug('Contention, enqueuing waiter', {
      lock: this.name,
      owner,
      heldBy: this.holder.owner,
      queueLength: this.waitQueue.length + 1,
    });

    return new Promise<ReleaseFn>((resolve) => {
      this.waitQueue.push({
        owner,
        enqueuedAt: this.clock(),
        grant: () => resolve(this.grant(owner)),
      });
      this.stats.maxQueueLength = Math.max(this.stats.maxQueueLength, this.waitQueue.length);
    });
  }

  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  getMetrics(): LockMetrics {
    return {
      ...this.stats,
      queueLength: this.waitQueue.length,
      heldBy: this.holder?.owner ?? null,
    };
  }

  // ── Private ───────────────────────────────────────────────────────────────

  private grant(owner: string): ReleaseFn {
    const holder: LockHolder = { owner, acquiredAt: this.clock() };
    this.holder = holder;
    this.stats.totalAcquisitions++;

    let released = false;
    return () => {
      if (released) {
        log.warn('Release called twice', { lock: this.name, owner });
        return;
      }
      released = true;
      this.release(holder);
    };
  }

  private release(holder: LockHolder): void {
    const now = this.clock();
    const heldMs = Math.max(0, now - holder.acquiredAt);
    this.stats.maxHoldMs = Math.max(this.stats.maxHoldMs, heldMs);
    this.holder = null;
    this.stats.totalReleases++;

    const next = this.waitQueue.shift();
    if (next) {
      log.debug('Handing lock to next waiter', {
        lock: this.name,
        from: holder.owner,
        to: next.owner,
        heldMs,
        waitedMs: Math.max(0, now - next.enqueuedAt),
      });
      next.grant();
    }
  }

  private generateOwnerId(): string {
    this.ownerSeq++;
    return `${this.name}#${this.ownerSeq}`;
  }
}
