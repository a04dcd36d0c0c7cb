/**
 * Channel Lock
 *
 * One writer lane per channel. Waiters are served in arrival order;
 * different channels never wait on each other.
 */

import { nanoid } from 'nanoid';
import type { ChannelLease } from './types';

interface Waiter {
  holder: string;
  grant: () => void;
}

export class ChannelLock {
  private holders: Map<string, string> = new Map(); // channelId -> holder
  private waiters: Map<string, Waiter[]> = new Map();

  constructor(private readonly timeoutMs: number = 30_000) {}

  /**
   * Acquire the channel's lane, waiting behind earlier callers
   */
  async acquire(channelId: string, holder: string = nanoid(8)): Promise<ChannelLease> {
    if (!this.holders.has(channelId)) {
      this.holders.set(channelId, holder);
      return this.createLease(channelId, holder);
    }

    return new Promise<ChannelLease>((resolve, reject) => {
      const timeoutId = setTimeout(() => {
        this.removeWaiter(channelId, holder);
        reject(new Error(`Lock acquisition timeout for channel ${channelId}`));
      }, this.timeoutMs);

      const queue = this.waiters.get(channelId) ?? [];
      queue.push({
        holder,
        grant: () => {
          clearTimeout(timeoutId);
          this.holders.set(channelId, holder);
          resolve(this.createLease(channelId, holder));
        },
      });
      this.waiters.set(channelId, queue);
    });
  }

  /**
   * Run `task` while holding the channel's lane
   */
  async run<T>(channelId: string, task: () => Promise<T>): Promise<T> {
    const lease = await this.acquire(channelId);
    try {
      return await task();
    } finally {
      lease.release();
    }
  }

  release(channelId: string, holder: string): void {
    if (this.holders.get(channelId) !== holder) {
      return;
    }
    this.holders.delete(channelId);

    const queue = this.waiters.get(channelId);
    const next = queue?.shift();
    if (queue && queue.length === 0) {
      this.waiters.delete(channelId);
    }
    next?.grant();
  }

  isLocked(channelId: string): boolean {
    return this.holders.has(channelId);
  }

  pending(channelId: string): number {
    return this.waiters.get(channelId)?.length ?? 0;
  }

  private createLease(channelId: string, holder: string): ChannelLease {
    return {
      channelId,
      holder,
      acquiredAt: Date.now(),
      release: () => this.release(channelId, holder),
    };
  }

  private removeWaiter(channelId: string, holder: string): void {
    const queue = this.waiters.get(channelId);
    if (!queue) return;

    const index = queue.findIndex(w => w.holder === holder);
    if (index !== -1) {
      queue.splice(index, 1);
    }
    if (queue.length === 0) {
      this.waiters.delete(channelId);
    }
  }
}
