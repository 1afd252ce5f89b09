/**
 * @module services/queue
 * @fileoverview Concurrency control for outbound page and image requests.
 *
 * Each clip makes at most two outbound GETs, plus any redirect hops, one
 * after the other, but many clips may run at once. Every GET goes through
 * {@link OutboundQueue}:
 *
 * ```
 * enqueue(host, fn)
 *   |
 *   v
 * host queue (concurrency 1, optional minimum interval)
 *   |
 *   v
 * global queue (concurrency = config.maxConcurrent)
 *   |
 *   v
 * fn()
 * ```
 *
 * ## Design Decisions
 *
 * **Host queues are short-lived.** Callers choose the URL, so the set of
 * hosts is unbounded. A host queue is created when a request for that host
 * arrives and dropped once it has nothing waiting or running. With a
 * per-host interval the drop waits one interval, so a request that follows
 * closely still sees the spacing.
 *
 * **Publishing is not queued.** Requests to Tana go to a single endpoint
 * and are already one per clip; only page and image fetches pass through
 * here.
 *
 * The per-host interval defaults to 0, so a page and its cover image on the
 * same host are fetched back to back.
 */

import PQueue from "p-queue";
import { config } from "../config.js";

/**
 * Two-level queue: one p-queue per host, all feeding one global p-queue.
 *
 * @example
 * ```typescript
 * const queue = new OutboundQueue(4, 0);
 * const response = await queue.enqueue("example.com", () => fetch("https://example.com/"));
 * await queue.drain();
 * ```
 */
export class OutboundQueue {
  private readonly globalQueue: PQueue;

  private readonly hostQueues = new Map<string, PQueue>();

  private readonly perHostInterval: number;

  /**
   * @param maxConcurrent   - Global in-flight limit; defaults to `config.maxConcurrent`.
   * @param perHostInterval - Minimum milliseconds between two requests to one
   *   host; defaults to `config.perHostInterval`.
   */
  constructor(maxConcurrent?: number, perHostInterval?: number) {
    this.globalQueue = new PQueue({
      concurrency: Math.max(1, maxConcurrent ?? config.maxConcurrent),
    });
    this.perHostInterval = Math.max(0, perHostInterval ?? config.perHostInterval);
  }

  private getHostQueue(host: string): PQueue {
    let queue = this.hostQueues.get(host);

    if (!queue) {
      queue =
        this.perHostInterval > 0
          ? new PQueue({ concurrency: 1, interval: this.perHostInterval, intervalCap: 1 })
          : new PQueue({ concurrency: 1 });
      this.hostQueues.set(host, queue);
    }

    return queue;
  }

  /** Forget `host` if `queue` is still its queue and has no work. */
  private releaseIfIdle(host: string, queue: PQueue): void {
    if (this.hostQueues.get(host) === queue && queue.size === 0 && queue.pending === 0) {
      this.hostQueues.delete(host);
    }
  }

  private release(host: string, queue: PQueue): void {
    if (this.perHostInterval === 0) {
      this.releaseIfIdle(host, queue);
      return;
    }
    setTimeout(() => this.releaseIfIdle(host, queue), this.perHostInterval).unref();
  }

  /**
   * Run `fn` once both the host queue and the global queue admit it.
   * Rejections from `fn` propagate unchanged.
   */
  async enqueue<T>(host: string, fn: () => Promise<T>): Promise<T> {
    const hostQueue = this.getHostQueue(host);
    try {
      return await hostQueue.add(() => this.globalQueue.add(fn, { throwOnTimeout: true }), {
        throwOnTimeout: true,
      });
    } finally {
      this.release(host, hostQueue);
    }
  }

  /** Hosts that currently hold a queue. */
  getHostCount(): number {
    return this.hostQueues.size;
  }

  /** Wait for every queued request to settle; used on shutdown. */
  async drain(): Promise<void> {
    await Promise.all(Array.from(this.hostQueues.values(), (queue) => queue.onIdle()));
    await this.globalQueue.onIdle();
  }
}

export const outboundQueue = new OutboundQueue();
