/**
 * Result Aggregator
 *
 * Producers only enqueue hits. A single consumer applies them to the
 * path → entry map in arrival order, so no two writers ever touch the map.
 */

import type { ResultEntry, SearchHit } from "../types.js";

function comparePaths(a: ResultEntry, b: ResultEntry): number {
  // Code-unit order, independent of locale
  return a.path < b.path ? -1 : a.path > b.path ? 1 : 0;
}

export class ResultAggregator {
  private readonly entries = new Map<string, ResultEntry>();
  private queue: SearchHit[] = [];
  private closed = false;
  private wake?: () => void;
  private consumer?: Promise<void>;

  /**
   * Enqueue a hit.
   * @throws Error if the aggregator has been closed
   */
  push(hit: SearchHit): void {
    if (this.closed) {
      throw new Error(`Cannot add ${hit.path}: aggregator is closed`);
    }
    this.queue.push(hit);
    this.wake?.();
  }

  /** No more hits will be pushed. */
  close(): void {
    this.closed = true;
    this.wake?.();
  }

  /**
   * Start the consumer. Calling it again returns the same consumer.
   */
  run(): Promise<void> {
    this.consumer ??= this.consume();
    return this.consumer;
  }

  /**
   * Entries sorted by path, once the queue is closed and drained.
   */
  async result(): Promise<ResultEntry[]> {
    await this.run();
    return [...this.entries.values()].sort(comparePaths);
  }

  private async consume(): Promise<void> {
    for (;;) {
      const batch = this.queue;
      this.queue = [];
      for (const hit of batch) {
        this.apply(hit);
      }
      if (this.queue.length > 0) {
        continue;
      }
      if (this.closed) {
        return;
      }
      await new Promise<void>((resolve) => {
        this.wake = resolve;
      });
      this.wake = undefined;
    }
  }

  private apply(hit: SearchHit): void {
    const existing = this.entries.get(hit.path);

    if (hit.origin === "filename") {
      if (!existing) {
        this.entries.set(hit.path, {
          path: hit.path,
          origin: "filename",
          contentMatches: 0,
        });
      }
      return;
    }

    if (!existing || existing.origin === "filename") {
      this.entries.set(hit.path, {
        path: hit.path,
        origin: "content",
        detail: hit.detail,
        format: hit.format,
        contentMatches: 1,
      });
      return;
    }
    existing.contentMatches++;
  }
}
