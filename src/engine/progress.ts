/**
 * Live progress channel
 *
 * Written only by the run; read by any number of consumers. Every reader
 * first receives the events written so far, then live ones until the run
 * ends.
 */

import {
  type ProgressEvent,
  type ProgressSink,
  SEARCH_MODE_LABELS,
} from "../types.js";

export type ProgressListener = (event: ProgressEvent) => void;

export class ProgressChannel implements ProgressSink {
  private readonly events: ProgressEvent[] = [];
  private waiters: Array<() => void> = [];
  private closed = false;

  constructor(private listener?: ProgressListener) {}

  /**
   * A listener that throws is detached and its error rethrown; readers
   * still receive the event.
   */
  write(event: ProgressEvent): void {
    if (this.closed) {
      return;
    }
    this.events.push(event);
    this.notify();
    const listener = this.listener;
    if (!listener) {
      return;
    }
    try {
      listener(event);
    } catch (e) {
      this.listener = undefined;
      throw e;
    }
  }

  close(): void {
    this.closed = true;
    this.notify();
  }

  async *read(): AsyncGenerator<ProgressEvent, void, undefined> {
    let index = 0;
    for (;;) {
      while (index < this.events.length) {
        yield this.events[index++];
      }
      if (this.closed) {
        return;
      }
      await new Promise<void>((resolve) => {
        this.waiters.push(resolve);
      });
    }
  }

  private notify(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const wake of waiters) {
      wake();
    }
  }
}

/**
 * Render a progress event as one human-readable status line.
 */
export function formatProgressLine(event: ProgressEvent): string {
  switch (event.type) {
    case "started":
      return `Searching for "${event.term}" in ${event.rootDir} (${SEARCH_MODE_LABELS[event.mode]})`;
    case "scanning":
      return `Scanning: ${event.path}`;
    case "match":
      return event.origin === "content"
        ? `Content match: ${event.path}`
        : `Filename match: ${event.path}`;
    case "diagnostic":
      return `Warning: ${event.diagnostic.message}`;
    case "completed": {
      const { stats } = event;
      return `Search complete: ${stats.filesScanned} files in ${stats.directoriesScanned} directories, ${stats.contentMatches} content matches, ${stats.filenameMatches} filename matches (${stats.durationMs} ms)`;
    }
    case "failed":
      return `Search failed: ${event.message}`;
  }
}
