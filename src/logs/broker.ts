/**
 * Per-run fan-out of log items.
 *
 * Every watcher sees the full history exactly once, then live items, whether it
 * attached before the first record, mid-run, or after the run finished.
 */
import { createLogger } from '../logger.js';
import type { LogItem } from '../types.js';
import { AsyncQueue } from './queue.js';

const log = createLogger('log-broker');

export interface LogWatcher {
  readonly logs: AsyncIterable<LogItem>;
  /** Stops delivery to this watcher and ends its iteration. The broker keeps running. */
  close(): void;
}

interface WatcherState {
  queue: AsyncQueue<LogItem>;
  replayed: boolean;
}

export class LogBroker {
  private readonly history: LogItem[] = [];
  private readonly watchers = new Set<WatcherState>();
  private closed = false;

  constructor(private readonly runID = '') {}

  get isClosed(): boolean {
    return this.closed;
  }

  /** Items recorded so far, in recording order. */
  getHistory(): readonly LogItem[] {
    return this.history;
  }

  record(item: LogItem): void {
    if (this.closed) {
      log.debug({ runID: this.runID, insertID: item.insertID }, 'log recorded after broker closed; dropped');
      return;
    }
    for (const w of this.watchers) {
      this.replay(w);
      w.queue.push(item);
    }
    this.history.push(item);
  }

  newWatcher(): LogWatcher {
    const state: WatcherState = { queue: new AsyncQueue<LogItem>(), replayed: false };

    // Flush history on attach; record() and close() skip already-replayed watchers.
    this.replay(state);
    if (this.closed) {
      state.queue.close();
    } else {
      this.watchers.add(state);
    }

    return {
      logs: state.queue,
      close: () => {
        this.watchers.delete(state);
        state.queue.close();
      },
    };
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const w of this.watchers) {
      this.replay(w);
      w.queue.close();
    }
    this.watchers.clear();
  }

  private replay(w: WatcherState): void {
    if (w.replayed) return;
    w.replayed = true;
    for (const item of this.history) w.queue.push(item);
  }
}
