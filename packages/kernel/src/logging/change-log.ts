/**
 * Switchboard Kernel - Change Logger
 *
 * Records every write attempted through the ValueAccessor, whatever its
 * outcome. Rejected writes are recorded too.
 *
 * The logger accepts an injected LogSink for persistence. If no sink is
 * injected (e.g., in tests), record() forwards nothing. A bounded in-memory
 * tail of recent events is always kept for inspection.
 */

import type { OptionChangeEvent } from '../types/change.js';
import type { LogSink } from './log-sink.js';

/** Default number of events retained by recent(). */
export const DEFAULT_RECENT_LIMIT = 64;

export class ChangeLogger {
  private readonly tail: OptionChangeEvent[] = [];

  constructor(
    private readonly sink?: LogSink,
    private readonly recentLimit: number = DEFAULT_RECENT_LIMIT,
  ) {}

  /**
   * Record one change event and forward it to the sink, if any.
   */
  record(event: OptionChangeEvent): void {
    this.tail.push(event);
    if (this.tail.length > this.recentLimit) {
      this.tail.splice(0, this.tail.length - this.recentLimit);
    }
    this.sink?.append(event);
  }

  /**
   * The most recent events, oldest first.
   *
   * @param option - Restrict to events for this option name.
   */
  recent(option?: string): ReadonlyArray<OptionChangeEvent> {
    if (option === undefined) return [...this.tail];
    return this.tail.filter((e) => e.option === option);
  }
}
