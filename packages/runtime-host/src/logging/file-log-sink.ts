/**
 * Switchboard Runtime Host - File-backed Change Log Sink
 *
 * Implements the LogSink interface from @switchboard/kernel by appending
 * one JSONL line per option change event to `logs/option-changes.jsonl`
 * under the home directory, via the injected StateIO.
 *
 * The sink is synchronous: the line is written before the call returns.
 * Event ids from one sink ascend in write order.
 */

import type { LogSink, OptionChangeEvent } from '@switchboard/kernel';
import type { StateIO } from '../state/state-io.js';
import { createMonotonicUlid } from './ulid.js';

export const CHANGE_LOG_FILE = 'option-changes.jsonl';

export class FileLogSink implements LogSink {
  constructor(
    private readonly stateIO: StateIO,
    private readonly newId: () => string = createMonotonicUlid(),
  ) {}

  append(event: OptionChangeEvent): void {
    const line = JSON.stringify({
      event_id: this.newId(),
      timestamp: event.timestamp,
      option: event.option,
      letter: event.letter,
      access: event.access,
      requested: event.requested,
      previous: event.previous,
      outcome: event.outcome,
    });
    this.stateIO.appendLine(CHANGE_LOG_FILE, line);
  }
}
