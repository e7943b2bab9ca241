/**
 * Switchboard Kernel - Log Sink Interface
 *
 * Defines the injection point for option change log persistence.
 *
 * The kernel owns the contract (this interface) and the ChangeLogger class.
 * Concrete implementations live in the runtime host layer and are injected
 * at construction time; the kernel never writes to disk directly.
 */

import type { OptionChangeEvent } from '../types/change.js';

/**
 * A sink that receives and persists option change events.
 *
 * append() is called synchronously from inside the write path, after the
 * outcome is known. Implementations must not throw for ordinary I/O
 * trouble they can report elsewhere; an exception propagates to the writer.
 */
export interface LogSink {
  append(event: OptionChangeEvent): void;
}
