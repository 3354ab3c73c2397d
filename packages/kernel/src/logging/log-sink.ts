/**
 * nbimport Kernel — Log Sink Interface
 *
 * Defines the injection point for import event persistence.
 *
 * The kernel owns the contract (this interface) and the ImportLogger class.
 * Concrete sinks live in the runtime host layer and are injected at
 * construction time; the kernel never writes to disk or to a stream.
 */

import type { ImportEvent } from '../types/event.js';

/**
 * A sink that receives import events.
 *
 * append() is called synchronously from inside the import pipeline. A sink
 * that throws aborts the import it was called from.
 */
export interface LogSink {
  append(event: ImportEvent): void;
}
