/**
 * nbimport Kernel — Import Logger
 *
 * Builds import events and forwards them to an injected LogSink.
 *
 * The sink is optional: when omitted (tests, embedded use) every call is a
 * no-op. Production wiring injects a concrete sink from runtime-host
 * (ConsoleLogSink, FileLogSink).
 *
 * The clock is injectable so tests can assert exact timestamps.
 */

import type { ImportEvent } from '../types/event.js';
import type { LogSink } from './log-sink.js';

export type Clock = () => string;

const systemClock: Clock = () => new Date().toISOString();

export class ImportLogger {
  constructor(
    private readonly sink?: LogSink,
    private readonly clock: Clock = systemClock,
  ) {}

  record(event: ImportEvent): void {
    this.sink?.append(event);
  }

  started(module: string, path: string): void {
    this.record({ kind: 'import.start', timestamp: this.clock(), module, path });
  }

  completed(module: string, path: string, cells: number): void {
    this.record({ kind: 'import.complete', timestamp: this.clock(), module, path, cells });
  }

  /**
   * Record a failed load. Only the error's name and message are kept; the
   * error itself is rethrown by the caller.
   */
  failed(module: string, path: string | null, err: unknown): void {
    const { name, message } = errorFields(err);
    this.record({
      kind: 'import.failed',
      timestamp: this.clock(),
      module,
      path,
      error: name,
      message,
    });
  }
}

function errorFields(err: unknown): { name: string; message: string } {
  if (err instanceof Error) {
    return { name: err.name, message: err.message };
  }
  return { name: 'Error', message: String(err) };
}
