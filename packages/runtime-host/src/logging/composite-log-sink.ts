/**
 * LogSink that forwards every event to each of its sinks, in order. Used
 * when an importer reports to the console and to a log file at once.
 */

import type { ImportEvent, LogSink } from '@nbimport/kernel';

export class CompositeLogSink implements LogSink {
  readonly sinks: ReadonlyArray<LogSink>;

  constructor(sinks: ReadonlyArray<LogSink>) {
    this.sinks = [...sinks];
  }

  append(event: ImportEvent): void {
    for (const sink of this.sinks) {
      sink.append(event);
    }
  }
}
