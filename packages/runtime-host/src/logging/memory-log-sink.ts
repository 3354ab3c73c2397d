/**
 * In-memory LogSink. Keeps every appended event in order; for tests and for
 * callers that want to inspect what an import did after the fact.
 */

import type { ImportEvent, LogSink } from '@nbimport/kernel';

export class MemoryLogSink implements LogSink {
  private readonly events: ImportEvent[] = [];

  append(event: ImportEvent): void {
    this.events.push(event);
  }

  list(): ReadonlyArray<ImportEvent> {
    return this.events;
  }

  kinds(): ReadonlyArray<ImportEvent['kind']> {
    return this.events.map((e) => e.kind);
  }
}
