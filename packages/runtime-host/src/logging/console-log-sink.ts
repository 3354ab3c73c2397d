/**
 * nbimport Runtime Host — Console Log Sink
 *
 * Human-readable import progress on a stream (stderr by default):
 *
 *   importing notebook from analysis/clean_data.ipynb
 *   import of clean_data failed: ExecutionError: Cell 2 of module 'clean_data' failed: ...
 *
 * Completion events are silent unless `verbose` is set.
 */

import type { ImportEvent, LogSink } from '@nbimport/kernel';

/** The part of a writable stream the sink uses. */
export interface LineWriter {
  write(chunk: string): unknown;
}

export interface ConsoleLogSinkOptions {
  readonly stream?: LineWriter | undefined;
  readonly verbose?: boolean | undefined;
}

export class ConsoleLogSink implements LogSink {
  private readonly stream: LineWriter;
  private readonly verbose: boolean;

  constructor(options: ConsoleLogSinkOptions = {}) {
    this.stream = options.stream ?? process.stderr;
    this.verbose = options.verbose ?? false;
  }

  append(event: ImportEvent): void {
    const line = formatEvent(event, this.verbose);
    if (line !== null) {
      this.stream.write(line + '\n');
    }
  }
}

/** One display line for an event, or null when the event is not shown. */
export function formatEvent(event: ImportEvent, verbose: boolean): string | null {
  switch (event.kind) {
    case 'import.start':
      return `importing notebook from ${event.path}`;
    case 'import.complete':
      return verbose ? `imported ${event.module} (${event.cells} code cells)` : null;
    case 'import.failed':
      return `import of ${event.module} failed: ${event.error}: ${event.message}`;
  }
}
