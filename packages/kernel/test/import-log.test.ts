/**
 * nbimport Kernel — Import Logger Tests
 *
 *   LOG-U1: events are forwarded to the sink with the injected clock
 *   LOG-U2: failed() keeps only the error name and message
 *   LOG-U3: no sink means no-op
 */

import { describe, it, expect } from 'vitest';
import { ImportLogger, ResolutionError } from '../src/index.js';
import type { ImportEvent, LogSink } from '../src/index.js';

const FIXED_CLOCK = () => '2026-01-01T00:00:00.000Z';

class CollectingSink implements LogSink {
  readonly events: ImportEvent[] = [];
  append(event: ImportEvent): void {
    this.events.push(event);
  }
}

describe('ImportLogger', () => {
  it('LOG-U1: events are forwarded to the sink with the injected clock', () => {
    const sink = new CollectingSink();
    const logger = new ImportLogger(sink, FIXED_CLOCK);

    logger.started('demo', '/nb/demo.ipynb');
    logger.completed('demo', '/nb/demo.ipynb', 3);

    expect(sink.events).toEqual([
      { kind: 'import.start', timestamp: FIXED_CLOCK(), module: 'demo', path: '/nb/demo.ipynb' },
      {
        kind: 'import.complete',
        timestamp: FIXED_CLOCK(),
        module: 'demo',
        path: '/nb/demo.ipynb',
        cells: 3,
      },
    ]);
  });

  it('LOG-U2: failed() keeps only the error name and message', () => {
    const sink = new CollectingSink();
    const logger = new ImportLogger(sink, FIXED_CLOCK);

    logger.failed('gone', null, new ResolutionError('gone', ['']));
    logger.failed('odd', '/nb/odd.ipynb', 'thrown string');

    expect(sink.events).toEqual([
      {
        kind: 'import.failed',
        timestamp: FIXED_CLOCK(),
        module: 'gone',
        path: null,
        error: 'ResolutionError',
        message: `Notebook for module 'gone' can no longer be located. Searched: [""]`,
      },
      {
        kind: 'import.failed',
        timestamp: FIXED_CLOCK(),
        module: 'odd',
        path: '/nb/odd.ipynb',
        error: 'Error',
        message: 'thrown string',
      },
    ]);
  });

  it('LOG-U3: no sink means no-op', () => {
    const logger = new ImportLogger();
    expect(() => logger.started('demo', 'demo.ipynb')).not.toThrow();
  });
});
