/**
 * nbimport Runtime Host — Log Sink Tests
 *
 *   LOG-U4:  FileLogSink line carries the event plus a 26-char ULID event_id
 *   LOG-U4b: two appended events have distinct event_ids
 *   LOG-U5:  FileLogSink creates the parent directory
 *   LOG-U6:  ConsoleLogSink prints start and failure lines, completion only when verbose
 *   LOG-U7:  MemoryLogSink keeps events in order
 *   LOG-U8:  CompositeLogSink forwards each event to every sink
 */

import { describe, it, expect } from 'vitest';
import { mkdtempSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import type { ImportEvent } from '@nbimport/kernel';
import { FileLogSink } from '../src/logging/file-log-sink.js';
import { ConsoleLogSink } from '../src/logging/console-log-sink.js';
import { MemoryLogSink } from '../src/logging/memory-log-sink.js';
import { CompositeLogSink } from '../src/logging/composite-log-sink.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const TS = '2026-01-01T00:00:00.000Z';

const START: ImportEvent = { kind: 'import.start', timestamp: TS, module: 'demo', path: 'demo.ipynb' };
const COMPLETE: ImportEvent = {
  kind: 'import.complete',
  timestamp: TS,
  module: 'demo',
  path: 'demo.ipynb',
  cells: 2,
};
const FAILED: ImportEvent = {
  kind: 'import.failed',
  timestamp: TS,
  module: 'demo',
  path: 'demo.ipynb',
  error: 'ExecutionError',
  message: "Cell 1 of module 'demo' failed: Error: boom",
};

class CollectingWriter {
  readonly chunks: string[] = [];
  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }
}

function readLines(path: string): Record<string, unknown>[] {
  return readFileSync(path, 'utf-8')
    .trim()
    .split('\n')
    .map((line): Record<string, unknown> => JSON.parse(line));
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('FileLogSink', () => {
  it('LOG-U4: line carries the event plus a 26-char ULID event_id', () => {
    const dir = mkdtempSync(join(tmpdir(), 'nbimport-log-u4-'));
    const sink = new FileLogSink(join(dir, 'imports.jsonl'));

    sink.append(START);

    const [line] = readLines(join(dir, 'imports.jsonl'));
    expect(line).toMatchObject({ ...START });
    expect(line?.['event_id']).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/);
  });

  it('LOG-U4b: two appended events have distinct event_ids', () => {
    const dir = mkdtempSync(join(tmpdir(), 'nbimport-log-u4b-'));
    const sink = new FileLogSink(join(dir, 'imports.jsonl'));

    sink.append(START);
    sink.append(COMPLETE);

    const lines = readLines(join(dir, 'imports.jsonl'));
    expect(lines).toHaveLength(2);
    expect(lines[0]?.['event_id']).not.toBe(lines[1]?.['event_id']);
    expect(lines[1]?.['cells']).toBe(2);
  });

  it('LOG-U5: creates the parent directory', () => {
    const dir = mkdtempSync(join(tmpdir(), 'nbimport-log-u5-'));
    const path = join(dir, 'nested', 'deeper', 'imports.jsonl');
    new FileLogSink(path).append(FAILED);

    expect(readLines(path)[0]?.['error']).toBe('ExecutionError');
  });
});

describe('ConsoleLogSink', () => {
  it('LOG-U6: prints start and failure lines, completion only when verbose', () => {
    const quiet = new CollectingWriter();
    const quietSink = new ConsoleLogSink({ stream: quiet });
    quietSink.append(START);
    quietSink.append(COMPLETE);
    quietSink.append(FAILED);

    expect(quiet.chunks).toEqual([
      'importing notebook from demo.ipynb\n',
      "import of demo failed: ExecutionError: Cell 1 of module 'demo' failed: Error: boom\n",
    ]);

    const loud = new CollectingWriter();
    new ConsoleLogSink({ stream: loud, verbose: true }).append(COMPLETE);
    expect(loud.chunks).toEqual(['imported demo (2 code cells)\n']);
  });
});

describe('MemoryLogSink', () => {
  it('LOG-U7: keeps events in order', () => {
    const sink = new MemoryLogSink();
    sink.append(START);
    sink.append(FAILED);

    expect(sink.list()).toEqual([START, FAILED]);
    expect(sink.kinds()).toEqual(['import.start', 'import.failed']);
  });
});

describe('CompositeLogSink', () => {
  it('LOG-U8: forwards each event to every sink', () => {
    const dir = mkdtempSync(join(tmpdir(), 'nbimport-log-u8-'));
    const path = join(dir, 'imports.jsonl');
    const writer = new CollectingWriter();
    const memory = new MemoryLogSink();
    const sink = new CompositeLogSink([
      new ConsoleLogSink({ stream: writer }),
      new FileLogSink(path),
      memory,
    ]);

    sink.append(START);
    sink.append(COMPLETE);

    expect(writer.chunks).toEqual(['importing notebook from demo.ipynb\n']);
    expect(readLines(path).map((line) => line['kind'])).toEqual(['import.start', 'import.complete']);
    expect(memory.list()).toEqual([START, COMPLETE]);
  });
});
