/**
 * nbimport Module Loader — Bootstrap Tests
 *
 * Real files in a temp directory: notebooks are parsed by IpynbReader,
 * located by NodeFileProbe and logged through FileLogSink.
 *
 *   BS-U1: a notebook on the configured search path imports end to end
 *   BS-U2: the finder is installed once and the log file receives events
 *   BS-U3: injected collaborators replace the defaults
 *   BS-U4: an injected sink and the configured log file both receive events
 */

import { describe, it, expect } from 'vitest';
import { mkdtempSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ConsoleLogSink, MemoryLogSink, MemoryNotebookStore } from '@nbimport/runtime-host';
import { createNotebookImporter } from '../src/bootstrap.js';
import { code, prose } from './helpers.js';

class CollectingWriter {
  readonly chunks: string[] = [];
  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }
}

function readKinds(logFile: string): unknown[] {
  return readFileSync(logFile, 'utf-8')
    .trim()
    .split('\n')
    .map((line) => {
      const parsed: unknown = JSON.parse(line);
      return typeof parsed === 'object' && parsed !== null && 'kind' in parsed ? parsed.kind : undefined;
    });
}

function writeNotebook(dir: string, filename: string, cells: ReadonlyArray<{ cell_type: string; source: string[] }>): void {
  writeFileSync(join(dir, filename), JSON.stringify({ nbformat: 4, nbformat_minor: 5, metadata: {}, cells }), 'utf-8');
}

describe('createNotebookImporter', () => {
  it('BS-U1: a notebook on the configured search path imports end to end', () => {
    const dir = mkdtempSync(join(tmpdir(), 'nbimport-bs-u1-'));
    writeNotebook(dir, 'Data Prep.ipynb', [
      { cell_type: 'markdown', source: ['# Prep'] },
      { cell_type: 'code', source: ['rows = [1, 2, 3]\n', 'total = rows.reduce((a, b) => a + b, 0)'] },
    ]);

    const importer = createNotebookImporter({
      config: { searchPath: [dir], extension: '.ipynb', logFile: null },
    });
    const mod = importer.importModule('Data_Prep');

    expect(mod.file).toBe(join(dir, 'Data Prep.ipynb'));
    expect(mod.bindings()).toEqual({ rows: [1, 2, 3], total: 6 });
  });

  it('BS-U2: the finder is installed once and the log file receives events', () => {
    const dir = mkdtempSync(join(tmpdir(), 'nbimport-bs-u2-'));
    const logFile = join(dir, 'logs', 'imports.jsonl');
    writeNotebook(dir, 'tiny.ipynb', [{ cell_type: 'code', source: ['x = 1'] }]);

    const importer = createNotebookImporter({
      config: { searchPath: [dir], extension: '.ipynb', logFile },
    });
    importer.importModule('tiny');

    expect(importer.system.finders).toHaveLength(1);
    expect(importer.registrar.installed).toBe(true);
    expect(importer.handle.finder).toBe(importer.system.finders[0]);

    expect(readKinds(logFile)).toEqual(['import.start', 'import.complete']);
  });

  it('BS-U3: injected collaborators replace the defaults', () => {
    const store = new MemoryNotebookStore().add(join('nb', 'm.nb'), [prose('text'), code('value = 42')]);
    const sink = new MemoryLogSink();

    const importer = createNotebookImporter({
      config: { searchPath: ['nb'], extension: '.nb', logFile: null },
      probe: store,
      reader: store,
      sink,
    });
    const mod = importer.importModule('m');

    expect(mod.namespace['value']).toBe(42);
    expect(sink.kinds()).toEqual(['import.start', 'import.complete']);
  });

  it('BS-U4: an injected sink and the configured log file both receive events', () => {
    const dir = mkdtempSync(join(tmpdir(), 'nbimport-bs-u4-'));
    const logFile = join(dir, 'imports.jsonl');
    writeNotebook(dir, 'both.ipynb', [{ cell_type: 'code', source: ['y = 2'] }]);
    const writer = new CollectingWriter();

    const importer = createNotebookImporter({
      config: { searchPath: [dir], extension: '.ipynb', logFile },
      sink: new ConsoleLogSink({ stream: writer }),
    });
    importer.importModule('both');

    expect(writer.chunks).toEqual([`importing notebook from ${join(dir, 'both.ipynb')}\n`]);
    expect(readKinds(logFile)).toEqual(['import.start', 'import.complete']);
  });
});
