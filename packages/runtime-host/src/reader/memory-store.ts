/**
 * nbimport Runtime Host — In-Memory Notebook Store
 *
 * A FileProbe and DocumentReader over an in-memory map of path → cells.
 * No file system access. Suitable for unit tests and for embedding
 * notebooks that were fetched or generated in process.
 *
 * Paths are matched exactly as given: the store performs no normalization,
 * so tests must add notebooks under the same path strings the resolver
 * builds (`join(dir, name + ext)`).
 */

import { FormatError } from '@nbimport/kernel';
import type { CellRecord, DocumentReader, FileProbe } from '@nbimport/kernel';

export class MemoryNotebookStore implements FileProbe, DocumentReader {
  private readonly notebooks: Map<string, ReadonlyArray<CellRecord>> = new Map();
  private readonly malformed: Set<string> = new Set();
  private readonly reads: Map<string, number> = new Map();

  /** Add or replace a notebook. */
  add(path: string, cells: ReadonlyArray<CellRecord>): this {
    this.notebooks.set(path, cells);
    this.malformed.delete(path);
    return this;
  }

  /**
   * Add a path that exists but cannot be parsed: isFile() is true and
   * read() throws FormatError.
   */
  addMalformed(path: string): this {
    this.notebooks.delete(path);
    this.malformed.add(path);
    return this;
  }

  remove(path: string): void {
    this.notebooks.delete(path);
    this.malformed.delete(path);
  }

  isFile(path: string): boolean {
    return this.notebooks.has(path) || this.malformed.has(path);
  }

  read(path: string): ReadonlyArray<CellRecord> {
    this.reads.set(path, this.readCount(path) + 1);
    if (this.malformed.has(path)) {
      throw new FormatError(path, 'marked malformed');
    }
    const cells = this.notebooks.get(path);
    if (cells === undefined) {
      throw new Error(`ENOENT: no such notebook in memory store: ${path}`);
    }
    return cells;
  }

  /**
   * Number of times read() was called for a path.
   *
   * Specific to MemoryNotebookStore; not part of either interface. Tests use
   * it to verify that a notebook was not executed twice.
   */
  readCount(path: string): number {
    return this.reads.get(path) ?? 0;
  }
}
