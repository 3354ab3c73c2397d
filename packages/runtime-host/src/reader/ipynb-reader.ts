/**
 * nbimport Runtime Host — Jupyter Notebook Reader
 *
 * Implements the DocumentReader interface for `.ipynb` files.
 *
 * Only the parts of the container the loader needs are checked: a `cells`
 * array whose entries carry a `cell_type` string and a `source` that is a
 * string or an array of strings (nbformat stores multi-line sources as one
 * string per line, each keeping its trailing newline). Every other field,
 * including `nbformat` / `nbformat_minor`, is ignored; no version check is
 * performed.
 *
 * A `code` cell maps to CellKind.Code. Markdown, raw and any other type map
 * to CellKind.Other.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { CellKind, FormatError } from '@nbimport/kernel';
import type { CellRecord, DocumentReader } from '@nbimport/kernel';

// ---------------------------------------------------------------------------
// Container Schema
// ---------------------------------------------------------------------------

const SourceSchema = z.union([z.string(), z.array(z.string())]);

const CellSchema = z
  .object({
    cell_type: z.string(),
    source: SourceSchema,
  })
  .passthrough();

const NotebookSchema = z
  .object({
    cells: z.array(CellSchema),
  })
  .passthrough();

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Parse notebook JSON text into cell records.
 *
 * @param text - Raw file content
 * @param path - Used only for error messages
 * @throws {FormatError} If the text is not JSON or does not have the expected shape
 */
export function parseNotebook(text: string, path: string): ReadonlyArray<CellRecord> {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err: unknown) {
    throw new FormatError(path, 'not valid JSON', { cause: err });
  }

  const result = NotebookSchema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
      .join('; ');
    throw new FormatError(path, detail, { cause: result.error });
  }

  return result.data.cells.map((cell) => ({
    kind: cell.cell_type === 'code' ? CellKind.Code : CellKind.Other,
    source: typeof cell.source === 'string' ? cell.source : cell.source.join(''),
  }));
}

// ---------------------------------------------------------------------------
// IpynbReader
// ---------------------------------------------------------------------------

/**
 * Reads `.ipynb` files from disk as UTF-8.
 *
 * I/O errors (ENOENT, EACCES, ...) propagate unchanged; the loader wraps
 * them in ReadError together with FormatError.
 */
export class IpynbReader implements DocumentReader {
  read(path: string): ReadonlyArray<CellRecord> {
    return parseNotebook(readFileSync(path, 'utf-8'), path);
  }
}
