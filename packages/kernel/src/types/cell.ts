/**
 * nbimport Kernel — Cell Types
 *
 * A notebook, once read from its container, is an ordered list of cells.
 * Only code cells are executed; every other kind (markdown, raw, ...) is
 * carried as `CellKind.Other` and skipped by the loader.
 *
 * Cell order is significant: later cells see the bindings created by
 * earlier ones.
 */

// ---------------------------------------------------------------------------
// Cell Kind
// ---------------------------------------------------------------------------

export enum CellKind {
  Code = 'code',
  Other = 'other',
}

// ---------------------------------------------------------------------------
// Cell Record
// ---------------------------------------------------------------------------

/**
 * One cell of a notebook as seen by the loader.
 *
 * `source` is the raw cell text, before any magic transformation.
 */
export interface CellRecord {
  readonly kind: CellKind;
  readonly source: string;
}

/** True when the cell participates in execution. */
export function isCodeCell(cell: CellRecord): boolean {
  return cell.kind === CellKind.Code;
}
