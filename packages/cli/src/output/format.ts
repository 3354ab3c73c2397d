/**
 * Plain-text rendering for CLI output. No colour here: commands wrap the
 * pieces with the theme, tests assert the raw strings.
 */

import type { CellRecord, Namespace } from '@nbimport/kernel'

const PREVIEW_WIDTH = 60

/** One-line rendering of a binding value. */
export function describeValue(value: unknown): string {
  if (typeof value === 'function') {
    return value.name === '' ? '[function]' : `[function ${value.name}]`
  }
  if (typeof value === 'string') {
    return JSON.stringify(value)
  }
  if (value === undefined || typeof value === 'bigint' || typeof value === 'symbol') {
    return String(value)
  }
  try {
    return JSON.stringify(value) ?? String(value)
  } catch {
    // cyclic structures
    return Object.prototype.toString.call(value)
  }
}

/** `name = value` lines, sorted by name. */
export function formatBindings(bindings: Namespace): string[] {
  return Object.keys(bindings)
    .sort()
    .map((name) => `${name} = ${describeValue(bindings[name])}`)
}

/**
 * Bindings as a JSON-safe record. Values JSON cannot carry are replaced by
 * their describeValue() text.
 */
export function bindingsToJson(bindings: Namespace): Record<string, unknown> {
  const out: Record<string, unknown> = {}
  for (const name of Object.keys(bindings).sort()) {
    const value = bindings[name]
    out[name] = isJsonSafe(value) ? value : describeValue(value)
  }
  return out
}

function isJsonSafe(value: unknown): boolean {
  if (value === null || typeof value === 'number' || typeof value === 'boolean' || typeof value === 'string') {
    return true
  }
  if (typeof value !== 'object') {
    return false
  }
  try {
    JSON.stringify(value)
    return true
  } catch {
    return false
  }
}

/** First source line of a cell, trimmed to the preview width. */
export function previewSource(source: string): string {
  const firstLine = source.split('\n', 1)[0] ?? ''
  return firstLine.length > PREVIEW_WIDTH ? firstLine.slice(0, PREVIEW_WIDTH - 1) + '…' : firstLine
}

export interface CellRow {
  readonly index: number
  readonly kind: string
  readonly lines: number
  readonly preview: string
}

export function cellRows(cells: ReadonlyArray<CellRecord>): CellRow[] {
  return cells.map((cell, index) => ({
    index,
    kind: cell.kind,
    lines: cell.source === '' ? 0 : cell.source.split('\n').length,
    preview: previewSource(cell.source),
  }))
}
