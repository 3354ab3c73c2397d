/**
 * nbimport Kernel — Adapter Interfaces
 *
 * Everything the import pipeline needs from the outside world is one of the
 * interfaces below: probing the file system, reading a notebook container,
 * rewriting cell text, evaluating code against a namespace, and the shell
 * whose ambient namespace is swapped while a notebook executes.
 *
 * No implementations are provided here. Adapters are injected, not
 * constructed. Node.js implementations live in @nbimport/runtime-host.
 */

import type { CellRecord } from '../types/cell.js';
import type { Namespace } from '../types/module.js';

// ---------------------------------------------------------------------------
// File Probe
// ---------------------------------------------------------------------------

/**
 * Existence check used by path resolution.
 *
 * Must return false (never throw) for paths that do not exist or are not
 * regular files.
 */
export interface FileProbe {
  isFile(path: string): boolean;
}

// ---------------------------------------------------------------------------
// Document Reader
// ---------------------------------------------------------------------------

/**
 * Reads a notebook container into its ordered cells.
 *
 * Implementations throw FormatError when the container is malformed. Any
 * other failure (I/O) may propagate as-is; the loader wraps both in
 * ReadError.
 */
export interface DocumentReader {
  read(path: string): ReadonlyArray<CellRecord>;
}

// ---------------------------------------------------------------------------
// Cell Transformer
// ---------------------------------------------------------------------------

/**
 * Turns raw cell text, which may use notebook-only syntax such as line
 * magics, into plain executable statements.
 */
export interface CellTransformer {
  transform(source: string): string;
}

// ---------------------------------------------------------------------------
// Evaluator
// ---------------------------------------------------------------------------

/** Where a piece of evaluated code came from, for stack traces. */
export interface EvaluationOrigin {
  readonly filename: string;
  readonly cellIndex: number;
}

/**
 * Runs statements with `namespace` as both the read and the write scope.
 *
 * Successive calls with the same namespace object must share state: a
 * binding created by one call is visible to the next.
 */
export interface Evaluator {
  evaluate(code: string, namespace: Namespace, origin: EvaluationOrigin): unknown;
}

// ---------------------------------------------------------------------------
// Execution Context Provider
// ---------------------------------------------------------------------------

/**
 * Holder of the ambient ("current interactive") namespace that top-level
 * magics act on.
 *
 * There is one ambient slot per provider. The loader points it at the module
 * being executed and restores the previous value afterwards.
 */
export interface ExecutionContextProvider {
  getAmbientNamespace(): Namespace;
  setAmbientNamespace(namespace: Namespace): void;
}
