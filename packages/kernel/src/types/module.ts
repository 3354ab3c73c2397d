/**
 * nbimport Kernel — Module Types
 *
 * Defines the module name and search path value types, the namespace
 * mapping, and the NotebookModule object that a loader populates and the
 * module registry owns.
 *
 * A NotebookModule is created exactly once per distinct dotted name that is
 * imported. It is registered before any of its cells execute, so a cell that
 * imports its own module (directly or through a cycle) sees the partially
 * populated namespace rather than triggering a second load.
 */

// ---------------------------------------------------------------------------
// Names and Search Paths
// ---------------------------------------------------------------------------

/**
 * A dotted module identifier such as `analysis.cleaning`.
 *
 * The full name is the registry key. Only the last segment is used to find
 * the notebook on disk.
 */
export type ModuleName = string;

/**
 * Ordered list of directories to search. An empty list means the current
 * working directory only.
 */
export type SearchPathContext = ReadonlyArray<string>;

/**
 * Opaque brand symbol for SearchPathKey.
 * Prevents arbitrary strings from being used as loader cache keys.
 */
declare const __searchPathKeyBrand: unique symbol;

/**
 * A search path normalized to a scalar that compares by content.
 *
 * Produced only by `searchPathKey()`. Two independently built arrays with
 * the same directories in the same order produce equal keys.
 */
export type SearchPathKey = string & {
  readonly [__searchPathKeyBrand]: 'SearchPathKey';
};

/** The directories actually searched: an empty list becomes `['']`. */
export function effectiveSearchPath(searchPath: SearchPathContext | undefined): ReadonlyArray<string> {
  if (searchPath === undefined || searchPath.length === 0) {
    return [''];
  }
  return searchPath;
}

/**
 * Normalize a search path into its cache key.
 *
 * The effective directory list is serialized as a JSON array, so no
 * directory name can contain a character that makes two different lists
 * collide.
 */
export function searchPathKey(searchPath: SearchPathContext | undefined): SearchPathKey {
  return JSON.stringify(effectiveSearchPath(searchPath)) as SearchPathKey;
}

/** Last dot-separated segment of a module name. */
export function lastSegment(name: ModuleName): string {
  const idx = name.lastIndexOf('.');
  return idx === -1 ? name : name.slice(idx + 1);
}

// ---------------------------------------------------------------------------
// Namespace
// ---------------------------------------------------------------------------

/** Identifier → value mapping that cells read from and write to. */
export type Namespace = Record<string, unknown>;

/** Name of the namespace binding that returns the interactive shell. */
export const SHELL_ACCESSOR = 'getShell';

/**
 * Names the loader injects into every module namespace before the first
 * cell runs.
 *
 *   getShell       — returns the interactive shell (line magics call into it)
 *   importNotebook — imports another module through the owning import system
 *   console        — the host console (vm contexts have none of their own)
 */
export const PRELUDE_NAMES: ReadonlyArray<string> = [SHELL_ACCESSOR, 'importNotebook', 'console'];

/**
 * True for names that are user bindings: not injected by the loader and not
 * underscore-prefixed.
 */
export function isUserBinding(name: string): boolean {
  return !name.startsWith('_') && !PRELUDE_NAMES.includes(name);
}

// ---------------------------------------------------------------------------
// Notebook Module
// ---------------------------------------------------------------------------

/**
 * Anything able to (re)load a module by name. Held by each module as a
 * back-reference to the loader that created it.
 */
export interface ModuleLoaderRef {
  load(name: ModuleName): NotebookModule;
}

/**
 * A module materialized from a notebook.
 *
 * `namespace` is the single mutable scope every code cell of the notebook
 * runs against. It starts out holding only the prelude bindings.
 */
export class NotebookModule {
  readonly namespace: Namespace;

  constructor(
    readonly name: ModuleName,
    readonly file: string,
    readonly loader: ModuleLoaderRef,
    prelude: Namespace = {},
  ) {
    this.namespace = { ...prelude };
  }

  /** User bindings only, in insertion order. */
  bindings(): Namespace {
    const out: Namespace = {};
    for (const [key, value] of Object.entries(this.namespace)) {
      if (isUserBinding(key)) {
        out[key] = value;
      }
    }
    return out;
  }
}
