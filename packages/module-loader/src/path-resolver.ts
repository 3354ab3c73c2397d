/**
 * nbimport Module Loader — Path Resolver
 *
 * Maps a dotted module name to a notebook file.
 *
 * Only the last segment of the name is used: `reports.q3_summary` looks for
 * `q3_summary.ipynb`. For each directory of the search path, in order:
 *
 *   1. `<dir>/<segment><ext>`                      — returned if it is a file
 *   2. `<dir>/<segment with "_" → " "><ext>`       — returned if it is a file
 *
 * so `import Foo_Bar` also finds a notebook saved as `Foo Bar.ipynb`. The
 * first match wins; directory order is significant.
 *
 * An empty search path means the current directory only. A name with no
 * notebook resolves to null: the "this finder does not claim the
 * name" signal, not an error.
 */

import { join } from 'node:path';
import { effectiveSearchPath, lastSegment } from '@nbimport/kernel';
import type { FileProbe, ModuleName, SearchPathContext } from '@nbimport/kernel';

export const DEFAULT_NOTEBOOK_EXTENSION = '.ipynb';

export interface ResolveOptions {
  /** File extension including the dot. Default: `.ipynb`. */
  readonly extension?: string | undefined;
}

/**
 * Candidate file paths for a name, in the order they are tried.
 *
 * The space variant is omitted when the segment has no underscore (it would
 * be the same path).
 */
export function candidatePaths(
  name: ModuleName,
  searchPath: SearchPathContext | undefined,
  opts: ResolveOptions = {},
): ReadonlyArray<string> {
  const extension = opts.extension ?? DEFAULT_NOTEBOOK_EXTENSION;
  const segment = lastSegment(name);
  const spaced = segment.replaceAll('_', ' ');
  const out: string[] = [];
  for (const dir of effectiveSearchPath(searchPath)) {
    out.push(join(dir, segment + extension));
    if (spaced !== segment) {
      out.push(join(dir, spaced + extension));
    }
  }
  return out;
}

/**
 * Resolve a module name to a notebook path.
 *
 * @returns The first candidate that `probe` reports as a file, or null
 */
export function resolveNotebook(
  name: ModuleName,
  searchPath: SearchPathContext | undefined,
  probe: FileProbe,
  opts: ResolveOptions = {},
): string | null {
  for (const candidate of candidatePaths(name, searchPath, opts)) {
    if (probe.isFile(candidate)) {
      return candidate;
    }
  }
  return null;
}
