/**
 * nbimport Module Loader — Notebook Finder
 *
 * The resolver-chain entry for notebooks. find() decides whether a name is
 * importable as a notebook under the given search path and, if so, returns
 * the loader for that search path.
 *
 * Loaders are cached per search-path context (LoaderCache, keyed by
 * `searchPathKey()`), so every import that shares a search path shares one
 * loader and one shell.
 */

import { searchPathKey } from '@nbimport/kernel';
import type { ModuleName, SearchPathContext } from '@nbimport/kernel';
import type { Finder } from './import-system.js';
import { LoaderCache } from './loader-cache.js';
import { NotebookLoader } from './loader.js';
import type { LoaderDependencies } from './loader.js';
import { resolveNotebook } from './path-resolver.js';

export class NotebookFinder implements Finder {
  private readonly cache: LoaderCache<NotebookLoader> = new LoaderCache();

  constructor(private readonly deps: LoaderDependencies) {}

  /**
   * @returns The loader for `searchPath`, or null when no notebook matches
   *   `name` (the import system then asks the next finder)
   */
  find(name: ModuleName, searchPath: SearchPathContext = []): NotebookLoader | null {
    const path = resolveNotebook(name, searchPath, this.deps.probe, {
      extension: this.deps.extension,
    });
    if (path === null) {
      return null;
    }
    return this.cache.getOrCreate(
      searchPathKey(searchPath),
      () => new NotebookLoader(searchPath, this.deps),
    );
  }

  /** Number of distinct search-path contexts a loader has been created for. */
  get loaderCount(): number {
    return this.cache.size;
  }
}
