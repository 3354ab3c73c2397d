/**
 * nbimport Module Loader — Import System
 *
 * The context object that plays the part of a language runtime's import
 * machinery: an ordered chain of finders plus the module registry.
 *
 * importModule(name):
 *   1. If `name` is bound in the registry, return that module. Nothing is
 *      read or executed again.
 *   2. Otherwise ask each finder in chain order. The first one that returns
 *      a loader wins; its load() builds, registers and returns the module.
 *   3. If no finder claims the name, throw ModuleNotFoundError.
 *
 * There is no global instance. Applications create one (see
 * `createNotebookImporter()`), tests create their own.
 */

import { ModuleNotFoundError } from '@nbimport/kernel';
import type {
  ModuleLoaderRef,
  ModuleName,
  NotebookModule,
  SearchPathContext,
} from '@nbimport/kernel';
import { ModuleRegistry } from './registry.js';

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

/**
 * One entry of the resolver chain.
 *
 * Returns null to decline the name, so the next finder is asked.
 */
export interface Finder {
  find(name: ModuleName, searchPath?: SearchPathContext): ModuleLoaderRef | null;
}

/** What a loader needs from the import system it serves. */
export interface ImportHost {
  readonly registry: ModuleRegistry;
  importModule(name: ModuleName): NotebookModule;
}

export interface ImportSystemOptions {
  /** Search path handed to finders for imports that name none. Default: []. */
  readonly searchPath?: SearchPathContext | undefined;
  readonly registry?: ModuleRegistry | undefined;
}

// ---------------------------------------------------------------------------
// Import System
// ---------------------------------------------------------------------------

export class ImportSystem implements ImportHost {
  readonly registry: ModuleRegistry;
  readonly searchPath: SearchPathContext;
  private readonly chain: Finder[] = [];

  constructor(options: ImportSystemOptions = {}) {
    this.registry = options.registry ?? new ModuleRegistry();
    this.searchPath = [...(options.searchPath ?? [])];
  }

  /** The resolver chain, in consultation order. */
  get finders(): ReadonlyArray<Finder> {
    return this.chain;
  }

  /** Append a finder to the end of the chain. */
  addFinder(finder: Finder): void {
    this.chain.push(finder);
  }

  /**
   * Remove the first occurrence of a finder.
   *
   * @returns true if the finder was in the chain
   */
  removeFinder(finder: Finder): boolean {
    const idx = this.chain.indexOf(finder);
    if (idx === -1) {
      return false;
    }
    this.chain.splice(idx, 1);
    return true;
  }

  /**
   * Import a module by dotted name.
   *
   * @param searchPath - Directories for this import; defaults to the system search path
   * @throws {ModuleNotFoundError} If no finder claims the name
   */
  importModule(name: ModuleName, searchPath: SearchPathContext = this.searchPath): NotebookModule {
    const existing = this.registry.lookup(name);
    if (existing !== undefined) {
      return existing;
    }
    for (const finder of this.chain) {
      const loader = finder.find(name, searchPath);
      if (loader !== null) {
        return loader.load(name);
      }
    }
    throw new ModuleNotFoundError(name);
  }
}
