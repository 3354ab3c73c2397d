/**
 * nbimport Module Loader — Notebook Loader
 *
 * The NotebookLoader turns a notebook into a registered module. A loader is
 * bound to one search path; the finder keeps one loader per distinct search
 * path and hands it out for every name it claims under that path.
 *
 * load(name) is a multi-step process:
 * 1. Re-resolve the notebook path from the bound search path. The path found
 *    by the finder is not reused: the file may have moved since.
 * 2. Read the cells through the DocumentReader.
 * 3. Create the NotebookModule (file, loader, prelude) and register it in the
 *    host registry before any cell runs, so circular imports see the
 *    partially built module instead of loading it twice.
 * 4. Make the module namespace the shell's ambient namespace; the lease is
 *    released in a finally block on every exit path. If cell code left a
 *    lease of its own open, that release throws and its error replaces the
 *    cell's (see ambient.ts).
 * 5. For each code cell, in order: transform, then evaluate against the
 *    module namespace. The first failure stops execution; the module stays
 *    registered with the bindings made so far.
 * 6. Return the module.
 *
 * Failures:
 *   ResolutionError — the notebook is gone (nothing is registered)
 *   ReadError       — the reader threw (nothing is registered)
 *   ExecutionError  — a cell threw; errors that are already NotebookImportErrors
 *                     (a nested import failing, a bad magic) propagate unchanged
 */

import {
  ExecutionError,
  ImportLogger,
  NotebookImportError,
  NotebookModule,
  ReadError,
  ResolutionError,
  SHELL_ACCESSOR,
  effectiveSearchPath,
  isCodeCell,
} from '@nbimport/kernel';
import type {
  CellRecord,
  CellTransformer,
  DocumentReader,
  Evaluator,
  ExecutionContextProvider,
  FileProbe,
  ModuleLoaderRef,
  ModuleName,
  Namespace,
  SearchPathContext,
} from '@nbimport/kernel';
import { acquireAmbientNamespace } from './ambient.js';
import type { ImportHost } from './import-system.js';
import { resolveNotebook } from './path-resolver.js';

// ---------------------------------------------------------------------------
// Dependencies
// ---------------------------------------------------------------------------

/**
 * Everything a loader needs. Shared by all loaders a finder creates, so all
 * of them act on the same shell.
 */
export interface LoaderDependencies {
  readonly host: ImportHost;
  readonly probe: FileProbe;
  readonly reader: DocumentReader;
  readonly transformer: CellTransformer;
  readonly evaluator: Evaluator;
  readonly shell: ExecutionContextProvider;
  readonly logger?: ImportLogger | undefined;
  /** Notebook file extension including the dot. Default: `.ipynb`. */
  readonly extension?: string | undefined;
}

// ---------------------------------------------------------------------------
// Notebook Loader
// ---------------------------------------------------------------------------

export class NotebookLoader implements ModuleLoaderRef {
  readonly searchPath: SearchPathContext;
  private readonly logger: ImportLogger;

  constructor(
    searchPath: SearchPathContext,
    private readonly deps: LoaderDependencies,
  ) {
    this.searchPath = [...searchPath];
    this.logger = deps.logger ?? new ImportLogger();
  }

  /**
   * Import a notebook as a module.
   *
   * @throws {ResolutionError} If the notebook can no longer be located
   * @throws {ReadError} If the notebook cannot be read into cells
   * @throws {ExecutionError} If a code cell throws
   */
  load(name: ModuleName): NotebookModule {
    const path = resolveNotebook(name, this.searchPath, this.deps.probe, {
      extension: this.deps.extension,
    });
    if (path === null) {
      const err = new ResolutionError(name, effectiveSearchPath(this.searchPath));
      this.logger.failed(name, null, err);
      throw err;
    }

    this.logger.started(name, path);

    let cells: ReadonlyArray<CellRecord>;
    try {
      cells = this.deps.reader.read(path);
    } catch (cause: unknown) {
      const err = new ReadError(name, path, cause);
      this.logger.failed(name, path, err);
      throw err;
    }

    const module = new NotebookModule(name, path, this, this.prelude());

    let executed: number;
    try {
      this.deps.host.registry.register(name, module);
      executed = this.execute(module, cells);
    } catch (err: unknown) {
      this.logger.failed(name, path, err);
      throw err;
    }

    this.logger.completed(name, path, executed);
    return module;
  }

  /**
   * Run every code cell against the module namespace with the namespace
   * made ambient for the duration.
   *
   * @returns Number of code cells executed
   */
  private execute(module: NotebookModule, cells: ReadonlyArray<CellRecord>): number {
    const lease = acquireAmbientNamespace(this.deps.shell, module.namespace);
    try {
      let executed = 0;
      for (const [index, cell] of cells.entries()) {
        if (!isCodeCell(cell)) {
          continue;
        }
        try {
          const code = this.deps.transformer.transform(cell.source);
          this.deps.evaluator.evaluate(code, module.namespace, {
            filename: module.file,
            cellIndex: index,
          });
        } catch (err: unknown) {
          throw err instanceof NotebookImportError
            ? err
            : new ExecutionError(module.name, index, err);
        }
        executed++;
      }
      return executed;
    } finally {
      lease.release();
    }
  }

  /** Bindings injected into every module before its first cell. */
  private prelude(): Namespace {
    const { host, shell } = this.deps;
    return {
      [SHELL_ACCESSOR]: () => shell,
      importNotebook: (name: string): Namespace => host.importModule(name).namespace,
      console,
    };
  }
}
