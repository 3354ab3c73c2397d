/**
 * Shared fixtures for module-loader tests: an import system wired to an
 * in-memory notebook store, a real vm evaluator and a shell with an empty
 * environment. No file system access.
 */

import { CellKind, ImportLogger } from '@nbimport/kernel';
import type { CellRecord, Namespace, SearchPathContext } from '@nbimport/kernel';
import {
  InteractiveShell,
  MagicCellTransformer,
  MemoryLogSink,
  MemoryNotebookStore,
  VmEvaluator,
} from '@nbimport/runtime-host';
import { NotebookFinder } from '../src/finder.js';
import { HookRegistrar } from '../src/hook-registrar.js';
import { ImportSystem } from '../src/import-system.js';
import type { LoaderDependencies } from '../src/loader.js';

export const FIXED_CLOCK = () => '2026-01-01T00:00:00.000Z';

export function code(source: string): CellRecord {
  return { kind: CellKind.Code, source };
}

export function prose(source: string): CellRecord {
  return { kind: CellKind.Other, source };
}

export interface TestRuntime {
  readonly store: MemoryNotebookStore;
  readonly shell: InteractiveShell;
  readonly userNamespace: Namespace;
  readonly sink: MemoryLogSink;
  readonly system: ImportSystem;
  readonly deps: LoaderDependencies;
  readonly finder: NotebookFinder;
  readonly registrar: HookRegistrar;
}

export function makeRuntime(searchPath: SearchPathContext = []): TestRuntime {
  const store = new MemoryNotebookStore();
  const userNamespace: Namespace = {};
  const shell = new InteractiveShell({ userNamespace, env: {} });
  const sink = new MemoryLogSink();
  const system = new ImportSystem({ searchPath });
  const deps: LoaderDependencies = {
    host: system,
    probe: store,
    reader: store,
    transformer: new MagicCellTransformer(),
    evaluator: new VmEvaluator(),
    shell,
    logger: new ImportLogger(sink, FIXED_CLOCK),
  };
  const finder = new NotebookFinder(deps);
  const registrar = new HookRegistrar(system, finder);
  return { store, shell, userNamespace, sink, system, deps, finder, registrar };
}
