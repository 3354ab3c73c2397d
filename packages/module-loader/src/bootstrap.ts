/**
 * nbimport Module Loader — Bootstrap
 *
 * Wires the production implementations from @nbimport/runtime-host into an
 * ImportSystem with the notebook finder installed:
 *
 *   const importer = createNotebookImporter({ config: resolveImportConfig() });
 *   const analysis = importer.importModule('analysis');
 *   analysis.namespace['summary'];
 *
 * Every collaborator can be replaced through the options; tests pass a
 * MemoryNotebookStore as probe and reader.
 */

import { ImportLogger } from '@nbimport/kernel';
import type {
  CellTransformer,
  DocumentReader,
  Evaluator,
  FileProbe,
  LogSink,
  ModuleName,
  NotebookModule,
} from '@nbimport/kernel';
import {
  CompositeLogSink,
  FileLogSink,
  InteractiveShell,
  IpynbReader,
  MagicCellTransformer,
  NodeFileProbe,
  VmEvaluator,
  resolveImportConfig,
} from '@nbimport/runtime-host';
import type { ImportConfig } from '@nbimport/runtime-host';
import { NotebookFinder } from './finder.js';
import { HookRegistrar } from './hook-registrar.js';
import type { HookHandle } from './hook-registrar.js';
import { ImportSystem } from './import-system.js';

export interface NotebookImporterOptions {
  /** Default: resolveImportConfig() (flags absent, env, config file, defaults). */
  readonly config?: ImportConfig | undefined;
  readonly shell?: InteractiveShell | undefined;
  /**
   * Receives import events. When config.logFile is set, events also go to a
   * FileLogSink for that file.
   */
  readonly sink?: LogSink | undefined;
  readonly probe?: FileProbe | undefined;
  readonly reader?: DocumentReader | undefined;
  readonly transformer?: CellTransformer | undefined;
  readonly evaluator?: Evaluator | undefined;
}

export interface NotebookImporter {
  readonly config: ImportConfig;
  readonly system: ImportSystem;
  readonly registrar: HookRegistrar;
  readonly handle: HookHandle;
  readonly shell: InteractiveShell;
  importModule(name: ModuleName): NotebookModule;
}

export function createNotebookImporter(options: NotebookImporterOptions = {}): NotebookImporter {
  const config = options.config ?? resolveImportConfig();
  const shell = options.shell ?? new InteractiveShell();
  const sink = combineSinks(options.sink, config.logFile);

  const system = new ImportSystem({ searchPath: config.searchPath });
  const finder = new NotebookFinder({
    host: system,
    probe: options.probe ?? new NodeFileProbe(),
    reader: options.reader ?? new IpynbReader(),
    transformer: options.transformer ?? new MagicCellTransformer(),
    evaluator: options.evaluator ?? new VmEvaluator(),
    shell,
    logger: new ImportLogger(sink),
    extension: config.extension,
  });
  const registrar = new HookRegistrar(system, finder);
  const handle = registrar.install();

  return {
    config,
    system,
    registrar,
    handle,
    shell,
    importModule: (name) => system.importModule(name),
  };
}

function combineSinks(sink: LogSink | undefined, logFile: string | null): LogSink | undefined {
  if (logFile === null) {
    return sink;
  }
  const file = new FileLogSink(logFile);
  return sink === undefined ? file : new CompositeLogSink([sink, file]);
}
