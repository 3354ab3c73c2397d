/**
 * @nbimport/kernel
 *
 * nbimport kernel — the contracts of the notebook import pipeline: value
 * types, the error taxonomy, adapter interfaces and the import logger.
 *
 * This package is side-effect free. It contains no imports of node:fs,
 * node:vm or any other I/O API. Concrete adapters live in
 * @nbimport/runtime-host.
 */

// Types
export type { CellRecord } from './types/cell.js';
export { CellKind, isCodeCell } from './types/cell.js';

export type {
  ModuleLoaderRef,
  ModuleName,
  Namespace,
  SearchPathContext,
  SearchPathKey,
} from './types/module.js';
export {
  NotebookModule,
  PRELUDE_NAMES,
  SHELL_ACCESSOR,
  effectiveSearchPath,
  isUserBinding,
  lastSegment,
  searchPathKey,
} from './types/module.js';

export type { ImportEvent, ImportEventKind } from './types/event.js';

// Errors
export {
  ConfigError,
  ExecutionError,
  FormatError,
  MagicError,
  ModuleNotFoundError,
  NotebookImportError,
  ReadError,
  ResolutionError,
  describeError,
} from './types/errors.js';

// Adapter interfaces (implementations live in runtime-host)
export type {
  CellTransformer,
  DocumentReader,
  EvaluationOrigin,
  Evaluator,
  ExecutionContextProvider,
  FileProbe,
} from './adapters/index.js';

// Logging
export type { LogSink } from './logging/log-sink.js';
export type { Clock } from './logging/import-log.js';
export { ImportLogger } from './logging/import-log.js';
