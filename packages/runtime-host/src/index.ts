/**
 * @nbimport/runtime-host
 *
 * nbimport runtime host — Node.js implementations of the kernel's adapter
 * interfaces, the line-magic cell transformer, log sinks and configuration
 * resolution. Depends on @nbimport/kernel (interfaces); all I/O of the
 * project happens here.
 */

// Adapters
export { NodeFileProbe } from './adapters/file-probe.js';
export { IpynbReader, parseNotebook } from './reader/ipynb-reader.js';
export { MemoryNotebookStore } from './reader/memory-store.js';
export { VmEvaluator } from './exec/vm-evaluator.js';
export { bindingsAsVar } from './exec/lexical-bindings.js';

// Cell transformation
export {
  IdentityCellTransformer,
  MagicCellTransformer,
  isMagicLine,
  transformLine,
} from './transform/magics.js';
export { linesInsideLiterals } from './transform/literal-lines.js';

// Execution context
export type { InteractiveShellOptions, LineMagic } from './exec/shell.js';
export { InteractiveShell } from './exec/shell.js';

// Logging
export type { ConsoleLogSinkOptions, LineWriter } from './logging/console-log-sink.js';
export { ConsoleLogSink, formatEvent } from './logging/console-log-sink.js';
export { CompositeLogSink } from './logging/composite-log-sink.js';
export { FileLogSink } from './logging/file-log-sink.js';
export { MemoryLogSink } from './logging/memory-log-sink.js';
export { ulid } from './logging/ulid.js';

// Configuration
export type { ImportConfig, ResolveImportConfigOptions } from './config.js';
export {
  CONFIG_FILENAME,
  DEFAULT_EXTENSION,
  normalizeExtension,
  readConfigFile,
  resolveImportConfig,
} from './config.js';
