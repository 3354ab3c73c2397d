/**
 * nbimport Kernel — Error Taxonomy
 *
 * "Not found" is not an error: resolvers and finders return null so that
 * the import system can try the next finder. Everything else that can go
 * wrong during an import is one of the classes below, and all of them
 * propagate to the caller of `importModule()`. None are retried.
 *
 *   ModuleNotFoundError — no finder in the chain claimed the name
 *   ResolutionError     — the notebook vanished between find and load
 *   FormatError         — the container could not be parsed into cells
 *   ReadError           — the notebook exists but could not be read
 *   ExecutionError      — a code cell threw
 *   MagicError          — a line magic is unknown or was misused
 *   ConfigError         — a configuration file is malformed
 */

// ---------------------------------------------------------------------------
// Base
// ---------------------------------------------------------------------------

export class NotebookImportError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'NotebookImportError';
  }
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

export class ModuleNotFoundError extends NotebookImportError {
  constructor(readonly moduleName: string) {
    super(`No module named '${moduleName}'`);
    this.name = 'ModuleNotFoundError';
  }
}

export class ResolutionError extends NotebookImportError {
  constructor(
    readonly moduleName: string,
    readonly searchPath: ReadonlyArray<string>,
  ) {
    super(
      `Notebook for module '${moduleName}' can no longer be located. ` +
        `Searched: [${searchPath.map((d) => JSON.stringify(d)).join(', ')}]`,
    );
    this.name = 'ResolutionError';
  }
}

// ---------------------------------------------------------------------------
// Reading
// ---------------------------------------------------------------------------

export class FormatError extends NotebookImportError {
  constructor(
    readonly path: string,
    detail: string,
    options?: ErrorOptions,
  ) {
    super(`Malformed notebook ${path}: ${detail}`, options);
    this.name = 'FormatError';
  }
}

export class ReadError extends NotebookImportError {
  constructor(
    readonly moduleName: string,
    readonly path: string,
    cause: unknown,
  ) {
    super(`Cannot read notebook for module '${moduleName}' from ${path}: ${describeError(cause)}`, {
      cause,
    });
    this.name = 'ReadError';
  }
}

// ---------------------------------------------------------------------------
// Execution
// ---------------------------------------------------------------------------

export class ExecutionError extends NotebookImportError {
  constructor(
    readonly moduleName: string,
    readonly cellIndex: number,
    cause: unknown,
  ) {
    super(`Cell ${cellIndex} of module '${moduleName}' failed: ${describeError(cause)}`, { cause });
    this.name = 'ExecutionError';
  }
}

export class MagicError extends NotebookImportError {
  constructor(message: string) {
    super(message);
    this.name = 'MagicError';
  }
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export class ConfigError extends NotebookImportError {
  constructor(
    readonly path: string,
    detail: string,
    options?: ErrorOptions,
  ) {
    super(`Invalid configuration in ${path}: ${detail}`, options);
    this.name = 'ConfigError';
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Render any thrown value as a one-line message.
 *
 * Values thrown inside a vm context are instances of that context's Error,
 * so `instanceof Error` is false for them; the shape is checked instead.
 */
export function describeError(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
    const name = 'name' in err && typeof err.name === 'string' ? err.name : 'Error';
    return `${name}: ${err.message}`;
  }
  return String(err);
}
