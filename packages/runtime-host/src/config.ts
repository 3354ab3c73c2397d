/**
 * nbimport Runtime Host — Configuration Resolution
 *
 * Resolves the import configuration field by field, using the first source
 * that sets a field:
 *
 *   1. Explicit options (e.g. from --path / --ext / --log-file CLI flags)
 *   2. Environment variables:
 *        NBIMPORT_PATH       directories, separated by path.delimiter
 *        NBIMPORT_EXTENSION  notebook file extension
 *        NBIMPORT_LOG_FILE   JSONL import log
 *   3. `nbimport.config.json` in the working directory:
 *        { "searchPath"?: string[], "extension"?: string, "logFile"?: string }
 *   4. Defaults: search path [] (current directory), extension `.ipynb`,
 *      no log file
 *
 * A relative logFile from the config file is resolved against the directory
 * holding the config file. Search-path directories are kept as written: the
 * resolver joins them as-is, relative to the process working directory.
 */

import { readFileSync } from 'node:fs';
import { delimiter, join, resolve } from 'node:path';
import { z } from 'zod';
import { ConfigError } from '@nbimport/kernel';
import { isNodeError } from './errno.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const CONFIG_FILENAME = 'nbimport.config.json';
export const DEFAULT_EXTENSION = '.ipynb';

export interface ImportConfig {
  readonly searchPath: ReadonlyArray<string>;
  /** Always starts with a dot. */
  readonly extension: string;
  readonly logFile: string | null;
}

export interface ResolveImportConfigOptions {
  readonly searchPath?: ReadonlyArray<string> | undefined;
  readonly extension?: string | undefined;
  readonly logFile?: string | undefined;
  /** Environment to read. Default: process.env. */
  readonly env?: Readonly<Record<string, string | undefined>> | undefined;
  /** Directory holding the config file. Default: process.cwd(). */
  readonly cwd?: string | undefined;
}

const ConfigFileSchema = z
  .object({
    searchPath: z.array(z.string()).optional(),
    extension: z.string().min(1).optional(),
    logFile: z.string().min(1).optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ---------------------------------------------------------------------------
// Config File
// ---------------------------------------------------------------------------

/**
 * Read `nbimport.config.json` from a directory.
 *
 * Returns an empty object if the file does not exist.
 *
 * @throws {ConfigError} If the file is not JSON or has unknown / mistyped fields
 */
export function readConfigFile(dir: string): ConfigFile {
  const path = join(dir, CONFIG_FILENAME);
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT')) {
      return {};
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err: unknown) {
    throw new ConfigError(path, 'not valid JSON', { cause: err });
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(path, detail, { cause: result.error });
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

/** Prefix a dot if missing: `ipynb` → `.ipynb`. */
export function normalizeExtension(extension: string): string {
  return extension.startsWith('.') ? extension : `.${extension}`;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value !== '' ? value : undefined;
}

export function resolveImportConfig(opts: ResolveImportConfigOptions = {}): ImportConfig {
  const env = opts.env ?? process.env;
  const cwd = opts.cwd ?? process.cwd();
  const file = readConfigFile(cwd);

  const envPath = nonEmpty(env['NBIMPORT_PATH']);
  const searchPath =
    opts.searchPath ??
    (envPath !== undefined ? envPath.split(delimiter).filter((d) => d !== '') : undefined) ??
    file.searchPath ??
    [];

  const extension = normalizeExtension(
    nonEmpty(opts.extension) ??
      nonEmpty(env['NBIMPORT_EXTENSION']) ??
      file.extension ??
      DEFAULT_EXTENSION,
  );

  const fileLog = file.logFile !== undefined ? resolve(cwd, file.logFile) : undefined;
  const logFile = nonEmpty(opts.logFile) ?? nonEmpty(env['NBIMPORT_LOG_FILE']) ?? fileLog ?? null;

  return { searchPath, extension, logFile };
}
