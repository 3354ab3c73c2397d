/**
 * Option plumbing shared by the commands that resolve notebooks.
 */

import { resolveImportConfig } from '@nbimport/runtime-host';
import type { ImportConfig } from '@nbimport/runtime-host';

export interface SearchOptions {
  path?: string[];
  ext?: string;
  logFile?: string;
}

export function configFromOptions(options: SearchOptions): ImportConfig {
  return resolveImportConfig({
    searchPath: options.path,
    extension: options.ext,
    logFile: options.logFile,
  });
}
