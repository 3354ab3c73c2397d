/**
 * nbimport Runtime Host — File Probe
 *
 * Implements the FileProbe interface from @nbimport/kernel with a
 * synchronous stat. Resolution runs inside a synchronous import call, so
 * the probe cannot be async.
 *
 * Relative paths (including the bare `<name>.ipynb` produced for the empty
 * search-path entry) are resolved against the process working directory.
 */

import { statSync } from 'node:fs';
import type { FileProbe } from '@nbimport/kernel';
import { isNodeError } from '../errno.js';

/** stat() failures that mean "there is no regular file here". */
const NOT_A_FILE_CODES = ['ENOTDIR', 'EACCES', 'ENAMETOOLONG', 'ELOOP'];

export class NodeFileProbe implements FileProbe {
  isFile(path: string): boolean {
    if (path.includes('\0')) {
      return false;
    }
    try {
      return statSync(path, { throwIfNoEntry: false })?.isFile() === true;
    } catch (err: unknown) {
      if (NOT_A_FILE_CODES.some((code) => isNodeError(err, code))) {
        return false;
      }
      throw err;
    }
  }
}
