/**
 * commands/index.ts — Commander program, configured and exported without .parse().
 *
 * Imported by src/bin/nbimport.ts.
 */

import { program } from 'commander';
import { findCommand } from './find.js';
import { runCommand } from './run.js';
import { cellsCommand } from './cells.js';

program
  .name('nbimport')
  .description(
    'Import notebooks as modules.\n' +
    'Module names resolve to <search dir>/<last segment>.ipynb; underscores\n' +
    'in the last segment may stand for spaces in the file name.',
  )
  .version('0.1.0');

program.addCommand(findCommand);
program.addCommand(runCommand);
program.addCommand(cellsCommand);

export { program };
