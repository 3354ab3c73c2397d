/**
 * nbimport find — Show which notebook a module name resolves to
 *
 * Prints the path on stdout. If no notebook matches, prints the candidates
 * that were tried and exits with code 1.
 */

import { Command } from 'commander';
import { NodeFileProbe } from '@nbimport/runtime-host';
import { candidatePaths, resolveNotebook } from '@nbimport/module-loader';
import { t } from '../output/theme.js';
import { configFromOptions } from './shared.js';
import type { SearchOptions } from './shared.js';

export const findCommand = new Command('find')
  .description('Resolve a module name to a notebook file')
  .argument('<name>', 'Dotted module name')
  .option('-p, --path <dir...>', 'Search directories, in order')
  .option('--ext <extension>', 'Notebook file extension')
  .action((name: string, options: SearchOptions) => {
    const config = configFromOptions(options);
    const path = resolveNotebook(name, config.searchPath, new NodeFileProbe(), {
      extension: config.extension,
    });

    if (path !== null) {
      // eslint-disable-next-line no-console
      console.log(path);
      return;
    }

    // eslint-disable-next-line no-console
    console.error(t.red(`No notebook found for '${name}'. Tried:`));
    for (const candidate of candidatePaths(name, config.searchPath, { extension: config.extension })) {
      // eslint-disable-next-line no-console
      console.error(t.muted(`  ${candidate}`));
    }
    process.exitCode = 1;
  });
