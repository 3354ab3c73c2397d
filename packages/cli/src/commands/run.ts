/**
 * nbimport run — Import a notebook and show what it defined
 *
 * Executes every code cell of the notebook as a module and prints the
 * module's user bindings (names not starting with `_`, prelude excluded).
 * Import progress goes to stderr unless --quiet is given; a configured log
 * file receives the events either way.
 */

import { Command } from 'commander';
import { ConsoleLogSink } from '@nbimport/runtime-host';
import { createNotebookImporter } from '@nbimport/module-loader';
import { bindingsToJson, formatBindings } from '../output/format.js';
import { t } from '../output/theme.js';
import { configFromOptions } from './shared.js';
import type { SearchOptions } from './shared.js';

interface RunOptions extends SearchOptions {
  json?: boolean;
  quiet?: boolean;
}

export const runCommand = new Command('run')
  .description('Import a notebook as a module and print its bindings')
  .argument('<name>', 'Dotted module name')
  .option('-p, --path <dir...>', 'Search directories, in order')
  .option('--ext <extension>', 'Notebook file extension')
  .option('--log-file <file>', 'Append import events to a JSONL file')
  .option('--json', 'Output as JSON')
  .option('-q, --quiet', 'Do not report import progress')
  .action((name: string, options: RunOptions) => {
    const config = configFromOptions(options);
    // The configured log file, if any, receives events alongside the console.
    const sink = options.quiet === true ? undefined : new ConsoleLogSink();
    const importer = createNotebookImporter({ config, sink });

    const module = importer.importModule(name);
    const bindings = module.bindings();

    if (options.json === true) {
      // eslint-disable-next-line no-console
      console.log(JSON.stringify({
        module: module.name,
        file: module.file,
        bindings: bindingsToJson(bindings),
      }, null, 2));
      return;
    }

    // eslint-disable-next-line no-console
    console.log(t.white(module.name) + t.dim('  ' + module.file));
    const lines = formatBindings(bindings);
    if (lines.length === 0) {
      // eslint-disable-next-line no-console
      console.log(t.muted('  (no bindings)'));
    }
    for (const line of lines) {
      // eslint-disable-next-line no-console
      console.log('  ' + t.text(line));
    }
  });
