/**
 * nbimport cells — List the cells of a notebook file
 *
 * Shows the cells the reader extracts, in document order, with the kind the
 * loader uses to decide what runs.
 */

import { Command } from 'commander';
import { IpynbReader } from '@nbimport/runtime-host';
import { cellRows } from '../output/format.js';
import { kindColor, t } from '../output/theme.js';

export const cellsCommand = new Command('cells')
  .description('List the cells of a notebook file')
  .argument('<file>', 'Path to the notebook')
  .option('--json', 'Output as JSON')
  .action((file: string, options: { json?: boolean }) => {
    const rows = cellRows(new IpynbReader().read(file));

    if (options.json === true) {
      // eslint-disable-next-line no-console
      console.log(JSON.stringify(rows, null, 2));
      return;
    }

    for (const row of rows) {
      const kind = row.kind.padEnd(6);
      // eslint-disable-next-line no-console
      console.log(
        t.dim(String(row.index).padStart(3) + '  ') +
        kindColor(row.kind)(kind) +
        t.muted(`${row.lines} line${row.lines === 1 ? '' : 's'}`.padEnd(10)) +
        t.text(row.preview),
      );
    }
  });
