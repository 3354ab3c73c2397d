#!/usr/bin/env node
/**
 * bin/nbimport.ts — entry point for the `nbimport` CLI command.
 *
 * Errors thrown by a command end here: the message is printed in red and the
 * process exits non-zero.
 */

import { describeError, NotebookImportError } from '@nbimport/kernel'
import { program } from '../commands/index.js'
import { t } from '../output/theme.js'

try {
  await program.parseAsync()
} catch (err: unknown) {
  const message = err instanceof NotebookImportError ? err.message : describeError(err)
  // eslint-disable-next-line no-console
  console.error(t.red(message))
  process.exitCode = 1
}
