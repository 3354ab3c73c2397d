/**
 * nbimport Runtime Host — Cell Transformers
 *
 * Notebook cells may contain line magics, which are not valid JavaScript:
 *
 *   %who
 *   names = %who
 *   const env = %env HOME
 *
 * MagicCellTransformer rewrites each magic line into a call on the shell
 * accessor that the loader injects into every module namespace:
 *
 *   getShell().runLineMagic("who", "");
 *   names = getShell().runLineMagic("who", "");
 *   const env = getShell().runLineMagic("env", "HOME");
 *
 * Lines that are not magics pass through untouched, so a cell written in
 * plain JavaScript is returned unchanged. Lines that begin inside a template
 * literal or block comment are text and are never rewritten (see
 * linesInsideLiterals). Cell magics (`%%name`) are not recognised and are
 * left as they are.
 */

import { SHELL_ACCESSOR } from '@nbimport/kernel';
import type { CellTransformer } from '@nbimport/kernel';
import { linesInsideLiterals } from './literal-lines.js';

// `%name args` on its own line, with optional indentation.
const LINE_MAGIC = /^(\s*)%(?!%)([A-Za-z_]\w*)(?:\s+(.*?))?\s*$/;

// `lhs = %name args`, where lhs is an optional declaration keyword plus a
// (possibly dotted) target.
const ASSIGN_MAGIC =
  /^(\s*)((?:(?:var|let|const)\s+)?[A-Za-z_$][\w$]*(?:\.[A-Za-z_$][\w$]*)*\s*=\s*)%(?!%)([A-Za-z_]\w*)(?:\s+(.*?))?\s*$/;

function magicCall(name: string, args: string | undefined): string {
  return `${SHELL_ACCESSOR}().runLineMagic(${JSON.stringify(name)}, ${JSON.stringify(args ?? '')});`;
}

/**
 * Rewrite a single line, without regard to the lines around it. Exported for
 * tests and for tools that want to show the effective code of a cell.
 */
export function transformLine(line: string): string {
  const assign = ASSIGN_MAGIC.exec(line);
  if (assign !== null) {
    const [, indent = '', lhs = '', name = '', args] = assign;
    return `${indent}${lhs}${magicCall(name, args)}`;
  }
  const magic = LINE_MAGIC.exec(line);
  if (magic !== null) {
    const [, indent = '', name = '', args] = magic;
    return `${indent}${magicCall(name, args)}`;
  }
  return line;
}

export function isMagicLine(line: string): boolean {
  return ASSIGN_MAGIC.test(line) || LINE_MAGIC.test(line);
}

export class MagicCellTransformer implements CellTransformer {
  transform(source: string): string {
    const literal = linesInsideLiterals(source, isMagicLine);
    return source
      .split('\n')
      .map((line, index) => (literal[index] === true ? line : transformLine(line)))
      .join('\n');
  }
}

/** For notebooks whose cells are already plain JavaScript. */
export class IdentityCellTransformer implements CellTransformer {
  transform(source: string): string {
    return source;
  }
}
