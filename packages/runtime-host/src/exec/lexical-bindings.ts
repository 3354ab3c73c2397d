/**
 * nbimport Runtime Host — Top-Level Binding Rewrite
 *
 * In a vm context, top-level `let`, `const` and `class` declarations live in
 * the context's global lexical scope, not on the global object. The global
 * object is the module namespace, so such names would be invisible to
 * importers and to `%who` / `%reset_selective`.
 *
 * bindingsAsVar() rewrites each such top-level declaration into a `var`
 * declaration, which the vm defines on the global object:
 *
 *   const answer = 42        →  var answer = 42
 *   let n                    →  var n = undefined
 *   let { a, b } = pair      →  var { a, b } = pair
 *   class Foo {}             →  var Foo = class Foo {};
 *
 * Only statements at the top level of the cell are touched. Declarations
 * inside blocks, functions and loop heads keep their scoping. The rewritten
 * bindings are writable: `const` is not enforced across cells. Line and
 * column positions of all other code are unchanged.
 *
 * The code is parsed with the TypeScript compiler API as JavaScript. Callers
 * compile the original text first, so syntax errors are reported against
 * what the user wrote.
 */

import ts from 'typescript';

interface Edit {
  readonly start: number;
  readonly end: number;
  readonly text: string;
}

export function bindingsAsVar(code: string): string {
  const sourceFile = ts.createSourceFile(
    'cell.js',
    code,
    ts.ScriptTarget.Latest,
    /* setParentNodes */ false,
    ts.ScriptKind.JS,
  );

  const edits: Edit[] = [];
  for (const statement of sourceFile.statements) {
    edits.push(...editsFor(statement, sourceFile));
  }
  if (edits.length === 0) {
    return code;
  }

  // Apply back to front so earlier offsets stay valid.
  edits.sort((a, b) => b.start - a.start);
  let out = code;
  for (const edit of edits) {
    out = out.slice(0, edit.start) + edit.text + out.slice(edit.end);
  }
  return out;
}

function editsFor(statement: ts.Statement, sourceFile: ts.SourceFile): Edit[] {
  if (ts.isVariableStatement(statement)) {
    return variableEdits(statement.declarationList, sourceFile);
  }
  if (ts.isClassDeclaration(statement) && statement.name !== undefined) {
    const start = statement.getStart(sourceFile);
    const end = statement.getEnd();
    return [
      { start, end: start, text: `var ${statement.name.text} = ` },
      { start: end, end, text: ';' },
    ];
  }
  return [];
}

function variableEdits(list: ts.VariableDeclarationList, sourceFile: ts.SourceFile): Edit[] {
  // `using` declarations carry disposal semantics; leave them alone.
  if ((list.flags & ts.NodeFlags.Using) !== 0) {
    return [];
  }
  const keyword =
    (list.flags & ts.NodeFlags.Const) !== 0 ? 'const'
    : (list.flags & ts.NodeFlags.Let) !== 0 ? 'let'
    : null;
  if (keyword === null) {
    return [];
  }

  const start = list.getStart(sourceFile);
  const edits: Edit[] = [{ start, end: start + keyword.length, text: 'var' }];
  for (const declaration of list.declarations) {
    if (declaration.initializer === undefined) {
      const end = declaration.getEnd();
      edits.push({ start: end, end, text: ' = undefined' });
    }
  }
  return edits;
}
