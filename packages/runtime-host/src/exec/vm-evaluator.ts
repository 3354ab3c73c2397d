/**
 * nbimport Runtime Host — vm Evaluator
 *
 * Implements the Evaluator interface with node:vm. The module namespace
 * object itself is contextified and becomes the global object of the code
 * it runs, so:
 *
 *   - bare assignments (`x = 1`), `var` and function declarations become
 *     properties of the namespace, i.e. module bindings;
 *   - top-level `let` / `const` / `class` declarations are rewritten to
 *     `var` (see bindingsAsVar), so they are module bindings too;
 *   - the namespace is contextified once and reused, so every cell of a
 *     module shares one context.
 *
 * Each cell is compiled as written first, so a syntax error points at the
 * user's text. Code runs as a classic script, in sloppy mode unless the
 * cell opts in with a "use strict" directive.
 */

import { Script, createContext, isContext } from 'node:vm';
import type { EvaluationOrigin, Evaluator, Namespace } from '@nbimport/kernel';
import { bindingsAsVar } from './lexical-bindings.js';

export class VmEvaluator implements Evaluator {
  evaluate(code: string, namespace: Namespace, origin: EvaluationOrigin): unknown {
    const filename = `${origin.filename}#cell${origin.cellIndex}`;
    const original = new Script(code, { filename });
    const rewritten = bindingsAsVar(code);
    const script = rewritten === code ? original : new Script(rewritten, { filename });

    const context = isContext(namespace) ? namespace : createContext(namespace);
    return script.runInContext(context);
  }
}
