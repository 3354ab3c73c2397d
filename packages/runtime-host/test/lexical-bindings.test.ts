/**
 * nbimport Runtime Host — Top-Level Binding Rewrite Tests
 *
 *   LB-U1: top-level const and let become var
 *   LB-U2: let without an initializer is given undefined
 *   LB-U3: top-level class declarations become var-bound class expressions
 *   LB-U4: nested declarations keep their scoping
 *   LB-U5: code without lexical declarations is returned as is
 */

import { describe, it, expect } from 'vitest';
import { bindingsAsVar } from '../src/exec/lexical-bindings.js';

describe('bindingsAsVar', () => {
  it('LB-U1: top-level const and let become var', () => {
    expect(bindingsAsVar('const answer = 42')).toBe('var answer = 42');
    expect(bindingsAsVar('const a = 1, b = 2;')).toBe('var a = 1, b = 2;');
    expect(bindingsAsVar('let { a, b } = pair')).toBe('var { a, b } = pair');
    expect(bindingsAsVar('// setup\nconst k = 1\nk + 1')).toBe('// setup\nvar k = 1\nk + 1');
  });

  it('LB-U2: let without an initializer is given undefined', () => {
    expect(bindingsAsVar('let n')).toBe('var n = undefined');
    expect(bindingsAsVar('let a, b = 2\nconst c = 3')).toBe('var a = undefined, b = 2\nvar c = 3');
  });

  it('LB-U3: top-level class declarations become var-bound class expressions', () => {
    expect(bindingsAsVar('class Foo {}')).toBe('var Foo = class Foo {};');
    expect(bindingsAsVar('class Point {\n  x = 0\n}\np = new Point()')).toBe(
      'var Point = class Point {\n  x = 0\n};\np = new Point()',
    );
  });

  it('LB-U4: nested declarations keep their scoping', () => {
    const code = [
      'if (ok) {',
      '  const inner = 1',
      '}',
      'for (let i = 0; i < 2; i++) {}',
      'function f() { let x = 1; return x }',
    ].join('\n');
    expect(bindingsAsVar(code)).toBe(code);
  });

  it('LB-U5: code without lexical declarations is returned as is', () => {
    expect(bindingsAsVar('x = 1; var y = 2')).toBe('x = 1; var y = 2');
  });
});
