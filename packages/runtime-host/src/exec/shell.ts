/**
 * nbimport Runtime Host — Interactive Shell
 *
 * The execution-context provider. Holds the ambient ("user") namespace that
 * line magics act on, and the registry of line magics.
 *
 * At rest the ambient namespace is the shell's own user namespace. While a
 * notebook is being imported the loader points it at the module's namespace,
 * so `%who` inside a notebook lists that notebook's bindings and
 * `%reset_selective` deletes from it, not from whatever the caller had.
 *
 * Built-in magics:
 *
 *   %who                       sorted user binding names
 *   %reset_selective <regex>   delete matching user bindings, return their names
 *   %env                       copy of the shell environment record
 *   %env NAME                  value of NAME (undefined if unset)
 *   %env NAME=value            set NAME, return the value
 *
 * The environment record is a snapshot of process.env taken at construction;
 * %env never writes to process.env.
 */

import { MagicError, isUserBinding } from '@nbimport/kernel';
import type { ExecutionContextProvider, Namespace } from '@nbimport/kernel';

export type LineMagic = (args: string, shell: InteractiveShell) => unknown;

export interface InteractiveShellOptions {
  /** Initial user namespace. Default: a fresh empty object. */
  readonly userNamespace?: Namespace | undefined;
  /** Initial environment record. Default: a copy of process.env. */
  readonly env?: Readonly<Record<string, string | undefined>> | undefined;
}

export class InteractiveShell implements ExecutionContextProvider {
  private ambient: Namespace;
  private readonly magics: Map<string, LineMagic> = new Map();
  private readonly env: Map<string, string> = new Map();

  constructor(options: InteractiveShellOptions = {}) {
    this.ambient = options.userNamespace ?? {};
    for (const [key, value] of Object.entries(options.env ?? process.env)) {
      if (value !== undefined) {
        this.env.set(key, value);
      }
    }
    this.registerLineMagic('who', (_args, shell) => whoMagic(shell));
    this.registerLineMagic('reset_selective', (args, shell) => resetSelectiveMagic(args, shell));
    this.registerLineMagic('env', (args, shell) => shell.envMagic(args));
  }

  // -------------------------------------------------------------------------
  // ExecutionContextProvider
  // -------------------------------------------------------------------------

  getAmbientNamespace(): Namespace {
    return this.ambient;
  }

  setAmbientNamespace(namespace: Namespace): void {
    this.ambient = namespace;
  }

  // -------------------------------------------------------------------------
  // Line magics
  // -------------------------------------------------------------------------

  /** Register (or replace) a line magic. */
  registerLineMagic(name: string, magic: LineMagic): void {
    this.magics.set(name, magic);
  }

  /** Sorted names of all registered line magics. */
  lineMagicNames(): ReadonlyArray<string> {
    return Array.from(this.magics.keys()).sort();
  }

  /**
   * Run a line magic against the current ambient namespace.
   *
   * @throws {MagicError} If no magic of that name is registered
   */
  runLineMagic(name: string, args: string): unknown {
    const magic = this.magics.get(name);
    if (magic === undefined) {
      throw new MagicError(`Line magic function '%${name}' not found`);
    }
    return magic(args.trim(), this);
  }

  private envMagic(args: string): unknown {
    if (args === '') {
      return Object.fromEntries(this.env);
    }
    const eq = args.indexOf('=');
    if (eq === -1) {
      return this.env.get(args);
    }
    const key = args.slice(0, eq).trim();
    if (key === '') {
      throw new MagicError(`%env: missing variable name in '${args}'`);
    }
    const value = args.slice(eq + 1).trim();
    this.env.set(key, value);
    return value;
  }
}

// ---------------------------------------------------------------------------
// Built-in magics
// ---------------------------------------------------------------------------

function userNames(namespace: Namespace): string[] {
  return Object.keys(namespace).filter(isUserBinding).sort();
}

function whoMagic(shell: InteractiveShell): ReadonlyArray<string> {
  return userNames(shell.getAmbientNamespace());
}

function resetSelectiveMagic(args: string, shell: InteractiveShell): ReadonlyArray<string> {
  if (args === '') {
    throw new MagicError('%reset_selective requires a pattern');
  }
  let pattern: RegExp;
  try {
    pattern = new RegExp(args);
  } catch (err: unknown) {
    throw new MagicError(`%reset_selective: invalid pattern '${args}': ${String(err)}`);
  }
  const namespace = shell.getAmbientNamespace();
  // Declarations may be non-configurable on a vm global; those stay.
  return userNames(namespace).filter(
    (name) => pattern.test(name) && Reflect.deleteProperty(namespace, name),
  );
}
