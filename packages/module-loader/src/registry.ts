/**
 * nbimport Module Loader — Module Registry
 *
 * The ModuleRegistry is the authoritative record of imported modules, keyed
 * by full dotted name. It owns every NotebookModule registered in it.
 *
 * Registry invariants:
 * - A name is bound at most once; register() refuses a bound name. A module
 *   is never re-executed by importing its name again.
 * - Loaders register a module before running its cells, so a module whose
 *   execution failed stays bound with whatever bindings it had reached.
 * - unbind() is the only way to release a name; a later import of that name
 *   then loads the notebook afresh.
 */

import type { ModuleName, NotebookModule } from '@nbimport/kernel';

export class ModuleRegistry {
  private readonly entries: Map<ModuleName, NotebookModule> = new Map();

  /**
   * Bind a module under its name.
   *
   * @throws {Error} If the name is already bound
   */
  register(name: ModuleName, module: NotebookModule): void {
    if (this.entries.has(name)) {
      throw new Error(
        `Module already registered: ${name}. ` +
          `Unbind it first to load the notebook again.`,
      );
    }
    this.entries.set(name, module);
  }

  /** The module bound to `name`, or undefined. */
  lookup(name: ModuleName): NotebookModule | undefined {
    return this.entries.get(name);
  }

  has(name: ModuleName): boolean {
    return this.entries.has(name);
  }

  /**
   * Release a name.
   *
   * @returns true if the name was bound
   */
  unbind(name: ModuleName): boolean {
    return this.entries.delete(name);
  }

  /** Bound names in registration order. */
  names(): ReadonlyArray<ModuleName> {
    return Array.from(this.entries.keys());
  }
}
