/**
 * nbimport Module Loader — Hook Registrar
 *
 * Installs one finder into an import system's resolver chain and removes it
 * again.
 *
 * Installation is idempotent: while installed, install() returns the handle
 * it already issued and the chain keeps a single entry, so one loader cache
 * serves every import. uninstall() only acts on the current handle; a stale
 * handle from an earlier installation is ignored. After uninstall, install()
 * appends the same finder again (with its cache intact) under a new handle.
 */

import type { Finder, ImportSystem } from './import-system.js';

export interface HookHandle {
  readonly id: number;
  readonly finder: Finder;
}

export class HookRegistrar {
  private handle: HookHandle | null = null;
  private nextId = 1;

  constructor(
    private readonly system: ImportSystem,
    readonly finder: Finder,
  ) {}

  /** Append the finder to the chain unless it is already installed. */
  install(): HookHandle {
    if (this.handle !== null) {
      return this.handle;
    }
    this.system.addFinder(this.finder);
    this.handle = { id: this.nextId++, finder: this.finder };
    return this.handle;
  }

  /** Remove the finder from the chain if `handle` is the current handle. */
  uninstall(handle: HookHandle): void {
    if (this.handle === null || this.handle !== handle) {
      return;
    }
    this.system.removeFinder(this.finder);
    this.handle = null;
  }

  get installed(): boolean {
    return this.handle !== null;
  }
}
