/**
 * nbimport Module Loader — Loader Cache
 *
 * One loader per distinct search-path context. Keys are SearchPathKey
 * strings (see `searchPathKey()`), so two separately built directory lists
 * with the same contents hit the same entry.
 *
 * Entries are inserted lazily and never removed; the cache lives as long as
 * the finder that owns it.
 */

import type { SearchPathKey } from '@nbimport/kernel';

export class LoaderCache<L> {
  private readonly entries: Map<SearchPathKey, L> = new Map();

  /**
   * Return the loader for `key`, constructing and storing it with `factory`
   * on first use. The factory runs at most once per key.
   */
  getOrCreate(key: SearchPathKey, factory: () => L): L {
    const existing = this.entries.get(key);
    if (existing !== undefined) {
      return existing;
    }
    const created = factory();
    this.entries.set(key, created);
    return created;
  }

  has(key: SearchPathKey): boolean {
    return this.entries.has(key);
  }

  get size(): number {
    return this.entries.size;
  }
}
