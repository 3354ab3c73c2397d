/**
 * nbimport Module Loader — Finder and Loader Cache Tests
 *
 *   FD-U1: names without a notebook are declined with null
 *   FD-U2: equal search paths share one loader, even as distinct arrays
 *   FD-U3: different search paths get different loaders
 *   FD-U4: an empty and an absent search path share a loader
 *   FD-U5: LoaderCache runs the factory once per key
 */

import { describe, it, expect, vi } from 'vitest';
import { searchPathKey } from '@nbimport/kernel';
import { LoaderCache } from '../src/loader-cache.js';
import { code, makeRuntime } from './helpers.js';

describe('NotebookFinder', () => {
  it('FD-U1: names without a notebook are declined with null', () => {
    const rt = makeRuntime();
    rt.store.add('present.ipynb', [code('x = 1')]);

    expect(rt.finder.find('absent', [])).toBeNull();
    expect(rt.finder.loaderCount).toBe(0);
  });

  it('FD-U2: equal search paths share one loader, even as distinct arrays', () => {
    const rt = makeRuntime();
    rt.store.add('lib/a.ipynb', [code('a = 1')]).add('lib/b.ipynb', [code('b = 1')]);

    const first = rt.finder.find('a', ['lib']);
    const second = rt.finder.find('b', ['lib']);

    expect(first).not.toBeNull();
    expect(second).toBe(first);
    expect(rt.finder.loaderCount).toBe(1);
  });

  it('FD-U3: different search paths get different loaders', () => {
    const rt = makeRuntime();
    rt.store.add('one/a.ipynb', [code('a = 1')]).add('two/a.ipynb', [code('a = 2')]);

    const first = rt.finder.find('a', ['one']);
    const second = rt.finder.find('a', ['two', 'one']);

    expect(first).not.toBe(second);
    expect(first?.searchPath).toEqual(['one']);
    expect(second?.searchPath).toEqual(['two', 'one']);
    expect(rt.finder.loaderCount).toBe(2);
  });

  it('FD-U4: an empty and an absent search path share a loader', () => {
    const rt = makeRuntime();
    rt.store.add('demo.ipynb', [code('x = 1')]);

    const explicit = rt.finder.find('demo', []);
    const implicit = rt.finder.find('demo');

    expect(implicit).toBe(explicit);
    expect(rt.finder.loaderCount).toBe(1);
  });
});

describe('LoaderCache', () => {
  it('FD-U5: LoaderCache runs the factory once per key', () => {
    const cache = new LoaderCache<{ id: number }>();
    const factory = vi.fn(() => ({ id: 1 }));
    const key = searchPathKey(['x', 'y']);

    const first = cache.getOrCreate(key, factory);
    const second = cache.getOrCreate(searchPathKey(['x', 'y']), factory);

    expect(second).toBe(first);
    expect(factory).toHaveBeenCalledTimes(1);
    expect(cache.has(key)).toBe(true);
    expect(cache.has(searchPathKey(['y', 'x']))).toBe(false);
    expect(cache.size).toBe(1);
  });
});
