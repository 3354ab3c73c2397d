/**
 * nbimport Module Loader — Ambient Namespace Scope
 *
 * While a notebook executes, the shell's ambient namespace must point at the
 * module being built, and must be back to its previous value afterwards no
 * matter how execution ended. Imports nest (A's cell imports B, whose cell
 * imports C), so leases form a stack per provider:
 *
 *   acquire(A) → acquire(B) → acquire(C) → release(C) → release(B) → release(A)
 *
 * Each lease restores exactly the value that was current when it was
 * acquired. Releasing a lease that is not the innermost one throws: it would
 * restore a namespace the inner lease still depends on.
 *
 * The loader releases in a finally block, so a lease left open by code
 * running inside a cell makes that release throw, and the out-of-order
 * error replaces whatever error the cells raised. The loader's own leases
 * always nest; only cell code holding a lease of its own can trigger this.
 *
 * Usage:
 *
 *   const lease = acquireAmbientNamespace(shell, module.namespace);
 *   try {
 *     ...run cells...
 *   } finally {
 *     lease.release();
 *   }
 */

import type { ExecutionContextProvider, Namespace } from '@nbimport/kernel';

export interface AmbientLease {
  /** The namespace that was ambient when the lease was acquired. */
  readonly previous: Namespace;
  /** The namespace made ambient by this lease. */
  readonly current: Namespace;
  /**
   * Restore `previous`. A second call is a no-op.
   *
   * @throws {Error} If a lease acquired after this one is still held
   */
  release(): void;
}

const leaseStacks: WeakMap<ExecutionContextProvider, AmbientLease[]> = new WeakMap();

function stackFor(provider: ExecutionContextProvider): AmbientLease[] {
  let stack = leaseStacks.get(provider);
  if (stack === undefined) {
    stack = [];
    leaseStacks.set(provider, stack);
  }
  return stack;
}

/**
 * Make `namespace` the provider's ambient namespace until the returned lease
 * is released.
 */
export function acquireAmbientNamespace(
  provider: ExecutionContextProvider,
  namespace: Namespace,
): AmbientLease {
  const stack = stackFor(provider);
  const previous = provider.getAmbientNamespace();
  let released = false;

  const lease: AmbientLease = {
    previous,
    current: namespace,
    release(): void {
      if (released) {
        return;
      }
      if (stack[stack.length - 1] !== lease) {
        throw new Error(
          'Ambient namespace lease released out of order: ' +
            'an inner import still holds the ambient namespace.',
        );
      }
      stack.pop();
      released = true;
      provider.setAmbientNamespace(previous);
    },
  };

  provider.setAmbientNamespace(namespace);
  stack.push(lease);
  return lease;
}

/** Number of unreleased leases on a provider. */
export function ambientDepth(provider: ExecutionContextProvider): number {
  return leaseStacks.get(provider)?.length ?? 0;
}
