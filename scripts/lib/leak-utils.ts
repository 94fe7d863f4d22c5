/**
 * Leak-check helper for ssa-js scripts.
 *
 * Same guard as `withLeakCheck` in `tests/utils.ts`; scripts do not import
 * from the `tests/` directory.
 *
 * Usage:
 *   import { withLeakCheck } from './lib/leak-utils.ts';
 *   const rec = await withLeakCheck(() => ssaReconstruct(dec, groups));
 */

import { checkLeaks } from '@hamk-uas/jax-js-nonconsuming';

/**
 * Run `fn` inside a checkLeaks guard. Throws if any np.Array objects leak.
 */
export const withLeakCheck = async <T>(fn: () => Promise<T>): Promise<T> => {
  const guard = checkLeaks.start();
  try {
    return await fn();
  } finally {
    checkLeaks.stop(guard);
  }
};
