import { fail, ok } from '@/core/errors';
import type { Result } from '@/core/errors';

/**
 * Normalise a position into a lazy range of `count` elements
 */
export function toIndex(index: bigint | number, count: bigint): Result<bigint> {
  let i: bigint;
  if (typeof index === 'number') {
    if (!Number.isSafeInteger(index)) {
      return fail('IndexOutOfRange', `Index ${index} is not an integer`);
    }
    i = BigInt(index);
  } else {
    i = index;
  }

  if (i < 0n || i >= count) {
    return fail('IndexOutOfRange', `Index ${i} is outside 0..${count - 1n}`);
  }
  return ok(i);
}
