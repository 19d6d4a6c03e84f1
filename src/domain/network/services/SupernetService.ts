/**
 * SupernetService - merge networks into covering prefixes
 *
 * Pairwise:
 *   192.168.0.0/24 + 192.168.1.0/24 = 192.168.0.0/23
 *   10.1.0.0/16 + 10.0.0.0/16       = 10.0.0.0/15
 *   192.168.0.0/24 + 192.168.0.0/25 = 192.168.0.0/24
 *
 * Batch (supernetAll) is a greedy fixed-point reduction: networks are sorted,
 * stacked, and neighbours merged pass after pass until a pass merges nothing.
 * The result depends on that order; it is a valid cover but not guaranteed
 * to be the smallest possible one for every input.
 *
 * Wide subnet: the single smallest prefix that covers a set of networks.
 */

import { Logger } from '@/core/Logger';
import { fail, ok, orNull, unwrap } from '@/core/errors';
import type { Result } from '@/core/errors';
import { bitWidth } from '../AddressFamily';
import { IPAddress } from '../value-objects/IPAddress';
import { IPNetwork } from '../value-objects/IPNetwork';

const LOG_SOURCE = 'supernet';

type MaybeNetwork = IPNetwork | null | undefined;

function present(networks: ReadonlyArray<MaybeNetwork>): IPNetwork[] {
  return networks.filter((network): network is IPNetwork => network != null);
}

function mergePair(a: IPNetwork, b: IPNetwork): Result<IPNetwork> {
  if (a.family !== b.family) {
    return fail('MixedAddressFamily', `Cannot supernet ${a} (${a.family}) with ${b} (${b.family})`);
  }

  if (a.contains(b)) return ok(a);
  if (b.contains(a)) return ok(b);

  if (a.prefixLength !== b.prefixLength) {
    return fail('PrefixLengthMismatch', `Cannot supernet ${a} with ${b}: prefix lengths differ`);
  }

  const [first, last] = a.networkValue < b.networkValue ? [a, b] : [b, a];
  if (first.broadcastValue + 1n !== last.networkValue) {
    return fail('NotAdjacent', `Cannot supernet ${first} with ${last}: networks are not adjacent`);
  }

  const merged = IPNetwork.fromIntegerResult(first.networkValue, first.family, first.prefixLength - 1);
  if (!merged.ok) return merged;

  // Adjacent blocks still have to share the shorter prefix's boundary
  if (merged.value.networkValue !== first.networkValue) {
    return fail('MisalignedBoundary', `Cannot supernet ${first} with ${last}: ${first} does not start a /${first.prefixLength - 1}`);
  }
  return merged;
}

export function supernetResult(a: IPNetwork, b: IPNetwork): Result<IPNetwork> {
  const result = mergePair(a, b);
  if (!result.ok) {
    Logger.debug(LOG_SOURCE, 'supernet:rejected', result.error.message, {
      networks: [a.toString(), b.toString()],
      code: result.error.code,
    });
  }
  return result;
}

/**
 * @throws {IPNetworkError} MixedAddressFamily, PrefixLengthMismatch, NotAdjacent or MisalignedBoundary
 */
export function supernet(a: IPNetwork, b: IPNetwork): IPNetwork {
  return unwrap(supernetResult(a, b));
}

export function trySupernet(a: IPNetwork, b: IPNetwork): IPNetwork | null {
  return orNull(supernetResult(a, b));
}

/**
 * Merge a list of networks into covering prefixes. Null entries are dropped.
 *
 * 192.168.0.0/24 + 192.168.1.0/24 + 192.168.2.0/24 + 192.168.3.0/24 = [192.168.0.0/22]
 */
export function supernetAll(networks: ReadonlyArray<MaybeNetwork>): IPNetwork[] {
  // Ascending, then reversed so the lowest network sits on top of the stack
  let stack = present(networks).sort(IPNetwork.compare).reverse();
  let merged: IPNetwork[] = [];
  let previousCount = 0;
  let currentCount = stack.length;
  let pass = 0;

  while (previousCount !== currentCount) {
    merged = [];
    let top = stack.pop();
    while (top !== undefined) {
      const next = stack.pop();
      if (next === undefined) {
        merged.push(top);
        break;
      }

      const result = mergePair(top, next);
      if (result.ok) {
        top = result.value;
      } else {
        merged.push(top);
        top = next;
      }
    }

    pass++;
    previousCount = currentCount;
    currentCount = merged.length;
    Logger.debug(LOG_SOURCE, 'supernet:pass', `Pass ${pass}: ${previousCount} -> ${currentCount} networks`, {
      pass,
      before: previousCount,
      after: currentCount,
    });
    stack = merged.slice();
  }

  Logger.debug(LOG_SOURCE, 'supernet:done', `Merged ${networks.length} entries into ${merged.length} networks`, {
    result: merged.map(network => network.toString()),
  });
  return merged;
}

export function wideSubnetResult(networks: ReadonlyArray<MaybeNetwork>): Result<IPNetwork> {
  const candidates = present(networks).sort(IPNetwork.compare);
  if (candidates.length === 0) {
    return fail('EmptyOrMissingInput', 'Cannot compute a wide subnet of no networks');
  }

  const lowest = candidates[0];
  const family = lowest.family;
  if (candidates.some(network => network.family !== family)) {
    return fail('MixedAddressFamily', 'Cannot compute a wide subnet across address families');
  }
  if (candidates.length === 1) {
    return ok(lowest);
  }

  const highest = candidates.reduce((max, network) => (network.broadcastValue > max ? network.broadcastValue : max), 0n);
  for (let prefixLength = lowest.prefixLength; prefixLength > 0; prefixLength--) {
    const wide = IPNetwork.fromIntegerResult(lowest.networkValue, family, prefixLength);
    if (!wide.ok) return wide;
    if (wide.value.broadcastValue >= highest) {
      return wide;
    }
  }
  return IPNetwork.fromIntegerResult(0n, family, 0);
}

/**
 * Smallest single prefix covering every given network
 *
 * @throws {IPNetworkError} EmptyOrMissingInput or MixedAddressFamily
 */
export function wideSubnet(networks: ReadonlyArray<MaybeNetwork>): IPNetwork {
  return unwrap(wideSubnetResult(networks));
}

export function tryWideSubnet(networks: ReadonlyArray<MaybeNetwork>): IPNetwork | null {
  return orNull(wideSubnetResult(networks));
}

/**
 * Smallest single prefix covering every address from `start` to `end`
 *
 * @throws {IPNetworkError} EmptyOrMissingInput, MalformedAddress or MixedAddressFamily
 */
export function wideSubnetFromRange(start: IPAddress | string, end: IPAddress | string): IPNetwork {
  const from = typeof start === 'string' ? IPAddress.parse(start) : start;
  const to = typeof end === 'string' ? IPAddress.parse(end) : end;
  const hosts = [from, to].map(address => IPNetwork.fromPrefix(address, bitWidth(address.family)));
  return wideSubnet(hosts);
}
