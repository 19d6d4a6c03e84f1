/**
 * SubnetService - split a network into equal children
 *
 * Subnet 192.168.0.0/24 into /25 gives 192.168.0.0/25, 192.168.0.128/25.
 * Subnet 10.0.0.0/8 into /9 gives 10.0.0.0/9, 10.128.0.0/9.
 */

import { Logger } from '@/core/Logger';
import { fail, ok, orNull, unwrap } from '@/core/errors';
import type { Result } from '@/core/errors';
import { NetworkRange } from '../collections/NetworkRange';
import type { IPNetwork } from '../value-objects/IPNetwork';

const LOG_SOURCE = 'subnet';

export function subnetResult(parent: IPNetwork, prefixLength: number): Result<NetworkRange> {
  let result: Result<NetworkRange>;
  if (!Number.isInteger(prefixLength) || prefixLength < parent.prefixLength || prefixLength > parent.bitWidth) {
    result = fail(
      'InvalidSplit',
      `Cannot split ${parent} into /${prefixLength}: length must be between ${parent.prefixLength} and ${parent.bitWidth}`,
    );
  } else {
    result = ok(new NetworkRange(parent, prefixLength));
  }

  if (!result.ok) {
    Logger.debug(LOG_SOURCE, 'subnet:rejected', result.error.message, {
      network: parent.toString(),
      prefixLength,
    });
  }
  return result;
}

/**
 * Lazy sequence of the 2^(prefixLength - parent.prefixLength) children
 *
 * @throws {IPNetworkError} InvalidSplit
 */
export function subnet(parent: IPNetwork, prefixLength: number): NetworkRange {
  return unwrap(subnetResult(parent, prefixLength));
}

export function trySubnet(parent: IPNetwork, prefixLength: number): NetworkRange | null {
  return orNull(subnetResult(parent, prefixLength));
}
