/**
 * AddressEnumerator - lazy listing of a network's addresses
 *
 * @example
 * ```typescript
 * const hosts = listAddresses(parse('192.168.0.0/30'), 'usable');
 * hosts.count;                       // 2n
 * [...hosts].map(String);            // ['192.168.0.1', '192.168.0.2']
 * ```
 */

import { AddressRange } from '../collections/AddressRange';
import type { AddressFilter } from '../collections/AddressRange';
import type { IPNetwork } from '../value-objects/IPNetwork';

export function listAddresses(network: IPNetwork, filter: AddressFilter = 'all'): AddressRange {
  return new AddressRange(network, filter);
}
