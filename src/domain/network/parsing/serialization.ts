/**
 * Persistence helpers: a network is stored as its canonical string under
 * the "IPNetwork" member, e.g. {"IPNetwork":"10.0.0.0/8"}.
 */

import { IPNetworkError } from '@/core/errors';
import type { IPNetwork } from '../value-objects/IPNetwork';
import { parse, toCanonicalString } from './NetworkParser';

export interface SerializedNetwork {
  IPNetwork: string;
}

export function serializeNetwork(network: IPNetwork): string {
  const payload: SerializedNetwork = { IPNetwork: toCanonicalString(network) };
  return JSON.stringify(payload);
}

function isSerializedNetwork(value: unknown): value is SerializedNetwork {
  return typeof value === 'object'
    && value !== null
    && 'IPNetwork' in value
    && typeof value.IPNetwork === 'string';
}

/**
 * @throws {SyntaxError} if the text is not JSON
 * @throws {IPNetworkError} if the payload has no network or it does not parse
 */
export function deserializeNetwork(json: string): IPNetwork {
  const payload: unknown = JSON.parse(json);
  if (!isSerializedNetwork(payload)) {
    throw new IPNetworkError('EmptyOrMissingInput', 'Serialized network must carry an "IPNetwork" string');
  }
  return parse(payload.IPNetwork);
}
