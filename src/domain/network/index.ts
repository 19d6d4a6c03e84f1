/**
 * Domain Network - Unified export
 *
 * Address codec, prefix math, the IPNetwork value type, parsing,
 * subnetting, supernetting and address enumeration
 */

// Families and codec
export { IPV4_BITS, IPV6_BITS, isAddressFamily, compareFamilies } from './AddressFamily';
export type { AddressFamily } from './AddressFamily';
export {
  parseAddressText,
  formatAddress,
  toInteger,
  tryToInteger,
  fromInteger,
  truncate,
  toBytes,
  fromBytes,
} from './AddressCodec';
export type { RawAddress } from './AddressCodec';

// Prefix math
export {
  bitWidth,
  familyMask,
  isValidPrefixLength,
  netmask,
  tryNetmask,
  cidrFromNetmask,
  tryCidrFromNetmask,
  isValidNetmask,
  bitsSet,
  broadcast,
  wildcard,
  totalCount,
  usableCount,
  tryParsePrefixLength,
} from './PrefixMath';

// Value objects
export { IPAddress } from './value-objects/IPAddress';
export { IPNetwork } from './value-objects/IPNetwork';

// Parsing
export { ClassFullCidrGuess, ClassLessCidrGuess } from './parsing/CidrGuess';
export type { CidrGuess } from './parsing/CidrGuess';
export { NetworkParser, DEFAULT_PARSE_OPTIONS, parse, tryParse, toCanonicalString } from './parsing/NetworkParser';
export type { ParseOptions } from './parsing/NetworkParser';
export { serializeNetwork, deserializeNetwork } from './parsing/serialization';
export type { SerializedNetwork } from './parsing/serialization';

// Collections
export { NetworkRange } from './collections/NetworkRange';
export { AddressRange } from './collections/AddressRange';
export type { AddressFilter } from './collections/AddressRange';

// Services
export { subnet, trySubnet } from './services/SubnetService';
export {
  supernet,
  trySupernet,
  supernetAll,
  wideSubnet,
  tryWideSubnet,
  wideSubnetFromRange,
} from './services/SupernetService';
export { listAddresses } from './services/AddressEnumerator';
export {
  IANA_ABLK_RESERVED,
  IANA_BBLK_RESERVED,
  IANA_CBLK_RESERVED,
  isIANAReserved,
} from './services/ReservedRanges';
