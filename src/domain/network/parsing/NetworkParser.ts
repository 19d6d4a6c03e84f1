/**
 * NetworkParser - recognises the textual forms of a network
 *
 * Accepted forms:
 *   "192.168.168.100/24"            address and length, slash separated
 *   "192.168.168.100 24"            address and length, space separated
 *   "192.168.168.100 255.255.255.0" address and netmask
 *   "192.168.168.100 - 255.255.255.0" (with sanitizing)
 *   "10.0.0.1"                      length supplied by the CidrGuess strategy
 *   parse("10.0.0.1", "255.0.0.0")  explicit netmask
 *   parse("10.0.0.1", 8)            explicit length
 *
 * Every entry point has a throwing form and a `try*` form that returns
 * null; both run the same recognition and log failures under "parser".
 *
 * @example
 * ```typescript
 * const parser = new NetworkParser({ cidrGuess: ClassLessCidrGuess });
 * parser.parse('10.0.0.1').toString(); // '10.0.0.1/32'
 * parser.tryParse('not a network');    // null
 * ```
 */

import { Logger } from '@/core/Logger';
import { fail, orNull, unwrap } from '@/core/errors';
import type { Result } from '@/core/errors';
import { IPAddress } from '../value-objects/IPAddress';
import { IPNetwork } from '../value-objects/IPNetwork';
import { ClassFullCidrGuess } from './CidrGuess';
import type { CidrGuess } from './CidrGuess';

/**
 * Parser configuration
 */
export interface ParseOptions {
  /** Strip characters outside [0-9a-fA-F./: ], collapse whitespace, trim */
  sanitize?: boolean;
  cidrGuess?: CidrGuess;
}

export const DEFAULT_PARSE_OPTIONS: Readonly<Required<ParseOptions>> = {
  sanitize: true,
  cidrGuess: ClassFullCidrGuess,
};

const LOG_SOURCE = 'parser';
const SMALL_INTEGER = /^\d{1,3}$/;
const UNSANITARY = /[^0-9a-fA-F./\s:]+/g;
const SEPARATOR = /[\s/]/;

export class NetworkParser {
  private readonly sanitize: boolean;
  private readonly cidrGuess: CidrGuess;

  constructor(options: ParseOptions = {}) {
    this.sanitize = options.sanitize ?? DEFAULT_PARSE_OPTIONS.sanitize;
    this.cidrGuess = options.cidrGuess ?? DEFAULT_PARSE_OPTIONS.cidrGuess;
  }

  /**
   * @throws {IPNetworkError} EmptyOrMissingInput, MalformedAddress, MalformedNetmask,
   * InvalidNetmask, MixedAddressFamily, UnguessableLength or PrefixOutOfRange
   */
  parse(network: string): IPNetwork;
  parse(address: string, netmask: string): IPNetwork;
  parse(address: string, prefixLength: number): IPNetwork;
  parse(input: string, second?: string | number): IPNetwork {
    return unwrap(this.parseResult(input, second));
  }

  tryParse(network: string | null | undefined): IPNetwork | null;
  tryParse(address: string | null | undefined, netmask: string | null): IPNetwork | null;
  tryParse(address: string | null | undefined, prefixLength: number): IPNetwork | null;
  tryParse(input: string | null | undefined, second?: string | number | null): IPNetwork | null {
    return orNull(this.parseResult(input, second));
  }

  parseResult(input: string | null | undefined, second?: string | number | null): Result<IPNetwork> {
    let result: Result<IPNetwork>;
    if (second === undefined) {
      result = this.recognize(input);
    } else if (typeof second === 'number') {
      result = this.withPrefix(input, second);
    } else {
      result = this.withNetmask(input, second);
    }

    if (!result.ok) {
      Logger.debug(LOG_SOURCE, 'parse:failed', result.error.message, {
        input: input ?? null,
        code: result.error.code,
      });
    }
    return result;
  }

  private recognize(input: string | null | undefined): Result<IPNetwork> {
    if (!input) {
      return fail('EmptyOrMissingInput', 'Network cannot be empty');
    }

    let text = input;
    if (this.sanitize) {
      text = text.replace(UNSANITARY, '').replace(/\s{2,}/g, ' ').trim();
    }

    let tokens = text.split(SEPARATOR);
    if (this.sanitize) {
      tokens = tokens.filter(token => token !== '');
    }

    if (tokens.length === 0) {
      return fail('EmptyOrMissingInput', `Network '${input}' contains no address`);
    }

    if (tokens.length === 1) {
      return this.withGuess(tokens[0]);
    }

    if (tokens.length > 2) {
      return fail('MalformedNetmask', `Unexpected trailing input in '${input}'`);
    }

    const [address, second] = tokens;
    if (SMALL_INTEGER.test(second) && parseInt(second, 10) <= 255) {
      return this.withPrefix(address, parseInt(second, 10));
    }
    return this.withNetmask(address, second);
  }

  private withGuess(address: string): Result<IPNetwork> {
    const ip = this.address(address);
    if (!ip.ok) return ip;

    const prefixLength = this.cidrGuess.tryGuessCidr(address);
    if (prefixLength === null) {
      return fail('UnguessableLength', `Cannot guess a prefix length for '${address}'`);
    }
    return IPNetwork.fromIntegerResult(ip.value.value, ip.value.family, prefixLength);
  }

  private withPrefix(address: string | null | undefined, prefixLength: number): Result<IPNetwork> {
    const ip = this.address(address);
    if (!ip.ok) return ip;
    return IPNetwork.fromIntegerResult(ip.value.value, ip.value.family, prefixLength);
  }

  private withNetmask(address: string | null | undefined, netmask: string | null | undefined): Result<IPNetwork> {
    const ip = this.address(address);
    if (!ip.ok) return ip;

    if (!netmask) {
      return fail('EmptyOrMissingInput', 'Netmask cannot be empty');
    }
    return IPNetwork.fromNetmaskResult(ip.value, netmask);
  }

  private address(address: string | null | undefined): Result<IPAddress> {
    if (!address) {
      return fail('EmptyOrMissingInput', 'Address cannot be empty');
    }
    const ip = IPAddress.parseResult(address);
    if (!ip.ok) {
      return fail('MalformedAddress', ip.error.message);
    }
    return ip;
  }
}

const defaultParser = new NetworkParser();

/**
 * Parse with the default options (sanitizing, classful guess)
 */
export function parse(network: string): IPNetwork;
export function parse(address: string, netmask: string): IPNetwork;
export function parse(address: string, prefixLength: number): IPNetwork;
export function parse(input: string, second?: string | number): IPNetwork {
  return unwrap(defaultParser.parseResult(input, second));
}

export function tryParse(network: string | null | undefined): IPNetwork | null;
export function tryParse(address: string | null | undefined, netmask: string | null): IPNetwork | null;
export function tryParse(address: string | null | undefined, prefixLength: number): IPNetwork | null;
export function tryParse(input: string | null | undefined, second?: string | number | null): IPNetwork | null {
  return orNull(defaultParser.parseResult(input, second));
}

/** `address/prefixLength`, the form `parse` reads back losslessly */
export function toCanonicalString(network: IPNetwork): string {
  return network.toString();
}
