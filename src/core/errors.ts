/**
 * Errors - failure taxonomy shared by every module
 *
 * Internal helpers return a Result; public throwing entry points unwrap it,
 * `try*` entry points turn a failure into `null`.
 */

export type IPNetworkErrorCode =
  | 'EmptyOrMissingInput'
  | 'MalformedAddress'
  | 'MalformedNetmask'
  | 'InvalidNetmask'
  | 'PrefixOutOfRange'
  | 'UnguessableLength'
  | 'MixedAddressFamily'
  | 'NotAdjacent'
  | 'MisalignedBoundary'
  | 'InvalidSplit'
  | 'InvalidFamily'
  | 'PrefixLengthMismatch'
  | 'IndexOutOfRange';

export class IPNetworkError extends Error {
  readonly code: IPNetworkErrorCode;

  constructor(code: IPNetworkErrorCode, message: string) {
    super(message);
    this.code = code;
    this.name = 'IPNetworkError';
  }

  toString(): string {
    return `${this.name} [${this.code}]: ${this.message}`;
  }
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: IPNetworkError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(code: IPNetworkErrorCode, message: string): Result<T> {
  return { ok: false, error: new IPNetworkError(code, message) };
}

/** Hard-stop form: raise the carried error */
export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

/** Recoverable form: absence instead of an error */
export function orNull<T>(result: Result<T>): T | null {
  return result.ok ? result.value : null;
}
