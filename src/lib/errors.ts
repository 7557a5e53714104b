/**
 * Directory error classes with protocol result codes
 *
 * Every failure an operation can report is one of the kinds below. Inside the
 * library, parsers throw these errors; at the operation boundary they are
 * converted into an {@link Outcome} so callers handle them explicitly.
 */

export enum ErrorKind {
  InvalidDnSyntax = 'invalidDnSyntax',
  NoSuchObject = 'noSuchObject',
  AlreadyExists = 'alreadyExists',
  ProtocolError = 'protocolError',
  InvalidCredentials = 'invalidCredentials',
  InvalidFilter = 'invalidFilter',
  UnsupportedFilter = 'unsupportedFilter',
  SeedRequired = 'seedRequired',
  InvalidArgument = 'invalidArgument',
}

/**
 * Base directory error with its LDAP result code
 */
export class LdapError extends Error {
  constructor(
    message: string,
    public readonly kind: ErrorKind,
    public readonly code: number = 80
  ) {
    super(message);
    this.name = 'LdapError';
  }
}

export class InvalidDnSyntaxError extends LdapError {
  constructor(public readonly dn: string) {
    super(`Invalid DN syntax: "${dn}"`, ErrorKind.InvalidDnSyntax, 34);
    this.name = 'InvalidDnSyntaxError';
  }
}

export class NoSuchObjectError extends LdapError {
  constructor(public readonly dn: string) {
    super(`No such object: "${dn}"`, ErrorKind.NoSuchObject, 32);
    this.name = 'NoSuchObjectError';
  }
}

export class AlreadyExistsError extends LdapError {
  constructor(public readonly dn: string) {
    super(`Entry already exists: "${dn}"`, ErrorKind.AlreadyExists, 68);
    this.name = 'AlreadyExistsError';
  }
}

export class ProtocolError extends LdapError {
  constructor(message = 'Protocol error') {
    super(message, ErrorKind.ProtocolError, 2);
    this.name = 'ProtocolError';
  }
}

// Keeps the attempted identity for diagnostics
export class InvalidCredentialsError extends LdapError {
  constructor(
    public readonly who: string,
    public readonly cred: string
  ) {
    super(`${who}:${cred}`, ErrorKind.InvalidCredentials, 49);
    this.name = 'InvalidCredentialsError';
  }
}

export class InvalidFilterError extends LdapError {
  constructor(
    public readonly filter: string,
    reason: string
  ) {
    super(`Bad search filter "${filter}": ${reason}`, ErrorKind.InvalidFilter, 87);
    this.name = 'InvalidFilterError';
  }
}

export class UnsupportedFilterError extends LdapError {
  constructor(public readonly operator: string) {
    super(
      `Unsupported filter operation: ${operator}`,
      ErrorKind.UnsupportedFilter,
      53
    );
    this.name = 'UnsupportedFilterError';
  }
}

export class SeedRequiredError extends LdapError {
  constructor(
    public readonly method: string,
    public readonly args: readonly unknown[],
    public readonly reason: LdapError
  ) {
    super(
      `Seed required for ${method}: ${reason.message}`,
      ErrorKind.SeedRequired,
      53
    );
    this.name = 'SeedRequiredError';
  }
}

export class InvalidArgumentError extends LdapError {
  constructor(message: string) {
    super(message, ErrorKind.InvalidArgument, 0);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Result of an operation: either a value or the error that prevented it
 */
export type Outcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: LdapError };

export const success = <T>(value: T): Outcome<T> => ({ ok: true, value });

export const failure = <T = never>(error: LdapError): Outcome<T> => ({
  ok: false,
  error,
});

// Runs fn and converts a thrown LdapError into a failed outcome
export const attempt = <T>(fn: () => T): Outcome<T> => {
  try {
    return success(fn());
  } catch (err) {
    if (err instanceof LdapError) return failure(err);
    throw err;
  }
};

export const unwrap = <T>(outcome: Outcome<T>): T => {
  if (!outcome.ok) throw outcome.error;
  return outcome.value;
};
