/**
 * Error kinds raised while resolving and refreshing credentials
 */

export type CredentialErrorKind =
  | 'absent'
  | 'corrupt'
  | 'io'
  | 'not_found'
  | 'remote'
  | 'refresh_failed'
  | 'auth_exchange_failed'
  | 'credential_unavailable';

export abstract class CredentialError extends Error {
  abstract readonly kind: CredentialErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Local document does not exist yet
 */
export class AbsentError extends CredentialError {
  readonly kind = 'absent';
}

/**
 * Local document exists but does not parse
 */
export class CorruptError extends CredentialError {
  readonly kind = 'corrupt';
}

/**
 * Any other filesystem failure
 */
export class IOError extends CredentialError {
  readonly kind = 'io';
}

/**
 * Logical key missing from the secret store listing
 */
export class NotFoundError extends CredentialError {
  readonly kind = 'not_found';
}

export class RemoteError extends CredentialError {
  readonly kind = 'remote';
}

export class RefreshFailedError extends CredentialError {
  readonly kind = 'refresh_failed';
}

export class AuthExchangeFailedError extends CredentialError {
  readonly kind = 'auth_exchange_failed';
}

/**
 * No path to the application identity: the process cannot proceed
 */
export class CredentialUnavailableError extends CredentialError {
  readonly kind = 'credential_unavailable';
}

export function isCredentialError(error: unknown, kind?: CredentialErrorKind): error is CredentialError {
  return error instanceof CredentialError && (kind === undefined || error.kind === kind);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
