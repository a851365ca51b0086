/**
 * Error Handling Utilities
 *
 * Type-safe helpers for `catch (e: unknown)` plus the typed error and result
 * contract shared by the credential pipeline and the relay client.
 */

/**
 * Failure categories surfaced by the bridge.
 *
 * - NetworkFailure: transport or HTTP-level failure
 * - ProtocolError: response arrived but had an unexpected shape
 * - AuthRequired: no usable credential and interactive sign-in is not allowed
 * - AuthDeclinedOrExpired: the device-code prompt was declined, ignored or timed out
 * - NotConnected: send attempted without an open relay connection
 * - PersistenceDegraded: the token cache could not be read or written durably
 */
export type ErrorKind =
  | 'NetworkFailure'
  | 'ProtocolError'
  | 'AuthRequired'
  | 'AuthDeclinedOrExpired'
  | 'NotConnected'
  | 'PersistenceDegraded';

export class BridgeError extends Error {
  public readonly kind: ErrorKind;
  public readonly status?: number;

  constructor(kind: ErrorKind, message: string, options?: { status?: number; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'BridgeError';
    this.kind = kind;
    this.status = options?.status;
  }
}

export function isBridgeError(e: unknown, kind?: ErrorKind): e is BridgeError {
  return e instanceof BridgeError && (kind === undefined || e.kind === kind);
}

/** Tagged result returned by every pipeline operation */
export type AuthResult<T> = { success: true; value: T } | { success: false; error: BridgeError };

export function ok<T>(value: T): AuthResult<T> {
  return { success: true, value };
}

export function fail<T = never>(kind: ErrorKind, message: string, options?: { status?: number; cause?: unknown }): AuthResult<T> {
  return { success: false, error: new BridgeError(kind, message, options) };
}

/**
 * Check if a value is a Node.js ErrnoException
 */
export function isNodeError(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && 'code' in e;
}

/**
 * Extract a human-readable error message from an unknown error.
 * Safe to use with `catch (e: unknown)`.
 */
export function toErrorMessage(e: unknown): string {
  if (e instanceof Error) {
    return e.message;
  }
  if (typeof e === 'string') {
    return e;
  }
  if (e && typeof e === 'object' && 'message' in e && typeof e.message === 'string') {
    return e.message;
  }
  return String(e);
}

/**
 * Check if an error has a specific code (common for Node.js errors)
 */
export function hasErrorCode(e: unknown, code: string): boolean {
  return isNodeError(e) && e.code === code;
}

export function isNotFoundError(e: unknown): boolean {
  return hasErrorCode(e, 'ENOENT');
}
