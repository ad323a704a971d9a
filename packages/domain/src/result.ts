export type CareErrorKind =
  | 'INVALID_CODE'
  | 'EXPIRED_CODE'
  | 'ALREADY_REDEEMED'
  | 'LOCKED_OUT'
  | 'COMMUNITY_MISMATCH'
  | 'SCOPE_MISMATCH'
  | 'NOT_FOUND'
  | 'ALREADY_CLOSED'
  | 'ISSUANCE_COLLISION'
  | 'NOT_TERMINAL';

export interface CareError {
  kind: CareErrorKind;
  message: string;
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: CareError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T = never>(kind: CareErrorKind, message: string): Result<T> {
  return { ok: false, error: { kind, message } };
}

export type PublicRedemptionErrorKind = 'CODE_NOT_USABLE' | 'LOCKED_OUT';

/**
 * Collapses redemption failures for unauthenticated callers so that a missing,
 * expired, spent or out-of-scope code all look the same. Only the owning
 * caregiver sees the real credential state (see `PairingAuthority.describeCredential`).
 */
export function publicRedemptionError(kind: CareErrorKind): PublicRedemptionErrorKind {
  return kind === 'LOCKED_OUT' ? 'LOCKED_OUT' : 'CODE_NOT_USABLE';
}

/** Re-types a failure so it can be passed up from a differently typed call. */
export function propagate<T = never>(error: CareError): Result<T> {
  return { ok: false, error };
}
