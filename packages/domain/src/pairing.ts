export const PAIRING_STATUSES = ['pending', 'active', 'expired', 'revoked'] as const;
export type PairingStatus = (typeof PAIRING_STATUSES)[number];

export type CredentialStatus = 'issued' | 'redeemed' | 'expired';

export interface Pairing {
  id: string;
  caregiverId: string;
  dependentRef: string;
  communityCode: string | null;
  timeZone: string;
  contactChain: string[];
  status: PairingStatus;
  createdAt: Date;
  expiresAt: Date | null;
  activatedAt: Date | null;
  revokedAt: Date | null;
}

export interface Credential {
  id: string;
  pairingId: string;
  codeHash: string;
  tokenHash: string;
  communityCode: string | null;
  status: CredentialStatus;
  expiresAt: Date;
  redeemedAt: Date | null;
  createdAt: Date;
}

export const PAIRING_TRANSITIONS: Readonly<Record<PairingStatus, readonly PairingStatus[]>> = {
  pending: ['active', 'expired', 'revoked'],
  active: ['revoked', 'expired'],
  expired: [],
  revoked: [],
};

export const CREDENTIAL_TRANSITIONS: Readonly<Record<CredentialStatus, readonly CredentialStatus[]>> = {
  issued: ['redeemed', 'expired'],
  redeemed: [],
  expired: [],
};

export function canTransitionPairing(from: PairingStatus, to: PairingStatus): boolean {
  return PAIRING_TRANSITIONS[from].includes(to);
}

export function canTransitionCredential(from: CredentialStatus, to: CredentialStatus): boolean {
  return CREDENTIAL_TRANSITIONS[from].includes(to);
}

/** Statuses from which `to` is reachable in one step. */
export function pairingSourcesFor(to: PairingStatus): PairingStatus[] {
  return PAIRING_STATUSES.filter((from) => canTransitionPairing(from, to));
}

export function isCredentialExpired(credential: Credential, now: Date): boolean {
  return credential.status === 'expired' || credential.expiresAt.getTime() <= now.getTime();
}

export function isCredentialRedeemed(credential: Credential): boolean {
  return credential.status === 'redeemed' || credential.redeemedAt !== null;
}

export const MAX_CONTACT_CHAIN = 10;
