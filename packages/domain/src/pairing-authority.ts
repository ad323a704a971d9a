import {
  type Credential,
  type CredentialStatus,
  type Pairing,
  isCredentialExpired,
  pairingSourcesFor,
  MAX_CONTACT_CHAIN,
} from './pairing';
import {
  type AuditSink,
  type Clock,
  type CredentialRepository,
  type CredentialSecrets,
  type DomainLogger,
  type PairingRepository,
  type WithTransaction,
} from './ports';
import { fail, ok, type Result } from './result';

export const MAX_ISSUANCE_ATTEMPTS = 20;
const DEFAULT_EXPIRY_BATCH_SIZE = 100;

export interface PairingAuthorityDeps<Tx> {
  pairingRepo: PairingRepository<Tx>;
  credentialRepo: CredentialRepository<Tx>;
  secrets: CredentialSecrets;
  audit: AuditSink<Tx>;
  clock: Clock;
  generateId: () => string;
  withTransaction: WithTransaction<Tx>;
  defaultTimeZone: string;
  logger?: DomainLogger;
  expiryBatchSize?: number;
}

export interface CreatePairingOptions {
  ttlMs: number;
  communityCode?: string | null;
  timeZone?: string;
  contactChain?: string[];
}

/** Plaintext secrets are handed back exactly once, here. */
export interface IssuedPairing {
  pairing: Pairing;
  credentialId: string;
  shortCode: string;
  linkToken: string;
  expiresAt: Date;
}

export interface CredentialView {
  status: CredentialStatus;
  expiresAt: Date;
  redeemedAt: Date | null;
  createdAt: Date;
}

export class PairingAuthority<Tx> {
  constructor(private readonly deps: PairingAuthorityDeps<Tx>) {}

  async createPairing(
    caregiverId: string,
    dependentRef: string,
    opts: CreatePairingOptions,
  ): Promise<Result<IssuedPairing>> {
    const { pairingRepo, credentialRepo, secrets, audit, clock, generateId } = this.deps;

    try {
      return await this.deps.withTransaction(async (tx) => {
        const now = clock.now();

        let attempts = 0;
        const pickCode = async (): Promise<IssuanceCode | null> => {
          while (attempts < MAX_ISSUANCE_ATTEMPTS) {
            attempts++;
            const shortCode = secrets.generateShortCode();
            const codeHash = secrets.hash(shortCode);
            if (!(await credentialRepo.existsUnexpiredWithCodeHash(tx, codeHash, now))) {
              return { shortCode, codeHash };
            }
          }
          return null;
        };

        const first = await pickCode();
        if (!first) {
          return fail<IssuedPairing>('ISSUANCE_COLLISION', 'Could not issue a unique pairing code');
        }

        const linkToken = secrets.generateLinkToken();
        const expiresAt = new Date(now.getTime() + opts.ttlMs);
        const communityCode = opts.communityCode ?? null;

        const pairing = await pairingRepo.create(tx, {
          id: generateId(),
          caregiverId,
          dependentRef,
          communityCode,
          timeZone: opts.timeZone ?? this.deps.defaultTimeZone,
          contactChain: normalizeContacts(opts.contactChain ?? [caregiverId]),
          expiresAt,
        });

        // A concurrent issuance can take the code between the check and the insert.
        const { credential, shortCode } = await this.insertCredential(first, pickCode, (code) =>
          credentialRepo.create(tx, {
            id: generateId(),
            pairingId: pairing.id,
            codeHash: code.codeHash,
            tokenHash: secrets.hash(linkToken),
            communityCode,
            expiresAt,
          }),
        );

        await audit.record(tx, {
          actor: `caregiver:${caregiverId}`,
          action: 'pairing_created',
          resourceRef: `pairing:${pairing.id}`,
          timestamp: now,
          metadata: { credentialId: credential.id, communityCode },
        });

        return ok({ pairing, credentialId: credential.id, shortCode, linkToken, expiresAt });
      });
    } catch (err) {
      if (err instanceof IssuanceCollisionError) {
        return fail<IssuedPairing>('ISSUANCE_COLLISION', 'Could not issue a unique pairing code');
      }
      throw err;
    }
  }

  async revokePairing(pairingId: string, actingCaregiverId: string): Promise<Result<Pairing>> {
    const { pairingRepo, credentialRepo, audit, clock } = this.deps;

    return this.deps.withTransaction(async (tx) => {
      const pairing = await pairingRepo.findById(tx, pairingId);
      if (!pairing || pairing.caregiverId !== actingCaregiverId) {
        return fail<Pairing>('NOT_FOUND', 'Pairing not found');
      }
      if (pairing.status === 'revoked' || pairing.status === 'expired') {
        return ok(pairing);
      }

      const now = clock.now();
      const revoked = await pairingRepo.transition(tx, pairingId, pairingSourcesFor('revoked'), 'revoked', now);
      if (!revoked) {
        const current = await pairingRepo.findById(tx, pairingId);
        return current ? ok(current) : fail<Pairing>('NOT_FOUND', 'Pairing not found');
      }

      if (pairing.status === 'pending') {
        const credential = await credentialRepo.findLatestForPairing(tx, pairingId);
        if (credential && credential.status === 'issued') {
          await credentialRepo.markExpired(tx, credential.id);
        }
      }

      await audit.record(tx, {
        actor: `caregiver:${actingCaregiverId}`,
        action: 'pairing_revoked',
        resourceRef: `pairing:${pairingId}`,
        timestamp: now,
        metadata: { previousStatus: pairing.status },
      });

      return ok(revoked);
    });
  }

  /**
   * Expires issued credentials that ran past their expiry, together with the
   * pending pairing they would have activated. Each credential is handled in
   * its own transaction, so an interrupted sweep simply resumes next tick.
   */
  async expirePendingCredentials(now: Date): Promise<{ expired: number; failed: number }> {
    const { pairingRepo, credentialRepo, audit } = this.deps;
    const batchSize = this.deps.expiryBatchSize ?? DEFAULT_EXPIRY_BATCH_SIZE;
    const failedIds = new Set<string>();
    let expired = 0;

    for (;;) {
      const batch = await this.deps.withTransaction((tx) => credentialRepo.listExpirable(tx, now, batchSize));
      let changedInBatch = 0;

      for (const credential of batch) {
        if (failedIds.has(credential.id)) continue;
        try {
          const changed = await this.deps.withTransaction(async (tx) => {
            if (!(await credentialRepo.markExpired(tx, credential.id))) return false;
            await pairingRepo.transition(tx, credential.pairingId, ['pending'], 'expired', now);
            await audit.record(tx, {
              actor: 'system',
              action: 'credential_expired',
              resourceRef: `credential:${credential.id}`,
              timestamp: now,
              metadata: { pairingId: credential.pairingId },
            });
            return true;
          });
          if (changed) changedInBatch++;
        } catch (err) {
          failedIds.add(credential.id);
          this.deps.logger?.error(
            { credentialId: credential.id, err: err instanceof Error ? err.message : String(err) },
            'Credential expiry failed',
          );
        }
      }

      expired += changedInBatch;
      if (batch.length < batchSize || changedInBatch === 0) break;
    }

    return { expired, failed: failedIds.size };
  }

  private async insertCredential(
    first: IssuanceCode,
    pickCode: () => Promise<IssuanceCode | null>,
    insert: (code: IssuanceCode) => Promise<Credential | null>,
  ): Promise<{ credential: Credential; shortCode: string }> {
    for (let code: IssuanceCode | null = first; code; code = await pickCode()) {
      const credential = await insert(code);
      if (credential) return { credential, shortCode: code.shortCode };
    }
    throw new IssuanceCollisionError();
  }

  async setContactChain(
    pairingId: string,
    caregiverId: string,
    contacts: string[],
  ): Promise<Result<Pairing>> {
    const { pairingRepo, audit, clock } = this.deps;

    return this.deps.withTransaction(async (tx) => {
      const pairing = await pairingRepo.findById(tx, pairingId);
      if (!pairing || pairing.caregiverId !== caregiverId) {
        return fail<Pairing>('NOT_FOUND', 'Pairing not found');
      }

      const contactChain = normalizeContacts(contacts);
      await pairingRepo.updateContactChain(tx, pairingId, contactChain);
      await audit.record(tx, {
        actor: `caregiver:${caregiverId}`,
        action: 'contact_chain_updated',
        resourceRef: `pairing:${pairingId}`,
        timestamp: clock.now(),
        metadata: { contactCount: contactChain.length },
      });

      return ok({ ...pairing, contactChain });
    });
  }

  async listPairings(caregiverId: string): Promise<Pairing[]> {
    return this.deps.withTransaction((tx) => this.deps.pairingRepo.listByCaregiver(tx, caregiverId));
  }

  /** Owner-only view of the real credential state behind a pairing. */
  async describeCredential(pairingId: string, caregiverId: string): Promise<Result<CredentialView>> {
    const { pairingRepo, credentialRepo, clock } = this.deps;

    return this.deps.withTransaction(async (tx) => {
      const pairing = await pairingRepo.findById(tx, pairingId);
      if (!pairing || pairing.caregiverId !== caregiverId) {
        return fail<CredentialView>('NOT_FOUND', 'Pairing not found');
      }
      const credential = await credentialRepo.findLatestForPairing(tx, pairingId);
      if (!credential) {
        return fail<CredentialView>('NOT_FOUND', 'Credential not found');
      }
      return ok(toCredentialView(credential, clock.now()));
    });
  }
}

interface IssuanceCode {
  shortCode: string;
  codeHash: string;
}

/** Every candidate code was taken; thrown so the pairing insert rolls back. */
class IssuanceCollisionError extends Error {
  constructor() {
    super('Could not issue a unique pairing code');
    this.name = 'IssuanceCollisionError';
  }
}

function toCredentialView(credential: Credential, now: Date): CredentialView {
  const status: CredentialStatus =
    credential.status === 'issued' && isCredentialExpired(credential, now) ? 'expired' : credential.status;
  return {
    status,
    expiresAt: credential.expiresAt,
    redeemedAt: credential.redeemedAt,
    createdAt: credential.createdAt,
  };
}

export function normalizeContacts(contacts: string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of contacts) {
    const contact = raw.trim();
    if (!contact || seen.has(contact)) continue;
    seen.add(contact);
    result.push(contact);
  }
  return result.slice(0, MAX_CONTACT_CHAIN);
}
