import { type AttemptGuard } from './attempt-guard';
import { type Credential, type Pairing, isCredentialExpired, isCredentialRedeemed } from './pairing';
import {
  type AuditSink,
  type Clock,
  type CredentialRepository,
  type CredentialSecrets,
  type DomainLogger,
  type PairingRepository,
  type WithTransaction,
} from './ports';
import { type CareErrorKind, fail, ok, type Result } from './result';

export type PresentedSecret =
  | { kind: 'short_code'; code: string }
  | { kind: 'link_token'; token: string };

export interface RedemptionScope {
  communityCode?: string | null;
}

export interface RedemptionGateDeps<Tx> {
  pairingRepo: PairingRepository<Tx>;
  credentialRepo: CredentialRepository<Tx>;
  secrets: CredentialSecrets;
  guard: AttemptGuard;
  audit: AuditSink<Tx>;
  clock: Clock;
  withTransaction: WithTransaction<Tx>;
  logger?: DomainLogger;
}

interface Attempt {
  result: Result<Pairing>;
  /** False only for the compare-and-set loser, which presented a real code. */
  countsAsGuess: boolean;
}

export function normalizeSecret(presented: PresentedSecret): string {
  return presented.kind === 'short_code' ? presented.code.replace(/\s+/g, '') : presented.token.trim();
}

export class RedemptionGate<Tx> {
  constructor(private readonly deps: RedemptionGateDeps<Tx>) {}

  async redeem(
    presented: PresentedSecret,
    contextKey: string,
    scope: RedemptionScope = {},
  ): Promise<Result<Pairing>> {
    const { guard, secrets, clock } = this.deps;
    const now = clock.now();
    const keyHash = guard.keyFor(contextKey);

    if ((await guard.check(keyHash, now)) === 'locked') {
      return fail('LOCKED_OUT', 'Too many failed attempts');
    }

    const secretHash = secrets.hash(normalizeSecret(presented));
    let attempt: Attempt;
    try {
      attempt = await this.deps.withTransaction((tx) => this.attempt(tx, presented.kind, secretHash, scope, now));
    } catch (err) {
      if (!(err instanceof CredentialLostError)) throw err;
      this.deps.logger?.warn({ credentialId: err.credentialId }, 'Credential changed during redemption');
      attempt = { result: fail('EXPIRED_CODE', 'Credential expired'), countsAsGuess: false };
    }

    if (!attempt.result.ok) {
      if (attempt.countsAsGuess) {
        const verdict = await guard.recordFailure(keyHash, now);
        if (verdict === 'locked') {
          this.deps.logger?.warn({ keyHash, via: presented.kind }, 'Redemption key locked out');
        }
      }
      return attempt.result;
    }

    await guard.reset(keyHash);
    return attempt.result;
  }

  private async attempt(
    tx: Tx,
    via: PresentedSecret['kind'],
    secretHash: string,
    scope: RedemptionScope,
    now: Date,
  ): Promise<Attempt> {
    const { credentialRepo, pairingRepo, audit } = this.deps;

    const credential =
      via === 'short_code'
        ? await credentialRepo.findByCodeHash(tx, secretHash)
        : await credentialRepo.findByTokenHash(tx, secretHash);
    if (!credential) {
      return rejected('INVALID_CODE', 'No matching credential');
    }
    if (isCredentialExpired(credential, now)) {
      return rejected('EXPIRED_CODE', 'Credential expired');
    }
    if (isCredentialRedeemed(credential)) {
      return rejected('ALREADY_REDEEMED', 'Credential already redeemed');
    }

    const pairing = await pairingRepo.findById(tx, credential.pairingId);
    if (pairing?.status === 'active') {
      return lostRace();
    }
    if (!pairing || pairing.status !== 'pending') {
      return rejected('INVALID_CODE', 'Pairing is no longer pending');
    }
    if (!communityMatches(credential, scope)) {
      return rejected('COMMUNITY_MISMATCH', 'Credential is scoped to another community');
    }

    // The pairing transition is the compare-and-set; nothing is written before it.
    const active = await pairingRepo.transition(tx, pairing.id, ['pending'], 'active', now);
    if (!active) {
      const current = await pairingRepo.findById(tx, pairing.id);
      if (current?.status === 'active') {
        return lostRace();
      }
      return rejected('INVALID_CODE', 'Pairing is no longer pending');
    }

    if (!(await credentialRepo.markRedeemed(tx, credential.id, now))) {
      throw new CredentialLostError(credential.id);
    }

    await audit.record(tx, {
      actor: `dependent:${active.id}`,
      action: 'credential_redeemed',
      resourceRef: `credential:${credential.id}`,
      timestamp: now,
      metadata: { pairingId: active.id, via },
    });

    return { result: ok(active), countsAsGuess: false };
  }
}

/** Aborts the redemption transaction so the pairing activation rolls back. */
class CredentialLostError extends Error {
  constructor(readonly credentialId: string) {
    super(`Credential ${credentialId} was no longer redeemable`);
    this.name = 'CredentialLostError';
  }
}

function rejected(kind: CareErrorKind, message: string): Attempt {
  return { result: fail(kind, message), countsAsGuess: true };
}

function lostRace(): Attempt {
  return { result: fail('ALREADY_REDEEMED', 'Credential already redeemed'), countsAsGuess: false };
}

function communityMatches(credential: Credential, scope: RedemptionScope): boolean {
  if (!scope.communityCode) return true;
  return credential.communityCode === scope.communityCode;
}
