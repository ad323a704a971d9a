import { type Pairing } from './pairing';
import { fail, ok, type Result } from './result';
import { type PairingRepository } from './ports';

export type Actor =
  | { kind: 'caregiver'; caregiverId: string }
  | { kind: 'dependent'; pairingId: string }
  | { kind: 'system' };

export const SYSTEM_ACTOR: Actor = { kind: 'system' };

export function actorRef(actor: Actor): string {
  switch (actor.kind) {
    case 'caregiver':
      return `caregiver:${actor.caregiverId}`;
    case 'dependent':
      return `dependent:${actor.pairingId}`;
    case 'system':
      return 'system';
  }
}

/**
 * A caregiver who does not own the pairing gets NOT_FOUND, never a hint that
 * the pairing exists. A dependent session bound to another pairing is a scope
 * problem rather than a lookup miss.
 */
export function authorizePairing(actor: Actor, pairing: Pairing): Result<Pairing> {
  if (actor.kind === 'caregiver' && actor.caregiverId !== pairing.caregiverId) {
    return fail('NOT_FOUND', 'Pairing not found');
  }
  if (actor.kind === 'dependent' && actor.pairingId !== pairing.id) {
    return fail('SCOPE_MISMATCH', 'Session is not valid for this pairing');
  }
  return ok(pairing);
}

/** Loads a pairing and applies `authorizePairing`; a missing row is NOT_FOUND. */
export async function loadAuthorizedPairing<Tx>(
  repo: PairingRepository<Tx>,
  tx: Tx,
  actor: Actor,
  pairingId: string,
): Promise<Result<Pairing>> {
  const pairing = await repo.findById(tx, pairingId);
  if (!pairing) return fail('NOT_FOUND', 'Pairing not found');
  return authorizePairing(actor, pairing);
}
