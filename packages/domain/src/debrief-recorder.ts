import { type Actor, actorRef, loadAuthorizedPairing } from './actor';
import { type Debrief, type DebriefInput } from './debrief';
import { type EscalationCoordinator } from './escalation-coordinator';
import { type EscalationEpisode, isEpisodeClosed, isEpisodeTerminal } from './escalation';
import {
  type AuditSink,
  type Clock,
  type DebriefRepository,
  type EscalationRepository,
  type PairingRepository,
  type WithTransaction,
} from './ports';
import { fail, ok, propagate, type Result } from './result';

export interface DebriefRecorderDeps<Tx> {
  debriefRepo: DebriefRepository<Tx>;
  episodeRepo: EscalationRepository<Tx>;
  pairingRepo: PairingRepository<Tx>;
  coordinator: EscalationCoordinator<Tx>;
  audit: AuditSink<Tx>;
  clock: Clock;
  generateId: () => string;
  withTransaction: WithTransaction<Tx>;
}

/**
 * Debriefs are append-only. A mistake is fixed by recording a correction that
 * supersedes the earlier debrief; each debrief can be superseded once.
 */
export class DebriefRecorder<Tx> {
  constructor(private readonly deps: DebriefRecorderDeps<Tx>) {}

  async recordDebrief(actor: Actor, episodeId: string, input: DebriefInput): Promise<Result<Debrief>> {
    const { debriefRepo, coordinator, audit, clock, generateId } = this.deps;

    return this.deps.withTransaction(async (tx) => {
      const loaded = await this.loadEpisode(tx, actor, episodeId);
      if (!loaded.ok) return propagate<Debrief>(loaded.error);
      const episode = loaded.value;

      if (isEpisodeClosed(episode)) {
        return fail<Debrief>('ALREADY_CLOSED', 'Episode already has a debrief');
      }
      if (!isEpisodeTerminal(episode)) {
        return fail<Debrief>('NOT_TERMINAL', 'Episode is still escalating');
      }

      const now = clock.now();
      if (!(await coordinator.closeEpisode(tx, episode.id, now))) {
        return fail<Debrief>('ALREADY_CLOSED', 'Episode already has a debrief');
      }

      const debrief = await debriefRepo.create(tx, {
        id: generateId(),
        episodeId: episode.id,
        pairingId: episode.pairingId,
        outcome: input.outcome,
        difficulty: input.difficulty,
        feedback: cleanFeedback(input.feedback),
        supersedes: null,
      });
      if (!debrief) {
        throw new Error(`Debrief insert for episode ${episode.id} was rejected`);
      }

      await audit.record(tx, {
        actor: actorRef(actor),
        action: 'debrief_recorded',
        resourceRef: `debrief:${debrief.id}`,
        timestamp: now,
        metadata: { episodeId: episode.id, outcome: debrief.outcome, difficulty: debrief.difficulty },
      });
      return ok(debrief);
    });
  }

  async recordCorrection(actor: Actor, debriefId: string, input: DebriefInput): Promise<Result<Debrief>> {
    const { debriefRepo, audit, clock, generateId } = this.deps;

    return this.deps.withTransaction(async (tx) => {
      const original = await debriefRepo.findById(tx, debriefId);
      if (!original) return fail<Debrief>('NOT_FOUND', 'Debrief not found');

      const loaded = await this.loadEpisode(tx, actor, original.episodeId);
      if (!loaded.ok) return propagate<Debrief>(loaded.error);

      const correction = await debriefRepo.create(tx, {
        id: generateId(),
        episodeId: original.episodeId,
        pairingId: original.pairingId,
        outcome: input.outcome,
        difficulty: input.difficulty,
        feedback: cleanFeedback(input.feedback),
        supersedes: original.id,
      });
      if (!correction) {
        return fail<Debrief>('ALREADY_CLOSED', 'Debrief was already corrected');
      }

      await audit.record(tx, {
        actor: actorRef(actor),
        action: 'debrief_corrected',
        resourceRef: `debrief:${correction.id}`,
        timestamp: clock.now(),
        metadata: { episodeId: original.episodeId, supersedes: original.id },
      });
      return ok(correction);
    });
  }

  async listDebriefs(actor: Actor, episodeId: string): Promise<Result<Debrief[]>> {
    return this.deps.withTransaction(async (tx) => {
      const loaded = await this.loadEpisode(tx, actor, episodeId);
      if (!loaded.ok) return propagate<Debrief[]>(loaded.error);
      return ok(await this.deps.debriefRepo.listByEpisode(tx, episodeId));
    });
  }

  private async loadEpisode(tx: Tx, actor: Actor, episodeId: string): Promise<Result<EscalationEpisode>> {
    const episode = await this.deps.episodeRepo.findById(tx, episodeId);
    if (!episode) return fail('NOT_FOUND', 'Episode not found');
    const pairing = await loadAuthorizedPairing(this.deps.pairingRepo, tx, actor, episode.pairingId);
    return pairing.ok ? ok(episode) : propagate(pairing.error);
  }
}

function cleanFeedback(feedback: string | null | undefined): string | null {
  const trimmed = feedback?.trim();
  return trimmed ? trimmed : null;
}
