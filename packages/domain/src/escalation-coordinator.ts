import { type Actor, actorRef, loadAuthorizedPairing } from './actor';
import { type DailyStatus } from './daily-status';
import {
  type EpisodeResolution,
  type EscalationEpisode,
  type EscalationTrigger,
  firstStep,
  isEpisodeClosed,
  nextStep,
  notifyKindFor,
} from './escalation';
import { type Pairing } from './pairing';
import {
  type AuditSink,
  type Clock,
  type DomainLogger,
  type EscalationRepository,
  type NotificationSink,
  type PairingRepository,
  type WithTransaction,
} from './ports';
import { fail, ok, propagate, type Result } from './result';

/** An unanswered contact is passed over after two hours. */
export const DEFAULT_ADVANCE_AFTER_MS = 2 * 60 * 60 * 1000;
const DEFAULT_STALE_BATCH_SIZE = 100;

export interface EscalationCoordinatorDeps<Tx> {
  episodeRepo: EscalationRepository<Tx>;
  pairingRepo: PairingRepository<Tx>;
  notifications: NotificationSink<Tx>;
  audit: AuditSink<Tx>;
  clock: Clock;
  generateId: () => string;
  withTransaction: WithTransaction<Tx>;
  logger?: DomainLogger;
  staleBatchSize?: number;
  /** Runs in the advancing transaction after every stage change. */
  onStageAdvanced?: (tx: Tx, episode: EscalationEpisode, at: Date) => Promise<void>;
}

export interface StartEpisodeInput {
  pairing: Pairing;
  dailyStatus: DailyStatus;
  trigger: EscalationTrigger;
  now: Date;
}

export class EscalationCoordinator<Tx> {
  constructor(private readonly deps: EscalationCoordinatorDeps<Tx>) {}

  /**
   * Opens the episode for a daily status inside the caller's transaction. A
   * second call for the same daily status returns the episode already open.
   */
  async startEpisode(tx: Tx, input: StartEpisodeInput): Promise<EscalationEpisode> {
    const { episodeRepo, notifications, audit, generateId } = this.deps;
    const { pairing, dailyStatus, trigger, now } = input;

    const existing = await episodeRepo.findByDailyStatus(tx, dailyStatus.id);
    if (existing) return existing;

    const step = firstStep(pairing.contactChain);
    const episode = await episodeRepo.create(tx, {
      id: generateId(),
      pairingId: pairing.id,
      dailyStatusId: dailyStatus.id,
      trigger,
      stage: step.stage,
      contactIndex: step.contactIndex,
      at: now,
    });
    if (!episode) {
      const raced = await episodeRepo.findByDailyStatus(tx, dailyStatus.id);
      if (raced) return raced;
      throw new Error(`Episode insert for daily status ${dailyStatus.id} conflicted without a stored row`);
    }

    await notifications.notify(tx, {
      contactRef: step.contactRef ?? pairing.caregiverId,
      eventKind: step.contactRef ? notifyKindFor(trigger) : 'escalation_exhausted',
      episodeId: episode.id,
    });
    await audit.record(tx, {
      actor: 'system',
      action: 'escalation_started',
      resourceRef: `episode:${episode.id}`,
      timestamp: now,
      metadata: { pairingId: pairing.id, trigger, stage: episode.stage },
    });

    return episode;
  }

  async advance(actor: Actor, episodeId: string): Promise<Result<EscalationEpisode>> {
    return this.deps.withTransaction(async (tx) => {
      const loaded = await this.load(tx, actor, episodeId);
      if (!loaded.ok) return propagate<EscalationEpisode>(loaded.error);
      const { episode, pairing } = loaded.value;

      if (episode.resolvedAt !== null || isEpisodeClosed(episode)) {
        return fail<EscalationEpisode>('ALREADY_CLOSED', 'Episode is already closed');
      }
      if (episode.stage === 'exhausted') {
        return ok(episode);
      }
      return this.step(tx, episode, pairing, actorRef(actor), this.deps.clock.now());
    });
  }

  async resolve(
    actor: Actor,
    episodeId: string,
    resolution: EpisodeResolution,
  ): Promise<Result<EscalationEpisode>> {
    return this.deps.withTransaction(async (tx) => {
      const loaded = await this.load(tx, actor, episodeId);
      if (!loaded.ok) return propagate<EscalationEpisode>(loaded.error);
      return this.resolveWithin(tx, loaded.value.episode, resolution, actor, this.deps.clock.now());
    });
  }

  /**
   * Resolves the open episode of a daily status, if any, inside the caller's
   * transaction. Returns null when there is nothing left to resolve.
   */
  async resolveForDailyStatus(
    tx: Tx,
    dailyStatusId: string,
    resolution: EpisodeResolution,
    actor: Actor,
    now: Date,
  ): Promise<EscalationEpisode | null> {
    const episode = await this.deps.episodeRepo.findByDailyStatus(tx, dailyStatusId);
    if (!episode) return null;
    const result = await this.resolveWithin(tx, episode, resolution, actor, now);
    return result.ok ? result.value : null;
  }

  async findForDailyStatus(tx: Tx, dailyStatusId: string): Promise<EscalationEpisode | null> {
    return this.deps.episodeRepo.findByDailyStatus(tx, dailyStatusId);
  }

  /** Sole writer of `closedAt`; false when the episode was already closed. */
  async closeEpisode(tx: Tx, episodeId: string, now: Date): Promise<boolean> {
    return this.deps.episodeRepo.close(tx, episodeId, now);
  }

  async getEpisode(actor: Actor, episodeId: string): Promise<Result<EscalationEpisode>> {
    return this.deps.withTransaction(async (tx) => {
      const loaded = await this.load(tx, actor, episodeId);
      return loaded.ok ? ok(loaded.value.episode) : propagate<EscalationEpisode>(loaded.error);
    });
  }

  async sweepStaleEpisodes(
    now: Date,
    advanceAfterMs: number = DEFAULT_ADVANCE_AFTER_MS,
  ): Promise<{ advanced: number; failed: number }> {
    const { episodeRepo, pairingRepo } = this.deps;
    const batchSize = this.deps.staleBatchSize ?? DEFAULT_STALE_BATCH_SIZE;
    const cutoff = new Date(now.getTime() - advanceAfterMs);
    const failedIds = new Set<string>();
    let advanced = 0;

    for (;;) {
      const batch = await this.deps.withTransaction((tx) => episodeRepo.listStale(tx, cutoff, batchSize));
      let advancedInBatch = 0;

      for (const stale of batch) {
        if (failedIds.has(stale.id)) continue;
        try {
          const moved = await this.deps.withTransaction(async (tx) => {
            const episode = await episodeRepo.findById(tx, stale.id);
            if (!episode || episode.resolvedAt !== null || episode.closedAt !== null) return false;
            if (episode.stage === 'exhausted') return false;
            const pairing = await pairingRepo.findById(tx, episode.pairingId);
            if (!pairing) return false;
            const result = await this.step(tx, episode, pairing, 'system', now);
            return result.ok;
          });
          if (moved) advancedInBatch++;
        } catch (err) {
          failedIds.add(stale.id);
          this.deps.logger?.error(
            { episodeId: stale.id, err: err instanceof Error ? err.message : String(err) },
            'Stale episode advance failed',
          );
        }
      }

      advanced += advancedInBatch;
      if (batch.length < batchSize || advancedInBatch === 0) break;
    }

    const failed = failedIds.size;
    if (advanced > 0 || failed > 0) {
      this.deps.logger?.info({ advanced, failed }, 'Advanced stale escalation episodes');
    }
    return { advanced, failed };
  }

  private async load(
    tx: Tx,
    actor: Actor,
    episodeId: string,
  ): Promise<Result<{ episode: EscalationEpisode; pairing: Pairing }>> {
    const episode = await this.deps.episodeRepo.findById(tx, episodeId);
    if (!episode) return fail('NOT_FOUND', 'Episode not found');
    const pairing = await loadAuthorizedPairing(this.deps.pairingRepo, tx, actor, episode.pairingId);
    if (!pairing.ok) return propagate(pairing.error);
    return ok({ episode, pairing: pairing.value });
  }

  private async step(
    tx: Tx,
    episode: EscalationEpisode,
    pairing: Pairing,
    actor: string,
    now: Date,
  ): Promise<Result<EscalationEpisode>> {
    const { episodeRepo, notifications, audit } = this.deps;
    const step = nextStep(episode.contactIndex, pairing.contactChain);

    const advanced = await episodeRepo.advanceStage(
      tx,
      episode.id,
      { stage: episode.stage, contactIndex: episode.contactIndex },
      { stage: step.stage, contactIndex: step.contactIndex },
      now,
    );
    if (!advanced) {
      // Someone else moved the episode first; report where it ended up.
      const current = await episodeRepo.findById(tx, episode.id);
      if (!current) return fail('NOT_FOUND', 'Episode not found');
      if (current.resolvedAt !== null || isEpisodeClosed(current)) {
        return fail('ALREADY_CLOSED', 'Episode is already closed');
      }
      return ok(current);
    }

    await this.deps.onStageAdvanced?.(tx, advanced, now);
    await notifications.notify(tx, {
      contactRef: step.contactRef ?? pairing.caregiverId,
      eventKind: step.contactRef ? notifyKindFor(episode.trigger) : 'escalation_exhausted',
      episodeId: episode.id,
    });
    await audit.record(tx, {
      actor,
      action: 'escalation_advanced',
      resourceRef: `episode:${episode.id}`,
      timestamp: now,
      metadata: { stage: advanced.stage, contactIndex: advanced.contactIndex },
    });

    return ok(advanced);
  }

  private async resolveWithin(
    tx: Tx,
    episode: EscalationEpisode,
    resolution: EpisodeResolution,
    actor: Actor,
    now: Date,
  ): Promise<Result<EscalationEpisode>> {
    if (episode.resolvedAt !== null || isEpisodeClosed(episode)) {
      return fail('ALREADY_CLOSED', 'Episode is already closed');
    }

    const resolved = await this.deps.episodeRepo.resolve(tx, episode.id, resolution, now);
    if (!resolved) {
      return fail('ALREADY_CLOSED', 'Episode is already closed');
    }

    await this.deps.audit.record(tx, {
      actor: actorRef(actor),
      action: 'escalation_resolved',
      resourceRef: `episode:${episode.id}`,
      timestamp: now,
      metadata: { outcome: resolution.outcome, stage: resolved.stage },
    });

    return ok(resolved);
  }
}
