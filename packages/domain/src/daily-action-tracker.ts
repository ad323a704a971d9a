import { type Actor, actorRef, loadAuthorizedPairing } from './actor';
import { type CaregiverAction, type DailyStatus, type LocalDate } from './daily-status';
import { type EscalationCoordinator } from './escalation-coordinator';
import { type EscalationEpisode, firstStep } from './escalation';
import { addDays, isPastLocalDeadline, localDateOf, type TimeOfDay } from './local-day';
import { type Pairing } from './pairing';
import {
  type AuditSink,
  type Clock,
  type DailyStatusRepository,
  type DomainLogger,
  type PairingRepository,
  type WithTransaction,
} from './ports';
import { fail, ok, propagate, type Result } from './result';

export const DEFAULT_CONFIRM_DEADLINE: TimeOfDay = { hour: 20, minute: 0 };
const DEFAULT_SWEEP_PAGE_SIZE = 200;
export const MAX_STATUS_HISTORY_DAYS = 90;

export interface DailyActionTrackerDeps<Tx> {
  pairingRepo: PairingRepository<Tx>;
  dailyStatusRepo: DailyStatusRepository<Tx>;
  coordinator: EscalationCoordinator<Tx>;
  audit: AuditSink<Tx>;
  clock: Clock;
  generateId: () => string;
  withTransaction: WithTransaction<Tx>;
  logger?: DomainLogger;
  sweepPageSize?: number;
}

export interface HelpOutcome {
  dailyStatus: DailyStatus;
  episode: EscalationEpisode | null;
}

export class DailyActionTracker<Tx> {
  constructor(private readonly deps: DailyActionTrackerDeps<Tx>) {}

  async recordConfirm(actor: Actor, pairingId: string, date?: LocalDate): Promise<Result<DailyStatus>> {
    const { dailyStatusRepo, coordinator, audit, clock, generateId } = this.deps;

    return this.deps.withTransaction(async (tx) => {
      const loaded = await this.loadActive(tx, actor, pairingId);
      if (!loaded.ok) return propagate<DailyStatus>(loaded.error);
      const pairing = loaded.value;

      const now = clock.now();
      const statusDate = date ?? localDateOf(now, pairing.timeZone);
      const row = await dailyStatusRepo.ensure(tx, { id: generateId(), pairingId, statusDate });

      if (row.status === 'unconfirmed') {
        const confirmed = await dailyStatusRepo.transition(
          tx,
          row.id,
          ['unconfirmed'],
          { status: 'confirmed', confirmedAt: now },
          now,
        );
        if (confirmed) {
          await audit.record(tx, {
            actor: actorRef(actor),
            action: 'daily_confirmed',
            resourceRef: `daily_status:${confirmed.id}`,
            timestamp: now,
            metadata: { pairingId, statusDate },
          });
          return ok(confirmed);
        }
      }

      const current = (await dailyStatusRepo.findByPairingAndDate(tx, pairingId, statusDate)) ?? row;
      if (current.status === 'help_requested') {
        this.deps.logger?.info(
          { pairingId, statusDate, dailyStatusId: current.id },
          'Confirm after help request ignored',
        );
      } else if (current.status === 'escalated') {
        const resolved = await coordinator.resolveForDailyStatus(
          tx,
          current.id,
          { outcome: 'dependent_confirmed' },
          actor,
          now,
        );
        if (resolved) {
          this.deps.logger?.info({ pairingId, episodeId: resolved.id }, 'Late confirmation resolved escalation');
        }
      }
      return ok(current);
    });
  }

  async recordHelp(actor: Actor, pairingId: string, date?: LocalDate): Promise<Result<HelpOutcome>> {
    const { dailyStatusRepo, coordinator, audit, clock, generateId } = this.deps;

    return this.deps.withTransaction(async (tx) => {
      const loaded = await this.loadActive(tx, actor, pairingId);
      if (!loaded.ok) return propagate<HelpOutcome>(loaded.error);
      const pairing = loaded.value;

      const now = clock.now();
      const statusDate = date ?? localDateOf(now, pairing.timeZone);
      const row = await dailyStatusRepo.ensure(tx, { id: generateId(), pairingId, statusDate });

      if (row.status === 'unconfirmed' || row.status === 'confirmed') {
        const flagged = await dailyStatusRepo.transition(
          tx,
          row.id,
          ['unconfirmed', 'confirmed'],
          { status: 'help_requested', helpFlag: true, escalationStage: firstStep(pairing.contactChain).stage },
          now,
        );
        if (flagged) {
          if (row.status === 'confirmed') {
            this.deps.logger?.info(
              { pairingId, statusDate, dailyStatusId: row.id },
              'Help request after confirmation',
            );
          }
          await audit.record(tx, {
            actor: actorRef(actor),
            action: 'help_requested',
            resourceRef: `daily_status:${flagged.id}`,
            timestamp: now,
            metadata: { pairingId, statusDate },
          });
          const episode = await coordinator.startEpisode(tx, {
            pairing,
            dailyStatus: flagged,
            trigger: 'help_requested',
            now,
          });
          return ok<HelpOutcome>({ dailyStatus: flagged, episode });
        }
      }

      const current = (await dailyStatusRepo.findByPairingAndDate(tx, pairingId, statusDate)) ?? row;
      const episode = await coordinator.findForDailyStatus(tx, current.id);
      return ok<HelpOutcome>({ dailyStatus: current, episode });
    });
  }

  /**
   * Escalates every active pairing whose local deadline has passed without a
   * confirmation today. Pairings are paged by id and each is escalated in its
   * own transaction, so a second run finds nothing left to do.
   */
  async sweepOverdue(
    now: Date,
    deadline: TimeOfDay = DEFAULT_CONFIRM_DEADLINE,
  ): Promise<{ escalated: number; failed: number }> {
    const pageSize = this.deps.sweepPageSize ?? DEFAULT_SWEEP_PAGE_SIZE;
    let afterId: string | null = null;
    let escalated = 0;
    let failed = 0;

    for (;;) {
      const cursor: string | null = afterId;
      const page: Pairing[] = await this.deps.withTransaction((tx) =>
        this.deps.pairingRepo.listActive(tx, { afterId: cursor, limit: pageSize }),
      );

      for (const pairing of page) {
        if (!isOverdue(pairing, now, deadline)) continue;
        try {
          if (await this.deps.withTransaction((tx) => this.escalateIfUnconfirmed(tx, pairing, now))) {
            escalated++;
          }
        } catch (err) {
          failed++;
          this.deps.logger?.error(
            { pairingId: pairing.id, err: err instanceof Error ? err.message : String(err) },
            'Overdue escalation failed',
          );
        }
      }

      if (page.length < pageSize) break;
      afterId = page[page.length - 1].id;
    }

    if (escalated > 0 || failed > 0) {
      this.deps.logger?.info({ escalated, failed }, 'Escalated overdue daily statuses');
    }
    return { escalated, failed };
  }

  /** Mirrors an advanced episode's stage onto its daily status, in the advancing transaction. */
  async syncEscalationStage(tx: Tx, episode: EscalationEpisode, at: Date): Promise<void> {
    await this.deps.dailyStatusRepo.updateEscalationStage(tx, episode.dailyStatusId, episode.stage, at);
  }

  async recordCaregiverActions(
    pairingId: string,
    caregiverId: string,
    actions: CaregiverAction[],
    note: string | null,
  ): Promise<Result<DailyStatus>> {
    const { pairingRepo, dailyStatusRepo, audit, clock, generateId } = this.deps;
    const actor: Actor = { kind: 'caregiver', caregiverId };

    return this.deps.withTransaction(async (tx) => {
      const loaded = await loadAuthorizedPairing(pairingRepo, tx, actor, pairingId);
      if (!loaded.ok) return propagate<DailyStatus>(loaded.error);

      const now = clock.now();
      const statusDate = localDateOf(now, loaded.value.timeZone);
      const row = await dailyStatusRepo.ensure(tx, { id: generateId(), pairingId, statusDate });
      const unique = [...new Set(actions)];
      const trimmedNote = note?.trim() || null;

      const updated = await dailyStatusRepo.updateCaregiverActions(tx, row.id, unique, trimmedNote, now);
      await audit.record(tx, {
        actor: actorRef(actor),
        action: 'caregiver_actions_recorded',
        resourceRef: `daily_status:${row.id}`,
        timestamp: now,
        metadata: { pairingId, actions: unique },
      });
      return ok(updated);
    });
  }

  /** Rows for the last `days` local days, today included, oldest first. */
  async getRecentStatuses(pairingId: string, caregiverId: string, days: number): Promise<Result<DailyStatus[]>> {
    const { pairingRepo, dailyStatusRepo, clock } = this.deps;
    const span = Math.min(Math.max(Math.trunc(days), 1), MAX_STATUS_HISTORY_DAYS);

    return this.deps.withTransaction(async (tx) => {
      const loaded = await loadAuthorizedPairing(pairingRepo, tx, { kind: 'caregiver', caregiverId }, pairingId);
      if (!loaded.ok) return propagate<DailyStatus[]>(loaded.error);

      const today = localDateOf(clock.now(), loaded.value.timeZone);
      return ok(await dailyStatusRepo.listSince(tx, pairingId, addDays(today, 1 - span)));
    });
  }

  private async loadActive(tx: Tx, actor: Actor, pairingId: string): Promise<Result<Pairing>> {
    const loaded = await loadAuthorizedPairing(this.deps.pairingRepo, tx, actor, pairingId);
    if (!loaded.ok) return loaded;
    if (loaded.value.status !== 'active') {
      return fail('NOT_FOUND', 'No active pairing');
    }
    return loaded;
  }

  private async escalateIfUnconfirmed(tx: Tx, pairing: Pairing, now: Date): Promise<boolean> {
    const { dailyStatusRepo, coordinator, generateId } = this.deps;
    const statusDate = localDateOf(now, pairing.timeZone);
    const row = await dailyStatusRepo.ensure(tx, { id: generateId(), pairingId: pairing.id, statusDate });
    if (row.status !== 'unconfirmed') return false;

    const escalated = await dailyStatusRepo.transition(
      tx,
      row.id,
      ['unconfirmed'],
      { status: 'escalated', escalationStage: firstStep(pairing.contactChain).stage },
      now,
    );
    if (!escalated) return false;

    await coordinator.startEpisode(tx, {
      pairing,
      dailyStatus: escalated,
      trigger: 'confirmation_missed',
      now,
    });
    return true;
  }
}

/**
 * Past the local deadline, unless the pairing only became active after that
 * deadline today.
 */
export function isOverdue(pairing: Pairing, now: Date, deadline: TimeOfDay): boolean {
  if (!isPastLocalDeadline(now, pairing.timeZone, deadline)) return false;
  const activatedAt = pairing.activatedAt;
  if (
    activatedAt &&
    localDateOf(activatedAt, pairing.timeZone) === localDateOf(now, pairing.timeZone) &&
    isPastLocalDeadline(activatedAt, pairing.timeZone, deadline)
  ) {
    return false;
  }
  return true;
}
