import { type DailyStatus } from '../daily-status';
import { type Debrief } from '../debrief';
import { type EscalationEpisode, type EscalationStage } from '../escalation';
import { type Credential, type Pairing } from '../pairing';
import {
  type AuditEvent,
  type AuditSink,
  type CredentialRepository,
  type DailyStatusPatch,
  type DailyStatusRepository,
  type DebriefRepository,
  type EscalationRepository,
  type NewCredential,
  type NewDebrief,
  type NewEpisode,
  type NewPairing,
  type NotificationSink,
  type NotifyIntent,
  type PairingRepository,
  type WithTransaction,
} from '../ports';

// Single-process stores. Every compare-and-set yields once and then checks and
// writes synchronously, so concurrent callers interleave like separate
// transactions but only one of them can win a given row.

type Now = () => Date;
const systemNow: Now = () => new Date();

const yieldTurn = (): Promise<void> => Promise.resolve();

export const runWithoutTransaction: WithTransaction<unknown> = (fn) => fn(undefined);

function copyPairing(p: Pairing): Pairing {
  return { ...p, contactChain: [...p.contactChain] };
}

function copyStatus(s: DailyStatus): DailyStatus {
  return { ...s, caregiverActions: [...s.caregiverActions] };
}

function copyEpisode(e: EscalationEpisode): EscalationEpisode {
  return { ...e, resolution: e.resolution ? { ...e.resolution } : null };
}

export class InMemoryPairingRepository implements PairingRepository<unknown> {
  private readonly rows = new Map<string, Pairing>();

  constructor(private readonly now: Now = systemNow) {}

  async create(_tx: unknown, pairing: NewPairing): Promise<Pairing> {
    const row: Pairing = {
      ...pairing,
      contactChain: [...pairing.contactChain],
      status: 'pending',
      createdAt: this.now(),
      activatedAt: null,
      revokedAt: null,
    };
    this.rows.set(row.id, row);
    return copyPairing(row);
  }

  async findById(_tx: unknown, id: string): Promise<Pairing | null> {
    const row = this.rows.get(id);
    return row ? copyPairing(row) : null;
  }

  async listByCaregiver(_tx: unknown, caregiverId: string): Promise<Pairing[]> {
    return [...this.rows.values()]
      .filter((p) => p.caregiverId === caregiverId)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .map(copyPairing);
  }

  async listActive(_tx: unknown, page: { afterId: string | null; limit: number }): Promise<Pairing[]> {
    const afterId = page.afterId;
    return [...this.rows.values()]
      .filter((p) => p.status === 'active' && (afterId === null || p.id > afterId))
      .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
      .slice(0, page.limit)
      .map(copyPairing);
  }

  async transition(
    _tx: unknown,
    id: string,
    from: readonly Pairing['status'][],
    to: Pairing['status'],
    at: Date,
  ): Promise<Pairing | null> {
    await yieldTurn();
    const row = this.rows.get(id);
    if (!row || !from.includes(row.status)) return null;
    row.status = to;
    if (to === 'active') {
      row.activatedAt = at;
      row.expiresAt = null;
    }
    if (to === 'revoked') row.revokedAt = at;
    return copyPairing(row);
  }

  async updateContactChain(_tx: unknown, id: string, contactChain: string[]): Promise<void> {
    const row = this.rows.get(id);
    if (row) row.contactChain = [...contactChain];
  }
}

export class InMemoryCredentialRepository implements CredentialRepository<unknown> {
  private readonly rows = new Map<string, Credential>();

  constructor(private readonly now: Now = systemNow) {}

  async create(_tx: unknown, credential: NewCredential): Promise<Credential | null> {
    await yieldTurn();
    for (const existing of this.rows.values()) {
      if (existing.codeHash === credential.codeHash && existing.status === 'issued') return null;
    }
    const row: Credential = { ...credential, status: 'issued', redeemedAt: null, createdAt: this.now() };
    this.rows.set(row.id, row);
    return { ...row };
  }

  async findByCodeHash(_tx: unknown, codeHash: string): Promise<Credential | null> {
    return this.latest((c) => c.codeHash === codeHash);
  }

  async findByTokenHash(_tx: unknown, tokenHash: string): Promise<Credential | null> {
    return this.latest((c) => c.tokenHash === tokenHash);
  }

  async findLatestForPairing(_tx: unknown, pairingId: string): Promise<Credential | null> {
    return this.latest((c) => c.pairingId === pairingId);
  }

  async existsUnexpiredWithCodeHash(_tx: unknown, codeHash: string, now: Date): Promise<boolean> {
    return [...this.rows.values()].some(
      (c) => c.codeHash === codeHash && c.status !== 'expired' && c.expiresAt.getTime() > now.getTime(),
    );
  }

  async markRedeemed(_tx: unknown, id: string, at: Date): Promise<boolean> {
    await yieldTurn();
    const row = this.rows.get(id);
    if (!row || row.redeemedAt !== null || row.status !== 'issued') return false;
    if (row.expiresAt.getTime() <= at.getTime()) return false;
    row.redeemedAt = at;
    row.status = 'redeemed';
    return true;
  }

  async markExpired(_tx: unknown, id: string): Promise<boolean> {
    await yieldTurn();
    const row = this.rows.get(id);
    if (!row || row.status !== 'issued' || row.redeemedAt !== null) return false;
    row.status = 'expired';
    return true;
  }

  async listExpirable(_tx: unknown, now: Date, limit: number): Promise<Credential[]> {
    return [...this.rows.values()]
      .filter((c) => c.status === 'issued' && c.redeemedAt === null && c.expiresAt.getTime() <= now.getTime())
      .sort((a, b) => a.expiresAt.getTime() - b.expiresAt.getTime())
      .slice(0, limit)
      .map((c) => ({ ...c }));
  }

  private latest(match: (c: Credential) => boolean): Credential | null {
    let found: Credential | null = null;
    for (const row of this.rows.values()) {
      if (match(row) && (!found || row.createdAt.getTime() >= found.createdAt.getTime())) found = row;
    }
    return found ? { ...found } : null;
  }
}

export class InMemoryDailyStatusRepository implements DailyStatusRepository<unknown> {
  private readonly rows = new Map<string, DailyStatus>();
  private readonly byDay = new Map<string, string>();

  constructor(private readonly now: Now = systemNow) {}

  async findByPairingAndDate(_tx: unknown, pairingId: string, date: string): Promise<DailyStatus | null> {
    const id = this.byDay.get(`${pairingId}|${date}`);
    const row = id ? this.rows.get(id) : undefined;
    return row ? copyStatus(row) : null;
  }

  async ensure(_tx: unknown, input: { id: string; pairingId: string; statusDate: string }): Promise<DailyStatus> {
    const key = `${input.pairingId}|${input.statusDate}`;
    const existingId = this.byDay.get(key);
    const existing = existingId ? this.rows.get(existingId) : undefined;
    if (existing) return copyStatus(existing);

    const now = this.now();
    const row: DailyStatus = {
      id: input.id,
      pairingId: input.pairingId,
      statusDate: input.statusDate,
      status: 'unconfirmed',
      confirmedAt: null,
      helpFlag: false,
      escalationStage: null,
      caregiverActions: [],
      caregiverNote: null,
      createdAt: now,
      updatedAt: now,
    };
    this.rows.set(row.id, row);
    this.byDay.set(key, row.id);
    return copyStatus(row);
  }

  async transition(
    _tx: unknown,
    id: string,
    from: readonly DailyStatus['status'][],
    patch: DailyStatusPatch,
    at: Date,
  ): Promise<DailyStatus | null> {
    await yieldTurn();
    const row = this.rows.get(id);
    if (!row || !from.includes(row.status)) return null;
    row.status = patch.status;
    if (patch.confirmedAt !== undefined) row.confirmedAt = patch.confirmedAt;
    if (patch.helpFlag !== undefined) row.helpFlag = patch.helpFlag;
    if (patch.escalationStage !== undefined) row.escalationStage = patch.escalationStage;
    row.updatedAt = at;
    return copyStatus(row);
  }

  async updateEscalationStage(
    _tx: unknown,
    id: string,
    stage: EscalationStage,
    at: Date,
  ): Promise<void> {
    const row = this.rows.get(id);
    if (!row) return;
    row.escalationStage = stage;
    row.updatedAt = at;
  }

  async updateCaregiverActions(
    _tx: unknown,
    id: string,
    actions: DailyStatus['caregiverActions'],
    note: string | null,
    at: Date,
  ): Promise<DailyStatus> {
    const row = this.rows.get(id);
    if (!row) throw new Error(`Daily status ${id} not found`);
    row.caregiverActions = [...actions];
    row.caregiverNote = note;
    row.updatedAt = at;
    return copyStatus(row);
  }

  async listSince(_tx: unknown, pairingId: string, since: string): Promise<DailyStatus[]> {
    return [...this.rows.values()]
      .filter((s) => s.pairingId === pairingId && s.statusDate >= since)
      .sort((a, b) => (a.statusDate < b.statusDate ? -1 : a.statusDate > b.statusDate ? 1 : 0))
      .map(copyStatus);
  }
}

export class InMemoryEscalationRepository implements EscalationRepository<unknown> {
  private readonly rows = new Map<string, EscalationEpisode>();

  async create(
    _tx: unknown,
    episode: NewEpisode,
  ): Promise<EscalationEpisode | null> {
    await yieldTurn();
    for (const row of this.rows.values()) {
      if (row.dailyStatusId === episode.dailyStatusId) return null;
    }
    const row: EscalationEpisode = {
      id: episode.id,
      pairingId: episode.pairingId,
      dailyStatusId: episode.dailyStatusId,
      trigger: episode.trigger,
      stage: episode.stage,
      contactIndex: episode.contactIndex,
      primaryNotifiedAt: episode.stage === 'notify_primary' ? episode.at : null,
      backupNotifiedAt: null,
      exhaustedAt: episode.stage === 'exhausted' ? episode.at : null,
      lastNotifiedAt: episode.at,
      resolution: null,
      resolvedAt: null,
      closedAt: null,
      createdAt: episode.at,
    };
    this.rows.set(row.id, row);
    return copyEpisode(row);
  }

  async findById(_tx: unknown, id: string): Promise<EscalationEpisode | null> {
    const row = this.rows.get(id);
    return row ? copyEpisode(row) : null;
  }

  async findByDailyStatus(_tx: unknown, dailyStatusId: string): Promise<EscalationEpisode | null> {
    for (const row of this.rows.values()) {
      if (row.dailyStatusId === dailyStatusId) return copyEpisode(row);
    }
    return null;
  }

  async advanceStage(
    _tx: unknown,
    id: string,
    expected: { stage: EscalationEpisode['stage']; contactIndex: number },
    next: { stage: EscalationEpisode['stage']; contactIndex: number },
    at: Date,
  ): Promise<EscalationEpisode | null> {
    await yieldTurn();
    const row = this.rows.get(id);
    if (!row || row.resolvedAt !== null || row.closedAt !== null) return null;
    if (row.stage !== expected.stage || row.contactIndex !== expected.contactIndex) return null;
    row.stage = next.stage;
    row.contactIndex = next.contactIndex;
    if (next.stage === 'notify_backup') row.backupNotifiedAt = at;
    if (next.stage === 'exhausted') row.exhaustedAt = at;
    row.lastNotifiedAt = at;
    return copyEpisode(row);
  }

  async resolve(
    _tx: unknown,
    id: string,
    resolution: NonNullable<EscalationEpisode['resolution']>,
    at: Date,
  ): Promise<EscalationEpisode | null> {
    await yieldTurn();
    const row = this.rows.get(id);
    if (!row || row.resolvedAt !== null || row.closedAt !== null) return null;
    row.resolution = { ...resolution };
    row.resolvedAt = at;
    return copyEpisode(row);
  }

  async close(_tx: unknown, id: string, at: Date): Promise<boolean> {
    await yieldTurn();
    const row = this.rows.get(id);
    if (!row || row.closedAt !== null) return false;
    row.closedAt = at;
    return true;
  }

  async listStale(_tx: unknown, notifiedBefore: Date, limit: number): Promise<EscalationEpisode[]> {
    return [...this.rows.values()]
      .filter(
        (e) =>
          e.resolvedAt === null &&
          e.closedAt === null &&
          e.stage !== 'exhausted' &&
          e.lastNotifiedAt !== null &&
          e.lastNotifiedAt.getTime() <= notifiedBefore.getTime(),
      )
      .sort((a, b) => (a.lastNotifiedAt?.getTime() ?? 0) - (b.lastNotifiedAt?.getTime() ?? 0))
      .slice(0, limit)
      .map(copyEpisode);
  }
}

export class InMemoryDebriefRepository implements DebriefRepository<unknown> {
  private readonly rows: Debrief[] = [];

  constructor(private readonly now: Now = systemNow) {}

  async create(_tx: unknown, debrief: NewDebrief): Promise<Debrief | null> {
    await yieldTurn();
    if (debrief.supersedes !== null && this.rows.some((d) => d.supersedes === debrief.supersedes)) {
      return null;
    }
    const row: Debrief = { ...debrief, createdAt: this.now() };
    this.rows.push(row);
    return { ...row };
  }

  async findById(_tx: unknown, id: string): Promise<Debrief | null> {
    const row = this.rows.find((d) => d.id === id);
    return row ? { ...row } : null;
  }

  async listByEpisode(_tx: unknown, episodeId: string): Promise<Debrief[]> {
    return this.rows.filter((d) => d.episodeId === episodeId).map((d) => ({ ...d }));
  }
}

/** Keeps every intent it is handed; nothing is delivered. */
export class InMemoryNotificationSink implements NotificationSink<unknown> {
  readonly intents: NotifyIntent[] = [];

  async notify(_tx: unknown, intent: NotifyIntent): Promise<void> {
    this.intents.push({ ...intent });
  }
}

export class InMemoryAuditSink implements AuditSink<unknown> {
  readonly events: AuditEvent[] = [];

  async record(_tx: unknown, event: AuditEvent): Promise<void> {
    this.events.push({ ...event, metadata: { ...event.metadata } });
  }
}

export interface InMemoryRepositories {
  pairingRepo: InMemoryPairingRepository;
  credentialRepo: InMemoryCredentialRepository;
  dailyStatusRepo: InMemoryDailyStatusRepository;
  episodeRepo: InMemoryEscalationRepository;
  debriefRepo: InMemoryDebriefRepository;
  notifications: InMemoryNotificationSink;
  audit: InMemoryAuditSink;
  withTransaction: WithTransaction<unknown>;
}

export function createInMemoryRepositories(now: Now = systemNow): InMemoryRepositories {
  return {
    pairingRepo: new InMemoryPairingRepository(now),
    credentialRepo: new InMemoryCredentialRepository(now),
    dailyStatusRepo: new InMemoryDailyStatusRepository(now),
    episodeRepo: new InMemoryEscalationRepository(),
    debriefRepo: new InMemoryDebriefRepository(now),
    notifications: new InMemoryNotificationSink(),
    audit: new InMemoryAuditSink(),
    withTransaction: runWithoutTransaction,
  };
}
