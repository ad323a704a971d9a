import { type Credential, type Pairing, type PairingStatus } from './pairing';
import {
  type CaregiverAction,
  type DailyStatus,
  type DailyStatusKind,
  type LocalDate,
} from './daily-status';
import {
  type EpisodeResolution,
  type EscalationEpisode,
  type EscalationStage,
  type EscalationTrigger,
  type NotifyEventKind,
} from './escalation';
import { type Debrief, type DebriefOutcome } from './debrief';

export type WithTransaction<Tx> = <T>(fn: (tx: Tx) => Promise<T>) => Promise<T>;

export interface Clock {
  now(): Date;
}

export interface DomainLogger {
  info(meta: Record<string, unknown>, msg: string): void;
  warn(meta: Record<string, unknown>, msg: string): void;
  error(meta: Record<string, unknown>, msg: string): void;
}

/** Secure random generation and peppered hashing of pairing secrets. */
export interface CredentialSecrets {
  generateShortCode(): string;
  generateLinkToken(): string;
  hash(value: string): string;
}

export interface AttemptCounter {
  keyHash: string;
  failedCount: number;
  windowStartedAt: Date | null;
  lockedUntil: Date | null;
}

export interface AttemptPolicy {
  maxFailures: number;
  windowMs: number;
  lockMs: number;
}

/**
 * Keyed failure counters. `increment` must be atomic per key: two concurrent
 * failures on the same key always produce two distinct counts.
 */
export interface AttemptStore {
  get(keyHash: string): Promise<AttemptCounter | null>;
  increment(keyHash: string, now: Date, policy: AttemptPolicy): Promise<AttemptCounter>;
  clear(keyHash: string): Promise<void>;
}

export interface NotifyIntent {
  contactRef: string;
  eventKind: NotifyEventKind;
  episodeId: string;
}

export interface NotificationSink<Tx> {
  notify(tx: Tx, intent: NotifyIntent): Promise<void>;
}

export interface AuditEvent {
  actor: string;
  action: string;
  resourceRef: string;
  timestamp: Date;
  metadata: Record<string, unknown>;
}

export interface AuditSink<Tx> {
  record(tx: Tx, event: AuditEvent): Promise<void>;
}

export interface NewPairing {
  id: string;
  caregiverId: string;
  dependentRef: string;
  communityCode: string | null;
  timeZone: string;
  contactChain: string[];
  expiresAt: Date | null;
}

export interface PairingRepository<Tx> {
  create(tx: Tx, pairing: NewPairing): Promise<Pairing>;
  findById(tx: Tx, id: string): Promise<Pairing | null>;
  listByCaregiver(tx: Tx, caregiverId: string): Promise<Pairing[]>;
  /** Keyset page of active pairings ordered by id. */
  listActive(tx: Tx, page: { afterId: string | null; limit: number }): Promise<Pairing[]>;
  /** Conditional status change; null when the row is not in one of `from`. */
  transition(
    tx: Tx,
    id: string,
    from: readonly PairingStatus[],
    to: PairingStatus,
    at: Date,
  ): Promise<Pairing | null>;
  updateContactChain(tx: Tx, id: string, contactChain: string[]): Promise<void>;
}

export interface NewCredential {
  id: string;
  pairingId: string;
  codeHash: string;
  tokenHash: string;
  communityCode: string | null;
  expiresAt: Date;
}

export interface CredentialRepository<Tx> {
  /** Null when another issued credential already holds this code hash. */
  create(tx: Tx, credential: NewCredential): Promise<Credential | null>;
  /** Most recent credential carrying this code hash. */
  findByCodeHash(tx: Tx, codeHash: string): Promise<Credential | null>;
  findByTokenHash(tx: Tx, tokenHash: string): Promise<Credential | null>;
  findLatestForPairing(tx: Tx, pairingId: string): Promise<Credential | null>;
  existsUnexpiredWithCodeHash(tx: Tx, codeHash: string, now: Date): Promise<boolean>;
  /** Compare-and-set of redeemed_at from null; false when another caller won. */
  markRedeemed(tx: Tx, id: string, at: Date): Promise<boolean>;
  /** Expires an issued, unredeemed credential; false when it was not issued. */
  markExpired(tx: Tx, id: string): Promise<boolean>;
  listExpirable(tx: Tx, now: Date, limit: number): Promise<Credential[]>;
}

export interface DailyStatusPatch {
  status: DailyStatusKind;
  confirmedAt?: Date;
  helpFlag?: boolean;
  escalationStage?: EscalationStage;
}

export interface DailyStatusRepository<Tx> {
  findByPairingAndDate(tx: Tx, pairingId: string, date: LocalDate): Promise<DailyStatus | null>;
  /** Inserts the (pairing, date) row if missing and returns whichever row exists. */
  ensure(tx: Tx, row: { id: string; pairingId: string; statusDate: LocalDate }): Promise<DailyStatus>;
  /** Conditional status change; null when the row is not in one of `from`. */
  transition(
    tx: Tx,
    id: string,
    from: readonly DailyStatusKind[],
    patch: DailyStatusPatch,
    at: Date,
  ): Promise<DailyStatus | null>;
  updateEscalationStage(tx: Tx, id: string, stage: EscalationStage, at: Date): Promise<void>;
  updateCaregiverActions(
    tx: Tx,
    id: string,
    actions: CaregiverAction[],
    note: string | null,
    at: Date,
  ): Promise<DailyStatus>;
  listSince(tx: Tx, pairingId: string, since: LocalDate): Promise<DailyStatus[]>;
}

export interface NewEpisode {
  id: string;
  pairingId: string;
  dailyStatusId: string;
  trigger: EscalationTrigger;
  stage: EscalationStage;
  contactIndex: number;
  at: Date;
}

export interface EscalationRepository<Tx> {
  /** Null when the daily status already has an episode. */
  create(tx: Tx, episode: NewEpisode): Promise<EscalationEpisode | null>;
  findById(tx: Tx, id: string): Promise<EscalationEpisode | null>;
  findByDailyStatus(tx: Tx, dailyStatusId: string): Promise<EscalationEpisode | null>;
  /** Compare-and-set on (stage, contactIndex) of an unresolved episode. */
  advanceStage(
    tx: Tx,
    id: string,
    expected: { stage: EscalationStage; contactIndex: number },
    next: { stage: EscalationStage; contactIndex: number },
    at: Date,
  ): Promise<EscalationEpisode | null>;
  resolve(tx: Tx, id: string, resolution: EpisodeResolution, at: Date): Promise<EscalationEpisode | null>;
  close(tx: Tx, id: string, at: Date): Promise<boolean>;
  /** Unresolved, non-exhausted episodes last notified at or before `notifiedBefore`. */
  listStale(tx: Tx, notifiedBefore: Date, limit: number): Promise<EscalationEpisode[]>;
}

export interface NewDebrief {
  id: string;
  episodeId: string;
  pairingId: string;
  outcome: DebriefOutcome;
  difficulty: number;
  feedback: string | null;
  supersedes: string | null;
}

export interface DebriefRepository<Tx> {
  /** Null when `supersedes` already has a correction. */
  create(tx: Tx, debrief: NewDebrief): Promise<Debrief | null>;
  findById(tx: Tx, id: string): Promise<Debrief | null>;
  listByEpisode(tx: Tx, episodeId: string): Promise<Debrief[]>;
}
