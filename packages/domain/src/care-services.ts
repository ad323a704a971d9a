import { AttemptGuard, DEFAULT_ATTEMPT_POLICY } from './attempt-guard';
import { DailyActionTracker } from './daily-action-tracker';
import { DebriefRecorder } from './debrief-recorder';
import { EscalationCoordinator } from './escalation-coordinator';
import { PairingAuthority } from './pairing-authority';
import {
  type AttemptPolicy,
  type AttemptStore,
  type AuditSink,
  type Clock,
  type CredentialRepository,
  type CredentialSecrets,
  type DailyStatusRepository,
  type DebriefRepository,
  type DomainLogger,
  type EscalationRepository,
  type NotificationSink,
  type PairingRepository,
  type WithTransaction,
} from './ports';
import { RedemptionGate } from './redemption-gate';

export interface CarePorts<Tx> {
  pairingRepo: PairingRepository<Tx>;
  credentialRepo: CredentialRepository<Tx>;
  dailyStatusRepo: DailyStatusRepository<Tx>;
  episodeRepo: EscalationRepository<Tx>;
  debriefRepo: DebriefRepository<Tx>;
  notifications: NotificationSink<Tx>;
  audit: AuditSink<Tx>;
  withTransaction: WithTransaction<Tx>;
  attemptStore: AttemptStore;
  secrets: CredentialSecrets;
  clock: Clock;
  generateId: () => string;
}

export interface CareSettings {
  defaultTimeZone: string;
  attemptPolicy?: AttemptPolicy;
  logger?: DomainLogger;
}

export interface CareServices<Tx> {
  authority: PairingAuthority<Tx>;
  gate: RedemptionGate<Tx>;
  coordinator: EscalationCoordinator<Tx>;
  tracker: DailyActionTracker<Tx>;
  recorder: DebriefRecorder<Tx>;
}

/** Wires the five services over one set of ports. Guard keys reuse the peppered hash. */
export function createCareServices<Tx>(ports: CarePorts<Tx>, settings: CareSettings): CareServices<Tx> {
  const { clock, generateId, withTransaction, audit, secrets } = ports;
  const logger = settings.logger;

  const guard = new AttemptGuard({
    store: ports.attemptStore,
    policy: settings.attemptPolicy ?? DEFAULT_ATTEMPT_POLICY,
    hashKey: (raw) => secrets.hash(raw),
  });

  const authority = new PairingAuthority({
    pairingRepo: ports.pairingRepo,
    credentialRepo: ports.credentialRepo,
    secrets,
    audit,
    clock,
    generateId,
    withTransaction,
    defaultTimeZone: settings.defaultTimeZone,
    logger,
  });

  const gate = new RedemptionGate({
    pairingRepo: ports.pairingRepo,
    credentialRepo: ports.credentialRepo,
    secrets,
    guard,
    audit,
    clock,
    withTransaction,
    logger,
  });

  const coordinator: EscalationCoordinator<Tx> = new EscalationCoordinator({
    episodeRepo: ports.episodeRepo,
    pairingRepo: ports.pairingRepo,
    notifications: ports.notifications,
    audit,
    clock,
    generateId,
    withTransaction,
    logger,
    onStageAdvanced: (tx, episode, at) => tracker.syncEscalationStage(tx, episode, at),
  });

  const tracker: DailyActionTracker<Tx> = new DailyActionTracker({
    pairingRepo: ports.pairingRepo,
    dailyStatusRepo: ports.dailyStatusRepo,
    coordinator,
    audit,
    clock,
    generateId,
    withTransaction,
    logger,
  });

  const recorder = new DebriefRecorder({
    debriefRepo: ports.debriefRepo,
    episodeRepo: ports.episodeRepo,
    pairingRepo: ports.pairingRepo,
    coordinator,
    audit,
    clock,
    generateId,
    withTransaction,
  });

  return { authority, gate, coordinator, tracker, recorder };
}
