export {
  type CareErrorKind,
  type CareError,
  type Result,
  type PublicRedemptionErrorKind,
  ok,
  fail,
  propagate,
  publicRedemptionError,
} from './result';
export {
  PAIRING_STATUSES,
  PAIRING_TRANSITIONS,
  CREDENTIAL_TRANSITIONS,
  MAX_CONTACT_CHAIN,
  canTransitionPairing,
  canTransitionCredential,
  pairingSourcesFor,
  isCredentialExpired,
  isCredentialRedeemed,
  type Pairing,
  type PairingStatus,
  type Credential,
  type CredentialStatus,
} from './pairing';
export {
  DAILY_STATUS_KINDS,
  DAILY_STATUS_TRANSITIONS,
  CAREGIVER_ACTIONS,
  canTransitionDailyStatus,
  dailyStatusSourcesFor,
  isCaregiverAction,
  type DailyStatus,
  type DailyStatusKind,
  type CaregiverAction,
  type LocalDate,
} from './daily-status';
export {
  ESCALATION_STAGES,
  ESCALATION_TRANSITIONS,
  canTransitionStage,
  firstStep,
  nextStep,
  isEpisodeTerminal,
  isEpisodeClosed,
  notifyKindFor,
  type EscalationStage,
  type EscalationTrigger,
  type EscalationEpisode,
  type EpisodeResolution,
  type NotifyEventKind,
  type StageStep,
} from './escalation';
export { DEBRIEF_OUTCOMES, type Debrief, type DebriefOutcome, type DebriefInput } from './debrief';
export {
  isValidTimeZone,
  localDateOf,
  isPastLocalDeadline,
  addDays,
  parseTimeOfDay,
  type TimeOfDay,
} from './local-day';
export { type Actor, SYSTEM_ACTOR, actorRef, authorizePairing, loadAuthorizedPairing } from './actor';
export type {
  WithTransaction,
  Clock,
  DomainLogger,
  CredentialSecrets,
  AttemptCounter,
  AttemptPolicy,
  AttemptStore,
  NotifyIntent,
  NotificationSink,
  AuditEvent,
  AuditSink,
  NewPairing,
  PairingRepository,
  NewCredential,
  CredentialRepository,
  DailyStatusPatch,
  DailyStatusRepository,
  NewEpisode,
  EscalationRepository,
  NewDebrief,
  DebriefRepository,
} from './ports';
export {
  AttemptGuard,
  DEFAULT_ATTEMPT_POLICY,
  applyFailure,
  isLocked,
  type AttemptGuardDeps,
  type GuardVerdict,
} from './attempt-guard';
export {
  PairingAuthority,
  MAX_ISSUANCE_ATTEMPTS,
  normalizeContacts,
  type PairingAuthorityDeps,
  type CreatePairingOptions,
  type IssuedPairing,
  type CredentialView,
} from './pairing-authority';
export {
  RedemptionGate,
  normalizeSecret,
  type PresentedSecret,
  type RedemptionScope,
  type RedemptionGateDeps,
} from './redemption-gate';
export {
  EscalationCoordinator,
  DEFAULT_ADVANCE_AFTER_MS,
  type EscalationCoordinatorDeps,
  type StartEpisodeInput,
} from './escalation-coordinator';
export {
  DailyActionTracker,
  DEFAULT_CONFIRM_DEADLINE,
  MAX_STATUS_HISTORY_DAYS,
  isOverdue,
  type DailyActionTrackerDeps,
  type HelpOutcome,
} from './daily-action-tracker';
export { DebriefRecorder, type DebriefRecorderDeps } from './debrief-recorder';
export {
  createCareServices,
  type CarePorts,
  type CareSettings,
  type CareServices,
} from './care-services';
