export { initPool, closePool, getPool, withTransaction } from './client';
export {
  appendOutboxEvent,
  fetchUnpublishedEvents,
  markPublished,
  incrementRetryCount,
  deletePublishedBefore,
  type OutboxEvent,
} from './outbox';
export { OutboxNotificationSink, OutboxAuditSink } from './outbox-sinks';
export { applyMigrations, listMigrationFiles } from './migrator';
export { PgPairingRepository } from './repositories/pairing-repository';
export { PgCredentialRepository } from './repositories/credential-repository';
export { PgDailyStatusRepository } from './repositories/daily-status-repository';
export { PgEscalationRepository } from './repositories/escalation-repository';
export { PgDebriefRepository } from './repositories/debrief-repository';
