import { randomUUID } from 'node:crypto';
import { createCareServices } from '@careline/domain';
import {
  loadConfig,
  WorkerConfigSchema,
  createLogger,
  startHealthBeat,
  InMemoryAttemptStore,
  PepperedCredentialSecrets,
} from '@careline/shared';
import {
  initPool,
  closePool,
  withTransaction,
  PgPairingRepository,
  PgCredentialRepository,
  PgDailyStatusRepository,
  PgEscalationRepository,
  PgDebriefRepository,
  OutboxNotificationSink,
  OutboxAuditSink,
} from '@careline/db';
import { connect } from 'nats';
import { startOutboxPublisher } from './outbox-publisher';
import { runCredentialExpiryJob } from './jobs/credential-expiry';
import { runOverdueSweepJob } from './jobs/overdue-sweep';
import { runStaleEpisodeJob } from './jobs/stale-episodes';
import { runRetentionJob } from './jobs/retention';

const logger = createLogger({ name: 'worker' });

const RETENTION_INTERVAL_MS = 3_600_000;

async function main() {
  const config = loadConfig(WorkerConfigSchema);

  initPool({ connectionString: config.DATABASE_URL, max: config.DATABASE_POOL_MAX });

  // Redemption never runs here, so the attempt store stays process-local.
  const { authority, tracker, coordinator } = createCareServices(
    {
      pairingRepo: new PgPairingRepository(),
      credentialRepo: new PgCredentialRepository(),
      dailyStatusRepo: new PgDailyStatusRepository(),
      episodeRepo: new PgEscalationRepository(),
      debriefRepo: new PgDebriefRepository(),
      notifications: new OutboxNotificationSink(),
      audit: new OutboxAuditSink(),
      withTransaction,
      attemptStore: new InMemoryAttemptStore(),
      secrets: new PepperedCredentialSecrets(config.PAIR_TOKEN_PEPPER),
      clock: { now: () => new Date() },
      generateId: () => randomUUID(),
    },
    {
      defaultTimeZone: config.APP_TIMEZONE,
      logger: createLogger({ name: 'care', level: config.LOG_LEVEL }),
    },
  );

  const natsConn = await connect({ servers: config.NATS_URL });
  logger.info({}, 'Connected to NATS');

  const healthBeat = startHealthBeat({ path: config.WORKER_HEALTHCHECK_PATH, logger });

  const outboxPublisher = await startOutboxPublisher(natsConn, {
    pollIntervalMs: config.OUTBOX_POLL_INTERVAL_MS,
    batchSize: config.OUTBOX_BATCH_SIZE,
  });

  const advanceAfterMs = config.ESCALATION_ADVANCE_AFTER_MINUTES * 60_000;
  const jobIntervals = [
    setInterval(() => {
      runCredentialExpiryJob(authority).catch(logJobError('credential-expiry'));
    }, config.CREDENTIAL_EXPIRY_INTERVAL_MS),
    setInterval(() => {
      runOverdueSweepJob(tracker, config.CONFIRM_DEADLINE).catch(logJobError('overdue-sweep'));
    }, config.OVERDUE_SWEEP_INTERVAL_MS),
    setInterval(() => {
      runStaleEpisodeJob(coordinator, advanceAfterMs).catch(logJobError('stale-episodes'));
    }, config.STALE_EPISODE_INTERVAL_MS),
    setInterval(() => {
      runRetentionJob(config.OUTBOX_RETENTION_DAYS).catch(logJobError('retention'));
    }, RETENTION_INTERVAL_MS),
  ];

  logger.info({}, 'Worker started');

  const shutdown = async () => {
    logger.info({}, 'Shutting down worker');
    healthBeat.stop();
    outboxPublisher.stop();
    for (const interval of jobIntervals) clearInterval(interval);
    await natsConn.drain();
    await closePool();
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown());
  process.on('SIGINT', () => void shutdown());
}

function logJobError(jobName: string) {
  return (err: unknown) => {
    logger.error(
      { err: err instanceof Error ? err.message : String(err), job: jobName },
      'Job failed',
    );
  };
}

main().catch((err) => {
  logger.fatal({ err: err instanceof Error ? err.message : String(err) }, 'Failed to start worker');
  process.exit(1);
});
