import { randomUUID } from 'node:crypto';
import { createCareServices } from '@careline/domain';
import {
  loadConfig,
  ApiConfigSchema,
  createLogger,
  initRedis,
  closeRedis,
  JoseTokenService,
  PepperedCredentialSecrets,
  RedisAttemptStore,
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
import { buildServer } from './server';

const logger = createLogger({ name: 'api' });

async function main() {
  const config = loadConfig(ApiConfigSchema);

  initPool({ connectionString: config.DATABASE_URL, max: config.DATABASE_POOL_MAX });
  const redis = initRedis(config.REDIS_URL);

  const services = createCareServices(
    {
      pairingRepo: new PgPairingRepository(),
      credentialRepo: new PgCredentialRepository(),
      dailyStatusRepo: new PgDailyStatusRepository(),
      episodeRepo: new PgEscalationRepository(),
      debriefRepo: new PgDebriefRepository(),
      notifications: new OutboxNotificationSink(),
      audit: new OutboxAuditSink(),
      withTransaction,
      attemptStore: new RedisAttemptStore(redis),
      secrets: new PepperedCredentialSecrets(config.PAIR_TOKEN_PEPPER),
      clock: { now: () => new Date() },
      generateId: () => randomUUID(),
    },
    {
      defaultTimeZone: config.APP_TIMEZONE,
      attemptPolicy: {
        maxFailures: config.SHORT_CODE_FAIL_MAX,
        windowMs: config.SHORT_CODE_FAIL_WINDOW_MINUTES * 60_000,
        lockMs: config.SHORT_CODE_LOCK_MINUTES * 60_000,
      },
      logger: createLogger({ name: 'care', level: config.LOG_LEVEL }),
    },
  );

  const tokenService = new JoseTokenService({
    activeKid: config.JWT_ACTIVE_KID,
    keys: config.JWT_KEYS,
    issuer: config.JWT_ISSUER,
    dependentSessionTtl: config.DEPENDENT_SESSION_TTL_SECONDS,
  });

  const app = buildServer({
    services,
    tokenService,
    credentialTtlMs: config.CREDENTIAL_TTL_MINUTES * 60_000,
    redeemRateLimitPerMinute: config.REDEEM_RATE_LIMIT_PER_MINUTE,
  });

  await app.listen({ host: config.API_HOST, port: config.API_PORT });
  logger.info({ port: config.API_PORT }, 'API server started');

  const shutdown = async () => {
    logger.info({}, 'Shutting down API server');
    await app.close();
    await closeRedis();
    await closePool();
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown());
  process.on('SIGINT', () => void shutdown());
}

main().catch((err) => {
  logger.fatal({ err: err instanceof Error ? err.message : String(err) }, 'Failed to start API');
  process.exit(1);
});
