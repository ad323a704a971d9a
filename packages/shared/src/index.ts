export { createLogger, redact, type SafeLogger } from './logger';
export { AppError, ErrorCode } from './errors';
export {
  loadConfig,
  type BaseConfig,
  type ApiConfig,
  type WorkerConfig,
  BaseConfigSchema,
  DatabaseConfigSchema,
  RedisConfigSchema,
  NatsConfigSchema,
  JwtConfigSchema,
  CareConfigSchema,
  ScheduleConfigSchema,
  ApiConfigSchema,
  WorkerConfigSchema,
} from './config';
export { touchHealthFile, startHealthBeat, type HealthBeatOptions } from './healthcheck';
export { PepperedCredentialSecrets } from './credential-secrets';
export { RedisAttemptStore, InMemoryAttemptStore, type AttemptRedis } from './attempt-store';
export { JoseTokenService, type TokenService, type TokenScope } from './auth/token-service';
export { initRedis, getRedis, closeRedis } from './redis';
