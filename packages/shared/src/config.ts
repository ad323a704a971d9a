import { z } from 'zod';
import { isValidTimeZone, parseTimeOfDay } from '@careline/domain';

export const BaseConfigSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
});

export type BaseConfig = z.infer<typeof BaseConfigSchema>;

export const DatabaseConfigSchema = z.object({
  DATABASE_URL: z.string().min(1),
  DATABASE_POOL_MAX: z.coerce.number().int().positive().default(10),
});

export const RedisConfigSchema = z.object({
  REDIS_URL: z.string().default('redis://localhost:6379'),
});

export const NatsConfigSchema = z.object({
  NATS_URL: z.string().default('nats://localhost:4222'),
});

const JwtKeySchema = z.object({
  kid: z.string().min(1),
  secret: z.string().min(32),
});

export const JwtConfigSchema = z.object({
  JWT_ACTIVE_KID: z.string().min(1),
  JWT_KEYS: z
    .string()
    .transform((raw, ctx) => {
      try {
        const parsed: unknown = JSON.parse(raw);
        return parsed;
      } catch {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'JWT_KEYS must be a JSON array' });
        return z.NEVER;
      }
    })
    .pipe(z.array(JwtKeySchema).min(1)),
  JWT_ISSUER: z.string().default('careline'),
  DEPENDENT_SESSION_TTL_SECONDS: z.coerce.number().int().positive().default(30 * 24 * 60 * 60),
});

/** Secrets and thresholds of pairing issuance and redemption. */
export const CareConfigSchema = z.object({
  PAIR_TOKEN_PEPPER: z.string().min(16, 'PAIR_TOKEN_PEPPER must be at least 16 characters'),
  SHORT_CODE_FAIL_MAX: z.coerce.number().int().positive().default(5),
  SHORT_CODE_FAIL_WINDOW_MINUTES: z.coerce.number().int().positive().default(30),
  SHORT_CODE_LOCK_MINUTES: z.coerce.number().int().positive().default(30),
  CREDENTIAL_TTL_MINUTES: z.coerce.number().int().positive().default(3 * 24 * 60),
});

export const ScheduleConfigSchema = z.object({
  APP_TIMEZONE: z
    .string()
    .default('Asia/Shanghai')
    .refine(isValidTimeZone, { message: 'APP_TIMEZONE must be an IANA time zone' }),
  CONFIRM_DEADLINE: z
    .string()
    .default('20:00')
    .transform((raw, ctx) => {
      const parsed = parseTimeOfDay(raw);
      if (!parsed) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'CONFIRM_DEADLINE must be HH:MM' });
        return z.NEVER;
      }
      return parsed;
    }),
  ESCALATION_ADVANCE_AFTER_MINUTES: z.coerce.number().int().positive().default(120),
});

export const ApiConfigSchema = BaseConfigSchema.merge(DatabaseConfigSchema)
  .merge(RedisConfigSchema)
  .merge(JwtConfigSchema)
  .merge(CareConfigSchema)
  .merge(ScheduleConfigSchema)
  .extend({
    API_HOST: z.string().default('0.0.0.0'),
    API_PORT: z.coerce.number().default(3000),
    REDEEM_RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(20),
  });

export type ApiConfig = z.infer<typeof ApiConfigSchema>;

export const WorkerConfigSchema = BaseConfigSchema.merge(DatabaseConfigSchema)
  .merge(NatsConfigSchema)
  .merge(CareConfigSchema)
  .merge(ScheduleConfigSchema)
  .extend({
    OUTBOX_POLL_INTERVAL_MS: z.coerce.number().default(1000),
    OUTBOX_BATCH_SIZE: z.coerce.number().default(100),
    OUTBOX_RETENTION_DAYS: z.coerce.number().int().positive().default(7),
    CREDENTIAL_EXPIRY_INTERVAL_MS: z.coerce.number().default(60_000),
    OVERDUE_SWEEP_INTERVAL_MS: z.coerce.number().default(300_000),
    STALE_EPISODE_INTERVAL_MS: z.coerce.number().default(300_000),
    WORKER_HEALTHCHECK_PATH: z.string().default('/tmp/.worker-healthy'),
  });

export type WorkerConfig = z.infer<typeof WorkerConfigSchema>;

export function loadConfig<T extends z.ZodType>(
  schema: T,
  env: Record<string, string | undefined> = process.env,
): z.infer<T> {
  const result = schema.safeParse(env);
  if (!result.success) {
    const formatted = result.error.issues
      .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Config validation failed:\n${formatted}`);
  }
  return result.data;
}
