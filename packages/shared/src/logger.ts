import pino from 'pino';

const PII_PATTERNS = new Set([
  'password',
  'secret',
  'pepper',
  'token',
  'accesstoken',
  'sessiontoken',
  'linktoken',
  'code',
  'shortcode',
  'ip',
  'ipaddress',
  'remoteaddress',
  'deviceid',
  'authorization',
  'cookie',
  'body',
  'contactref',
  'contactchain',
  'dependentref',
  'note',
  'caregivernote',
  'feedback',
]);

function isPiiKey(key: string): boolean {
  return PII_PATTERNS.has(key.toLowerCase());
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value) && !(value instanceof Date);
}

function sanitizeValue(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sanitizeValue);
  if (value instanceof Error) return { name: value.name, message: value.message };
  if (isPlainObject(value)) return redact(value);
  return value;
}

/** Replaces secret and personal fields at any depth with `[REDACTED]`. */
export function redact(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    result[key] = isPiiKey(key) ? '[REDACTED]' : sanitizeValue(value);
  }
  return result;
}

export interface SafeLogger {
  info(meta: Record<string, unknown>, msg: string): void;
  warn(meta: Record<string, unknown>, msg: string): void;
  error(meta: Record<string, unknown>, msg: string): void;
  debug(meta: Record<string, unknown>, msg: string): void;
  fatal(meta: Record<string, unknown>, msg: string): void;
  child(bindings: Record<string, unknown>): SafeLogger;
}

function wrapPino(logger: pino.Logger): SafeLogger {
  return {
    info(meta: Record<string, unknown>, msg: string) {
      logger.info(redact(meta), msg);
    },
    warn(meta: Record<string, unknown>, msg: string) {
      logger.warn(redact(meta), msg);
    },
    error(meta: Record<string, unknown>, msg: string) {
      logger.error(redact(meta), msg);
    },
    debug(meta: Record<string, unknown>, msg: string) {
      logger.debug(redact(meta), msg);
    },
    fatal(meta: Record<string, unknown>, msg: string) {
      logger.fatal(redact(meta), msg);
    },
    child(bindings: Record<string, unknown>): SafeLogger {
      return wrapPino(logger.child(redact(bindings)));
    },
  };
}

export function createLogger(opts: { name: string; level?: string }): SafeLogger {
  const pinoInstance = pino({
    name: opts.name,
    level: opts.level ?? 'info',
    timestamp: pino.stdTimeFunctions.isoTime,
  });
  return wrapPino(pinoInstance);
}
