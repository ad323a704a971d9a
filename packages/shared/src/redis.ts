import Redis from 'ioredis';
import { createLogger } from './logger';

const logger = createLogger({ name: 'redis' });

const KEY_PREFIX = 'careline:';

let client: Redis | null = null;

/** Every key the application writes is namespaced under `careline:`. */
export function initRedis(url: string): Redis {
  if (client) return client;
  client = new Redis(url, { lazyConnect: false, maxRetriesPerRequest: 3, keyPrefix: KEY_PREFIX });
  client.on('error', (err: Error) => {
    logger.error({ err: err.message }, 'Redis connection error');
  });
  logger.info({}, 'Redis client initialized');
  return client;
}

export function getRedis(): Redis {
  if (!client) throw new Error('Redis not initialized. Call initRedis() first.');
  return client;
}

export async function closeRedis(): Promise<void> {
  if (client) {
    await client.quit();
    client = null;
    logger.info({}, 'Redis client closed');
  }
}
