import { createLogger } from '@careline/shared';
import { withTransaction, deletePublishedBefore } from '@careline/db';

const logger = createLogger({ name: 'worker:retention' });

const DAY_MS = 24 * 60 * 60 * 1000;

export async function runRetentionJob(retentionDays: number, now: Date = new Date()): Promise<void> {
  logger.info({}, 'Retention sweep started');

  const before = new Date(now.getTime() - retentionDays * DAY_MS);
  const count = await withTransaction((tx) => deletePublishedBefore(tx, before));
  if (count > 0) {
    logger.info({ count }, 'Cleaned up old outbox events');
  }

  logger.info({}, 'Retention sweep completed');
}
