import { type EscalationCoordinator } from '@careline/domain';
import { createLogger } from '@careline/shared';

const logger = createLogger({ name: 'worker:stale-episodes' });

export async function runStaleEpisodeJob<Tx>(
  coordinator: EscalationCoordinator<Tx>,
  advanceAfterMs: number,
  now: Date = new Date(),
): Promise<number> {
  const { advanced, failed } = await coordinator.sweepStaleEpisodes(now, advanceAfterMs);
  if (failed > 0) {
    logger.warn({ advanced, failed }, 'Stale episode sweep skipped episodes that failed');
  }
  logger.debug({ advanced }, 'Stale episode sweep completed');
  return advanced;
}
