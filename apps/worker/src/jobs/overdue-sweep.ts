import { type DailyActionTracker, type TimeOfDay } from '@careline/domain';
import { createLogger } from '@careline/shared';

const logger = createLogger({ name: 'worker:overdue-sweep' });

/** Escalates pairings that missed today's confirmation deadline. Safe to run repeatedly. */
export async function runOverdueSweepJob<Tx>(
  tracker: DailyActionTracker<Tx>,
  deadline: TimeOfDay,
  now: Date = new Date(),
): Promise<number> {
  const { escalated, failed } = await tracker.sweepOverdue(now, deadline);
  if (failed > 0) {
    logger.warn({ escalated, failed }, 'Overdue sweep skipped pairings that failed');
  }
  logger.debug({ escalated, deadline: formatDeadline(deadline) }, 'Overdue sweep completed');
  return escalated;
}

function formatDeadline({ hour, minute }: TimeOfDay): string {
  return `${String(hour).padStart(2, '0')}:${String(minute).padStart(2, '0')}`;
}
