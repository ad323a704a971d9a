import { type NatsConnection, StringCodec } from 'nats';
import { fetchUnpublishedEvents, markPublished, incrementRetryCount, getPool, type OutboxEvent } from '@careline/db';
import { createLogger } from '@careline/shared';
import { createEnvelope, resolveOutboxSubject } from '@careline/proto';

const logger = createLogger({ name: 'worker:outbox' });
const sc = StringCodec();

export interface OutboxMessage {
  subject: string;
  data: string;
}

export function toOutboxMessage(event: OutboxEvent): OutboxMessage {
  const envelope = createEnvelope(event.id, event.eventType, event.payload, event.createdAt);
  return {
    subject: resolveOutboxSubject(event.aggregateType, event.aggregateId, event.eventType),
    data: JSON.stringify(envelope),
  };
}

/**
 * Publishes each event that could be handed to NATS and counts a retry
 * against the rest; those stay unpublished for the next poll.
 */
export function publishBatch(
  events: OutboxEvent[],
  publish: (message: OutboxMessage) => void,
): { published: string[]; failed: string[] } {
  const published: string[] = [];
  const failed: string[] = [];

  for (const event of events) {
    try {
      publish(toOutboxMessage(event));
      published.push(event.id);
    } catch (err) {
      logger.warn(
        { eventId: event.id, retryCount: event.retryCount, err: err instanceof Error ? err.message : String(err) },
        'Outbox publish failed',
      );
      failed.push(event.id);
    }
  }

  return { published, failed };
}

export async function startOutboxPublisher(
  natsConn: NatsConnection,
  opts: { pollIntervalMs: number; batchSize: number },
): Promise<{ stop: () => void }> {
  let running = true;
  const publish = (message: OutboxMessage) => natsConn.publish(message.subject, sc.encode(message.data));

  const loop = async () => {
    while (running) {
      try {
        const client = await getPool().connect();
        try {
          await client.query('BEGIN');
          const events = await fetchUnpublishedEvents(client, opts.batchSize);

          if (events.length > 0) {
            const { published, failed } = publishBatch(events, publish);
            await markPublished(client, published);
            await incrementRetryCount(client, failed);
            await client.query('COMMIT');

            logger.info({ count: published.length, failed: failed.length }, 'Published outbox events');
          } else {
            await client.query('COMMIT');
          }
        } catch (innerErr) {
          await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
            logger.error(
              { err: rollbackErr instanceof Error ? rollbackErr.message : String(rollbackErr) },
              'Outbox rollback failed',
            );
          });
          throw innerErr;
        } finally {
          client.release();
        }
      } catch (err) {
        logger.error(
          { err: err instanceof Error ? err.message : String(err) },
          'Outbox publisher error',
        );
      }

      await sleep(opts.pollIntervalMs);
    }
  };

  loop().catch((err) => {
    logger.fatal(
      { err: err instanceof Error ? err.message : String(err) },
      'Outbox publisher crashed',
    );
  });

  return {
    stop: () => {
      running = false;
    },
  };
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
