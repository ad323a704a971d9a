import { type PoolClient } from 'pg';
import { type Row, int, json, text, timestamp, timestampOrNull } from './rows';

export interface OutboxEvent {
  id: string;
  aggregateType: string;
  aggregateId: string;
  eventType: string;
  payload: Record<string, unknown>;
  createdAt: Date;
  publishedAt: Date | null;
  retryCount: number;
}

export async function appendOutboxEvent(
  client: PoolClient,
  id: string,
  event: {
    aggregateType: string;
    aggregateId: string;
    eventType: string;
    payload: Record<string, unknown>;
  },
): Promise<void> {
  await client.query(
    `INSERT INTO outbox_events (id, aggregate_type, aggregate_id, event_type, payload)
     VALUES ($1, $2, $3, $4, $5)`,
    [id, event.aggregateType, event.aggregateId, event.eventType, JSON.stringify(event.payload)],
  );
}

export async function fetchUnpublishedEvents(
  client: PoolClient,
  batchSize: number,
): Promise<OutboxEvent[]> {
  const result = await client.query<Row>(
    `SELECT id, aggregate_type, aggregate_id, event_type, payload,
            created_at, published_at, retry_count
     FROM outbox_events
     WHERE published_at IS NULL
     ORDER BY created_at ASC
     LIMIT $1
     FOR UPDATE SKIP LOCKED`,
    [batchSize],
  );
  return result.rows.map(mapRow);
}

export async function markPublished(
  client: PoolClient,
  ids: string[],
): Promise<void> {
  if (ids.length === 0) return;
  await client.query(
    `UPDATE outbox_events SET published_at = NOW() WHERE id = ANY($1::text[])`,
    [ids],
  );
}

export async function incrementRetryCount(
  client: PoolClient,
  ids: string[],
): Promise<void> {
  if (ids.length === 0) return;
  await client.query(
    `UPDATE outbox_events SET retry_count = retry_count + 1 WHERE id = ANY($1::text[])`,
    [ids],
  );
}

/** Deletes published rows older than `before`; returns how many went. */
export async function deletePublishedBefore(
  client: PoolClient,
  before: Date,
): Promise<number> {
  const result = await client.query(
    `DELETE FROM outbox_events WHERE published_at IS NOT NULL AND published_at < $1`,
    [before],
  );
  return result.rowCount ?? 0;
}

function mapRow(row: Row): OutboxEvent {
  return {
    id: text(row, 'id'),
    aggregateType: text(row, 'aggregate_type'),
    aggregateId: text(row, 'aggregate_id'),
    eventType: text(row, 'event_type'),
    payload: json(row, 'payload'),
    createdAt: timestamp(row, 'created_at'),
    publishedAt: timestampOrNull(row, 'published_at'),
    retryCount: int(row, 'retry_count'),
  };
}
