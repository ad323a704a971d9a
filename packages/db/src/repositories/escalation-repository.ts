import { type PoolClient } from 'pg';
import {
  ESCALATION_STAGES,
  type EpisodeResolution,
  type EscalationEpisode,
  type EscalationRepository,
  type EscalationStage,
  type EscalationTrigger,
  type NewEpisode,
} from '@careline/domain';
import { type Row, int, json, oneOf, text, timestamp, timestampOrNull } from '../rows';

const TRIGGERS: readonly EscalationTrigger[] = ['help_requested', 'confirmation_missed'];

const COLUMNS = `id, pairing_id, daily_status_id, trigger, stage, contact_index,
       primary_notified_at, backup_notified_at, exhausted_at, last_notified_at,
       resolution, resolved_at, closed_at, created_at`;

export class PgEscalationRepository implements EscalationRepository<PoolClient> {
  async create(client: PoolClient, episode: NewEpisode): Promise<EscalationEpisode | null> {
    const result = await client.query<Row>(
      `INSERT INTO escalation_episodes
         (id, pairing_id, daily_status_id, trigger, stage, contact_index,
          primary_notified_at, exhausted_at, last_notified_at, created_at)
       VALUES ($1, $2, $3, $4, $5::text, $6,
               CASE WHEN $5::text = 'notify_primary' THEN $7::timestamptz END,
               CASE WHEN $5::text = 'exhausted' THEN $7::timestamptz END,
               $7, $7)
       ON CONFLICT (daily_status_id) DO NOTHING
       RETURNING ${COLUMNS}`,
      [
        episode.id,
        episode.pairingId,
        episode.dailyStatusId,
        episode.trigger,
        episode.stage,
        episode.contactIndex,
        episode.at,
      ],
    );
    return result.rows[0] ? mapEpisodeRow(result.rows[0]) : null;
  }

  async findById(client: PoolClient, id: string): Promise<EscalationEpisode | null> {
    const result = await client.query<Row>(`SELECT ${COLUMNS} FROM escalation_episodes WHERE id = $1`, [id]);
    return result.rows[0] ? mapEpisodeRow(result.rows[0]) : null;
  }

  async findByDailyStatus(client: PoolClient, dailyStatusId: string): Promise<EscalationEpisode | null> {
    const result = await client.query<Row>(
      `SELECT ${COLUMNS} FROM escalation_episodes WHERE daily_status_id = $1`,
      [dailyStatusId],
    );
    return result.rows[0] ? mapEpisodeRow(result.rows[0]) : null;
  }

  async advanceStage(
    client: PoolClient,
    id: string,
    expected: { stage: EscalationStage; contactIndex: number },
    next: { stage: EscalationStage; contactIndex: number },
    at: Date,
  ): Promise<EscalationEpisode | null> {
    const result = await client.query<Row>(
      `UPDATE escalation_episodes
       SET stage = $4::text,
           contact_index = $5,
           backup_notified_at = CASE WHEN $4::text = 'notify_backup' THEN $6::timestamptz ELSE backup_notified_at END,
           exhausted_at = CASE WHEN $4::text = 'exhausted' THEN $6::timestamptz ELSE exhausted_at END,
           last_notified_at = $6
       WHERE id = $1 AND stage = $2 AND contact_index = $3
         AND resolved_at IS NULL AND closed_at IS NULL
       RETURNING ${COLUMNS}`,
      [id, expected.stage, expected.contactIndex, next.stage, next.contactIndex, at],
    );
    return result.rows[0] ? mapEpisodeRow(result.rows[0]) : null;
  }

  async resolve(
    client: PoolClient,
    id: string,
    resolution: EpisodeResolution,
    at: Date,
  ): Promise<EscalationEpisode | null> {
    const result = await client.query<Row>(
      `UPDATE escalation_episodes
       SET resolution = $2, resolved_at = $3
       WHERE id = $1 AND resolved_at IS NULL AND closed_at IS NULL
       RETURNING ${COLUMNS}`,
      [id, JSON.stringify(resolution), at],
    );
    return result.rows[0] ? mapEpisodeRow(result.rows[0]) : null;
  }

  async close(client: PoolClient, id: string, at: Date): Promise<boolean> {
    const result = await client.query(
      `UPDATE escalation_episodes SET closed_at = $2 WHERE id = $1 AND closed_at IS NULL`,
      [id, at],
    );
    return result.rowCount === 1;
  }

  async listStale(client: PoolClient, notifiedBefore: Date, limit: number): Promise<EscalationEpisode[]> {
    const result = await client.query<Row>(
      `SELECT ${COLUMNS} FROM escalation_episodes
       WHERE resolved_at IS NULL AND closed_at IS NULL AND stage <> 'exhausted'
         AND last_notified_at <= $1
       ORDER BY last_notified_at
       LIMIT $2`,
      [notifiedBefore, limit],
    );
    return result.rows.map(mapEpisodeRow);
  }
}

function mapResolution(row: Row): EpisodeResolution | null {
  if (row.resolution === null || row.resolution === undefined) return null;
  const value = json(row, 'resolution');
  if (value.outcome === 'dependent_confirmed') return { outcome: 'dependent_confirmed' };
  if (value.outcome === 'contact_reached' && typeof value.contactRef === 'string') {
    return { outcome: 'contact_reached', contactRef: value.contactRef };
  }
  throw new Error('Column resolution: unrecognised episode resolution');
}

function mapEpisodeRow(row: Row): EscalationEpisode {
  return {
    id: text(row, 'id'),
    pairingId: text(row, 'pairing_id'),
    dailyStatusId: text(row, 'daily_status_id'),
    trigger: oneOf(row, 'trigger', TRIGGERS),
    stage: oneOf(row, 'stage', ESCALATION_STAGES),
    contactIndex: int(row, 'contact_index'),
    primaryNotifiedAt: timestampOrNull(row, 'primary_notified_at'),
    backupNotifiedAt: timestampOrNull(row, 'backup_notified_at'),
    exhaustedAt: timestampOrNull(row, 'exhausted_at'),
    lastNotifiedAt: timestampOrNull(row, 'last_notified_at'),
    resolution: mapResolution(row),
    resolvedAt: timestampOrNull(row, 'resolved_at'),
    closedAt: timestampOrNull(row, 'closed_at'),
    createdAt: timestamp(row, 'created_at'),
  };
}
