import { type PoolClient } from 'pg';
import { DEBRIEF_OUTCOMES, type Debrief, type DebriefRepository, type NewDebrief } from '@careline/domain';
import { type Row, int, oneOf, text, textOrNull, timestamp } from '../rows';

const COLUMNS = 'id, episode_id, pairing_id, outcome, difficulty, feedback, supersedes, created_at';

export class PgDebriefRepository implements DebriefRepository<PoolClient> {
  /** The unique index on `supersedes` turns a second correction into a no-op. */
  async create(client: PoolClient, debrief: NewDebrief): Promise<Debrief | null> {
    const result = await client.query<Row>(
      `INSERT INTO debriefs (id, episode_id, pairing_id, outcome, difficulty, feedback, supersedes)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       ON CONFLICT (supersedes) DO NOTHING
       RETURNING ${COLUMNS}`,
      [
        debrief.id,
        debrief.episodeId,
        debrief.pairingId,
        debrief.outcome,
        debrief.difficulty,
        debrief.feedback,
        debrief.supersedes,
      ],
    );
    return result.rows[0] ? mapDebriefRow(result.rows[0]) : null;
  }

  async findById(client: PoolClient, id: string): Promise<Debrief | null> {
    const result = await client.query<Row>(`SELECT ${COLUMNS} FROM debriefs WHERE id = $1`, [id]);
    return result.rows[0] ? mapDebriefRow(result.rows[0]) : null;
  }

  async listByEpisode(client: PoolClient, episodeId: string): Promise<Debrief[]> {
    const result = await client.query<Row>(
      `SELECT ${COLUMNS} FROM debriefs WHERE episode_id = $1 ORDER BY created_at, id`,
      [episodeId],
    );
    return result.rows.map(mapDebriefRow);
  }
}

function mapDebriefRow(row: Row): Debrief {
  return {
    id: text(row, 'id'),
    episodeId: text(row, 'episode_id'),
    pairingId: text(row, 'pairing_id'),
    outcome: oneOf(row, 'outcome', DEBRIEF_OUTCOMES),
    difficulty: int(row, 'difficulty'),
    feedback: textOrNull(row, 'feedback'),
    supersedes: textOrNull(row, 'supersedes'),
    createdAt: timestamp(row, 'created_at'),
  };
}
