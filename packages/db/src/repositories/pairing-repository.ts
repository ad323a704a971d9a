import { type PoolClient } from 'pg';
import {
  PAIRING_STATUSES,
  type NewPairing,
  type Pairing,
  type PairingRepository,
  type PairingStatus,
} from '@careline/domain';
import { type Row, oneOf, text, textArray, textOrNull, timestamp, timestampOrNull } from '../rows';

const COLUMNS = `id, caregiver_id, dependent_ref, community_code, time_zone, contact_chain,
       status, created_at, expires_at, activated_at, revoked_at`;

export class PgPairingRepository implements PairingRepository<PoolClient> {
  async create(client: PoolClient, pairing: NewPairing): Promise<Pairing> {
    const result = await client.query<Row>(
      `INSERT INTO pairings (id, caregiver_id, dependent_ref, community_code, time_zone, contact_chain, expires_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       RETURNING ${COLUMNS}`,
      [
        pairing.id,
        pairing.caregiverId,
        pairing.dependentRef,
        pairing.communityCode,
        pairing.timeZone,
        pairing.contactChain,
        pairing.expiresAt,
      ],
    );
    return mapPairingRow(result.rows[0]);
  }

  async findById(client: PoolClient, id: string): Promise<Pairing | null> {
    const result = await client.query<Row>(`SELECT ${COLUMNS} FROM pairings WHERE id = $1`, [id]);
    return result.rows[0] ? mapPairingRow(result.rows[0]) : null;
  }

  async listByCaregiver(client: PoolClient, caregiverId: string): Promise<Pairing[]> {
    const result = await client.query<Row>(
      `SELECT ${COLUMNS} FROM pairings WHERE caregiver_id = $1 ORDER BY created_at DESC`,
      [caregiverId],
    );
    return result.rows.map(mapPairingRow);
  }

  async listActive(client: PoolClient, page: { afterId: string | null; limit: number }): Promise<Pairing[]> {
    if (page.afterId) {
      const result = await client.query<Row>(
        `SELECT ${COLUMNS} FROM pairings
         WHERE status = 'active' AND id > $1
         ORDER BY id
         LIMIT $2`,
        [page.afterId, page.limit],
      );
      return result.rows.map(mapPairingRow);
    }

    const result = await client.query<Row>(
      `SELECT ${COLUMNS} FROM pairings WHERE status = 'active' ORDER BY id LIMIT $1`,
      [page.limit],
    );
    return result.rows.map(mapPairingRow);
  }

  async transition(
    client: PoolClient,
    id: string,
    from: readonly PairingStatus[],
    to: PairingStatus,
    at: Date,
  ): Promise<Pairing | null> {
    const result = await client.query<Row>(
      `UPDATE pairings
       SET status = $3::text,
           activated_at = CASE WHEN $3::text = 'active' THEN $4::timestamptz ELSE activated_at END,
           expires_at = CASE WHEN $3::text = 'active' THEN NULL ELSE expires_at END,
           revoked_at = CASE WHEN $3::text = 'revoked' THEN $4::timestamptz ELSE revoked_at END
       WHERE id = $1 AND status = ANY($2::text[])
       RETURNING ${COLUMNS}`,
      [id, [...from], to, at],
    );
    return result.rows[0] ? mapPairingRow(result.rows[0]) : null;
  }

  async updateContactChain(client: PoolClient, id: string, contactChain: string[]): Promise<void> {
    await client.query(`UPDATE pairings SET contact_chain = $2 WHERE id = $1`, [id, contactChain]);
  }
}

function mapPairingRow(row: Row): Pairing {
  return {
    id: text(row, 'id'),
    caregiverId: text(row, 'caregiver_id'),
    dependentRef: text(row, 'dependent_ref'),
    communityCode: textOrNull(row, 'community_code'),
    timeZone: text(row, 'time_zone'),
    contactChain: textArray(row, 'contact_chain'),
    status: oneOf(row, 'status', PAIRING_STATUSES),
    createdAt: timestamp(row, 'created_at'),
    expiresAt: timestampOrNull(row, 'expires_at'),
    activatedAt: timestampOrNull(row, 'activated_at'),
    revokedAt: timestampOrNull(row, 'revoked_at'),
  };
}
