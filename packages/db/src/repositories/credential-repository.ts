import { type PoolClient } from 'pg';
import {
  type Credential,
  type CredentialRepository,
  type CredentialStatus,
  type NewCredential,
} from '@careline/domain';
import { type Row, oneOf, text, textOrNull, timestamp, timestampOrNull } from '../rows';

const CREDENTIAL_STATUSES: readonly CredentialStatus[] = ['issued', 'redeemed', 'expired'];

const COLUMNS = `id, pairing_id, code_hash, token_hash, community_code, status,
       expires_at, redeemed_at, created_at`;

export class PgCredentialRepository implements CredentialRepository<PoolClient> {
  async create(client: PoolClient, credential: NewCredential): Promise<Credential | null> {
    // No row comes back when an issued credential already holds the code hash.
    const result = await client.query<Row>(
      `INSERT INTO pairing_credentials (id, pairing_id, code_hash, token_hash, community_code, expires_at)
       VALUES ($1, $2, $3, $4, $5, $6)
       ON CONFLICT (code_hash) WHERE status = 'issued' DO NOTHING
       RETURNING ${COLUMNS}`,
      [
        credential.id,
        credential.pairingId,
        credential.codeHash,
        credential.tokenHash,
        credential.communityCode,
        credential.expiresAt,
      ],
    );
    return result.rows[0] ? mapCredentialRow(result.rows[0]) : null;
  }

  async findByCodeHash(client: PoolClient, codeHash: string): Promise<Credential | null> {
    const result = await client.query<Row>(
      `SELECT ${COLUMNS} FROM pairing_credentials
       WHERE code_hash = $1
       ORDER BY created_at DESC
       LIMIT 1`,
      [codeHash],
    );
    return result.rows[0] ? mapCredentialRow(result.rows[0]) : null;
  }

  async findByTokenHash(client: PoolClient, tokenHash: string): Promise<Credential | null> {
    const result = await client.query<Row>(
      `SELECT ${COLUMNS} FROM pairing_credentials WHERE token_hash = $1`,
      [tokenHash],
    );
    return result.rows[0] ? mapCredentialRow(result.rows[0]) : null;
  }

  async findLatestForPairing(client: PoolClient, pairingId: string): Promise<Credential | null> {
    const result = await client.query<Row>(
      `SELECT ${COLUMNS} FROM pairing_credentials
       WHERE pairing_id = $1
       ORDER BY created_at DESC
       LIMIT 1`,
      [pairingId],
    );
    return result.rows[0] ? mapCredentialRow(result.rows[0]) : null;
  }

  async existsUnexpiredWithCodeHash(client: PoolClient, codeHash: string, now: Date): Promise<boolean> {
    const result = await client.query<Row>(
      `SELECT 1 FROM pairing_credentials
       WHERE code_hash = $1 AND status <> 'expired' AND expires_at > $2
       LIMIT 1`,
      [codeHash, now],
    );
    return result.rows.length > 0;
  }

  async markRedeemed(client: PoolClient, id: string, at: Date): Promise<boolean> {
    const result = await client.query(
      `UPDATE pairing_credentials
       SET status = 'redeemed', redeemed_at = $2
       WHERE id = $1 AND redeemed_at IS NULL AND status = 'issued' AND expires_at > $2`,
      [id, at],
    );
    return result.rowCount === 1;
  }

  async markExpired(client: PoolClient, id: string): Promise<boolean> {
    const result = await client.query(
      `UPDATE pairing_credentials
       SET status = 'expired'
       WHERE id = $1 AND status = 'issued' AND redeemed_at IS NULL`,
      [id],
    );
    return result.rowCount === 1;
  }

  async listExpirable(client: PoolClient, now: Date, limit: number): Promise<Credential[]> {
    const result = await client.query<Row>(
      `SELECT ${COLUMNS} FROM pairing_credentials
       WHERE status = 'issued' AND redeemed_at IS NULL AND expires_at <= $1
       ORDER BY expires_at
       LIMIT $2`,
      [now, limit],
    );
    return result.rows.map(mapCredentialRow);
  }
}

function mapCredentialRow(row: Row): Credential {
  return {
    id: text(row, 'id'),
    pairingId: text(row, 'pairing_id'),
    codeHash: text(row, 'code_hash'),
    tokenHash: text(row, 'token_hash'),
    communityCode: textOrNull(row, 'community_code'),
    status: oneOf(row, 'status', CREDENTIAL_STATUSES),
    expiresAt: timestamp(row, 'expires_at'),
    redeemedAt: timestampOrNull(row, 'redeemed_at'),
    createdAt: timestamp(row, 'created_at'),
  };
}
