import { type PoolClient } from 'pg';
import {
  DAILY_STATUS_KINDS,
  ESCALATION_STAGES,
  isCaregiverAction,
  type CaregiverAction,
  type DailyStatus,
  type DailyStatusKind,
  type DailyStatusPatch,
  type DailyStatusRepository,
  type EscalationStage,
  type LocalDate,
} from '@careline/domain';
import { type Row, bool, oneOf, oneOfOrNull, text, textArray, textOrNull, timestamp, timestampOrNull } from '../rows';

// DATE is read back as text so no time zone conversion touches it.
const COLUMNS = `id, pairing_id, status_date::text AS status_date, status, confirmed_at, help_flag,
       escalation_stage, caregiver_actions, caregiver_note, created_at, updated_at`;

export class PgDailyStatusRepository implements DailyStatusRepository<PoolClient> {
  async findByPairingAndDate(client: PoolClient, pairingId: string, date: LocalDate): Promise<DailyStatus | null> {
    const result = await client.query<Row>(
      `SELECT ${COLUMNS} FROM daily_statuses WHERE pairing_id = $1 AND status_date = $2::date`,
      [pairingId, date],
    );
    return result.rows[0] ? mapDailyStatusRow(result.rows[0]) : null;
  }

  async ensure(
    client: PoolClient,
    row: { id: string; pairingId: string; statusDate: LocalDate },
  ): Promise<DailyStatus> {
    await client.query(
      `INSERT INTO daily_statuses (id, pairing_id, status_date)
       VALUES ($1, $2, $3::date)
       ON CONFLICT (pairing_id, status_date) DO NOTHING`,
      [row.id, row.pairingId, row.statusDate],
    );
    const existing = await this.findByPairingAndDate(client, row.pairingId, row.statusDate);
    if (!existing) {
      throw new Error(`Daily status for ${row.pairingId} on ${row.statusDate} missing after insert`);
    }
    return existing;
  }

  async transition(
    client: PoolClient,
    id: string,
    from: readonly DailyStatusKind[],
    patch: DailyStatusPatch,
    at: Date,
  ): Promise<DailyStatus | null> {
    const result = await client.query<Row>(
      `UPDATE daily_statuses
       SET status = $3,
           confirmed_at = COALESCE($4, confirmed_at),
           help_flag = COALESCE($5, help_flag),
           escalation_stage = COALESCE($6, escalation_stage),
           updated_at = $7
       WHERE id = $1 AND status = ANY($2::text[])
       RETURNING ${COLUMNS}`,
      [
        id,
        [...from],
        patch.status,
        patch.confirmedAt ?? null,
        patch.helpFlag ?? null,
        patch.escalationStage ?? null,
        at,
      ],
    );
    return result.rows[0] ? mapDailyStatusRow(result.rows[0]) : null;
  }

  async updateEscalationStage(client: PoolClient, id: string, stage: EscalationStage, at: Date): Promise<void> {
    await client.query(
      `UPDATE daily_statuses SET escalation_stage = $2, updated_at = $3 WHERE id = $1`,
      [id, stage, at],
    );
  }

  async updateCaregiverActions(
    client: PoolClient,
    id: string,
    actions: CaregiverAction[],
    note: string | null,
    at: Date,
  ): Promise<DailyStatus> {
    const result = await client.query<Row>(
      `UPDATE daily_statuses
       SET caregiver_actions = $2, caregiver_note = $3, updated_at = $4
       WHERE id = $1
       RETURNING ${COLUMNS}`,
      [id, actions, note, at],
    );
    if (!result.rows[0]) throw new Error(`Daily status ${id} not found`);
    return mapDailyStatusRow(result.rows[0]);
  }

  async listSince(client: PoolClient, pairingId: string, since: LocalDate): Promise<DailyStatus[]> {
    const result = await client.query<Row>(
      `SELECT ${COLUMNS} FROM daily_statuses
       WHERE pairing_id = $1 AND status_date >= $2::date
       ORDER BY status_date`,
      [pairingId, since],
    );
    return result.rows.map(mapDailyStatusRow);
  }
}

function mapDailyStatusRow(row: Row): DailyStatus {
  return {
    id: text(row, 'id'),
    pairingId: text(row, 'pairing_id'),
    statusDate: text(row, 'status_date'),
    status: oneOf(row, 'status', DAILY_STATUS_KINDS),
    confirmedAt: timestampOrNull(row, 'confirmed_at'),
    helpFlag: bool(row, 'help_flag'),
    escalationStage: oneOfOrNull(row, 'escalation_stage', ESCALATION_STAGES),
    caregiverActions: textArray(row, 'caregiver_actions').filter(isCaregiverAction),
    caregiverNote: textOrNull(row, 'caregiver_note'),
    createdAt: timestamp(row, 'created_at'),
    updatedAt: timestamp(row, 'updated_at'),
  };
}
