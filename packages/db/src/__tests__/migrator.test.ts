import { describe, it, expect } from 'vitest';
import { listMigrationFiles } from '../migrator';

describe('listMigrationFiles', () => {
  it('lists the SQL migrations in apply order', async () => {
    expect(await listMigrationFiles()).toEqual([
      '001_pairings.sql',
      '002_daily_and_escalation.sql',
      '003_outbox.sql',
      '004_credential_code_unique.sql',
    ]);
  });
});
