import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { type PoolClient } from 'pg';
import { createLogger } from '@careline/shared';

const logger = createLogger({ name: 'migrator' });

const MIGRATIONS_DIR = join(__dirname, '..', 'migrations');

export async function listMigrationFiles(dir: string = MIGRATIONS_DIR): Promise<string[]> {
  return (await readdir(dir)).filter((f) => f.endsWith('.sql')).sort();
}

/** Applies every migration not yet recorded in `_migrations`, each in its own transaction. */
export async function applyMigrations(client: PoolClient, dir: string = MIGRATIONS_DIR): Promise<string[]> {
  await client.query(`
    CREATE TABLE IF NOT EXISTS _migrations (
      name VARCHAR(255) PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);

  const applied = await client.query<{ name: string }>('SELECT name FROM _migrations ORDER BY name');
  const appliedSet = new Set(applied.rows.map((r) => r.name));
  const newlyApplied: string[] = [];

  for (const file of await listMigrationFiles(dir)) {
    if (appliedSet.has(file)) continue;

    const sql = await readFile(join(dir, file), 'utf-8');

    await client.query('BEGIN');
    try {
      await client.query(sql);
      await client.query('INSERT INTO _migrations (name) VALUES ($1)', [file]);
      await client.query('COMMIT');
      logger.info({ file }, 'Migration applied');
      newlyApplied.push(file);
    } catch (err) {
      await client.query('ROLLBACK');
      throw err;
    }
  }

  return newlyApplied;
}
