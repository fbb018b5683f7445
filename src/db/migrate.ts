import pool, { withTransaction } from '../config/database';
import fs from 'fs';
import path from 'path';

/**
 * Apply every `migrations/*.sql` file not yet recorded in `schema_migrations`,
 * in file-name order, each in its own transaction.
 */
async function migrate() {
  try {
    await pool.query(
      `CREATE TABLE IF NOT EXISTS schema_migrations (
         name        TEXT PRIMARY KEY,
         applied_at  TIMESTAMPTZ NOT NULL DEFAULT NOW()
       )`
    );
    const applied = new Set(
      (await pool.query<{ name: string }>('SELECT name FROM schema_migrations')).rows.map((r) => r.name)
    );

    const migrationsDir = path.join(__dirname, '..', '..', 'migrations');
    const pending = fs
      .readdirSync(migrationsDir)
      .filter((f) => f.endsWith('.sql') && !applied.has(f))
      .sort();

    console.log(`[Migrate] ${pending.length} pending migration(s)`);

    for (const file of pending) {
      const sql = fs.readFileSync(path.join(migrationsDir, file), 'utf-8');
      await withTransaction(async (client) => {
        await client.query(sql);
        await client.query('INSERT INTO schema_migrations (name) VALUES ($1)', [file]);
      });
      console.log(`[Migrate]   applied ${file}`);
    }

    console.log('[Migrate] Schema is up to date.');
  } catch (err) {
    console.error('[Migrate] Migration failed:', err);
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

void migrate();
