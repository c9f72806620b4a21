import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import { pathToFileURL } from 'url';
import { logger } from '../logger.js';
import { pool, withTransaction, type Db } from './pool.js';

const MIGRATIONS_DIR = join(process.cwd(), 'src/infra/db/migrations');

interface Migration {
  filename: string;
  version: number;
}

async function getMigrations(dir: string): Promise<Migration[]> {
  const files = await readdir(dir);
  return files
    .filter((f) => f.endsWith('.sql'))
    .map((filename) => {
      const match = filename.match(/^(\d+)_/);
      if (!match) {
        throw new Error(`Invalid migration filename: ${filename}`);
      }
      return {
        filename,
        version: parseInt(match[1], 10),
      };
    })
    .sort((a, b) => a.version - b.version);
}

async function ensureMigrationsTable(db: Db): Promise<void> {
  await db.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
}

async function getAppliedMigrations(db: Db): Promise<number[]> {
  const result = await db.query<{ version: number }>(
    'SELECT version FROM schema_migrations ORDER BY version'
  );
  return result.rows.map((row) => row.version);
}

async function applyMigration(db: Db, dir: string, migration: Migration): Promise<void> {
  const sql = await readFile(join(dir, migration.filename), 'utf-8');

  await withTransaction(db, async (client) => {
    await client.query(sql);
    await client.query('INSERT INTO schema_migrations (version) VALUES ($1)', [
      migration.version,
    ]);
  });
  logger.info({ version: migration.version, file: migration.filename }, 'Applied migration');
}

/**
 * Apply every pending migration in version order. Returns the versions
 * applied by this run.
 */
export async function runMigrations(db: Db, dir = MIGRATIONS_DIR): Promise<number[]> {
  await ensureMigrationsTable(db);
  const migrations = await getMigrations(dir);
  const applied = await getAppliedMigrations(db);

  const pending = migrations.filter((m) => !applied.includes(m.version));
  if (pending.length === 0) {
    logger.info('No pending migrations');
    return [];
  }

  logger.info({ count: pending.length }, 'Applying pending migrations');
  for (const migration of pending) {
    await applyMigration(db, dir, migration);
  }
  return pending.map((m) => m.version);
}

async function main(): Promise<void> {
  try {
    await runMigrations(pool);
    logger.info('All migrations applied successfully');
  } catch (error) {
    logger.error({ err: error }, 'Migration failed');
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  void main();
}
