/**
 * Database Migration Runner
 *
 * Applies the SQL files in migrations/ in name order.
 */

import fs from 'fs';
import path from 'path';
import { Pool } from 'pg';
import { config, logger } from '@aum-scraper/shared';

const pool = new Pool({
  connectionString: process.env.DATABASE_URL || config.databaseUrl,
});

function migrationsDir(): string {
  // Beside the source, or relative to the workspace when run from dist/
  const candidates = [path.join(__dirname, 'migrations'), path.join(process.cwd(), 'src/migrations')];
  const found = candidates.find((dir) => fs.existsSync(dir));
  if (!found) throw new Error(`Migrations directory not found (looked in ${candidates.join(', ')})`);
  return found;
}

async function runMigrations(): Promise<void> {
  const client = await pool.connect();

  try {
    const dir = migrationsDir();
    const files = fs
      .readdirSync(dir)
      .filter((f) => f.endsWith('.sql'))
      .sort();

    logger.info('Running database migrations', { count: files.length });

    for (const file of files) {
      await client.query(fs.readFileSync(path.join(dir, file), 'utf-8'));
      logger.info('Migration complete', { file });
    }
  } catch (error) {
    logger.error('Migration failed', error);
    throw error;
  } finally {
    client.release();
    await pool.end();
  }
}

runMigrations()
  .then(() => process.exit(0))
  .catch(() => process.exit(1));
