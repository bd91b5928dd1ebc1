/**
 * MIGRATION RUNNER
 *
 * Applies src/database/migrations/*.sql in name order, once each.
 */

import fs from 'fs';
import path from 'path';
import { DatabaseService } from './DatabaseService';
import { createLogger } from '../services/Logger';

const logger = createLogger('Migrations');

// Compiled output does not carry the .sql files; fall back to the sources
const CANDIDATE_DIRS = [
  path.join(__dirname, 'migrations'),
  path.resolve(__dirname, '..', '..', '..', 'src', 'database', 'migrations'),
];

export function findMigrationsDir(): string {
  const dir = CANDIDATE_DIRS.find(candidate => fs.existsSync(candidate));
  if (!dir) {
    throw new Error(`Migrations directory not found (looked in ${CANDIDATE_DIRS.join(', ')})`);
  }
  return dir;
}

export function listMigrations(dir: string = findMigrationsDir()): string[] {
  return fs
    .readdirSync(dir)
    .filter(file => file.endsWith('.sql'))
    .sort();
}

export async function runMigrations(db: DatabaseService, dir: string = findMigrationsDir()): Promise<string[]> {
  await db.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      name        TEXT        PRIMARY KEY,
      applied_at  TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);

  const applied = new Set(
    (await db.queryMany<{ name: string }>('SELECT name FROM schema_migrations')).map(row => row.name)
  );

  const ran: string[] = [];
  for (const file of listMigrations(dir)) {
    if (applied.has(file)) continue;

    const sql = fs.readFileSync(path.join(dir, file), 'utf8');
    logger.info(`📦 Applying migration ${file}`);
    await db.query(sql);
    await db.query('INSERT INTO schema_migrations (name) VALUES ($1)', [file]);
    ran.push(file);
  }

  if (ran.length === 0) {
    logger.info('✅ Schema up to date');
  }
  return ran;
}
