import fs from 'fs';
import path from 'path';
import { Database } from '../postgres';
import { logger } from '../../utils/logger';

export const MIGRATIONS = [
  '001_create_clients_table.sql',
  '002_create_traffic_tables.sql',
  '003_create_sessions_table.sql',
];

// tsc does not copy the .sql files, so a build in dist/ reads them from src/
function resolveMigrationsDir(): string {
  const sourceDir = __dirname.replace(`${path.sep}dist${path.sep}`, `${path.sep}src${path.sep}`);
  return fs.existsSync(path.join(__dirname, MIGRATIONS[0])) ? __dirname : sourceDir;
}

export async function runMigrations(db: Database, migrationsDir = resolveMigrationsDir()): Promise<string[]> {
  try {
    logger.info('Running database migrations...');

    await db.query(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        version VARCHAR(255) PRIMARY KEY,
        applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);

    const appliedMigrations = await db.query<{ version: string }>(
      'SELECT version FROM schema_migrations ORDER BY version'
    );
    const appliedVersions = new Set(appliedMigrations.map((m) => m.version));
    const applied: string[] = [];

    for (const migration of MIGRATIONS) {
      const version = migration.replace('.sql', '');
      if (appliedVersions.has(version)) {
        logger.debug(`Migration ${version} already applied, skipping`);
        continue;
      }

      logger.info(`Applying migration ${version}...`);
      const sql = fs.readFileSync(path.join(migrationsDir, migration), 'utf-8');

      await db.transaction(async (tx) => {
        await tx.query(sql);
        await tx.query('INSERT INTO schema_migrations (version) VALUES ($1)', [version]);
      });

      applied.push(version);
      logger.info(`Migration ${version} applied successfully`);
    }

    logger.info('All migrations completed successfully', { applied: applied.length });
    return applied;
  } catch (error) {
    logger.error('Migration failed', { error });
    throw error;
  }
}
