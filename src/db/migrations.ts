import { createHash } from 'node:crypto';
import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import type { Pool } from 'pg';

import type { Logger } from '../logging/logger.js';
import { withTransaction } from '../repositories/postgres-helpers.js';

export const DEFAULT_MIGRATIONS_DIRECTORY = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  '../../migrations'
);

export interface Migration {
  filename: string;
  sql: string;
  checksum: string;
}

/** Loads `*.sql` files in filename order, each with its sha256 checksum. */
export async function loadMigrations(directory: string): Promise<Migration[]> {
  const filenames = (await readdir(directory))
    .filter((filename) => filename.endsWith('.sql'))
    .sort((left, right) => left.localeCompare(right));

  return Promise.all(filenames.map(async (filename) => {
    const sql = await readFile(path.join(directory, filename), 'utf8');
    return {
      filename,
      sql,
      checksum: createHash('sha256').update(sql).digest('hex')
    };
  }));
}

/**
 * Migrations not yet recorded. Throws when a recorded migration's file no
 * longer matches the checksum it was applied with.
 */
export function selectPendingMigrations(
  migrations: readonly Migration[],
  appliedChecksums: ReadonlyMap<string, string>
): Migration[] {
  const changed = migrations.find((migration) => {
    const recorded = appliedChecksums.get(migration.filename);
    return recorded !== undefined && recorded !== migration.checksum;
  });

  if (changed !== undefined) {
    throw new Error(`Migration ${changed.filename} was modified after it was applied.`);
  }

  return migrations.filter((migration) => !appliedChecksums.has(migration.filename));
}

export async function applyPendingMigrations(
  pool: Pool,
  logger: Logger,
  migrationsDirectory: string = DEFAULT_MIGRATIONS_DIRECTORY
): Promise<string[]> {
  const migrations = await loadMigrations(migrationsDirectory);

  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      filename TEXT PRIMARY KEY,
      checksum TEXT NOT NULL,
      executed_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
  const { rows } = await pool.query<{ filename: string; checksum: string }>(
    'SELECT filename, checksum FROM schema_migrations'
  );
  const pending = selectPendingMigrations(
    migrations,
    new Map(rows.map((row) => [row.filename, row.checksum]))
  );

  for (const migration of pending) {
    logger.info({ filename: migration.filename }, 'migration_applying');
    await withTransaction(pool, async (client) => {
      await client.query(migration.sql);
      await client.query(
        'INSERT INTO schema_migrations (filename, checksum) VALUES ($1, $2)',
        [migration.filename, migration.checksum]
      );
    });
  }

  return pending.map((migration) => migration.filename);
}
