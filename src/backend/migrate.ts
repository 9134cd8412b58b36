/**
 * SQLite migration runner.
 *
 * Applies every `<migrationsPath>/<name>/migration.sql` not yet recorded in
 * `_migrations`, in directory-name order, each inside its own transaction.
 *
 * Can be used in two ways:
 * 1. As a module: import { runMigrations, migrateDatabase } from './migrate'
 * 2. As a script: tsx src/backend/migrate.ts (uses configService paths)
 */

import { createHash, randomUUID } from 'node:crypto';
import { existsSync, readdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { pathToFileURL } from 'node:url';
import { openDatabase, type SqliteDatabase } from './db';
import { configService } from './services/config.service';

export interface MigrationOptions {
  databasePath: string;
  migrationsPath: string;
  log?: (msg: string) => void;
}

interface AppliedMigrationRow {
  migration_name: string;
  checksum: string;
}

function writeStdout(message: string): void {
  process.stdout.write(`${message}\n`);
}

function writeStderr(message: string): void {
  process.stderr.write(`${message}\n`);
}

/**
 * Split migration SQL into PRAGMAs and DDL/DML.
 * PRAGMAs must execute outside a transaction in SQLite; foreign-key
 * toggles that disable checks run before the transaction, the rest after.
 */
function parseMigrationSql(migrationSql: string): {
  prePragmas: string[];
  ddlDml: string;
  postPragmas: string[];
} {
  const prePragmas: string[] = [];
  const postPragmas: string[] = [];
  const ddlDml: string[] = [];
  let foundNonPragma = false;

  for (const line of migrationSql.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('--')) {
      continue;
    }

    if (trimmed.toUpperCase().startsWith('PRAGMA ')) {
      const normalized = trimmed.toUpperCase().replace(/\s+/g, '');
      const disablesChecks =
        normalized === 'PRAGMAFOREIGN_KEYS=OFF;' || normalized === 'PRAGMADEFER_FOREIGN_KEYS=ON;';
      if (disablesChecks || !foundNonPragma) {
        prePragmas.push(trimmed);
      } else {
        postPragmas.push(trimmed);
      }
    } else {
      foundNonPragma = true;
      ddlDml.push(line);
    }
  }

  return { prePragmas, ddlDml: ddlDml.join('\n'), postPragmas };
}

function applySingleMigration(
  db: SqliteDatabase,
  migrationName: string,
  sql: string,
  checksum: string,
  log: (msg: string) => void
): void {
  const { prePragmas, ddlDml, postPragmas } = parseMigrationSql(sql);

  const applyMigration = db.transaction(() => {
    const id = randomUUID();
    db.prepare(
      'INSERT INTO _migrations (id, checksum, migration_name, started_at) VALUES (?, ?, ?, CURRENT_TIMESTAMP)'
    ).run(id, checksum, migrationName);

    if (ddlDml.trim()) {
      db.exec(ddlDml);
    }

    db.prepare('UPDATE _migrations SET finished_at = CURRENT_TIMESTAMP WHERE id = ?').run(id);
  });

  log(`[migrate] Applying: ${migrationName}`);

  for (const pragma of prePragmas) {
    db.exec(pragma);
  }

  try {
    applyMigration();
  } finally {
    for (const pragma of postPragmas) {
      try {
        db.exec(pragma);
      } catch (pragmaError) {
        log(
          `[migrate] Warning: Failed to execute post-PRAGMA "${pragma}": ${pragmaError instanceof Error ? pragmaError.message : String(pragmaError)}`
        );
      }
    }
  }

  log(`[migrate] Applied: ${migrationName}`);
}

/**
 * Apply pending migrations to an open connection.
 * @throws Error if a migration fails; earlier migrations stay applied
 */
export function migrateDatabase(
  db: SqliteDatabase,
  migrationsPath: string,
  log: (msg: string) => void = writeStdout
): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id TEXT PRIMARY KEY,
      checksum TEXT NOT NULL,
      migration_name TEXT NOT NULL UNIQUE,
      finished_at DATETIME,
      started_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP
    )
  `);

  const applied = new Map(
    db
      .prepare<[], AppliedMigrationRow>(
        'SELECT migration_name, checksum FROM _migrations WHERE finished_at IS NOT NULL'
      )
      .all()
      .map((row) => [row.migration_name, row.checksum])
  );

  const migrationDirs = readdirSync(migrationsPath, { withFileTypes: true })
    .filter((d) => d.isDirectory())
    .map((d) => d.name)
    .sort();

  for (const migrationName of migrationDirs) {
    const sqlPath = join(migrationsPath, migrationName, 'migration.sql');
    if (!existsSync(sqlPath)) {
      log(`[migrate] No migration.sql found in ${migrationName}, skipping`);
      continue;
    }

    const sql = readFileSync(sqlPath, 'utf-8');
    const checksum = createHash('sha256').update(sql).digest('hex');

    const appliedChecksum = applied.get(migrationName);
    if (appliedChecksum !== undefined) {
      if (appliedChecksum !== checksum) {
        log(`[migrate] Warning: ${migrationName} changed after it was applied`);
      }
      log(`[migrate] Skipping already applied: ${migrationName}`);
      continue;
    }

    try {
      applySingleMigration(db, migrationName, sql, checksum, log);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log(`[migrate] Failed to apply migration ${migrationName}: ${message}`);
      throw err;
    }
  }

  log('[migrate] All migrations complete');
}

/**
 * Open the database at `databasePath`, migrate it and close it again.
 * @throws Error if migrations fail
 */
export function runMigrations(options: MigrationOptions): void {
  const { databasePath, migrationsPath, log = writeStdout } = options;

  log(`[migrate] Database: ${databasePath}`);
  log(`[migrate] Migrations: ${migrationsPath}`);

  const db = openDatabase(databasePath);
  try {
    migrateDatabase(db, migrationsPath, log);
  } finally {
    db.close();
  }
}

const entryPoint = process.argv[1];
const isMainModule = entryPoint !== undefined && import.meta.url === pathToFileURL(entryPoint).href;
if (isMainModule) {
  try {
    runMigrations({
      databasePath: configService.getDatabasePath(),
      migrationsPath: configService.getMigrationsPath(),
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    writeStderr(`Migration failed: ${message}`);
    process.exit(1);
  }
}
