import fs from 'node:fs';
import path from 'node:path';
import type Database from 'better-sqlite3';
import { DbError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { getPackageRoot } from '../shared/utils.js';

export interface MigrationReport {
  applied: string[];
  skipped: string[];
}

// SQL files ship with the package source, so dist builds read them from src/ too.
export function getMigrationsDir(): string {
  return path.join(getPackageRoot(), 'src', 'db', 'migrations');
}

function listMigrationFiles(dir: string): string[] {
  if (!fs.existsSync(dir)) {
    throw new DbError(`Migrations directory not found: ${dir}`);
  }
  return fs
    .readdirSync(dir)
    .filter((f) => f.endsWith('.sql'))
    .sort();
}

export function runMigrations(
  db: Database.Database,
  dir: string = getMigrationsDir(),
): MigrationReport {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      name       TEXT PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);

  const done = new Set(
    (db.prepare('SELECT name FROM _migrations').all() as Array<{ name: string }>).map((r) => r.name),
  );
  const record = db.prepare('INSERT INTO _migrations (name) VALUES (?)');

  const report: MigrationReport = { applied: [], skipped: [] };

  for (const file of listMigrationFiles(dir)) {
    if (done.has(file)) {
      report.skipped.push(file);
      continue;
    }

    const sql = fs.readFileSync(path.join(dir, file), 'utf-8');
    const apply = db.transaction(() => {
      db.exec(sql);
      record.run(file);
    });

    try {
      apply();
    } catch (err) {
      throw new DbError(`Migration failed: ${file}`, {
        migration: file,
        cause: err instanceof Error ? err.message : String(err),
      });
    }
    report.applied.push(file);
    logger.info({ migration: file }, 'Migration applied');
  }

  return report;
}
