import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { runMigrations } from '../migrate.js';

let db: Database.Database;

beforeEach(() => {
  db = new Database(':memory:');
  db.pragma('foreign_keys = ON');
});

afterEach(() => {
  db.close();
});

describe('runMigrations', () => {
  it('creates all tables from 001_init.sql', () => {
    const { applied } = runMigrations(db);
    expect(applied).toContain('001_init.sql');

    const tables = db
      .prepare("SELECT name FROM sqlite_master WHERE type='table' ORDER BY name")
      .all() as Array<{ name: string }>;

    const tableNames = tables.map((t) => t.name);
    expect(tableNames).toContain('articles');
    expect(tableNames).toContain('collection_logs');
    expect(tableNames).toContain('_migrations');
  });

  it('is idempotent (second run applies nothing)', () => {
    const first = runMigrations(db);
    expect(first.applied.length).toBeGreaterThan(0);

    const second = runMigrations(db);
    expect(second.applied).toEqual([]);
    expect(second.skipped).toEqual(first.applied);
  });

  it('creates correct indexes', () => {
    runMigrations(db);

    const indexes = db
      .prepare("SELECT name FROM sqlite_master WHERE type='index' AND name LIKE 'idx_%'")
      .all() as Array<{ name: string }>;

    const indexNames = indexes.map((i) => i.name);
    expect(indexNames).toContain('idx_articles_created');
    expect(indexNames).toContain('idx_articles_keyword');
    expect(indexNames).toContain('idx_articles_source');
    expect(indexNames).toContain('idx_logs_created');
  });

  it('enforces a unique canonical link', () => {
    runMigrations(db);
    const insert = db.prepare(
      "INSERT INTO articles (title, canonical_link, link, source) VALUES ('t', 'https://a.com/1', 'https://a.com/1', 'api')",
    );
    insert.run();
    expect(() => insert.run()).toThrow(/UNIQUE/);
  });

  it('rejects an unknown source tag', () => {
    runMigrations(db);
    expect(() =>
      db
        .prepare(
          "INSERT INTO articles (title, canonical_link, link, source) VALUES ('t', 'https://a.com/1', 'https://a.com/1', 'rss')",
        )
        .run(),
    ).toThrow(/CHECK/);
  });
});
