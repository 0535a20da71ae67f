import { mkdirSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import Database from 'better-sqlite3';

const IN_MEMORY = ':memory:';
const INSTANCES = new Map<string, Database.Database>();

function getSchemaSql(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  return readFileSync(join(here, 'schema.sql'), 'utf-8');
}

function applySchema(db: Database.Database): void {
  db.exec(getSchemaSql());
}

/**
 * Open (or reuse) the memory database at `dbPath`. ':memory:' always gets a
 * fresh, unshared database.
 */
export function openDatabase(dbPath: string): Database.Database {
  if (dbPath === IN_MEMORY) {
    const db = new Database(IN_MEMORY);
    applySchema(db);
    return db;
  }

  const existing = INSTANCES.get(dbPath);
  if (existing) {
    return existing;
  }

  mkdirSync(dirname(dbPath), { recursive: true });

  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  applySchema(db);

  INSTANCES.set(dbPath, db);
  return db;
}

export function closeDatabase(dbPath: string): void {
  const db = INSTANCES.get(dbPath);
  if (db) {
    db.close();
    INSTANCES.delete(dbPath);
  }
}
