import Database from 'better-sqlite3';
import { homedir } from 'os';
import { join } from 'path';
import { mkdirSync, existsSync } from 'fs';
import { SCHEMA, SCHEMA_VERSION } from './schema.js';
import { logger } from '../utils/logger.js';

const DATA_DIR = process.env.FEEDSTASH_HOME || join(homedir(), '.feedstash');
const DB_PATH = join(DATA_DIR, 'feedstash.db');

const log = logger.scope('db');

let db: Database.Database | null = null;

function columnNames(database: Database.Database, table: string): string[] {
  const columns = database.prepare(`PRAGMA table_info(${table})`).all() as { name: string }[];
  return columns.map(c => c.name);
}

function addColumnIfMissing(database: Database.Database, table: string, column: string, definition: string): void {
  if (!columnNames(database, table).includes(column)) {
    database.exec(`ALTER TABLE ${table} ADD COLUMN ${column} ${definition}`);
    log.debug(`Migration: added ${table}.${column}`);
  }
}

// 迁移只增加列/表，墓碑与星标数据原样保留
const MIGRATIONS: Record<number, (database: Database.Database) => void> = {
  1: (database) => {
    database.exec(SCHEMA);
  },
  2: (database) => {
    addColumnIfMissing(database, 'articles', 'summary_model', 'TEXT');
    addColumnIfMissing(database, 'articles', 'bookmark_tags', 'TEXT');
    addColumnIfMissing(database, 'articles', 'bookmarked_at', 'TEXT');
  },
};

export function runMigrations(database: Database.Database): number {
  const current = Number(database.pragma('user_version', { simple: true }));
  if (current >= SCHEMA_VERSION) {
    return current;
  }

  const migrate = database.transaction(() => {
    for (let version = current + 1; version <= SCHEMA_VERSION; version++) {
      MIGRATIONS[version]?.(database);
    }
    database.pragma(`user_version = ${SCHEMA_VERSION}`);
  });
  migrate();

  log.debug(`Schema migrated from v${current} to v${SCHEMA_VERSION}`);
  return SCHEMA_VERSION;
}

export function openDb(path: string): Database.Database {
  const database = new Database(path);
  if (path !== ':memory:') {
    database.pragma('journal_mode = WAL');
  }
  database.pragma('foreign_keys = ON');
  runMigrations(database);
  return database;
}

export function getDb(): Database.Database {
  if (!db) {
    if (!existsSync(DATA_DIR)) {
      mkdirSync(DATA_DIR, { recursive: true });
    }
    db = openDb(DB_PATH);
  }
  return db;
}

export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}

export { DB_PATH, DATA_DIR };
