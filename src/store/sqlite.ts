import Database from 'better-sqlite3';
import type { Logger } from 'pino';
import type { DocumentStore } from './base.js';
import type { Entity, EntityKey, Query } from '../types.js';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { decodeKey, encodeKey, isComplete, keyKind, withId } from './key.js';
import { decodeProperties, encodeProperties } from './codec.js';
import { runQuery } from './query.js';
import { createLogger } from '../logger.js';

const SCHEMA = `
CREATE TABLE IF NOT EXISTS entities (
    key_path    TEXT PRIMARY KEY,
    kind        TEXT NOT NULL,
    properties  TEXT NOT NULL,
    unindexed   TEXT
);
CREATE INDEX IF NOT EXISTS idx_entities_kind ON entities(kind);
CREATE TABLE IF NOT EXISTS id_sequences (
    kind        TEXT PRIMARY KEY,
    next_id     INTEGER NOT NULL
);
`;

interface EntityRow {
  key_path: string;
  kind: string;
  properties: string;
  unindexed: string | null;
}

function entityToRow(entity: Entity): EntityRow {
  return {
    key_path: encodeKey(entity.key),
    kind: keyKind(entity.key),
    properties: encodeProperties(entity.properties),
    unindexed: entity.excludeFromIndexes ? JSON.stringify(entity.excludeFromIndexes) : null,
  };
}

function parseUnindexed(text: string): string[] {
  const raw: unknown = JSON.parse(text);
  if (!Array.isArray(raw) || !raw.every((v): v is string => typeof v === 'string')) {
    throw new Error(`Invalid unindexed column: ${text}`);
  }
  return raw;
}

function rowToEntity(row: EntityRow): Entity {
  const entity: Entity = {
    key: decodeKey(row.key_path),
    properties: decodeProperties(row.properties),
  };
  if (row.unindexed) {
    entity.excludeFromIndexes = parseUnindexed(row.unindexed);
  }
  return entity;
}

/** Options for constructing a SqliteStore. */
export interface SqliteStoreOptions {
  logger?: Logger;
}

/**
 * SQLite-backed document store. Entities live in one table keyed by their
 * encoded key path; ids are allocated per kind from `id_sequences`.
 */
export class SqliteStore implements DocumentStore {
  private db: Database.Database;
  private readonly log: Logger;

  constructor(dbPath: string, options?: SqliteStoreOptions) {
    this.log = (options?.logger ?? createLogger({ level: 'silent' })).child({ store: 'sqlite' });
    mkdirSync(dirname(dbPath), { recursive: true });
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.exec(SCHEMA);
    this.log.debug({ dbPath }, 'Opened SQLite store');
  }

  private allocateId(kind: string): number {
    const row = this.db
      .prepare<[string], { next_id: number }>(`
        INSERT INTO id_sequences (kind, next_id) VALUES (?, 1)
        ON CONFLICT(kind) DO UPDATE SET next_id = next_id + 1
        RETURNING next_id
      `)
      .get(kind);
    if (!row) {
      throw new Error(`Could not allocate an id for ${kind}`);
    }
    return row.next_id;
  }

  async get(key: EntityKey): Promise<Entity | null> {
    const row = this.db
      .prepare<[string], EntityRow>('SELECT * FROM entities WHERE key_path = ?')
      .get(encodeKey(key));
    return row ? rowToEntity(row) : null;
  }

  async put(entity: Entity): Promise<EntityKey> {
    const key = isComplete(entity.key) ? entity.key : withId(entity.key, this.allocateId(keyKind(entity.key)));
    const row = entityToRow({ ...entity, key });
    this.db
      .prepare<EntityRow>(`
        INSERT OR REPLACE INTO entities (key_path, kind, properties, unindexed)
        VALUES (@key_path, @kind, @properties, @unindexed)
      `)
      .run(row);
    return decodeKey(row.key_path);
  }

  async query(query: Query): Promise<Entity[]> {
    let sql = 'SELECT * FROM entities WHERE kind = ?';
    const params: (string | number)[] = [query.kind];

    if (query.ancestor) {
      // Descendants share the ancestor's encoded path plus a separator.
      const prefix = `${encodeKey(query.ancestor)}/`;
      sql += ' AND (key_path = ? OR substr(key_path, 1, ?) = ?)';
      params.push(encodeKey(query.ancestor), prefix.length, prefix);
    }

    const rows = this.db.prepare<(string | number)[], EntityRow>(sql).all(...params);
    return runQuery(rows.map(rowToEntity), query);
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
