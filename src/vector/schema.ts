import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

export type SqliteDatabase = Database.Database;

export const INDEX_SCHEMA_VERSION = '1';

const INDEX_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS index_meta (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS chunks (
  rowid INTEGER PRIMARY KEY,
  chunk_id TEXT UNIQUE NOT NULL,
  parent_document_id TEXT NOT NULL,
  ordinal INTEGER NOT NULL,
  content TEXT NOT NULL,
  metadata TEXT NOT NULL,
  embedding BLOB NOT NULL
);
`;

const CACHE_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS embedding_cache (
  content_hash TEXT NOT NULL,
  model TEXT NOT NULL,
  embedding BLOB NOT NULL,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  PRIMARY KEY (content_hash, model)
);
`;

/**
 * Fresh index bundle at dbPath. Single-file journal so the finished bundle
 * can be moved into place with one rename.
 */
export function createIndexDb(dbPath: string): SqliteDatabase {
  mkdirSync(dirname(dbPath), { recursive: true });
  const db = new Database(dbPath);
  db.pragma('journal_mode = DELETE');
  db.exec(INDEX_SCHEMA_SQL);
  return db;
}

export function openIndexDb(dbPath: string): SqliteDatabase {
  return new Database(dbPath, { readonly: true, fileMustExist: true });
}

export function openEmbeddingCache(dbPath: string): SqliteDatabase {
  mkdirSync(dirname(dbPath), { recursive: true });
  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.exec(CACHE_SCHEMA_SQL);
  return db;
}

export function serializeEmbedding(embedding: number[]): Buffer {
  return Buffer.from(new Float32Array(embedding).buffer);
}

export function deserializeEmbedding(buf: Buffer): Float32Array {
  const vector = new Float32Array(buf.byteLength / 4);
  new Uint8Array(vector.buffer).set(buf);
  return vector;
}
