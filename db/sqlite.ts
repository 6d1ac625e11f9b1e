import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';

export interface StoredCredential {
  email: string;
  refresh_token: string;
  updated_at: number;
}

let db: Database.Database | null = null;

export function initDb(dbPath: string): void {
  if (db) return;
  if (dbPath !== ':memory:') {
    const dir = path.dirname(path.resolve(dbPath));
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  }
  db = new Database(dbPath);
  db.exec(`
    CREATE TABLE IF NOT EXISTS google_credentials (
      email TEXT PRIMARY KEY,
      refresh_token TEXT NOT NULL,
      updated_at INTEGER NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_google_credentials_updated ON google_credentials(updated_at);
  `);
  console.info('[db] google_credentials ready');
}

export function closeDb(): void {
  db?.close();
  db = null;
}

function requireDb(): Database.Database {
  if (!db) throw new Error('credential_db_not_initialized');
  return db;
}

export function saveGoogleCredential(email: string, refreshToken: string, now = Date.now()): void {
  requireDb()
    .prepare(`
      INSERT INTO google_credentials (email, refresh_token, updated_at)
      VALUES (@email, @refresh_token, @updated_at)
      ON CONFLICT(email) DO UPDATE SET refresh_token = excluded.refresh_token, updated_at = excluded.updated_at
    `)
    .run({ email, refresh_token: refreshToken, updated_at: now });
}

// Most recently authorised account wins
export function getLatestGoogleCredential(): StoredCredential | null {
  if (!db) return null;
  const row = db
    .prepare<[], StoredCredential>(`SELECT email, refresh_token, updated_at FROM google_credentials ORDER BY updated_at DESC LIMIT 1`)
    .get();
  return row ?? null;
}
