// =============================================================================
// SQLite tile cache — map tile rasters keyed by URL, with TTL
//
// Only background imagery goes in here. Flight data is never cached.
// =============================================================================

import Database from 'better-sqlite3';

export type TileCache = {
  get(key: string): Buffer | null;
  set(key: string, data: Buffer, ttlMs: number): void;
  cleanup(): number;
  close(): void;
};

type TileRow = { data: Buffer; expires_at: number };

function isTileRow(row: unknown): row is TileRow {
  return (
    typeof row === 'object' && row !== null &&
    'data' in row && Buffer.isBuffer(row.data) &&
    'expires_at' in row && typeof row.expires_at === 'number'
  );
}

/** Open (or create) the cache at `dbPath`. ":memory:" works for tests. */
export function openTileCache(dbPath: string): TileCache {
  const db = new Database(dbPath);
  if (dbPath !== ':memory:') db.pragma('journal_mode = WAL');
  db.exec(`
    CREATE TABLE IF NOT EXISTS tiles (
      key TEXT PRIMARY KEY,
      data BLOB NOT NULL,
      expires_at INTEGER NOT NULL
    )
  `);

  const selectStmt = db.prepare('SELECT data, expires_at FROM tiles WHERE key = ?');
  const deleteStmt = db.prepare('DELETE FROM tiles WHERE key = ?');
  const upsertStmt = db.prepare('INSERT OR REPLACE INTO tiles (key, data, expires_at) VALUES (?, ?, ?)');
  const cleanupStmt = db.prepare('DELETE FROM tiles WHERE expires_at < ?');

  return {
    get(key) {
      const row: unknown = selectStmt.get(key);
      if (!isTileRow(row)) return null;
      if (Date.now() > row.expires_at) {
        deleteStmt.run(key);
        return null;
      }
      return row.data;
    },
    set(key, data, ttlMs) {
      upsertStmt.run(key, data, Date.now() + ttlMs);
    },
    cleanup() {
      return cleanupStmt.run(Date.now()).changes;
    },
    close() {
      db.close();
    },
  };
}
