import Database from 'better-sqlite3';

export function ensureSchema(db: Database.Database): void {
  db.exec(`
    PRAGMA journal_mode = WAL;

    CREATE TABLE IF NOT EXISTS verified (
      path TEXT PRIMARY KEY,
      verifiedAt TEXT NOT NULL
    );
  `);
}
