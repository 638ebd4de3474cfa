import Database from 'better-sqlite3';
import type { VerifyState } from '../VerifyState.js';
import { ensureSchema } from './schema.js';

export interface SqliteVerifyStateOptions {
  path?: string;
  now?: () => string;
}

/**
 * Each `add` is its own autocommitted statement, so progress survives an interrupt
 * without an explicit flush.
 */
export class SqliteVerifyState implements VerifyState {
  private readonly db: Database.Database;
  private readonly nowFn: () => string;
  private readonly hasStmt: Database.Statement<[string]>;
  private readonly addStmt: Database.Statement<[string, string]>;

  constructor(options: SqliteVerifyStateOptions = {}) {
    this.db = new Database(options.path ?? ':memory:');
    ensureSchema(this.db);
    this.nowFn = options.now ?? (() => new Date().toISOString());
    this.hasStmt = this.db.prepare('SELECT 1 FROM verified WHERE path = ?');
    this.addStmt = this.db.prepare('INSERT OR IGNORE INTO verified (path, verifiedAt) VALUES (?, ?)');
  }

  has(prettyPath: string): boolean {
    return this.hasStmt.get(prettyPath) !== undefined;
  }

  add(prettyPath: string): void {
    this.addStmt.run(prettyPath, this.nowFn());
  }

  count(): number {
    const row: unknown = this.db.prepare('SELECT COUNT(*) AS n FROM verified').get();
    if (typeof row === 'object' && row !== null && 'n' in row && typeof row.n === 'number') return row.n;
    return 0;
  }

  close(): void {
    if (this.db.open) this.db.close();
  }
}
