import Database from 'better-sqlite3';

export type SqlParams = unknown[];

export interface RunResult {
  changes: number;
  lastInsertRowid: number | bigint;
}

/** Synchronous SQLite access over better-sqlite3. */
export class SQLiteDriver {
  private readonly db: Database.Database;

  constructor(filename: string) {
    this.db = new Database(filename);
    this.db.pragma('foreign_keys = ON');
    if (filename !== ':memory:') this.db.pragma('journal_mode = WAL');
  }

  exec(sql: string): void {
    this.db.exec(sql);
  }

  run(sql: string, params: SqlParams = []): RunResult {
    return this.db.prepare(sql).run(...params);
  }

  get<T>(sql: string, params: SqlParams = []): T | undefined {
    return this.db.prepare<unknown[], T>(sql).get(...params);
  }

  all<T>(sql: string, params: SqlParams = []): T[] {
    return this.db.prepare<unknown[], T>(sql).all(...params);
  }

  /** Runs fn inside BEGIN/COMMIT; any throw rolls everything back. */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  close(): void {
    if (this.db.open) this.db.close();
  }
}
