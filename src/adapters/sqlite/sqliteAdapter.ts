import type { IDataStore, RestorePayload, RestoreResult } from '../../ports/datastore';
import type {
  Budget, BudgetPeriod, NewTransaction, Transaction, TransactionChanges, TransactionFilter, TxType, User,
} from '../../domain/types';
import { StorageError, ValidationError } from '../../domain/errors';
import { SQLiteDriver } from './driver';

const SCHEMA_VERSION = 1;

interface UserRow {
  id: number;
  username: string;
  password_hash: string;
  created_at: number;
}

interface TransactionRow {
  id: number;
  user_id: number;
  type: TxType;
  amount: number;
  category: string;
  description: string | null;
  date: string;
  created_at: number;
}

interface BudgetRow {
  user_id: number;
  category: string;
  year: number;
  month: number;
  amount: number;
}

export class SqliteDataStore implements IDataStore {
  constructor(private readonly driver: SQLiteDriver) {
    this.guard(() => this.migrate());
  }

  static open(filename: string): SqliteDataStore {
    try {
      return new SqliteDataStore(new SQLiteDriver(filename));
    } catch (e) {
      throw new StorageError(`Cannot open database ${filename}: ${errorMessage(e)}`, { cause: e });
    }
  }

  private migrate(): void {
    const row = this.driver.get<{ user_version: number }>('PRAGMA user_version');
    if ((row?.user_version ?? 0) >= SCHEMA_VERSION) return;
    this.driver.exec(`
      CREATE TABLE IF NOT EXISTS users (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        username TEXT UNIQUE NOT NULL,
        password_hash TEXT NOT NULL,
        created_at INTEGER NOT NULL
      );
      CREATE TABLE IF NOT EXISTS transactions (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        user_id INTEGER NOT NULL REFERENCES users (id),
        type TEXT NOT NULL CHECK (type IN ('income', 'expense')),
        amount REAL NOT NULL CHECK (amount > 0),
        category TEXT NOT NULL,
        description TEXT,
        date TEXT NOT NULL,
        created_at INTEGER NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_transactions_user_date ON transactions (user_id, date, id);
      CREATE TABLE IF NOT EXISTS budgets (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        user_id INTEGER NOT NULL REFERENCES users (id),
        category TEXT NOT NULL,
        amount REAL NOT NULL CHECK (amount >= 0),
        month INTEGER NOT NULL CHECK (month BETWEEN 1 AND 12),
        year INTEGER NOT NULL,
        UNIQUE (user_id, category, month, year)
      );
      PRAGMA user_version = ${SCHEMA_VERSION};
    `);
  }

  async createUser(input: { username: string; passwordHash: string }): Promise<User> {
    return this.guard(() => {
      if (this.driver.get('SELECT id FROM users WHERE username = ?', [input.username])) {
        throw new ValidationError('Username already exists. Please choose a different one.');
      }
      const createdAt = Date.now();
      const res = this.driver.run(
        'INSERT INTO users (username, password_hash, created_at) VALUES (?, ?, ?)',
        [input.username, input.passwordHash, createdAt],
      );
      return { id: Number(res.lastInsertRowid), username: input.username, passwordHash: input.passwordHash, createdAt };
    });
  }

  async findUserByUsername(username: string): Promise<User | null> {
    return this.guard(() => {
      const row = this.driver.get<UserRow>('SELECT * FROM users WHERE username = ?', [username]);
      return row ? mapUser(row) : null;
    });
  }

  async findUserById(id: number): Promise<User | null> {
    return this.guard(() => {
      const row = this.driver.get<UserRow>('SELECT * FROM users WHERE id = ?', [id]);
      return row ? mapUser(row) : null;
    });
  }

  async addTransaction(userId: number, tx: NewTransaction): Promise<Transaction> {
    return this.guard(() => {
      const createdAt = Date.now();
      const res = this.driver.run(
        `INSERT INTO transactions (user_id, type, amount, category, description, date, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
        [userId, tx.type, tx.amount, tx.category, tx.description ?? null, tx.date, createdAt],
      );
      return { id: Number(res.lastInsertRowid), userId, ...withoutUndefined(tx), createdAt };
    });
  }

  async getTransaction(id: number): Promise<Transaction | null> {
    return this.guard(() => this.findTransaction(id));
  }

  async updateTransaction(id: number, changes: TransactionChanges): Promise<Transaction | null> {
    return this.guard(() => {
      const fields: string[] = [];
      const values: unknown[] = [];

      if (changes.type !== undefined) {
        fields.push('type = ?');
        values.push(changes.type);
      }
      if (changes.amount !== undefined) {
        fields.push('amount = ?');
        values.push(changes.amount);
      }
      if (changes.category !== undefined) {
        fields.push('category = ?');
        values.push(changes.category);
      }
      if (changes.description !== undefined) {
        fields.push('description = ?');
        values.push(changes.description === '' ? null : changes.description);
      }
      if (changes.date !== undefined) {
        fields.push('date = ?');
        values.push(changes.date);
      }

      if (fields.length > 0) {
        const res = this.driver.run(`UPDATE transactions SET ${fields.join(', ')} WHERE id = ?`, [...values, id]);
        if (res.changes === 0) return null;
      }
      return this.findTransaction(id);
    });
  }

  async removeTransaction(id: number): Promise<boolean> {
    return this.guard(() => this.driver.run('DELETE FROM transactions WHERE id = ?', [id]).changes > 0);
  }

  async listTransactions(userId: number, filter: TransactionFilter = {}): Promise<Transaction[]> {
    return this.guard(() => {
      let sql = 'SELECT * FROM transactions WHERE user_id = ?';
      const params: unknown[] = [userId];
      if (filter.dateFrom) {
        sql += ' AND date >= ?';
        params.push(filter.dateFrom);
      }
      if (filter.dateTo) {
        sql += ' AND date <= ?';
        params.push(filter.dateTo);
      }
      if (filter.category) {
        sql += ' AND category = ?';
        params.push(filter.category);
      }
      if (filter.type) {
        sql += ' AND type = ?';
        params.push(filter.type);
      }
      sql += ' ORDER BY date ASC, id ASC';
      return this.driver.all<TransactionRow>(sql, params).map(mapTransaction);
    });
  }

  async upsertBudget(budget: Budget): Promise<Budget> {
    return this.guard(() => {
      this.driver.run(
        `INSERT INTO budgets (user_id, category, amount, month, year) VALUES (?, ?, ?, ?, ?)
         ON CONFLICT (user_id, category, month, year) DO UPDATE SET amount = excluded.amount`,
        [budget.userId, budget.category, budget.threshold, budget.period.month, budget.period.year],
      );
      return budget;
    });
  }

  async getBudget(userId: number, category: string, period: BudgetPeriod): Promise<Budget | null> {
    return this.guard(() => {
      const row = this.driver.get<BudgetRow>(
        'SELECT * FROM budgets WHERE user_id = ? AND category = ? AND month = ? AND year = ?',
        [userId, category, period.month, period.year],
      );
      return row ? mapBudget(row) : null;
    });
  }

  async listBudgets(userId: number, period?: BudgetPeriod): Promise<Budget[]> {
    return this.guard(() => {
      const rows = period
        ? this.driver.all<BudgetRow>(
          'SELECT * FROM budgets WHERE user_id = ? AND month = ? AND year = ? ORDER BY category',
          [userId, period.month, period.year],
        )
        : this.driver.all<BudgetRow>(
          'SELECT * FROM budgets WHERE user_id = ? ORDER BY year, month, category',
          [userId],
        );
      return rows.map(mapBudget);
    });
  }

  async replaceUserData(userId: number, data: RestorePayload): Promise<RestoreResult> {
    return this.guard(() => this.driver.transaction(() => {
      this.driver.run('DELETE FROM transactions WHERE user_id = ?', [userId]);
      this.driver.run('DELETE FROM budgets WHERE user_id = ?', [userId]);

      // ids held by other users get fresh ones, after every free id is placed
      const conflicts = data.transactions.filter((tx) =>
        this.driver.get('SELECT id FROM transactions WHERE id = ?', [tx.id]) !== undefined);
      const kept = data.transactions.filter((tx) => !conflicts.includes(tx));

      const createdAt = Date.now();
      const insert = (tx: RestorePayload['transactions'][number], id: number | null) => this.driver.run(
        `INSERT INTO transactions (id, user_id, type, amount, category, description, date, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
        [id, userId, tx.type, tx.amount, tx.category, tx.description ?? null, tx.date, createdAt],
      );
      for (const tx of kept) insert(tx, tx.id);
      for (const tx of conflicts) insert(tx, null);

      for (const b of data.budgets) {
        this.driver.run(
          'INSERT INTO budgets (user_id, category, amount, month, year) VALUES (?, ?, ?, ?, ?)',
          [userId, b.category, b.threshold, b.period.month, b.period.year],
        );
      }
      return { transactions: data.transactions.length, budgets: data.budgets.length, renumbered: conflicts.length };
    }));
  }

  close(): void {
    this.driver.close();
  }

  private findTransaction(id: number): Transaction | null {
    const row = this.driver.get<TransactionRow>('SELECT * FROM transactions WHERE id = ?', [id]);
    return row ? mapTransaction(row) : null;
  }

  /** Lets domain errors through and wraps driver failures in StorageError. */
  private guard<T>(fn: () => T): T {
    try {
      return fn();
    } catch (e) {
      if (e instanceof ValidationError || e instanceof StorageError) throw e;
      throw new StorageError(`Storage failure: ${errorMessage(e)}`, { cause: e });
    }
  }
}

function mapUser(row: UserRow): User {
  return { id: row.id, username: row.username, passwordHash: row.password_hash, createdAt: row.created_at };
}

function mapTransaction(row: TransactionRow): Transaction {
  const tx: Transaction = {
    id: row.id,
    userId: row.user_id,
    type: row.type,
    amount: row.amount,
    category: row.category,
    date: row.date,
    createdAt: row.created_at,
  };
  if (row.description !== null) tx.description = row.description;
  return tx;
}

function mapBudget(row: BudgetRow): Budget {
  return {
    userId: row.user_id,
    category: row.category,
    period: { year: row.year, month: row.month },
    threshold: row.amount,
  };
}

function withoutUndefined(tx: NewTransaction): NewTransaction {
  const { description, ...rest } = tx;
  return description === undefined ? rest : { ...rest, description };
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
