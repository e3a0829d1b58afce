import type {
  Budget, BudgetPeriod, NewTransaction, Transaction, TransactionChanges, TransactionFilter, User,
} from '../domain/types';

export interface RestorePayload {
  transactions: Array<NewTransaction & { id: number }>;
  budgets: Array<Omit<Budget, 'userId'>>;
}

export interface RestoreResult {
  transactions: number;
  budgets: number;
  renumbered: number;
}

export interface IDataStore {
  createUser(input: { username: string; passwordHash: string }): Promise<User>;
  findUserByUsername(username: string): Promise<User | null>;
  findUserById(id: number): Promise<User | null>;

  addTransaction(userId: number, tx: NewTransaction): Promise<Transaction>;
  getTransaction(id: number): Promise<Transaction | null>;
  updateTransaction(id: number, changes: TransactionChanges): Promise<Transaction | null>;
  removeTransaction(id: number): Promise<boolean>;
  /** Ordered by date, then insertion order. */
  listTransactions(userId: number, filter?: TransactionFilter): Promise<Transaction[]>;

  upsertBudget(budget: Budget): Promise<Budget>;
  getBudget(userId: number, category: string, period: BudgetPeriod): Promise<Budget | null>;
  listBudgets(userId: number, period?: BudgetPeriod): Promise<Budget[]>;

  /** Replaces every transaction and budget of the user in a single transaction. */
  replaceUserData(userId: number, data: RestorePayload): Promise<RestoreResult>;

  close(): void;
}
