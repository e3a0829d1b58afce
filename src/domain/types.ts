export type TxType = 'income' | 'expense';

export const TX_TYPES: readonly TxType[] = ['income', 'expense'];

export type ReportPeriod = 'monthly' | 'yearly';

export interface User {
  id: number;
  username: string;
  passwordHash: string;
  createdAt: number;
}

/** The logged-in user, passed explicitly to every operation. */
export interface Session {
  userId: number;
  username: string;
}

export interface Transaction {
  id: number;
  userId: number;
  type: TxType;
  amount: number;
  category: string;
  description?: string;
  date: string; // YYYY-MM-DD
  createdAt: number;
}

export interface NewTransaction {
  type: TxType;
  amount: number;
  category: string;
  description?: string;
  date: string;
}

export type TransactionChanges = Partial<NewTransaction>;

export interface TransactionFilter {
  dateFrom?: string;
  dateTo?: string;
  category?: string;
  type?: TxType;
}

export interface BudgetPeriod {
  year: number;
  month: number; // 1-12
}

export interface Budget {
  userId: number;
  category: string;
  period: BudgetPeriod;
  threshold: number;
}

export interface BudgetStatus {
  category: string;
  period: BudgetPeriod;
  threshold: number;
  spent: number;
  remaining: number;
  exceeded: boolean;
}

export interface DateRange { start: string; end: string }

export interface CategoryTotal { category: string; total: number }

export interface Report extends DateRange {
  period: ReportPeriod;
  totalIncome: number;
  totalExpenses: number;
  savings: number;
  transactionCount: number;
  categoryExpenses: CategoryTotal[];
}
