import type { NewTransaction, Session, Transaction, TransactionChanges, TransactionFilter } from '../domain/types';

export interface ILedgerService {
  addTransaction(session: Session | null, input: NewTransaction): Promise<number>;
  getTransaction(session: Session | null, id: number): Promise<Transaction>;
  updateTransaction(session: Session | null, id: number, changes: TransactionChanges): Promise<Transaction>;
  deleteTransaction(session: Session | null, id: number): Promise<void>;
  listTransactions(session: Session | null, filter?: TransactionFilter): Promise<Transaction[]>;
}
