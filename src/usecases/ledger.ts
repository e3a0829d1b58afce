import type { IAuthService } from '../ports/auth';
import type { IDataStore } from '../ports/datastore';
import type { ILedgerService } from '../ports/ledger';
import type {
  NewTransaction, Session, Transaction, TransactionChanges, TransactionFilter,
} from '../domain/types';
import { AuthorizationError, NotFoundError } from '../domain/errors';
import {
  newTransactionSchema, parseInput, transactionChangesSchema, transactionFilterSchema,
} from '../domain/schemas';

export class LedgerService implements ILedgerService {
  constructor(
    private readonly store: IDataStore,
    private readonly auth: IAuthService,
  ) {}

  async addTransaction(session: Session | null, input: NewTransaction): Promise<number> {
    const user = await this.auth.requireSession(session);
    const tx = parseInput(newTransactionSchema, input);
    const saved = await this.store.addTransaction(user.userId, tx);
    return saved.id;
  }

  async getTransaction(session: Session | null, id: number): Promise<Transaction> {
    const user = await this.auth.requireSession(session);
    return this.owned(user, id);
  }

  async updateTransaction(session: Session | null, id: number, changes: TransactionChanges): Promise<Transaction> {
    const user = await this.auth.requireSession(session);
    const patch = parseInput(transactionChangesSchema, changes);
    await this.owned(user, id);
    const updated = await this.store.updateTransaction(id, patch);
    if (!updated) throw notFound(id);
    return updated;
  }

  async deleteTransaction(session: Session | null, id: number): Promise<void> {
    const user = await this.auth.requireSession(session);
    await this.owned(user, id);
    if (!(await this.store.removeTransaction(id))) throw notFound(id);
  }

  async listTransactions(session: Session | null, filter: TransactionFilter = {}): Promise<Transaction[]> {
    const user = await this.auth.requireSession(session);
    return this.store.listTransactions(user.userId, parseInput(transactionFilterSchema, filter));
  }

  private async owned(user: Session, id: number): Promise<Transaction> {
    const tx = await this.store.getTransaction(id);
    if (!tx) throw notFound(id);
    if (tx.userId !== user.userId) {
      throw new AuthorizationError(`Transaction ${id} belongs to another user.`);
    }
    return tx;
  }
}

function notFound(id: number): NotFoundError {
  return new NotFoundError(`Transaction ${id} not found.`);
}
