import type { IAuthService } from '../ports/auth';
import type { IBackupService } from '../ports/backup';
import type { IDataStore, RestoreResult } from '../ports/datastore';
import type { Session } from '../domain/types';
import { AuthorizationError, FormatError } from '../domain/errors';
import {
  SNAPSHOT_FORMAT, SNAPSHOT_VERSION, describeIssues, snapshotSchema, type Snapshot,
} from '../domain/schemas';

export class BackupService implements IBackupService {
  constructor(
    private readonly store: IDataStore,
    private readonly auth: IAuthService,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async exportSnapshot(session: Session | null): Promise<Snapshot> {
    const user = await this.auth.requireSession(session);
    const [transactions, budgets] = await Promise.all([
      this.store.listTransactions(user.userId),
      this.store.listBudgets(user.userId),
    ]);
    return {
      format: SNAPSHOT_FORMAT,
      version: SNAPSHOT_VERSION,
      username: user.username,
      exportedAt: this.clock().toISOString(),
      transactions: transactions.map((t) => ({
        id: t.id,
        type: t.type,
        amount: t.amount,
        category: t.category,
        ...(t.description !== undefined ? { description: t.description } : {}),
        date: t.date,
      })),
      budgets: budgets.map((b) => ({
        category: b.category,
        year: b.period.year,
        month: b.period.month,
        threshold: b.threshold,
      })),
    };
  }

  async exportAsJson(session: Session | null): Promise<string> {
    return JSON.stringify(await this.exportSnapshot(session), null, 2) + '\n';
  }

  /** Replaces the user's ledger and budgets with the snapshot; nothing is written unless all of it is valid. */
  async importSnapshot(session: Session | null, snapshot: unknown): Promise<RestoreResult> {
    const user = await this.auth.requireSession(session);
    const parsed = snapshotSchema.safeParse(snapshot);
    if (!parsed.success) {
      throw new FormatError(`Malformed backup: ${describeIssues(parsed.error)}`);
    }
    const data = parsed.data;
    if (data.username !== user.username) {
      throw new AuthorizationError('Backup file does not belong to the current user.');
    }
    assertUnique(data.transactions.map((t) => String(t.id)), 'transaction id');
    assertUnique(data.budgets.map((b) => `${b.category} ${b.year}-${b.month}`), 'budget');

    return this.store.replaceUserData(user.userId, {
      transactions: data.transactions,
      budgets: data.budgets.map((b) => ({
        category: b.category,
        period: { year: b.year, month: b.month },
        threshold: b.threshold,
      })),
    });
  }

  async importFromJson(session: Session | null, text: string): Promise<RestoreResult> {
    let doc: unknown;
    try {
      doc = JSON.parse(text);
    } catch (e) {
      throw new FormatError(`Backup is not valid JSON: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
    }
    return this.importSnapshot(session, doc);
  }
}

function assertUnique(keys: string[], what: string): void {
  const seen = new Set<string>();
  for (const k of keys) {
    if (seen.has(k)) throw new FormatError(`Malformed backup: duplicate ${what} ${k}`);
    seen.add(k);
  }
}
