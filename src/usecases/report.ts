import type { IAuthService } from '../ports/auth';
import type { IDataStore } from '../ports/datastore';
import type { IReportService } from '../ports/report';
import type { CategoryTotal, Report, ReportPeriod, Session, Transaction } from '../domain/types';
import { ValidationError } from '../domain/errors';
import { dateSchema, parseInput } from '../domain/schemas';
import { parseDate, periodBounds } from '../utils/dates';
import { fromCents, toCents } from '../utils/money';

export class ReportService implements IReportService {
  constructor(
    private readonly store: IDataStore,
    private readonly auth: IAuthService,
  ) {}

  async generateReport(session: Session | null, period: ReportPeriod, referenceDate: string): Promise<Report> {
    const user = await this.auth.requireSession(session);
    if (period !== 'monthly' && period !== 'yearly') {
      throw new ValidationError(`Invalid period "${String(period)}". Use 'monthly' or 'yearly'.`);
    }
    const reference = parseDate(parseInput(dateSchema, referenceDate));
    if (!reference) throw new ValidationError(`Invalid date "${referenceDate}" (expected YYYY-MM-DD)`);

    const range = periodBounds(period, reference);
    const items = await this.store.listTransactions(user.userId, { dateFrom: range.start, dateTo: range.end });
    return { period, ...range, ...summarize(items) };
  }
}

type Totals = Pick<Report, 'totalIncome' | 'totalExpenses' | 'savings' | 'transactionCount' | 'categoryExpenses'>;

export function summarize(items: Transaction[]): Totals {
  let income = 0;
  let expenses = 0;
  const buckets = new Map<string, number>();
  for (const t of items) {
    const cents = toCents(t.amount);
    if (t.type === 'income') {
      income += cents;
      continue;
    }
    expenses += cents;
    buckets.set(t.category, (buckets.get(t.category) ?? 0) + cents);
  }
  const categoryExpenses: CategoryTotal[] = Array.from(buckets.entries())
    .sort((a, b) => b[1] - a[1] || compareText(a[0], b[0]))
    .map(([category, total]) => ({ category, total: fromCents(total) }));
  return {
    totalIncome: fromCents(income),
    totalExpenses: fromCents(expenses),
    savings: fromCents(income - expenses),
    transactionCount: items.length,
    categoryExpenses,
  };
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
