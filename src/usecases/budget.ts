import type { IAuthService } from '../ports/auth';
import type { IBudgetService } from '../ports/budget';
import type { IDataStore } from '../ports/datastore';
import type { Budget, BudgetPeriod, BudgetStatus, Session } from '../domain/types';
import { NotFoundError } from '../domain/errors';
import {
  budgetPeriodSchema, categorySchema, dateSchema, parseInput, thresholdSchema,
} from '../domain/schemas';
import { monthRange, parseDate, periodLabel, periodOf } from '../utils/dates';
import { fromCents, sumAmounts, toCents } from '../utils/money';

export class BudgetService implements IBudgetService {
  constructor(
    private readonly store: IDataStore,
    private readonly auth: IAuthService,
  ) {}

  async setBudget(session: Session | null, category: string, period: BudgetPeriod, threshold: number): Promise<Budget> {
    const user = await this.auth.requireSession(session);
    return this.store.upsertBudget({
      userId: user.userId,
      category: parseInput(categorySchema, category),
      period: parseInput(budgetPeriodSchema, period),
      threshold: parseInput(thresholdSchema, threshold),
    });
  }

  async checkBudget(session: Session | null, category: string, period: BudgetPeriod): Promise<BudgetStatus> {
    const user = await this.auth.requireSession(session);
    const name = parseInput(categorySchema, category);
    const p = parseInput(budgetPeriodSchema, period);
    const budget = await this.store.getBudget(user.userId, name, p);
    if (!budget) {
      throw new NotFoundError(`No budget for ${name} in ${periodLabel(p)}.`);
    }
    return this.status(budget);
  }

  async listBudgets(session: Session | null, period: BudgetPeriod): Promise<BudgetStatus[]> {
    const user = await this.auth.requireSession(session);
    const budgets = await this.store.listBudgets(user.userId, parseInput(budgetPeriodSchema, period));
    const out: BudgetStatus[] = [];
    for (const b of budgets) out.push(await this.status(b));
    return out;
  }

  /** Budget status for the month of `date`, or null when that category has no budget. */
  async alertFor(session: Session | null, category: string, date: string): Promise<BudgetStatus | null> {
    const user = await this.auth.requireSession(session);
    const day = parseDate(parseInput(dateSchema, date));
    if (!day) return null;
    const budget = await this.store.getBudget(user.userId, parseInput(categorySchema, category), periodOf(day));
    return budget ? this.status(budget) : null;
  }

  // recomputed from the ledger on every call
  private async status(budget: Budget): Promise<BudgetStatus> {
    const range = monthRange(budget.period);
    const expenses = await this.store.listTransactions(budget.userId, {
      dateFrom: range.start,
      dateTo: range.end,
      category: budget.category,
      type: 'expense',
    });
    const spent = sumAmounts(expenses.map((t) => t.amount));
    return {
      category: budget.category,
      period: budget.period,
      threshold: budget.threshold,
      spent,
      remaining: fromCents(toCents(budget.threshold) - toCents(spent)),
      exceeded: toCents(spent) > toCents(budget.threshold),
    };
  }
}
