import type { Budget, BudgetPeriod, BudgetStatus, Session } from '../domain/types';

export interface IBudgetService {
  setBudget(session: Session | null, category: string, period: BudgetPeriod, threshold: number): Promise<Budget>;
  checkBudget(session: Session | null, category: string, period: BudgetPeriod): Promise<BudgetStatus>;
  listBudgets(session: Session | null, period: BudgetPeriod): Promise<BudgetStatus[]>;
  alertFor(session: Session | null, category: string, date: string): Promise<BudgetStatus | null>;
}
