import type { BudgetStatus, Report, Transaction } from '../domain/types';
import { periodLabel } from '../utils/dates';
import { formatMoney, sumAmounts } from '../utils/money';

export const RULE = '-'.repeat(80);

export function formatTransaction(t: Transaction): string {
  return `ID: ${t.id} | ${t.date} | ${t.type.toUpperCase()} | ${formatMoney(t.amount)} | ${t.category} | ${t.description ?? ''}`;
}

export function formatTotals(items: Transaction[]): string {
  const income = sumAmounts(items.filter((t) => t.type === 'income').map((t) => t.amount));
  const expense = sumAmounts(items.filter((t) => t.type === 'expense').map((t) => t.amount));
  return `Total Income: ${formatMoney(income)} | Total Expense: ${formatMoney(expense)} | Net: ${formatMoney(income - expense)}`;
}

export function formatTransactionList(items: Transaction[]): string[] {
  if (!items.length) return ['No transactions found.'];
  return ['Transactions:', RULE, ...items.map(formatTransaction), RULE, formatTotals(items)];
}

export function formatReport(r: Report): string[] {
  const lines = [
    `--- Financial Report (${r.period}) ---`,
    `Period: ${r.start} to ${r.end}`,
    `Total Income: ${formatMoney(r.totalIncome)}`,
    `Total Expenses: ${formatMoney(r.totalExpenses)}`,
    `Savings: ${formatMoney(r.savings)}`,
  ];
  if (r.categoryExpenses.length) {
    lines.push('', 'Expenses by Category:');
    for (const c of r.categoryExpenses) lines.push(`  ${c.category}: ${formatMoney(c.total)}`);
  }
  return lines;
}

export function formatBudget(s: BudgetStatus): string {
  const state = s.exceeded
    ? `EXCEEDED by ${formatMoney(-s.remaining)}`
    : `${formatMoney(s.remaining)} left`;
  return `${s.category}: ${formatMoney(s.threshold)} | spent ${formatMoney(s.spent)} | ${state}`;
}

export function formatBudgetList(items: BudgetStatus[], label: string): string[] {
  if (!items.length) return [`No budgets set for ${label}.`];
  const rule = '-'.repeat(40);
  return [`Budgets for ${label}:`, rule, ...items.map(formatBudget), rule];
}

export function budgetWarning(s: BudgetStatus): string[] {
  return [
    `Warning: You have exceeded your budget for ${s.category} in ${periodLabel(s.period)}!`,
    `Budget: ${formatMoney(s.threshold)}, Spent: ${formatMoney(s.spent)}`,
  ];
}
