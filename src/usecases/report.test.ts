import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { AppContext } from '../app';
import type { Session, Transaction } from '../domain/types';
import { ValidationError } from '../domain/errors';
import { memoryApp, signIn } from '../testing/context';
import { summarize } from './report';

describe('ReportService', () => {
  let app: AppContext;
  let alice: Session;

  beforeEach(async () => {
    app = memoryApp();
    alice = await signIn(app, 'alice');
  });

  afterEach(() => app.store.close());

  async function seedSeptember(): Promise<void> {
    await app.ledger.addTransaction(alice, { type: 'income', amount: 5000, category: 'Salary', date: '2025-09-01' });
    await app.ledger.addTransaction(alice, { type: 'expense', amount: 600, category: 'Food', date: '2025-09-05' });
    await app.ledger.addTransaction(alice, { type: 'expense', amount: 300, category: 'Travel', date: '2025-09-12' });
    await app.ledger.addTransaction(alice, { type: 'expense', amount: 300, category: 'Entertainment', date: '2025-09-20' });
    await app.ledger.addTransaction(alice, { type: 'expense', amount: 75, category: 'Food', date: '2025-08-31' });
  }

  it('summarizes a month', async () => {
    await seedSeptember();
    const report = await app.reports.generateReport(alice, 'monthly', '2025-09-15');
    expect(report).toEqual({
      period: 'monthly',
      start: '2025-09-01',
      end: '2025-09-30',
      totalIncome: 5000,
      totalExpenses: 1200,
      savings: 3800,
      transactionCount: 4,
      categoryExpenses: [
        { category: 'Food', total: 600 },
        { category: 'Entertainment', total: 300 },
        { category: 'Travel', total: 300 },
      ],
    });
  });

  it('summarizes a calendar year', async () => {
    await seedSeptember();
    await app.ledger.addTransaction(alice, { type: 'expense', amount: 10, category: 'Food', date: '2024-12-31' });
    const report = await app.reports.generateReport(alice, 'yearly', '2025-03-02');
    expect(report.start).toBe('2025-01-01');
    expect(report.end).toBe('2025-12-31');
    expect(report.totalExpenses).toBe(1275);
    expect(report.categoryExpenses[0]).toEqual({ category: 'Food', total: 675 });
  });

  it('ends February on the leap day', async () => {
    const report = await app.reports.generateReport(alice, 'monthly', '2024-02-10');
    expect([report.start, report.end]).toEqual(['2024-02-01', '2024-02-29']);
    expect(report.categoryExpenses).toEqual([]);
    expect(report.savings).toBe(0);
  });

  it('allows negative savings', async () => {
    await app.ledger.addTransaction(alice, { type: 'income', amount: 100, category: 'Gift', date: '2025-05-01' });
    await app.ledger.addTransaction(alice, { type: 'expense', amount: 250.5, category: 'Rent', date: '2025-05-02' });
    const report = await app.reports.generateReport(alice, 'monthly', '2025-05-31');
    expect(report.savings).toBe(-150.5);
  });

  it('keeps savings equal to income minus expenses', async () => {
    const amounts = [12.34, 0.1, 0.2, 99.99, 1500, 7.07, 3.3];
    for (const [i, amount] of amounts.entries()) {
      await app.ledger.addTransaction(alice, {
        type: i % 3 === 0 ? 'income' : 'expense',
        amount,
        category: `C${i % 2}`,
        date: `2025-06-${String(i + 1).padStart(2, '0')}`,
      });
    }
    const report = await app.reports.generateReport(alice, 'monthly', '2025-06-01');
    expect(report.totalIncome).toBe(115.63);
    expect(report.totalExpenses).toBe(1507.37);
    expect(report.savings).toBe(-1391.74);
  });

  it('refuses sub-cent amounts so totals stay exact', async () => {
    for (let i = 0; i < 3; i++) {
      await expect(app.ledger.addTransaction(alice, {
        type: 'expense', amount: 0.004, category: 'Food', date: '2025-09-02',
      })).rejects.toBeInstanceOf(ValidationError);
    }
    await app.ledger.addTransaction(alice, { type: 'expense', amount: 0.01, category: 'Food', date: '2025-09-02' });
    const report = await app.reports.generateReport(alice, 'monthly', '2025-09-02');
    expect(report.totalExpenses).toBe(0.01);
    expect(report.savings).toBe(-0.01);
  });

  it('only counts the requesting user\'s transactions', async () => {
    const bob = await signIn(app, 'bob');
    await seedSeptember();
    const report = await app.reports.generateReport(bob, 'monthly', '2025-09-15');
    expect(report.transactionCount).toBe(0);
    expect(report.totalIncome).toBe(0);
  });

  it('rejects a malformed reference date', async () => {
    await expect(app.reports.generateReport(alice, 'monthly', '2025-13-01')).rejects.toBeInstanceOf(ValidationError);
  });
});

describe('summarize', () => {
  const tx = (type: 'income' | 'expense', amount: number, category: string): Transaction => ({
    id: 1, userId: 1, type, amount, category, date: '2025-01-01', createdAt: 0,
  });

  it('adds in cents', () => {
    const totals = summarize([tx('expense', 0.1, 'A'), tx('expense', 0.2, 'A')]);
    expect(totals.totalExpenses).toBe(0.3);
    expect(totals.categoryExpenses).toEqual([{ category: 'A', total: 0.3 }]);
  });

  it('orders categories by total, then by name', () => {
    const totals = summarize([
      tx('expense', 5, 'b'),
      tx('expense', 5, 'a'),
      tx('expense', 9, 'c'),
      tx('income', 100, 'z'),
    ]);
    expect(totals.categoryExpenses.map((c) => c.category)).toEqual(['c', 'a', 'b']);
  });
});
