import { existsSync } from 'node:fs';
import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { AppContext } from '../app';
import type { BudgetPeriod, ReportPeriod, Session, TransactionChanges, TransactionFilter, TxType } from '../domain/types';
import { ValidationError, isFinanceError } from '../domain/errors';
import { backupStamp, periodLabel, periodOf, today } from '../utils/dates';
import { formatMoney } from '../utils/money';
import {
  budgetWarning, formatBudgetList, formatReport, formatTransactionList,
} from './format';

/** Line-oriented terminal access; `null` from a prompt means input ended. */
export interface Io {
  ask(question: string): Promise<string | null>;
  askSecret(question: string): Promise<string | null>;
  print(line?: string): void;
}

export interface Files {
  exists(path: string): boolean;
  read(path: string): Promise<string>;
  write(path: string, text: string): Promise<void>;
}

export const nodeFiles: Files = {
  exists: (path) => existsSync(path),
  read: (path) => readFile(path, 'utf8'),
  write: (path, text) => writeFile(path, text, 'utf8'),
};

export interface MenuOptions {
  files?: Files;
  backupDir?: string;
  now?: () => Date;
  debug?: boolean;
}

export const MENU = [
  'Register',
  'Login',
  'Add Income',
  'Add Expense',
  'View Transactions',
  'Update Transaction',
  'Delete Transaction',
  'Generate Report',
  'Set Budget',
  'View Budgets',
  'Backup Data',
  'Restore Data',
  'Exit',
] as const;

class EndOfInput extends Error {}

type Action = (session: Session | null) => Promise<Session | null>;

export class Menu {
  private readonly files: Files;
  private readonly backupDir: string;
  private readonly now: () => Date;
  private readonly debug: boolean;

  constructor(private readonly ctx: AppContext, private readonly io: Io, opts: MenuOptions = {}) {
    this.files = opts.files ?? nodeFiles;
    this.backupDir = opts.backupDir ?? '.';
    this.now = opts.now ?? (() => new Date());
    this.debug = opts.debug ?? false;
  }

  /** Runs until Exit is chosen or input ends. */
  async run(): Promise<void> {
    let session: Session | null = null;
    for (;;) {
      this.showMenu();
      let choice: string;
      try {
        choice = await this.prompt(`Enter your choice (1-${MENU.length}): `);
      } catch (e) {
        if (e instanceof EndOfInput) return;
        throw e;
      }
      if (choice === String(MENU.length)) {
        this.io.print('Thank you for using Personal Finance Manager!');
        return;
      }
      const action = this.actions()[choice];
      if (!action) {
        this.io.print('Invalid choice. Please try again.');
        continue;
      }
      try {
        session = await action(session);
      } catch (e) {
        if (e instanceof EndOfInput) return;
        this.report(e);
      }
    }
  }

  private showMenu(): void {
    this.io.print();
    this.io.print('=== Personal Finance Manager ===');
    MENU.forEach((label, i) => this.io.print(`${i + 1}. ${label}`));
    this.io.print('================================');
  }

  private actions(): Record<string, Action> {
    return {
      '1': (s) => this.register(s),
      '2': () => this.login(),
      '3': (s) => this.addTransaction(s, 'income'),
      '4': (s) => this.addTransaction(s, 'expense'),
      '5': (s) => this.viewTransactions(s),
      '6': (s) => this.updateTransaction(s),
      '7': (s) => this.deleteTransaction(s),
      '8': (s) => this.generateReport(s),
      '9': (s) => this.setBudget(s),
      '10': (s) => this.viewBudgets(s),
      '11': (s) => this.backup(s),
      '12': (s) => this.restore(s),
    };
  }

  private async register(session: Session | null): Promise<Session | null> {
    const username = await this.prompt('Enter username: ');
    const password = await this.secret('Enter password: ');
    await this.ctx.auth.register(username, password);
    this.io.print('Registration successful!');
    return session;
  }

  private async login(): Promise<Session | null> {
    const username = await this.prompt('Enter username: ');
    const password = await this.secret('Enter password: ');
    const session = await this.ctx.auth.login(username, password);
    this.io.print(`Welcome, ${session.username}!`);
    return session;
  }

  private async addTransaction(session: Session | null, type: TxType): Promise<Session | null> {
    await this.ctx.auth.requireSession(session);
    const amount = parseAmount(await this.prompt(`Enter ${type} amount: `));
    const category = await this.prompt('Enter category: ');
    const description = await this.prompt('Enter description (optional): ');
    const date = (await this.prompt('Enter date (YYYY-MM-DD, blank for today): ')) || today(this.now());

    const id = await this.ctx.ledger.addTransaction(session, {
      type,
      amount,
      category,
      ...(description ? { description } : {}),
      date,
    });
    this.io.print(`Transaction #${id} added successfully!`);

    if (type === 'expense') {
      const status = await this.ctx.budgets.alertFor(session, category, date);
      if (status?.exceeded) budgetWarning(status).forEach((l) => this.io.print(l));
    }
    return session;
  }

  private async viewTransactions(session: Session | null): Promise<Session | null> {
    await this.ctx.auth.requireSession(session);
    this.io.print();
    this.io.print('Filter options:');
    this.io.print('1. All transactions');
    this.io.print('2. By date range');
    this.io.print('3. By category');
    this.io.print('4. By type (income/expense)');
    const choice = await this.prompt('Enter your choice (1-4): ');

    const filter: TransactionFilter = {};
    if (choice === '2') {
      filter.dateFrom = (await this.prompt('Enter start date (YYYY-MM-DD): ')) || undefined;
      filter.dateTo = (await this.prompt('Enter end date (YYYY-MM-DD): ')) || undefined;
    } else if (choice === '3') {
      filter.category = await this.prompt('Enter category: ');
    } else if (choice === '4') {
      filter.type = parseType(await this.prompt('Enter type (income/expense): '));
    }

    const items = await this.ctx.ledger.listTransactions(session, filter);
    this.io.print();
    formatTransactionList(items).forEach((l) => this.io.print(l));
    return session;
  }

  private async updateTransaction(session: Session | null): Promise<Session | null> {
    await this.ctx.auth.requireSession(session);
    const id = parseId(await this.prompt('Enter transaction ID to update: '));
    const current = await this.ctx.ledger.getTransaction(session, id);
    this.io.print('Leave field blank to keep current value:');

    const changes: TransactionChanges = {};
    const amount = await this.prompt(`Enter new amount [${formatMoney(current.amount)}]: `);
    if (amount) changes.amount = parseAmount(amount);
    const category = await this.prompt(`Enter new category [${current.category}]: `);
    if (category) changes.category = category;
    const description = await this.prompt(`Enter new description [${current.description ?? ''}] ('-' to clear): `);
    if (description === '-') changes.description = '';
    else if (description) changes.description = description;
    const date = await this.prompt(`Enter new date [${current.date}]: `);
    if (date) changes.date = date;

    await this.ctx.ledger.updateTransaction(session, id, changes);
    this.io.print(`Transaction #${id} updated successfully!`);
    return session;
  }

  private async deleteTransaction(session: Session | null): Promise<Session | null> {
    await this.ctx.auth.requireSession(session);
    const id = parseId(await this.prompt('Enter transaction ID to delete: '));
    await this.ctx.ledger.deleteTransaction(session, id);
    this.io.print(`Transaction #${id} deleted successfully!`);
    return session;
  }

  private async generateReport(session: Session | null): Promise<Session | null> {
    await this.ctx.auth.requireSession(session);
    const period = parsePeriodKind(await this.prompt('Enter period (monthly/yearly): '));
    const reference = (await this.prompt('Enter reference date (YYYY-MM-DD, blank for today): ')) || today(this.now());
    const report = await this.ctx.reports.generateReport(session, period, reference);
    this.io.print();
    formatReport(report).forEach((l) => this.io.print(l));
    return session;
  }

  private async setBudget(session: Session | null): Promise<Session | null> {
    await this.ctx.auth.requireSession(session);
    const category = await this.prompt('Enter category: ');
    const threshold = parseAmount(await this.prompt('Enter budget amount: '));
    const period = await this.askPeriod();
    const budget = await this.ctx.budgets.setBudget(session, category, period, threshold);
    this.io.print(`Budget for ${budget.category} set to ${formatMoney(budget.threshold)} for ${periodLabel(budget.period)}.`);
    return session;
  }

  private async viewBudgets(session: Session | null): Promise<Session | null> {
    await this.ctx.auth.requireSession(session);
    const period = await this.askPeriod();
    const items = await this.ctx.budgets.listBudgets(session, period);
    this.io.print();
    formatBudgetList(items, periodLabel(period)).forEach((l) => this.io.print(l));
    return session;
  }

  private async backup(session: Session | null): Promise<Session | null> {
    await this.ctx.auth.requireSession(session);
    const file = (await this.prompt('Enter backup filename: '))
      || join(this.backupDir, `finance_backup_${backupStamp(this.now())}.json`);
    const json = await this.ctx.backup.exportAsJson(session);
    await this.files.write(file, json);
    this.io.print(`Backup created successfully: ${file}`);
    return session;
  }

  private async restore(session: Session | null): Promise<Session | null> {
    await this.ctx.auth.requireSession(session);
    const file = await this.prompt('Enter backup filename: ');
    if (!file || !this.files.exists(file)) {
      this.io.print('Backup file not found.');
      return session;
    }
    const result = await this.ctx.backup.importFromJson(session, await this.files.read(file));
    this.io.print(`Data restored successfully! (${result.transactions} transactions, ${result.budgets} budgets)`);
    if (result.renumbered) this.io.print(`${result.renumbered} transaction IDs were reassigned.`);
    return session;
  }

  private async askPeriod(): Promise<BudgetPeriod> {
    const text = await this.prompt('Enter month (YYYY-MM, blank for current): ');
    if (!text) return periodOf(this.now());
    const m = /^(\d{4})-(\d{1,2})$/.exec(text);
    if (!m) throw new ValidationError(`Invalid month "${text}" (expected YYYY-MM)`);
    return { year: Number(m[1]), month: Number(m[2]) };
  }

  private async prompt(question: string): Promise<string> {
    const answer = await this.io.ask(question);
    if (answer === null) throw new EndOfInput();
    return answer.trim();
  }

  private async secret(question: string): Promise<string> {
    const answer = await this.io.askSecret(question);
    if (answer === null) throw new EndOfInput();
    return answer;
  }

  private report(e: unknown): void {
    if (isFinanceError(e)) {
      this.io.print(`Error: ${e.message}`);
      return;
    }
    this.io.print(`Unexpected error: ${e instanceof Error ? e.message : String(e)}`);
    if (this.debug) console.error(e);
  }
}

function parseAmount(text: string): number {
  if (!/^[+-]?(\d+(\.\d*)?|\.\d+)$/.test(text)) {
    throw new ValidationError('Invalid amount. Please enter a number.');
  }
  return Number(text);
}

function parseId(text: string): number {
  if (!/^\d+$/.test(text)) throw new ValidationError('Invalid transaction ID.');
  return Number(text);
}

function parseType(text: string): TxType {
  const t = text.toLowerCase();
  if (t !== 'income' && t !== 'expense') throw new ValidationError("Type must be 'income' or 'expense'.");
  return t;
}

function parsePeriodKind(text: string): ReportPeriod {
  const p = text.toLowerCase();
  if (p !== 'monthly' && p !== 'yearly') throw new ValidationError("Invalid period. Use 'monthly' or 'yearly'.");
  return p;
}
