import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { AppContext } from '../app';
import { memoryApp } from '../testing/context';
import { Menu, type Files, type Io } from './menu';

class ScriptedIo implements Io {
  readonly lines: string[] = [];
  readonly prompts: string[] = [];

  constructor(private readonly answers: string[]) {}

  async ask(question: string): Promise<string | null> {
    this.prompts.push(question);
    return this.answers.shift() ?? null;
  }

  async askSecret(question: string): Promise<string | null> {
    return this.ask(question);
  }

  print(line = ''): void {
    this.lines.push(line);
  }
}

class MemoryFiles implements Files {
  readonly data = new Map<string, string>();

  exists(path: string): boolean {
    return this.data.has(path);
  }

  async read(path: string): Promise<string> {
    const text = this.data.get(path);
    if (text === undefined) throw new Error(`ENOENT: ${path}`);
    return text;
  }

  async write(path: string, text: string): Promise<void> {
    this.data.set(path, text);
  }
}

describe('Menu', () => {
  let app: AppContext;
  let files: MemoryFiles;
  const now = () => new Date(2025, 8, 20, 10, 30, 0);

  beforeEach(() => {
    app = memoryApp();
    files = new MemoryFiles();
  });

  afterEach(() => app.store.close());

  async function run(answers: string[]): Promise<ScriptedIo> {
    const io = new ScriptedIo(answers);
    await new Menu(app, io, { files, now, backupDir: '/backups' }).run();
    return io;
  }

  const session = ['1', 'alice', 'test-secret', '2', 'alice', 'test-secret'];

  it('shows the numbered menu', async () => {
    const io = await run(['13']);
    expect(io.lines.slice(1, 15)).toEqual([
      '=== Personal Finance Manager ===',
      '1. Register',
      '2. Login',
      '3. Add Income',
      '4. Add Expense',
      '5. View Transactions',
      '6. Update Transaction',
      '7. Delete Transaction',
      '8. Generate Report',
      '9. Set Budget',
      '10. View Budgets',
      '11. Backup Data',
      '12. Restore Data',
      '13. Exit',
    ]);
    expect(io.lines.at(-1)).toBe('Thank you for using Personal Finance Manager!');
  });

  it('asks for a login before touching the ledger', async () => {
    const io = await run(['3', '2', 'alice', 'test-secret', '13']);
    expect(io.lines).toContain('Error: Please log in first.');
    expect(io.lines).toContain('Error: Invalid username or password.');
  });

  it('records transactions and warns when a budget is exceeded', async () => {
    const io = await run([
      ...session,
      '3', '5000', 'Salary', '', '2025-09-01',
      '9', 'Food', '500', '',
      '4', '600', 'Food', 'groceries', '',
      '13',
    ]);
    expect(io.lines).toContain('Registration successful!');
    expect(io.lines).toContain('Welcome, alice!');
    expect(io.lines).toContain('Transaction #1 added successfully!');
    expect(io.lines).toContain('Budget for Food set to $500.00 for September 2025.');
    expect(io.lines).toContain('Transaction #2 added successfully!');
    expect(io.lines).toContain('Warning: You have exceeded your budget for Food in September 2025!');
    expect(io.lines).toContain('Budget: $500.00, Spent: $600.00');

    const alice = await app.auth.login('alice', 'test-secret');
    const [, expense] = await app.ledger.listTransactions(alice);
    expect(expense).toMatchObject({ amount: 600, description: 'groceries', date: '2025-09-20' });
  });

  it('prints the monthly report', async () => {
    const io = await run([
      ...session,
      '3', '5000', 'Salary', '', '2025-09-01',
      '4', '600', 'Food', '', '2025-09-05',
      '4', '300', 'Travel', '', '2025-09-12',
      '4', '300', 'Entertainment', '', '2025-09-20',
      '8', 'monthly', '',
      '13',
    ]);
    const start = io.lines.indexOf('--- Financial Report (monthly) ---');
    expect(io.lines.slice(start, start + 10)).toEqual([
      '--- Financial Report (monthly) ---',
      'Period: 2025-09-01 to 2025-09-30',
      'Total Income: $5000.00',
      'Total Expenses: $1200.00',
      'Savings: $3800.00',
      '',
      'Expenses by Category:',
      '  Food: $600.00',
      '  Entertainment: $300.00',
      '  Travel: $300.00',
    ]);
  });

  it('updates, lists and deletes', async () => {
    const io = await run([
      ...session,
      '4', '20', 'Food', 'lunch', '2025-09-02',
      '6', '1', '25', '', '', '',
      '5', '3', 'Food',
      '7', '1',
      '7', '1',
      '13',
    ]);
    expect(io.lines).toContain('Transaction #1 updated successfully!');
    expect(io.lines).toContain('ID: 1 | 2025-09-02 | EXPENSE | $25.00 | Food | lunch');
    expect(io.lines).toContain('Total Income: $0.00 | Total Expense: $25.00 | Net: -$25.00');
    expect(io.lines).toContain('Transaction #1 deleted successfully!');
    expect(io.lines).toContain('Error: Transaction 1 not found.');
  });

  it('accepts only plain decimal amounts', async () => {
    const io = await run([
      ...session,
      '4', '0x10',
      '4', '1e3',
      '4', '12.50', 'Food', '', '2025-09-02',
      '13',
    ]);
    expect(io.lines.filter((l) => l === 'Error: Invalid amount. Please enter a number.')).toHaveLength(2);
    expect(io.lines).toContain('Transaction #1 added successfully!');
  });

  it('clears a description with a dash', async () => {
    const io = await run([
      ...session,
      '4', '20', 'Food', 'lunch', '2025-09-02',
      '6', '1', '', '', '-', '',
      '5', '1',
      '13',
    ]);
    expect(io.prompts).toContain("Enter new description [lunch] ('-' to clear): ");
    expect(io.lines).toContain('ID: 1 | 2025-09-02 | EXPENSE | $20.00 | Food | ');
  });

  it('rejects bad input and stays in the loop', async () => {
    const io = await run([...session, '4', 'abc', '6', 'x', '42', '13']);
    expect(io.lines).toContain('Error: Invalid amount. Please enter a number.');
    expect(io.lines).toContain('Error: Invalid transaction ID.');
    expect(io.lines).toContain('Invalid choice. Please try again.');
    expect(io.lines.at(-1)).toBe('Thank you for using Personal Finance Manager!');
  });

  it('backs up and restores through files', async () => {
    const io = await run([
      ...session,
      '4', '20', 'Food', '', '2025-09-02',
      '9', 'Food', '100', '2025-09',
      '11', '',
      '7', '1',
      '12', '/backups/finance_backup_20250920_103000.json',
      '10', '2025-09',
      '12', 'missing.json',
      '13',
    ]);
    expect(io.lines).toContain('Backup created successfully: /backups/finance_backup_20250920_103000.json');
    expect(io.lines).toContain('Data restored successfully! (1 transactions, 1 budgets)');
    expect(io.lines).toContain('Food: $100.00 | spent $20.00 | $80.00 left');
    expect(io.lines).toContain('Backup file not found.');
  });

  it('stops quietly when input ends', async () => {
    const io = await run(['1', 'alice']);
    expect(io.lines).not.toContain('Registration successful!');
    expect(io.prompts.at(-1)).toBe('Enter password: ');
  });
});
