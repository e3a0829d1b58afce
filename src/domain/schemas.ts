import { z } from 'zod';
import { isCalendarDate } from '../utils/dates';
import { ValidationError } from './errors';
import { TX_TYPES } from './types';

export const txTypeSchema = z.enum(['income', 'expense'], {
  errorMap: () => ({ message: `Transaction type must be one of: ${TX_TYPES.join(', ')}` }),
});

export const dateSchema = z
  .string()
  .refine(isCalendarDate, (v) => ({ message: `Invalid date "${v}" (expected YYYY-MM-DD)` }));

const wholeCents = (v: number) => Math.abs(v * 100 - Math.round(v * 100)) < 1e-6;

export const amountSchema = z
  .number({ invalid_type_error: 'Amount must be a number' })
  .finite('Amount must be a finite number')
  .positive('Amount must be positive')
  .refine(wholeCents, 'Amount must have at most two decimals');

export const categorySchema = z.string().trim().min(1, 'Category cannot be empty');

export const descriptionSchema = z.string().optional();

export const newTransactionSchema = z.object({
  type: txTypeSchema,
  amount: amountSchema,
  category: categorySchema,
  description: descriptionSchema,
  date: dateSchema,
});

export const transactionChangesSchema = newTransactionSchema
  .partial()
  .refine((c) => Object.values(c).some((v) => v !== undefined), 'No updates provided');

export const transactionFilterSchema = z
  .object({
    dateFrom: dateSchema.optional(),
    dateTo: dateSchema.optional(),
    category: z.string().optional(),
    type: txTypeSchema.optional(),
  })
  .refine((f) => !f.dateFrom || !f.dateTo || f.dateFrom <= f.dateTo, 'Start date must not be after end date');

export const budgetPeriodSchema = z.object({
  year: z.number().int().min(1, 'Year out of range').max(9999, 'Year out of range'),
  month: z.number().int().min(1, 'Month must be 1-12').max(12, 'Month must be 1-12'),
});

export const thresholdSchema = z
  .number({ invalid_type_error: 'Budget amount must be a number' })
  .finite('Budget amount must be a finite number')
  .nonnegative('Budget amount cannot be negative')
  .refine(wholeCents, 'Budget amount must have at most two decimals');

export const credentialsSchema = z.object({
  username: z.string().trim().min(1, 'Username cannot be empty'),
  password: z.string().min(1, 'Password cannot be empty'),
});

export const SNAPSHOT_FORMAT = 'ledger-snapshot';
export const SNAPSHOT_VERSION = 1;

export const snapshotTransactionSchema = z.object({
  id: z.number().int().positive().max(Number.MAX_SAFE_INTEGER, 'Transaction id out of range'),
  type: txTypeSchema,
  amount: amountSchema,
  category: categorySchema,
  description: descriptionSchema,
  date: dateSchema,
});

export const snapshotBudgetSchema = z.object({
  category: categorySchema,
  year: budgetPeriodSchema.shape.year,
  month: budgetPeriodSchema.shape.month,
  threshold: thresholdSchema,
});

export const snapshotSchema = z.object({
  format: z.literal(SNAPSHOT_FORMAT),
  version: z.literal(SNAPSHOT_VERSION),
  username: z.string().min(1),
  exportedAt: z.string(),
  transactions: z.array(snapshotTransactionSchema),
  budgets: z.array(snapshotBudgetSchema),
});

export type Snapshot = z.infer<typeof snapshotSchema>;
export type SnapshotTransaction = z.infer<typeof snapshotTransactionSchema>;
export type SnapshotBudget = z.infer<typeof snapshotBudgetSchema>;

/** Renders the first few zod issues as `path: message` fragments. */
export function describeIssues(error: z.ZodError, limit = 3): string {
  return error.issues
    .slice(0, limit)
    .map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message))
    .join('; ');
}

/** Parses user input, turning zod issues into a ValidationError. */
export function parseInput<S extends z.ZodTypeAny>(schema: S, value: unknown): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) throw new ValidationError(describeIssues(result.error));
  return result.data;
}
