import type { IAuthService } from './ports/auth';
import type { IBackupService } from './ports/backup';
import type { IBudgetService } from './ports/budget';
import type { IPasswordHasher } from './ports/crypto';
import type { IDataStore } from './ports/datastore';
import type { ILedgerService } from './ports/ledger';
import type { IReportService } from './ports/report';
import { ScryptPasswordHasher } from './adapters/crypto/scryptHasher';
import { SqliteDataStore } from './adapters/sqlite/sqliteAdapter';
import { AuthService } from './usecases/auth';
import { BackupService } from './usecases/backup';
import { BudgetService } from './usecases/budget';
import { LedgerService } from './usecases/ledger';
import { ReportService } from './usecases/report';

/** Everything an operation needs, passed explicitly instead of living in module state. */
export interface AppContext {
  store: IDataStore;
  auth: IAuthService;
  ledger: ILedgerService;
  budgets: IBudgetService;
  reports: IReportService;
  backup: IBackupService;
}

export function createApp(store: IDataStore, hasher: IPasswordHasher = new ScryptPasswordHasher()): AppContext {
  const auth = new AuthService(store, hasher);
  return {
    store,
    auth,
    ledger: new LedgerService(store, auth),
    budgets: new BudgetService(store, auth),
    reports: new ReportService(store, auth),
    backup: new BackupService(store, auth),
  };
}

export function openApp(dbPath: string): AppContext {
  return createApp(SqliteDataStore.open(dbPath));
}

export * from './domain/types';
export * from './domain/errors';
export type { Snapshot } from './domain/schemas';
