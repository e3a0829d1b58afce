import type { Snapshot } from '../domain/schemas';
import type { Session } from '../domain/types';
import type { RestoreResult } from './datastore';

export interface IBackupService {
  exportSnapshot(session: Session | null): Promise<Snapshot>;
  exportAsJson(session: Session | null): Promise<string>;
  importSnapshot(session: Session | null, snapshot: unknown): Promise<RestoreResult>;
  importFromJson(session: Session | null, text: string): Promise<RestoreResult>;
}
