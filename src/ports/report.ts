import type { Report, ReportPeriod, Session } from '../domain/types';

export interface IReportService {
  generateReport(session: Session | null, period: ReportPeriod, referenceDate: string): Promise<Report>;
}
