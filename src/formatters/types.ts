import { AnalysisReport } from '../types/report';

export interface ReportFormatter {
  format(report: AnalysisReport): string;
}
