export type { CellPattern, ExtractionResult } from './core/review';
export type { ReviewLoad, ReviewState } from './core/reviewSession';

export enum LogStatus {
  Ok = 'ok',
  Warn = 'warn',
  Error = 'error',
}

export interface LogMetric {
  label: string;
  value: string | number;
}

export interface LogEntry {
  id: string;
  stepId: string;
  title: string;
  status: LogStatus;
  metrics: LogMetric[];
  description?: string;
}
