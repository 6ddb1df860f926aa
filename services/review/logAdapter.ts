import { ReviewError, ReviewEvent, ReviewEventPhase } from '../../core/review';
import { LogEntry, LogStatus } from '../../types';

const PHASE_LABELS: Record<ReviewEventPhase, string> = {
  extract: 'Pattern',
  compile: 'Pattern',
  scan: 'Scan',
  resolve: 'Resolve',
  session: 'Review',
};

const STATUS_BY_LEVEL: Record<ReviewEvent['level'], LogStatus> = {
  info: LogStatus.Ok,
  warn: LogStatus.Warn,
  error: LogStatus.Error,
};

let sequence = 0;

function nextId(prefix: string): string {
  sequence += 1;
  return `${prefix}-${sequence}`;
}

/** `stepId` defaults to `<phase>.<code>`. */
export function mapReviewEventToLogEntry(event: ReviewEvent, stepId = `${event.phase}.${event.code}`): LogEntry {
  return {
    id: nextId(event.phase),
    stepId,
    title: `${PHASE_LABELS[event.phase]}: ${event.message}`,
    status: STATUS_BY_LEVEL[event.level],
    metrics: Object.entries(event.metrics ?? {}).map(([label, value]) => ({ label, value })),
    description: event.code,
  };
}

export function mapReviewErrorToLogEntry(error: unknown, fallbackStep: string): LogEntry {
  if (error instanceof ReviewError) {
    return mapReviewEventToLogEntry(error.toEvent('session'), fallbackStep);
  }

  return {
    id: nextId('error'),
    stepId: fallbackStep,
    title: 'Unexpected Error',
    status: LogStatus.Error,
    metrics: [],
    description: error instanceof Error ? error.message : String(error),
  };
}
