export * from './core/review';
export * from './core/reviewSession';
export { ReviewNavigator } from './services/reviewNavigator';
export type { ReviewNavigatorConfig } from './services/reviewNavigator';
export { mapReviewEventToLogEntry, mapReviewErrorToLogEntry } from './services/review/logAdapter';
export { ReviewPanel } from './components/ReviewPanel';
export { SubPanel } from './components/SubPanel';
export { LogStatus } from './types';
export type { LogEntry, LogMetric } from './types';
export { SEPARATOR_CHARS, MIN_CORROBORATING_CELLS, REVIEW_MESSAGES } from './constants';
