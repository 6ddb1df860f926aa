import type { ReviewEvent, ReviewEventPhase } from './events';

export type ReviewErrorCode =
  | 'INSUFFICIENT_INPUT'
  | 'NO_COMMON_PREFIX'
  | 'EMPTY_RADIX'
  | 'DUPLICATE_TAIL'
  | 'DIRECTORY_UNREADABLE';

export class ReviewError extends Error {
  public readonly code: ReviewErrorCode;
  public readonly details?: Record<string, string | number>;

  constructor(code: ReviewErrorCode, message: string, details?: Record<string, string | number>) {
    super(message);
    this.name = 'ReviewError';
    this.code = code;
    this.details = details;
  }

  /** Report this failure through an `onEvent` callback. */
  toEvent(phase: ReviewEventPhase): ReviewEvent {
    return { phase, level: 'error', code: this.code, message: this.message, metrics: this.details };
  }
}

export function isReviewError(value: unknown): value is ReviewError {
  return value instanceof ReviewError;
}
