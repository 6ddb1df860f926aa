import {
  activateReview,
  applyPatternEdits,
  createReviewState,
  refreshReview,
  stepReview,
} from '../core/reviewSession';
import type { ActivateRequest, ReviewLoad, ReviewState, ReviewUpdate } from '../core/reviewSession';
import type { DirectoryLister, ReviewOptions } from '../core/review';
import { LogEntry } from '../types';
import { mapReviewErrorToLogEntry, mapReviewEventToLogEntry } from './review/logAdapter';

export interface ReviewNavigatorConfig {
  onLog: (log: LogEntry) => void;
  /** Defaults to reading the real filesystem. */
  lister?: DirectoryLister;
  separators?: readonly string[];
  minCorroboratingCells?: number;
}

/**
 * Holds the Review Mode state on behalf of the viewer and reports every
 * review event to its log panel.
 */
export class ReviewNavigator {
  private current: ReviewState = createReviewState();
  private readonly options: ReviewOptions;

  constructor(private readonly config: ReviewNavigatorConfig) {
    this.options = {
      lister: config.lister,
      separators: config.separators,
      minCorroboratingCells: config.minCorroboratingCells,
      onEvent: (event) => config.onLog(mapReviewEventToLogEntry(event)),
    };
  }

  public get state(): ReviewState {
    return this.current;
  }

  public activate(request: ActivateRequest): ReviewLoad[] {
    return this.apply('session.activate', () => activateReview(this.current, request, this.options));
  }

  public editPatterns(sources: string[]): ReviewLoad[] {
    return this.apply('session.edit', () => applyPatternEdits(this.current, sources, this.options));
  }

  public refresh(): ReviewLoad[] {
    return this.apply('session.refresh', () => refreshReview(this.current, this.options));
  }

  public step(direction: 1 | -1): ReviewLoad[] {
    return this.apply('session.step', () => stepReview(this.current, direction, this.options));
  }

  private apply(stepId: string, transition: () => ReviewUpdate): ReviewLoad[] {
    try {
      const update = transition();
      this.current = update.state;
      return update.loads;
    } catch (error) {
      this.config.onLog(mapReviewErrorToLogEntry(error, stepId));
      throw error;
    }
  }
}
