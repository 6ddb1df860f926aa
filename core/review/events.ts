export type ReviewEventPhase = 'extract' | 'compile' | 'scan' | 'resolve' | 'session';
export type ReviewEventLevel = 'info' | 'warn' | 'error';

export interface ReviewEvent {
  phase: ReviewEventPhase;
  level: ReviewEventLevel;
  code: string;
  message: string;
  metrics?: Record<string, string | number>;
}

export type ReviewEventCallback = (event: ReviewEvent) => void;

export interface EventCapableOptions {
  onEvent?: ReviewEventCallback;
}
