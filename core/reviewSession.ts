/**
 * Review Mode state for the viewer.
 *
 * The state is a plain value. Every transition takes the previous state and
 * returns the next one together with the files the viewer should load, so
 * nothing about the review lives outside the object the caller holds.
 *
 *  • **activate** – infer the naming pattern from the displayed images and
 *    scan their directory for other comparable sets.
 *  • **edit**     – replace the cell patterns by hand-edited sources and rescan.
 *  • **refresh**  – rescan with the current patterns.
 *  • **step**     – move to the next / previous set, wrapping around. Reuses
 *    the known radix list.
 */

import { REVIEW_MESSAGES } from '../constants';
import {
  cellPatternsFromSources,
  extractPatterns,
  resolveFiles,
  scanRadixes,
} from './review';
import type { CellPattern, ReviewOptions } from './review';

// ─── Public types ──────────────────────────────────────────────────────

export interface ReviewState {
  directory: string | null;
  /** Radix inferred from the images the review was activated with. */
  radix: string | null;
  cellPatterns: CellPattern[];
  radixes: string[];
  /** Position in `radixes`, -1 when the list is empty. */
  currentIndex: number;
  errorMessage: string | null;
}

export interface ReviewLoad {
  /** Cell slot the file belongs to. */
  index: number;
  path: string;
}

export interface ReviewUpdate {
  state: ReviewState;
  loads: ReviewLoad[];
}

export interface ActivateRequest {
  directory: string;
  /** Basenames of the displayed images, in slot order. */
  filenames: string[];
}

// ─── Transitions ───────────────────────────────────────────────────────

export function createReviewState(): ReviewState {
  return {
    directory: null,
    radix: null,
    cellPatterns: [],
    radixes: [],
    currentIndex: -1,
    errorMessage: null,
  };
}

export function currentRadix(state: ReviewState): string | null {
  if (state.currentIndex < 0 || state.currentIndex >= state.radixes.length) return null;
  return state.radixes[state.currentIndex];
}

export function activateReview(
  state: ReviewState,
  request: ActivateRequest,
  options: ReviewOptions = {},
): ReviewUpdate {
  if (request.filenames.length < 2) {
    return { state: { ...state, errorMessage: REVIEW_MESSAGES.notEnoughImages }, loads: [] };
  }

  const extraction = extractPatterns(request.filenames, options);
  if (!extraction) {
    return { state: { ...state, errorMessage: REVIEW_MESSAGES.noCommonPattern }, loads: [] };
  }

  const radixes = scanRadixes(request.directory, extraction.cellPatterns, options);
  const found = radixes.indexOf(extraction.radix);
  const next: ReviewState = {
    directory: request.directory,
    radix: extraction.radix,
    cellPatterns: extraction.cellPatterns,
    radixes,
    currentIndex: found >= 0 ? found : radixes.length > 0 ? 0 : -1,
    errorMessage: null,
  };

  return { state: next, loads: loadsFor(next, options) };
}

export function applyPatternEdits(
  state: ReviewState,
  sources: string[],
  options: ReviewOptions = {},
): ReviewUpdate {
  if (state.directory === null) {
    options.onEvent?.({
      phase: 'session',
      level: 'warn',
      code: 'NO_ACTIVE_REVIEW',
      message: REVIEW_MESSAGES.noActiveReview,
    });
    return { state, loads: [] };
  }

  const cellPatterns = cellPatternsFromSources(sources, state.cellPatterns);
  return rescan({ ...state, cellPatterns }, state.directory, options);
}

export function refreshReview(state: ReviewState, options: ReviewOptions = {}): ReviewUpdate {
  if (state.directory === null) return { state, loads: [] };
  return rescan(state, state.directory, options);
}

export function stepReview(state: ReviewState, step: number, options: ReviewOptions = {}): ReviewUpdate {
  const count = state.radixes.length;
  if (count === 0) return { state, loads: [] };

  const base = state.currentIndex < 0 ? 0 : state.currentIndex;
  const next: ReviewState = { ...state, currentIndex: (((base + step) % count) + count) % count };
  return { state: next, loads: loadsFor(next, options) };
}

// ─── Helpers ───────────────────────────────────────────────────────────

function rescan(state: ReviewState, directory: string, options: ReviewOptions): ReviewUpdate {
  const previous = currentRadix(state);
  const radixes = scanRadixes(directory, state.cellPatterns, options);
  const kept = previous === null ? -1 : radixes.indexOf(previous);

  const next: ReviewState = {
    ...state,
    radixes,
    currentIndex: kept >= 0 ? kept : radixes.length > 0 ? 0 : -1,
  };
  return { state: next, loads: loadsFor(next, options) };
}

function loadsFor(state: ReviewState, options: ReviewOptions): ReviewLoad[] {
  const radix = currentRadix(state);
  if (radix === null || state.directory === null) return [];

  const loads: ReviewLoad[] = [];
  resolveFiles(state.directory, radix, state.cellPatterns, options).forEach((path, index) => {
    if (path !== null) loads.push({ index, path });
  });
  return loads;
}
