import { SEPARATOR_CHARS } from '../../constants';
import type { EventCapableOptions } from './events';
import type { CellPattern, CompiledCellPattern } from './types';

const REGEX_SYNTAX = /[.*+?^${}()|[\]\\]/g;

// `.` must also cross \r, U+2028 and U+2029, which filenames may contain.
const PATTERN_FLAGS = 's';

export function escapePattern(text: string): string {
  return text.replace(REGEX_SYNTAX, '\\$&');
}

function trimLeading(text: string, separators: readonly string[]): string {
  let start = 0;
  while (start < text.length && separators.includes(text[start])) start++;
  return text.slice(start);
}

/**
 * Label shown for a cell: the tail without its leading separators and
 * extension. A tail that is only an extension (".jpg") is labelled by the
 * extension itself.
 */
export function deriveLabel(tail: string, separators: readonly string[] = SEPARATOR_CHARS): string {
  const stripped = trimLeading(tail, separators);
  const dotIndex = stripped.lastIndexOf('.');
  if (dotIndex < 0) return stripped;

  const withoutExtension = stripped.slice(0, dotIndex);
  return withoutExtension.length > 0 ? withoutExtension : stripped.slice(dotIndex + 1);
}

export function buildCellPattern(tail: string, separators: readonly string[] = SEPARATOR_CHARS): CellPattern {
  return {
    label: deriveLabel(tail, separators),
    tail,
    pattern: `^(.*)${escapePattern(tail)}$`,
  };
}

/**
 * Rebuild cell patterns from hand-edited sources. Tails and labels are only
 * display bookkeeping, so they are carried over by position.
 */
export function cellPatternsFromSources(sources: string[], previous: CellPattern[]): CellPattern[] {
  return sources.map((pattern, index) => {
    const prior = previous[index];
    return {
      label: prior?.label ?? `cell ${index + 1}`,
      tail: prior?.tail ?? '',
      pattern,
    };
  });
}

function countCaptureGroups(regex: RegExp): number {
  // An empty alternative always matches, exposing the group count.
  const probe = new RegExp(`${regex.source}|`, regex.flags).exec('');
  return probe ? probe.length - 1 : 0;
}

export function compileCellPatterns(
  cellPatterns: CellPattern[],
  options: EventCapableOptions = {},
): CompiledCellPattern[] {
  return cellPatterns.map(({ pattern }, index) => {
    let regex: RegExp;
    try {
      regex = new RegExp(pattern, PATTERN_FLAGS);
    } catch (error) {
      if (!(error instanceof SyntaxError)) throw error;
      options.onEvent?.({
        phase: 'compile',
        level: 'warn',
        code: 'INVALID_PATTERN',
        message: `Skipping invalid pattern for cell ${index}: ${error.message}`,
        metrics: { cell: index, pattern },
      });
      return { index, source: pattern, regex: null };
    }

    if (countCaptureGroups(regex) === 0) {
      options.onEvent?.({
        phase: 'compile',
        level: 'warn',
        code: 'MISSING_CAPTURE_GROUP',
        message: `Skipping pattern for cell ${index}: it has no capture group for the radix.`,
        metrics: { cell: index, pattern },
      });
      return { index, source: pattern, regex: null };
    }

    return { index, source: pattern, regex };
  });
}

export function captureRadix(compiled: CompiledCellPattern, filename: string): string | null {
  if (!compiled.regex) return null;
  const match = compiled.regex.exec(filename);
  return match?.[1] ?? null;
}
