import { SEPARATOR_CHARS } from '../../constants';
import { buildCellPattern } from './compilePattern';
import { ReviewError, isReviewError } from './errors';
import type { ExtractOptions, ExtractionResult } from './types';

export function longestCommonPrefix(strings: string[]): string {
  if (strings.length === 0) return '';

  const first = strings[0];
  let length = first.length;
  for (let s = 1; s < strings.length; s++) {
    const other = strings[s];
    length = Math.min(length, other.length);
    for (let i = 0; i < length; i++) {
      if (first[i] !== other[i]) {
        length = i;
        break;
      }
    }
  }
  return first.slice(0, length);
}

function trimTrailing(text: string, separators: readonly string[]): string {
  let end = text.length;
  while (end > 0 && separators.includes(text[end - 1])) end--;
  return text.slice(0, end);
}

function lastSeparatorIndex(text: string, separators: readonly string[]): number {
  for (let i = text.length - 1; i >= 0; i--) {
    if (separators.includes(text[i])) return i;
  }
  return -1;
}

/**
 * Decide where the radix ends inside the common prefix.
 *
 *  - prefix ends on a separator: that separator belongs to every tail, trim it.
 *  - every filename continues with a word character: the prefix stops
 *    mid-word ("frame001_v" from v1/v2), back up to the last separator.
 *  - otherwise the prefix is the radix.
 */
function radixFromPrefix(prefix: string, filenames: string[], separators: readonly string[]): string {
  if (separators.includes(prefix[prefix.length - 1])) {
    return trimTrailing(prefix, separators);
  }

  const midWord = filenames.every((name) => {
    const next = name.charAt(prefix.length);
    return next !== '' && !separators.includes(next);
  });
  if (!midWord) return prefix;

  const cut = lastSeparatorIndex(prefix, separators);
  return cut < 0 ? '' : prefix.slice(0, cut);
}

/**
 * Infer the radix shared by `filenames` and one cell pattern per filename.
 * Throws a `ReviewError` when the names share no usable structure.
 */
export function extractPatternsOrThrow(filenames: string[], options: ExtractOptions = {}): ExtractionResult {
  const separators = options.separators ?? SEPARATOR_CHARS;

  if (filenames.length < 2) {
    throw new ReviewError('INSUFFICIENT_INPUT', 'At least two filenames are needed to infer a pattern.', {
      filenames: filenames.length,
    });
  }

  const prefix = longestCommonPrefix(filenames);
  if (prefix.length === 0) {
    throw new ReviewError('NO_COMMON_PREFIX', 'Filenames share no common prefix.');
  }

  const radix = radixFromPrefix(prefix, filenames, separators);
  if (radix.length === 0) {
    throw new ReviewError('EMPTY_RADIX', `No radix boundary found in common prefix "${prefix}".`, { prefix });
  }

  const cellPatterns = filenames.map((name) => buildCellPattern(name.slice(radix.length), separators));

  const tails = new Set(cellPatterns.map((cell) => cell.tail));
  if (tails.size !== cellPatterns.length) {
    throw new ReviewError('DUPLICATE_TAIL', 'Two filenames end with the same tail and cannot be told apart.', {
      radix,
    });
  }

  options.onEvent?.({
    phase: 'extract',
    level: 'info',
    code: 'PATTERN_EXTRACTED',
    message: `Inferred radix "${radix}" from ${filenames.length} filenames.`,
    metrics: { radix, cells: cellPatterns.length },
  });

  return { radix, cellPatterns };
}

export function extractPatterns(filenames: string[], options: ExtractOptions = {}): ExtractionResult | null {
  try {
    return extractPatternsOrThrow(filenames, options);
  } catch (error) {
    if (!isReviewError(error)) throw error;
    options.onEvent?.(error.toEvent('extract'));
    return null;
  }
}
