import { MIN_CORROBORATING_CELLS } from '../../constants';
import { captureRadix, compileCellPatterns } from './compilePattern';
import { nodeDirectoryLister } from './directoryLister';
import type { EventCapableOptions, ReviewEventPhase } from './events';
import type { CellPattern, DirectoryLister, ScanOptions } from './types';

/**
 * List `directory`, reporting a failure as a warning. `null` means the
 * directory could not be read.
 */
export function listEntries(
  directory: string,
  lister: DirectoryLister,
  phase: ReviewEventPhase,
  options: EventCapableOptions,
): string[] | null {
  try {
    return lister.list(directory);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    options.onEvent?.({
      phase,
      level: 'warn',
      code: 'DIRECTORY_UNREADABLE',
      message: `Cannot list ${directory}: ${reason}`,
      metrics: { directory },
    });
    return null;
  }
}

/**
 * Find every radix in `directory` that at least two cells (or every cell,
 * when there is only one) agree on. A lone loose pattern such as
 * `^(.*)\.jpg$` would otherwise turn every jpg in the folder into a radix.
 */
export function scanRadixes(directory: string, cellPatterns: CellPattern[], options: ScanOptions = {}): string[] {
  if (cellPatterns.length === 0) return [];

  const compiled = compileCellPatterns(cellPatterns, options);
  const entries = listEntries(directory, options.lister ?? nodeDirectoryLister, 'scan', options);
  if (!entries) return [];

  const radixCells = new Map<string, Set<number>>();
  for (const name of entries) {
    for (const cell of compiled) {
      const radix = captureRadix(cell, name);
      if (radix === null) continue;

      const cells = radixCells.get(radix);
      if (cells) {
        cells.add(cell.index);
      } else {
        radixCells.set(radix, new Set([cell.index]));
      }
    }
  }

  const minCells = Math.min(cellPatterns.length, options.minCorroboratingCells ?? MIN_CORROBORATING_CELLS);
  const radixes = Array.from(radixCells)
    .filter(([, cells]) => cells.size >= minCells)
    .map(([radix]) => radix)
    .sort();

  options.onEvent?.({
    phase: 'scan',
    level: 'info',
    code: 'SCAN_COMPLETE',
    message: `Found ${radixes.length} comparable sets in ${directory}.`,
    metrics: { entries: entries.length, candidates: radixCells.size, radixes: radixes.length },
  });

  return radixes;
}
