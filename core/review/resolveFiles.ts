import { join } from 'node:path';
import { captureRadix, compileCellPatterns } from './compilePattern';
import { nodeDirectoryLister } from './directoryLister';
import { listEntries } from './scanRadixes';
import type { CellPattern, ScanOptions } from './types';

/**
 * Pick, for each cell, the first entry of `directory` whose captured radix is
 * exactly `radix`. Cells without a match stay `null`.
 */
export function resolveFiles(
  directory: string,
  radix: string,
  cellPatterns: CellPattern[],
  options: ScanOptions = {},
): Array<string | null> {
  const resolved: Array<string | null> = cellPatterns.map(() => null);
  if (cellPatterns.length === 0) return resolved;

  const compiled = compileCellPatterns(cellPatterns, options);
  const entries = listEntries(directory, options.lister ?? nodeDirectoryLister, 'resolve', options);
  if (!entries) return resolved;

  for (const name of entries) {
    for (const cell of compiled) {
      if (resolved[cell.index] !== null) continue;
      if (captureRadix(cell, name) === radix) {
        resolved[cell.index] = join(directory, name);
      }
    }
  }

  const missing = resolved.filter((path) => path === null).length;
  options.onEvent?.({
    phase: 'resolve',
    level: missing > 0 ? 'warn' : 'info',
    code: 'RESOLVE_COMPLETE',
    message: `Resolved ${resolved.length - missing} of ${resolved.length} cells for "${radix}".`,
    metrics: { radix, resolved: resolved.length - missing, missing },
  });

  return resolved;
}
