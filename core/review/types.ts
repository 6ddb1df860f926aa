import type { EventCapableOptions } from './events';

export interface CellPattern {
  /** Display name of the variant. Never used for matching. */
  label: string;
  /** Exact suffix following the radix: separator, distinguishing text and extension. */
  tail: string;
  /** RegExp source whose first capture group yields the radix of a matching filename. */
  pattern: string;
}

export interface ExtractionResult {
  radix: string;
  cellPatterns: CellPattern[];
}

export interface CompiledCellPattern {
  index: number;
  source: string;
  /** `null` when the source does not compile or has no capture group. */
  regex: RegExp | null;
}

/** Flat listing of the entry names of a directory. Throws when it cannot be read. */
export interface DirectoryLister {
  list(directory: string): string[];
}

export interface ExtractOptions extends EventCapableOptions {
  separators?: readonly string[];
}

export interface ScanOptions extends EventCapableOptions {
  lister?: DirectoryLister;
  minCorroboratingCells?: number;
}

export type ReviewOptions = ExtractOptions & ScanOptions;
