import { readdirSync } from 'node:fs';
import { ReviewError } from './errors';
import type { DirectoryLister } from './types';

export const nodeDirectoryLister: DirectoryLister = {
  list(directory: string): string[] {
    return readdirSync(directory);
  },
};

/** Lister backed by a fixed map of directory path to entry names. */
export function createMemoryLister(tree: Record<string, string[]>): DirectoryLister {
  const entries = new Map(Object.entries(tree));
  return {
    list(directory: string): string[] {
      const names = entries.get(directory);
      if (!names) {
        throw new ReviewError('DIRECTORY_UNREADABLE', `No such directory: ${directory}`, { directory });
      }
      return [...names];
    },
  };
}
