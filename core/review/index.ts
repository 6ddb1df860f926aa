export * from './types';
export * from './errors';
export * from './events';
export { escapePattern, deriveLabel, buildCellPattern, cellPatternsFromSources, compileCellPatterns, captureRadix } from './compilePattern';
export { longestCommonPrefix, extractPatterns, extractPatternsOrThrow } from './extractPatterns';
export { scanRadixes } from './scanRadixes';
export { resolveFiles } from './resolveFiles';
export { nodeDirectoryLister, createMemoryLister } from './directoryLister';
