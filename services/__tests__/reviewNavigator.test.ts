import { describe, expect, it, vi } from 'vitest';
import { createMemoryLister, ReviewError } from '../../core/review';
import { LogEntry, LogStatus } from '../../types';
import { mapReviewErrorToLogEntry, mapReviewEventToLogEntry } from '../review/logAdapter';
import { ReviewNavigator } from '../reviewNavigator';

const SHOTS = {
  '/shots': [
    'shot_001_diffuse.jpg',
    'shot_001_specular.jpg',
    'shot_002_diffuse.jpg',
    'shot_002_specular.jpg',
    'unrelated.txt',
  ],
};

const RENDER_PASSES = ['shot_001_diffuse.jpg', 'shot_001_specular.jpg'];

describe('ReviewNavigator', () => {
  it('logs each stage of an activation', () => {
    const logs: LogEntry[] = [];
    const navigator = new ReviewNavigator({ lister: createMemoryLister(SHOTS), onLog: (log) => logs.push(log) });

    const loads = navigator.activate({ directory: '/shots', filenames: RENDER_PASSES });

    expect(loads).toEqual([
      { index: 0, path: '/shots/shot_001_diffuse.jpg' },
      { index: 1, path: '/shots/shot_001_specular.jpg' },
    ]);
    expect(logs.map((log) => log.stepId)).toEqual([
      'extract.PATTERN_EXTRACTED',
      'scan.SCAN_COMPLETE',
      'resolve.RESOLVE_COMPLETE',
    ]);
    expect(logs.every((log) => log.status === LogStatus.Ok)).toBe(true);
  });

  it('steps through the discovered sets', () => {
    const navigator = new ReviewNavigator({ lister: createMemoryLister(SHOTS), onLog: vi.fn() });
    navigator.activate({ directory: '/shots', filenames: RENDER_PASSES });

    expect(navigator.step(1).map((load) => load.path)).toEqual([
      '/shots/shot_002_diffuse.jpg',
      '/shots/shot_002_specular.jpg',
    ]);
    expect(navigator.state.currentIndex).toBe(1);

    navigator.step(1);
    expect(navigator.state.currentIndex).toBe(0);
  });

  it('applies edited patterns', () => {
    const navigator = new ReviewNavigator({ lister: createMemoryLister(SHOTS), onLog: vi.fn() });
    navigator.activate({ directory: '/shots', filenames: RENDER_PASSES });

    const loads = navigator.editPatterns(['^(.*)_specular\\.jpg$', '^(.*)_diffuse\\.jpg$']);
    expect(loads.map((load) => load.path)).toEqual(['/shots/shot_001_specular.jpg', '/shots/shot_001_diffuse.jpg']);
    expect(navigator.state.cellPatterns.map((cell) => cell.label)).toEqual(['diffuse', 'specular']);
  });

  it('refreshes the radix list', () => {
    const tree = { '/shots': [...SHOTS['/shots']] };
    const navigator = new ReviewNavigator({ lister: createMemoryLister(tree), onLog: vi.fn() });
    navigator.activate({ directory: '/shots', filenames: RENDER_PASSES });
    tree['/shots'].push('shot_003_diffuse.jpg', 'shot_003_specular.jpg');

    navigator.refresh();
    expect(navigator.state.radixes).toEqual(['shot_001', 'shot_002', 'shot_003']);
  });

  it('warns when the directory cannot be listed', () => {
    const logs: LogEntry[] = [];
    const navigator = new ReviewNavigator({ lister: createMemoryLister({}), onLog: (log) => logs.push(log) });

    expect(navigator.activate({ directory: '/missing', filenames: RENDER_PASSES })).toEqual([]);
    expect(logs.map((log) => [log.stepId, log.status])).toEqual([
      ['extract.PATTERN_EXTRACTED', LogStatus.Ok],
      ['scan.DIRECTORY_UNREADABLE', LogStatus.Warn],
    ]);
  });

  it('surfaces the error message for an unusable selection', () => {
    const logs: LogEntry[] = [];
    const navigator = new ReviewNavigator({ lister: createMemoryLister(SHOTS), onLog: (log) => logs.push(log) });

    navigator.activate({ directory: '/shots', filenames: ['abc.png', 'xyz.jpg'] });
    expect(navigator.state.errorMessage).toBe('No common filename pattern found in the displayed images.');
    expect(logs[0].status).toBe(LogStatus.Error);
    expect(logs[0].stepId).toBe('extract.NO_COMMON_PREFIX');
  });

  it('logs and rethrows unexpected failures', () => {
    const logs: LogEntry[] = [];
    const brokenLister = { list: () => ({}) as unknown as string[] };
    const navigator = new ReviewNavigator({ lister: brokenLister, onLog: (log) => logs.push(log) });

    expect(() => navigator.activate({ directory: '/shots', filenames: RENDER_PASSES })).toThrow(TypeError);
    expect(logs[logs.length - 1]).toMatchObject({
      stepId: 'session.activate',
      title: 'Unexpected Error',
      status: LogStatus.Error,
    });
    expect(navigator.state.directory).toBeNull();
  });
});

describe('logAdapter', () => {
  it('maps review events to log entries', () => {
    const entry = mapReviewEventToLogEntry({
      phase: 'scan',
      level: 'warn',
      code: 'DIRECTORY_UNREADABLE',
      message: 'Cannot list /missing',
      metrics: { directory: '/missing' },
    });

    expect(entry.id).toMatch(/^scan-\d+$/);
    expect(entry).toMatchObject({
      stepId: 'scan.DIRECTORY_UNREADABLE',
      title: 'Scan: Cannot list /missing',
      status: LogStatus.Warn,
      metrics: [{ label: 'directory', value: '/missing' }],
      description: 'DIRECTORY_UNREADABLE',
    });
  });

  it('maps review errors with their details', () => {
    const entry = mapReviewErrorToLogEntry(new ReviewError('EMPTY_RADIX', 'No radix boundary.', { prefix: 'v' }), 'extract');
    expect(entry).toMatchObject({
      stepId: 'extract',
      title: 'Review: No radix boundary.',
      status: LogStatus.Error,
      metrics: [{ label: 'prefix', value: 'v' }],
      description: 'EMPTY_RADIX',
    });
  });

  it('keeps an explicit step id and gives each entry its own id', () => {
    const event = { phase: 'resolve', level: 'info', code: 'RESOLVE_COMPLETE', message: 'Resolved 2 of 2 cells.' } as const;
    const first = mapReviewEventToLogEntry(event, 'session.step');
    const second = mapReviewEventToLogEntry(event);

    expect(first.stepId).toBe('session.step');
    expect(first.title).toBe('Resolve: Resolved 2 of 2 cells.');
    expect(second.stepId).toBe('resolve.RESOLVE_COMPLETE');
    expect(first.id).not.toBe(second.id);
  });

  it('maps unknown errors', () => {
    const entry = mapReviewErrorToLogEntry('boom', 'session.step');
    expect(entry).toMatchObject({ title: 'Unexpected Error', description: 'boom', metrics: [] });
  });
});
