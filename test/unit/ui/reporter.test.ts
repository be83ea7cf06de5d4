import { vi, describe, it, expect, beforeAll, beforeEach, afterEach } from 'vitest';
import chalk from 'chalk';
import type { ImageResult, Report } from '../../../src/types/index.js';
import {
  formatFailures,
  formatLabel,
  formatReport,
  formatSummary,
  formatTagList,
  formatUpdates,
  printReport,
} from '../../../src/ui/reporter.js';
import { summarize, updateLevel } from '../../../src/runner.js';

const breaking: ImageResult = {
  service: 'api',
  image: 'node:18.19.0',
  location: '/app/Dockerfile',
  line: 2,
  status: 'checked',
  currentTag: '18.19.0',
  pattern: '<!>.<>.<>',
  updates: { breaking: ['20.11.0'], compatible: ['18.20.1'], unmatched: 0 },
  level: 'breaking',
};

const compatible: ImageResult = {
  image: 'nginx:1.24-alpine',
  location: '/app/Dockerfile',
  line: 5,
  status: 'checked',
  currentTag: '1.24-alpine',
  pattern: '<>.<>-alpine',
  updates: { breaking: [], compatible: ['1.25-alpine'], unmatched: 3 },
  level: 'compatible',
};

const current: ImageResult = {
  image: 'postgres:16.2',
  location: '/app/Dockerfile',
  status: 'checked',
  currentTag: '16.2',
  pattern: '<!>.<>',
  updates: { breaking: [], compatible: [], unmatched: 0 },
  level: 'none',
};

const failed: ImageResult = {
  image: 'node:lts',
  location: '/app/Dockerfile',
  line: 3,
  status: 'failed',
  error: 'The current tag `lts` does not match the pattern `<>`',
};

const skipped: ImageResult = {
  service: 'cache',
  image: 'redis:7.2.4',
  location: '/app/docker-compose.yml',
  status: 'skipped',
  reason: 'no pattern directive',
};

function makeReport(results: ImageResult[]): Report {
  return {
    path: '/app/Dockerfile',
    timestamp: '2024-01-01T00:00:00.000Z',
    version: '0.3.0',
    results,
    summary: summarize(results),
    level: updateLevel(results),
  };
}

beforeAll(() => {
  chalk.level = 0;
});

describe('formatLabel()', () => {
  it('prefixes the service name', () => {
    expect(formatLabel(skipped)).toBe('cache › redis:7.2.4');
  });

  it('shows a placeholder for an empty image', () => {
    expect(formatLabel({ ...skipped, service: undefined, image: '' })).toBe('(no image)');
  });
});

describe('formatTagList()', () => {
  it('joins short lists', () => {
    expect(formatTagList(['1.25', '1.24'])).toBe('1.25, 1.24');
  });

  it('truncates long lists', () => {
    expect(formatTagList(['a', 'b', 'c', 'd'], 2)).toBe('a, b (+2 more)');
  });
});

describe('formatFailures()', () => {
  it('is empty without failures', () => {
    expect(formatFailures([current])).toBe('');
  });

  it('lists each failure with its location', () => {
    expect(formatFailures([failed]).split('\n')).toEqual([
      '',
      '  Failures (1)',
      '',
      '  x node:lts /app/Dockerfile:3',
      '    The current tag `lts` does not match the pattern `<>`',
    ]);
  });
});

describe('formatUpdates()', () => {
  it('groups results by outcome', () => {
    expect(formatUpdates([current, skipped, compatible, breaking]).split('\n')).toEqual([
      '',
      '  Breaking updates (1)',
      '',
      '  ! api › node:18.19.0 [<!>.<>.<>]',
      '    breaking: 20.11.0',
      '    compatible: 18.20.1',
      '',
      '  Compatible updates (1)',
      '',
      '  + nginx:1.24-alpine [<>.<>-alpine]',
      '    compatible: 1.25-alpine',
      '',
      '  Up to date (1)',
      '',
      '  = postgres:16.2 [<!>.<>]',
      '',
      '  Skipped (1)',
      '',
      '  - cache › redis:7.2.4 no pattern directive',
    ]);
  });

  it('omits the compatible line of a breaking image without one', () => {
    const onlyBreaking: ImageResult = {
      ...breaking,
      updates: { breaking: ['20.11.0'], compatible: [], unmatched: 0 },
    };
    expect(formatUpdates([onlyBreaking]).split('\n')).toEqual([
      '',
      '  Breaking updates (1)',
      '',
      '  ! api › node:18.19.0 [<!>.<>.<>]',
      '    breaking: 20.11.0',
    ]);
  });
});

describe('formatSummary()', () => {
  it('reports an all-clear', () => {
    expect(formatSummary(makeReport([current]))).toBe('  All clear — 1 image up to date');
    expect(formatSummary(makeReport([current, current, skipped]))).toBe('  All clear — 2 images up to date, 1 skipped');
  });

  it('counts each outcome', () => {
    expect(formatSummary(makeReport([breaking, compatible, current, failed, skipped]))).toBe(
      '  Checked 3 images: 1 breaking, 1 compatible, 1 failed, 1 skipped',
    );
  });
});

describe('formatReport()', () => {
  it('joins heading, sections and summary', () => {
    expect(formatReport(makeReport([failed, current]), 'Report for Dockerfile at `/app/Dockerfile`:').split('\n')).toEqual([
      'Report for Dockerfile at `/app/Dockerfile`:',
      '',
      '  Failures (1)',
      '',
      '  x node:lts /app/Dockerfile:3',
      '    The current tag `lts` does not match the pattern `<>`',
      '',
      '  Up to date (1)',
      '',
      '  = postgres:16.2 [<!>.<>]',
      '',
      '  Checked 1 image: 1 failed',
    ]);
  });

  it('has only the heading and summary for an empty report', () => {
    expect(formatReport(makeReport([]), 'heading')).toBe('heading\n\n  All clear — 0 images up to date');
  });
});

describe('printReport()', () => {
  let logSpy: ReturnType<typeof vi.spyOn>;
  let errorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    logSpy.mockRestore();
    errorSpy.mockRestore();
  });

  it('writes failures to stderr and the rest to stdout', () => {
    printReport(makeReport([failed, current]), 'Report for Dockerfile at `/app/Dockerfile`:');

    expect(logSpy.mock.calls[0]).toEqual(['Report for Dockerfile at `/app/Dockerfile`:']);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy.mock.calls[0][0]).toContain('  x node:lts /app/Dockerfile:3');
    expect(logSpy.mock.calls.at(-1)).toEqual(['  Checked 1 image: 1 failed']);
  });

  it('skips stderr when nothing failed', () => {
    printReport(makeReport([current]), 'heading');
    expect(errorSpy).not.toHaveBeenCalled();
  });
});
