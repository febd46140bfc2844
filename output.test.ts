import { afterEach, describe, expect, it, vi } from 'vitest';
import { displayError, formatMetricDelta, generateHistoryCSV } from './output.ts';
import { ConfigError } from './config.ts';
import type { ComparisonResult } from './types.ts';
import { makeStats } from './test-fixtures.ts';

describe('generateHistoryCSV', () => {
  it('writes one row per snapshot and escapes quotes in titles', () => {
    const csv = generateHistoryCSV([{ ...makeStats(), repoName: 'widgets', date: '2026-03-15' }]);
    const [header, row] = csv.split('\n');

    expect(header).toBe(
      'Repository,Date,Total Open,Avg Age (days),Avg Age Excl. Oldest (days),Avg Comments,Avg Comments (commented),Approved,Oldest Age (days),Oldest Title,Zero Comments'
    );
    expect(row).toBe('widgets,2026-03-15,4,3.33,2.00,1.50,3.00,1,6,"Refactor ""legacy"" parser",2');
  });
});

describe('formatMetricDelta', () => {
  it('shows the current value, an arrow and the previous value', () => {
    const comparison: ComparisonResult = {
      repoName: 'widgets',
      currentDate: '2026-03-15',
      previousDate: '2026-03-08',
      metrics: [
        { metric: 'totalOpen', current: 5, previous: 3, direction: 'increased' },
        { metric: 'avgAgeDays', current: 2.25, previous: 4, direction: 'decreased' },
        { metric: 'approvedCount', current: 1, previous: 1, direction: 'unchanged' },
      ],
    };

    expect(formatMetricDelta(comparison, 'totalOpen')).toBe('5 ↑ (was 3)');
    expect(formatMetricDelta(comparison, 'avgAgeDays')).toBe('2.3 ↓ (was 4)');
    expect(formatMetricDelta(comparison, 'approvedCount')).toBe('1 → (was 1)');
    expect(formatMetricDelta(comparison, 'zeroCommentCount')).toBe('');
  });
});

describe('displayError', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints configuration errors without a stack trace', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    displayError(new ConfigError('"organization" must be a non-empty string'));

    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith('\n❌ Error: "organization" must be a non-empty string');
  });

  it('prints the stack trace of other errors', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const error = new Error('Failed to save snapshot');

    displayError(error);

    expect(errorSpy).toHaveBeenCalledTimes(2);
    expect(errorSpy).toHaveBeenLastCalledWith(error.stack);
  });

  it('suggests waiting when the rate limit was hit', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    displayError(new Error('API rate limit exceeded for user'));

    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(logSpy).toHaveBeenCalledWith('\n⚠️  Hit API rate limit. Wait for the reset time and try again.');
  });
});
