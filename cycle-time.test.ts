import { describe, expect, it } from 'vitest';
import { combineCycleTimeReports, computeCycleTimeReport } from './cycle-time.ts';
import { NOW, daysAgo, makeRequest, timelineOf, unavailable } from './test-fixtures.ts';

function closed(id: number, authorId: string, openedDaysAgo: number, closedDaysAgo: number) {
  return makeRequest({ id, authorId, createdAt: daysAgo(openedDaysAgo), closedAt: daysAgo(closedDaysAgo) });
}

describe('computeCycleTimeReport', () => {
  it('returns zeros when nothing closed', async () => {
    const report = await computeCycleTimeReport('widgets', [], 28, { mode: 'none' }, { now: NOW });

    expect(report).toEqual({
      repoName: 'widgets',
      windowDays: 28,
      totalClosed: 0,
      avgDaysOpen: 0,
      stdDevDaysOpen: 0,
      perAuthor: {},
      reopenedCount: 0,
      entries: [],
    });
  });

  it('stops at the first request closed before the window', async () => {
    const report = await computeCycleTimeReport(
      'widgets',
      [closed(1, 'alice', 5, 1), closed(2, 'bob', 8, 2), closed(3, 'alice', 35, 30)],
      28,
      { mode: 'none' },
      { now: NOW }
    );

    expect(report.totalClosed).toBe(2);
    expect(report.avgDaysOpen).toBe(5);
    expect(report.stdDevDaysOpen).toBeCloseTo(Math.SQRT2, 10);
    expect(report.entries.map(entry => entry.id)).toEqual([1, 2]);
    expect(report.perAuthor).toEqual({});
  });

  it('measures cycle time in fractional days', async () => {
    const report = await computeCycleTimeReport('widgets', [closed(1, 'alice', 2.5, 1)], 28, { mode: 'none' }, { now: NOW });
    expect(report.entries[0].daysOpen).toBeCloseTo(1.5, 10);
    expect(report.stdDevDaysOpen).toBe(0);
  });

  it('tracks a single author', async () => {
    const requests = [closed(1, 'alice', 5, 1), closed(2, 'bob', 8, 2), closed(3, 'alice', 5, 3)];

    const report = await computeCycleTimeReport('widgets', requests, 28, { mode: 'author', authorId: 'alice' }, { now: NOW });
    expect(Object.keys(report.perAuthor)).toEqual(['alice']);
    expect(report.perAuthor.alice.count).toBe(2);
    expect(report.perAuthor.alice.avgDaysOpen).toBe(3);
    expect(report.perAuthor.alice.stdDevDaysOpen).toBeCloseTo(Math.SQRT2, 10);

    const absent = await computeCycleTimeReport('widgets', requests, 28, { mode: 'author', authorId: 'carol' }, { now: NOW });
    expect(absent.perAuthor).toEqual({ carol: { count: 0, avgDaysOpen: 0, stdDevDaysOpen: 0 } });
  });

  it('breaks down every author', async () => {
    const report = await computeCycleTimeReport(
      'widgets',
      [closed(1, 'alice', 5, 1), closed(2, 'bob', 8, 2), closed(3, 'alice', 5, 3)],
      28,
      { mode: 'all' },
      { now: NOW }
    );

    expect(Object.keys(report.perAuthor).sort()).toEqual(['alice', 'bob']);
    expect(report.perAuthor.bob).toEqual({ count: 1, avgDaysOpen: 6, stdDevDaysOpen: 0 });
    expect(report.perAuthor.alice.count).toBe(2);
  });

  it('counts each reopened request once', async () => {
    const requests = [
      makeRequest({
        id: 1,
        createdAt: daysAgo(10),
        closedAt: daysAgo(1),
        loadTimeline: timelineOf(['reopened', 6], ['closed', 5], ['reopened', 4]),
      }),
      makeRequest({
        id: 2,
        createdAt: daysAgo(60),
        closedAt: daysAgo(2),
        loadTimeline: timelineOf(['reopened', 40]),
      }),
      makeRequest({ id: 3, createdAt: daysAgo(9), closedAt: daysAgo(3), loadTimeline: unavailable() }),
      makeRequest({ id: 4, createdAt: daysAgo(9), closedAt: daysAgo(4), loadTimeline: timelineOf(['closed', 4]) }),
    ];

    const report = await computeCycleTimeReport('widgets', requests, 28, { mode: 'none' }, { now: NOW });
    expect(report.totalClosed).toBe(4);
    expect(report.reopenedCount).toBe(1);
  });

  it('rejects a source that is not ordered newest first', async () => {
    await expect(
      computeCycleTimeReport('widgets', [closed(1, 'alice', 9, 5), closed(2, 'bob', 4, 1)], 28, { mode: 'none' }, { now: NOW })
    ).rejects.toThrow('Closed review requests must be ordered newest first (#2 is out of order)');
  });

  it('rejects requests that are still open', async () => {
    await expect(
      computeCycleTimeReport('widgets', [makeRequest({ id: 7 })], 28, { mode: 'none' }, { now: NOW })
    ).rejects.toThrow('Review request #7 has no close time');
  });

  it('rejects a non-positive window', async () => {
    await expect(computeCycleTimeReport('widgets', [], 0)).rejects.toThrow(
      'Observation window must be a positive number of days, got 0'
    );
  });
});

describe('combineCycleTimeReports', () => {
  it('pools durations across repositories', async () => {
    const first = await computeCycleTimeReport('widgets', [closed(1, 'alice', 5, 1)], 28, { mode: 'all' }, { now: NOW });
    const second = await computeCycleTimeReport('gadgets', [closed(2, 'bob', 8, 2)], 28, { mode: 'all' }, { now: NOW });

    const overall = combineCycleTimeReports([first, second]);
    expect(overall.totalClosed).toBe(2);
    expect(overall.avgDaysOpen).toBe(5);
    expect(overall.stdDevDaysOpen).toBeCloseTo(Math.SQRT2, 10);
    expect(overall.reopenedCount).toBe(0);
    expect(overall.perAuthor).toEqual({
      alice: { count: 1, avgDaysOpen: 4, stdDevDaysOpen: 0 },
      bob: { count: 1, avgDaysOpen: 6, stdDevDaysOpen: 0 },
    });
  });
});
