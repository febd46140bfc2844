import { describe, expect, it } from 'vitest';
import { calculateOpenStats, computeOpenSnapshot, lastActivityDays } from './metrics.ts';
import type { SnapshotWriter } from './store.ts';
import { NOW, commentsAt, daysAgo, makeRequest, recordingStore, unavailable } from './test-fixtures.ts';

describe('computeOpenSnapshot', () => {
  it('saves a zero snapshot when nothing is open', async () => {
    const store = recordingStore();
    const result = await computeOpenSnapshot('widgets', [], store, { now: NOW, details: true, staleDays: 7 });

    expect(result.snapshot).toEqual({
      repoName: 'widgets',
      date: '2026-03-15',
      totalOpen: 0,
      avgAgeDays: 0,
      avgAgeDaysExcludingOldest: 0,
      avgComments: 0,
      avgCommentsWithComments: 0,
      approvedCount: 0,
      oldestAgeDays: 0,
      oldestTitle: '',
      zeroCommentCount: 0,
    });
    expect(result.zeroCommentRequests).toEqual([]);
    expect(result.inactiveRequests).toEqual([]);
    expect(store.saved).toHaveLength(1);
  });

  it('aggregates ages, comments and approvals', async () => {
    const store = recordingStore();
    const requests = [
      makeRequest({ title: 'Oldest', createdAt: daysAgo(5), commentCount: 0, approvalStates: ['commented', 'approved'] }),
      makeRequest({ title: 'Newer', createdAt: daysAgo(2), commentCount: 3, approvalStates: ['changes_requested'] }),
    ];

    const { snapshot } = await computeOpenSnapshot('widgets', requests, store, { now: NOW });

    expect(snapshot).toEqual({
      repoName: 'widgets',
      date: '2026-03-15',
      totalOpen: 2,
      avgAgeDays: 3.5,
      avgAgeDaysExcludingOldest: 2,
      avgComments: 1.5,
      avgCommentsWithComments: 3,
      approvedCount: 1,
      oldestAgeDays: 5,
      oldestTitle: 'Oldest',
      zeroCommentCount: 1,
    });
    expect(store.saved).toEqual([snapshot]);
  });

  it('does not depend on request order for the average age', () => {
    const requests = [
      makeRequest({ createdAt: daysAgo(9) }),
      makeRequest({ createdAt: daysAgo(1) }),
      makeRequest({ createdAt: daysAgo(4.5) }),
    ];

    const forward = calculateOpenStats(requests, NOW);
    const backward = calculateOpenStats([...requests].reverse(), NOW);
    expect(forward.avgAgeDays).toBeCloseTo(14 / 3, 10);
    expect(backward.avgAgeDays).toBe(forward.avgAgeDays);
  });

  it('keeps the first request reaching the maximum age and excludes every tie', () => {
    const stats = calculateOpenStats(
      [
        makeRequest({ title: 'First', createdAt: daysAgo(7) }),
        makeRequest({ title: 'Second', createdAt: daysAgo(7) }),
        makeRequest({ title: 'Young', createdAt: daysAgo(3) }),
      ],
      NOW
    );

    expect(stats.oldestTitle).toBe('First');
    expect(stats.oldestAgeDays).toBe(7);
    expect(stats.avgAgeDaysExcludingOldest).toBe(3);
  });

  it('reports 0 excluding the oldest for a single request or an all-tied set', () => {
    expect(calculateOpenStats([makeRequest({ createdAt: daysAgo(4) })], NOW).avgAgeDaysExcludingOldest).toBe(0);
    expect(
      calculateOpenStats([makeRequest({ createdAt: daysAgo(4) }), makeRequest({ createdAt: daysAgo(4) })], NOW)
        .avgAgeDaysExcludingOldest
    ).toBe(0);
  });

  it('propagates store failures', async () => {
    const failing: SnapshotWriter = {
      save() {
        throw new Error('disk full');
      },
    };

    await expect(computeOpenSnapshot('widgets', [makeRequest()], failing, { now: NOW })).rejects.toThrow('disk full');
  });
});

describe('zero-comment requests', () => {
  const requests = [
    makeRequest({ title: 'Too young', createdAt: daysAgo(1), labels: new Set(['ready for review']) }),
    makeRequest({ title: 'Unlabelled', createdAt: daysAgo(10) }),
    makeRequest({ title: 'Ready four days', createdAt: daysAgo(4), labels: new Set(['ready for review']) }),
    makeRequest({
      title: 'Ready nine days',
      createdAt: daysAgo(9),
      labels: new Set(['Ready For Review', 'backend']),
      isDraft: true,
    }),
    makeRequest({ title: 'Discussed', createdAt: daysAgo(20), commentCount: 2, labels: new Set(['ready for review']) }),
  ];

  it('lists only labelled requests at or above the minimum age, oldest first', async () => {
    const result = await computeOpenSnapshot('widgets', requests, recordingStore(), {
      now: NOW,
      details: true,
      minZeroCommentAgeDays: 3,
    });

    expect(result.snapshot.zeroCommentCount).toBe(4);
    expect(result.zeroCommentRequests).toEqual([
      {
        title: 'Ready nine days',
        ageDays: 9,
        url: 'https://github.com/acme/widgets/pull/1',
        isApproved: false,
        isDraft: true,
      },
      {
        title: 'Ready four days',
        ageDays: 4,
        url: 'https://github.com/acme/widgets/pull/1',
        isApproved: false,
        isDraft: false,
      },
    ]);
  });

  it('skips the list outside detail mode', async () => {
    const result = await computeOpenSnapshot('widgets', requests, recordingStore(), { now: NOW });
    expect(result.zeroCommentRequests).toEqual([]);
  });

  it('turns detail mode on when a stale threshold is given', async () => {
    const result = await computeOpenSnapshot('widgets', requests, recordingStore(), { now: NOW, staleDays: 30 });
    expect(result.zeroCommentRequests.map(record => record.title)).toEqual(['Ready nine days', 'Ready four days']);
  });
});

describe('inactive requests', () => {
  it('flags requests without recent comments or pushes', async () => {
    const requests = [
      makeRequest({
        title: 'Do not merge',
        createdAt: daysAgo(30),
        lastPushAt: daysAgo(30),
        labels: new Set(['do not merge']),
      }),
      makeRequest({
        title: 'Recently pushed',
        createdAt: daysAgo(30),
        loadComments: commentsAt(20),
        lastPushAt: daysAgo(2),
      }),
      makeRequest({
        title: 'Quiet draft',
        createdAt: daysAgo(30),
        commentCount: 2,
        loadComments: commentsAt(10, 8),
        lastPushAt: daysAgo(9),
        approvalStates: ['approved'],
        isDraft: true,
      }),
      makeRequest({
        title: 'Lookup failed',
        createdAt: daysAgo(12),
        loadComments: unavailable(),
      }),
      makeRequest({
        title: 'Recently discussed',
        createdAt: daysAgo(30),
        commentCount: 1,
        loadComments: commentsAt(1),
        lastPushAt: daysAgo(20),
      }),
    ];

    const result = await computeOpenSnapshot('widgets', requests, recordingStore(), { now: NOW, staleDays: 7 });

    expect(result.inactiveRequests).toEqual([
      {
        title: 'Lookup failed',
        lastActivityDays: 12,
        url: 'https://github.com/acme/widgets/pull/1',
        isApproved: false,
        isDraft: false,
      },
      {
        title: 'Quiet draft',
        lastActivityDays: 8,
        url: 'https://github.com/acme/widgets/pull/1',
        isApproved: true,
        isDraft: true,
      },
    ]);
  });

  it('does not look up comments without a threshold', async () => {
    let lookups = 0;
    const request = makeRequest({
      createdAt: daysAgo(40),
      loadComments: async () => {
        lookups++;
        return { status: 'ok', value: [] };
      },
    });

    const result = await computeOpenSnapshot('widgets', [request], recordingStore(), { now: NOW, details: true });
    expect(result.inactiveRequests).toEqual([]);
    expect(lookups).toBe(0);
  });
});

describe('lastActivityDays', () => {
  it('uses the newest comment regardless of order', async () => {
    const request = makeRequest({ createdAt: daysAgo(50), loadComments: commentsAt(6, 2, 15) });
    expect(await lastActivityDays(request, NOW)).toBe(2);
  });

  it('falls back to the creation date without comments', async () => {
    expect(await lastActivityDays(makeRequest({ createdAt: daysAgo(11) }), NOW)).toBe(11);
  });
});
