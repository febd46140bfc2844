import type { CommentEvent, Lookup, ReviewRequest, Snapshot, SnapshotStats, TimelineEvent } from './types.ts';
import type { SnapshotWriter } from './store.ts';

const DAY = 1000 * 60 * 60 * 24;

export const NOW = new Date('2026-03-15T12:00:00Z');

export function daysAgo(days: number): Date {
  return new Date(NOW.getTime() - days * DAY);
}

export function unavailable<T>(): () => Promise<Lookup<T>> {
  return async () => ({ status: 'unavailable', reason: 'Server Error' });
}

export function commentsAt(...ages: number[]): () => Promise<Lookup<CommentEvent[]>> {
  return async () => ({ status: 'ok', value: ages.map(age => ({ createdAt: daysAgo(age) })) });
}

export function timelineOf(...events: Array<[kind: string, age: number]>): () => Promise<Lookup<TimelineEvent[]>> {
  return async () => ({
    status: 'ok',
    value: events.map(([kind, age]) => ({ kind, createdAt: daysAgo(age) })),
  });
}

export function makeRequest(overrides: Partial<ReviewRequest> = {}): ReviewRequest {
  return {
    id: 1,
    title: 'Add widget endpoint',
    url: 'https://github.com/acme/widgets/pull/1',
    createdAt: daysAgo(1),
    closedAt: null,
    commentCount: 0,
    approvalStates: [],
    labels: new Set<string>(),
    isDraft: false,
    lastPushAt: null,
    authorId: 'alice',
    loadComments: commentsAt(),
    loadTimeline: timelineOf(),
    ...overrides,
  };
}

export function makeStats(overrides: Partial<SnapshotStats> = {}): SnapshotStats {
  return {
    totalOpen: 4,
    avgAgeDays: 10 / 3,
    avgAgeDaysExcludingOldest: 2,
    avgComments: 1.5,
    avgCommentsWithComments: 3,
    approvedCount: 1,
    oldestAgeDays: 6,
    oldestTitle: 'Refactor "legacy" parser',
    zeroCommentCount: 2,
    ...overrides,
  };
}

/**
 * In-memory writer recording every save
 */
export function recordingStore(): SnapshotWriter & { saved: Snapshot[] } {
  const saved: Snapshot[] = [];
  return {
    saved,
    save(repoName: string, stats: SnapshotStats, date = '1970-01-01'): Snapshot {
      const snapshot = { ...stats, repoName, date };
      saved.push(snapshot);
      return snapshot;
    },
  };
}
