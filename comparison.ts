import type { ComparisonResult, Direction, MetricDelta, NumericSnapshotField, Snapshot } from './types.ts';
import type { SnapshotStore } from './store.ts';
import { assertDayKey, formatDate, subtractDays } from './utils.ts';

export const COMPARED_METRICS: readonly NumericSnapshotField[] = [
  'totalOpen',
  'avgAgeDays',
  'avgAgeDaysExcludingOldest',
  'avgComments',
  'avgCommentsWithComments',
  'approvedCount',
  'oldestAgeDays',
  'zeroCommentCount',
];

export function direction(current: number, previous: number): Direction {
  if (current > previous) return 'increased';
  if (current < previous) return 'decreased';
  return 'unchanged';
}

type SnapshotHistory = Pick<SnapshotStore, 'getBeforeDate' | 'getEarliest'>;

export class ComparisonEngine {
  private store: SnapshotHistory;
  private now: () => Date;

  constructor(store: SnapshotHistory, options: { now?: () => Date } = {}) {
    this.store = store;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Snapshot from before `daysAgo` days prior to `anchorDate` (default today),
   * falling back to the earliest one. Only rows strictly older than the anchor
   * day qualify.
   */
  getComparison(repoName: string, daysAgo: number, anchorDate: string = formatDate(this.now())): Snapshot | null {
    const anchor = new Date(`${assertDayKey(anchorDate)}T00:00:00Z`);
    const target = formatDate(subtractDays(anchor, daysAgo));
    const baseline = this.store.getBeforeDate(repoName, target) ?? this.store.getEarliest(repoName);
    return baseline && baseline.date < anchorDate ? baseline : null;
  }

  compare(current: Snapshot, previous: Snapshot): ComparisonResult {
    const metrics: MetricDelta[] = COMPARED_METRICS.map(metric => ({
      metric,
      current: current[metric],
      previous: previous[metric],
      direction: direction(current[metric], previous[metric]),
    }));

    return {
      repoName: current.repoName,
      currentDate: current.date,
      previousDate: previous.date,
      metrics,
    };
  }
}

/**
 * Latest stored snapshot, for runs that skip the GitHub API
 */
export function requireStoredSnapshot(store: Pick<SnapshotStore, 'getLatest'>, repoName: string): Snapshot {
  const snapshot = store.getLatest(repoName);
  if (!snapshot) {
    throw new Error(
      `No stored snapshots for repository "${repoName}". Run without --from-db to fetch live data first.`
    );
  }
  return snapshot;
}
