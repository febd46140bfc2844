import type {
  AuthorCycleStats,
  ClosedRequestEntry,
  CycleTimeReport,
  IdentityFilter,
  ReviewRequest,
} from './types.ts';
import { fractionalDaysBetween, mean, sampleStdDev, subtractDays } from './utils.ts';

export interface CycleTimeOptions {
  now?: Date;
}

function summarize(daysOpen: number[]): AuthorCycleStats {
  return {
    count: daysOpen.length,
    avgDaysOpen: mean(daysOpen),
    stdDevDaysOpen: sampleStdDev(daysOpen),
  };
}

/**
 * Whether the request was reopened at least once inside the window.
 * An unavailable timeline counts as not reopened.
 */
export async function wasReopenedWithin(request: ReviewRequest, windowStart: Date, now: Date): Promise<boolean> {
  const timeline = await request.loadTimeline();
  if (timeline.status === 'unavailable') return false;

  return timeline.value.some(
    event => event.kind === 'reopened' && event.createdAt >= windowStart && event.createdAt <= now
  );
}

/**
 * Cycle time statistics for requests closed in the last `windowDays` days.
 * `closedRequests` must be ordered newest-closed first; iteration stops at the
 * first request closed before the window.
 */
export async function computeCycleTimeReport(
  repoName: string,
  closedRequests: Iterable<ReviewRequest>,
  windowDays: number,
  identityFilter: IdentityFilter = { mode: 'none' },
  options: CycleTimeOptions = {}
): Promise<CycleTimeReport> {
  if (!Number.isInteger(windowDays) || windowDays < 1) {
    throw new Error(`Observation window must be a positive number of days, got ${windowDays}`);
  }

  const now = options.now ?? new Date();
  const windowStart = subtractDays(now, windowDays);

  const entries: ClosedRequestEntry[] = [];
  const byAuthor = new Map<string, number[]>();
  let reopenedCount = 0;
  let previousClosedAt: Date | null = null;

  if (identityFilter.mode === 'author') {
    byAuthor.set(identityFilter.authorId, []);
  }

  for (const request of closedRequests) {
    const closedAt = request.closedAt;
    if (!closedAt) {
      throw new Error(`Review request #${request.id} has no close time`);
    }
    if (previousClosedAt && closedAt > previousClosedAt) {
      throw new Error(`Closed review requests must be ordered newest first (#${request.id} is out of order)`);
    }
    previousClosedAt = closedAt;

    if (closedAt < windowStart) break;

    const daysOpen = fractionalDaysBetween(request.createdAt, closedAt);
    entries.push({
      id: request.id,
      authorId: request.authorId,
      createdAt: request.createdAt,
      closedAt,
      daysOpen,
    });

    if (identityFilter.mode === 'all' || (identityFilter.mode === 'author' && identityFilter.authorId === request.authorId)) {
      const authorDays = byAuthor.get(request.authorId) ?? [];
      authorDays.push(daysOpen);
      byAuthor.set(request.authorId, authorDays);
    }

    if (await wasReopenedWithin(request, windowStart, now)) {
      reopenedCount++;
    }
  }

  const allDays = entries.map(entry => entry.daysOpen);
  const perAuthor: Record<string, AuthorCycleStats> = {};
  for (const [authorId, daysOpen] of byAuthor) {
    perAuthor[authorId] = summarize(daysOpen);
  }

  return {
    repoName,
    windowDays,
    totalClosed: entries.length,
    avgDaysOpen: mean(allDays),
    stdDevDaysOpen: sampleStdDev(allDays),
    perAuthor,
    reopenedCount,
    entries,
  };
}

export interface OverallCycleTime {
  totalClosed: number;
  avgDaysOpen: number;
  stdDevDaysOpen: number;
  reopenedCount: number;
  perAuthor: Record<string, AuthorCycleStats>;
}

/**
 * Pool the per-request durations of several repositories
 */
export function combineCycleTimeReports(reports: CycleTimeReport[]): OverallCycleTime {
  const entries = reports.flatMap(report => report.entries);
  const authors = new Set(reports.flatMap(report => Object.keys(report.perAuthor)));

  const perAuthor: Record<string, AuthorCycleStats> = {};
  for (const authorId of authors) {
    perAuthor[authorId] = summarize(
      entries.filter(entry => entry.authorId === authorId).map(entry => entry.daysOpen)
    );
  }

  const overall = summarize(entries.map(entry => entry.daysOpen));
  return {
    totalClosed: overall.count,
    avgDaysOpen: overall.avgDaysOpen,
    stdDevDaysOpen: overall.stdDevDaysOpen,
    reopenedCount: reports.reduce((acc, report) => acc + report.reopenedCount, 0),
    perAuthor,
  };
}
