import type {
  InactiveRequestRecord,
  OpenSnapshotResult,
  ReviewRequest,
  SnapshotStats,
  ZeroCommentRecord,
} from './types.ts';
import type { SnapshotWriter } from './store.ts';
import { formatDate, mean, wholeDaysBetween } from './utils.ts';

export interface OpenSnapshotOptions {
  now?: Date;
  details?: boolean;
  /** Enables the no-recent-activity list (and detail mode) */
  staleDays?: number;
  minZeroCommentAgeDays?: number;
  readyForReviewLabel?: string;
  doNotMergeLabel?: string;
}

export const DEFAULT_MIN_ZERO_COMMENT_AGE_DAYS = 3;
export const DEFAULT_READY_FOR_REVIEW_LABEL = 'ready for review';
export const DEFAULT_DO_NOT_MERGE_LABEL = 'do not merge';

const EMPTY_STATS: SnapshotStats = {
  totalOpen: 0,
  avgAgeDays: 0,
  avgAgeDaysExcludingOldest: 0,
  avgComments: 0,
  avgCommentsWithComments: 0,
  approvedCount: 0,
  oldestAgeDays: 0,
  oldestTitle: '',
  zeroCommentCount: 0,
};

export function hasLabel(request: ReviewRequest, label: string): boolean {
  const wanted = label.toLowerCase();
  for (const name of request.labels) {
    if (name.toLowerCase() === wanted) return true;
  }
  return false;
}

export function isApproved(request: ReviewRequest): boolean {
  return request.approvalStates.some(state => state.toLowerCase() === 'approved');
}

/**
 * Calculate the aggregate statistics for a set of open review requests
 */
export function calculateOpenStats(requests: ReviewRequest[], now: Date): SnapshotStats {
  if (requests.length === 0) return { ...EMPTY_STATS };

  const ages: number[] = [];
  let oldestAgeDays = -1;
  let oldestTitle = '';

  for (const request of requests) {
    const ageDays = wholeDaysBetween(request.createdAt, now);
    ages.push(ageDays);

    // Strictly greater: ties keep the first request that reached the maximum
    if (ageDays > oldestAgeDays) {
      oldestAgeDays = ageDays;
      oldestTitle = request.title;
    }
  }

  const commentCounts = requests.map(request => request.commentCount);
  const withComments = commentCounts.filter(count => count > 0);

  // Every request tied at the maximum age is dropped, not just the tracked one
  const youngerAges = requests.length > 1 ? ages.filter(age => age < oldestAgeDays) : [];

  return {
    totalOpen: requests.length,
    avgAgeDays: mean(ages),
    avgAgeDaysExcludingOldest: mean(youngerAges),
    avgComments: mean(commentCounts),
    avgCommentsWithComments: mean(withComments),
    approvedCount: requests.filter(isApproved).length,
    oldestAgeDays,
    oldestTitle,
    zeroCommentCount: commentCounts.length - withComments.length,
  };
}

/**
 * Zero-comment requests old enough and labelled ready for review, oldest first
 */
export function findZeroCommentRequests(
  requests: ReviewRequest[],
  now: Date,
  minAgeDays: number,
  readyForReviewLabel: string
): ZeroCommentRecord[] {
  return requests
    .filter(request => request.commentCount === 0)
    .map(request => ({ request, ageDays: wholeDaysBetween(request.createdAt, now) }))
    .filter(({ request, ageDays }) => ageDays >= minAgeDays && hasLabel(request, readyForReviewLabel))
    .sort((a, b) => b.ageDays - a.ageDays)
    .map(({ request, ageDays }) => ({
      title: request.title,
      ageDays,
      url: request.url,
      isApproved: isApproved(request),
      isDraft: request.isDraft,
    }));
}

/**
 * Days since the most recent comment, or since creation when there is none
 */
export async function lastActivityDays(request: ReviewRequest, now: Date): Promise<number> {
  const comments = await request.loadComments();
  if (comments.status === 'unavailable' || comments.value.length === 0) {
    return wholeDaysBetween(request.createdAt, now);
  }

  let latest = comments.value[0].createdAt;
  for (const comment of comments.value) {
    if (comment.createdAt > latest) latest = comment.createdAt;
  }
  return wholeDaysBetween(latest, now);
}

/**
 * Requests with neither discussion nor pushes within the threshold.
 * Comment lookups run one request at a time.
 */
export async function findInactiveRequests(
  requests: ReviewRequest[],
  now: Date,
  staleDays: number,
  doNotMergeLabel: string
): Promise<InactiveRequestRecord[]> {
  const inactive: InactiveRequestRecord[] = [];

  for (const request of requests) {
    if (hasLabel(request, doNotMergeLabel)) continue;

    const activityDays = await lastActivityDays(request, now);
    if (activityDays < staleDays) continue;

    const pushDays = wholeDaysBetween(request.lastPushAt ?? request.createdAt, now);
    if (pushDays < staleDays) continue;

    inactive.push({
      title: request.title,
      lastActivityDays: activityDays,
      url: request.url,
      isApproved: isApproved(request),
      isDraft: request.isDraft,
    });
  }

  return inactive.sort((a, b) => b.lastActivityDays - a.lastActivityDays);
}

/**
 * Compute today's snapshot for one repository's open requests and persist it
 */
export async function computeOpenSnapshot(
  repoName: string,
  requests: ReviewRequest[],
  store: SnapshotWriter,
  options: OpenSnapshotOptions = {}
): Promise<OpenSnapshotResult> {
  const now = options.now ?? new Date();
  const details = options.details === true || options.staleDays !== undefined;

  const snapshot = store.save(repoName, calculateOpenStats(requests, now), formatDate(now));

  const zeroCommentRequests = details
    ? findZeroCommentRequests(
        requests,
        now,
        options.minZeroCommentAgeDays ?? DEFAULT_MIN_ZERO_COMMENT_AGE_DAYS,
        options.readyForReviewLabel ?? DEFAULT_READY_FOR_REVIEW_LABEL
      )
    : [];

  const inactiveRequests = options.staleDays !== undefined
    ? await findInactiveRequests(
        requests,
        now,
        options.staleDays,
        options.doNotMergeLabel ?? DEFAULT_DO_NOT_MERGE_LABEL
      )
    : [];

  return { snapshot, zeroCommentRequests, inactiveRequests };
}
