export interface Config {
  githubToken?: string;  // Optional - can be provided via GH_TOKEN env var
  organization: string;
  repositories: string[];
  databasePath: string;
  minZeroCommentAgeDays: number;
  readyForReviewLabel: string;
  doNotMergeLabel: string;
}

/**
 * Result of a lazy lookup against the remote API
 */
export type Lookup<T> =
  | { status: 'ok'; value: T }
  | { status: 'unavailable'; reason: string };

export interface CommentEvent {
  createdAt: Date;
}

export interface TimelineEvent {
  kind: string;
  createdAt: Date;
}

export interface ReviewRequest {
  id: number;
  title: string;
  url: string;
  createdAt: Date;
  closedAt: Date | null;
  commentCount: number;
  approvalStates: string[];
  labels: Set<string>;
  isDraft: boolean;
  lastPushAt: Date | null;
  authorId: string;
  loadComments: () => Promise<Lookup<CommentEvent[]>>;
  loadTimeline: () => Promise<Lookup<TimelineEvent[]>>;
}

export interface SnapshotStats {
  totalOpen: number;
  avgAgeDays: number;
  avgAgeDaysExcludingOldest: number;
  avgComments: number;
  avgCommentsWithComments: number;
  approvedCount: number;
  oldestAgeDays: number;
  oldestTitle: string;
  zeroCommentCount: number;
}

export interface Snapshot extends SnapshotStats {
  repoName: string;
  date: string; // YYYY-MM-DD, UTC
}

export type NumericSnapshotField = {
  [K in keyof SnapshotStats]: SnapshotStats[K] extends number ? K : never;
}[keyof SnapshotStats];

export interface ZeroCommentRecord {
  title: string;
  ageDays: number;
  url: string;
  isApproved: boolean;
  isDraft: boolean;
}

export interface InactiveRequestRecord {
  title: string;
  lastActivityDays: number;
  url: string;
  isApproved: boolean;
  isDraft: boolean;
}

export interface OpenSnapshotResult {
  snapshot: Snapshot;
  zeroCommentRequests: ZeroCommentRecord[];
  inactiveRequests: InactiveRequestRecord[];
}

export type IdentityFilter =
  | { mode: 'none' }
  | { mode: 'author'; authorId: string }
  | { mode: 'all' };

export interface AuthorCycleStats {
  count: number;
  avgDaysOpen: number;
  stdDevDaysOpen: number;
}

export interface ClosedRequestEntry {
  id: number;
  authorId: string;
  createdAt: Date;
  closedAt: Date;
  daysOpen: number;
}

export interface CycleTimeReport {
  repoName: string;
  windowDays: number;
  totalClosed: number;
  avgDaysOpen: number;
  stdDevDaysOpen: number;
  perAuthor: Record<string, AuthorCycleStats>;
  reopenedCount: number;
  entries: ClosedRequestEntry[];
}

export type Direction = 'increased' | 'decreased' | 'unchanged';

export interface MetricDelta {
  metric: NumericSnapshotField;
  current: number;
  previous: number;
  direction: Direction;
}

export interface ComparisonResult {
  repoName: string;
  currentDate: string;
  previousDate: string;
  metrics: MetricDelta[];
}

export interface OrgMember {
  login: string;
  email: string | null;
}
