import { writeFile } from 'node:fs/promises';
import type {
  ComparisonResult,
  CycleTimeReport,
  Direction,
  NumericSnapshotField,
  OpenSnapshotResult,
  OrgMember,
  Snapshot,
} from './types.ts';
import type { OverallCycleTime } from './cycle-time.ts';
import { COMPARED_METRICS } from './comparison.ts';
import { ConfigError } from './config.ts';
import { errorMessage } from './github.ts';
import { formatDate } from './utils.ts';

const METRIC_LABELS: Record<NumericSnapshotField, string> = {
  totalOpen: 'Total Open PRs',
  avgAgeDays: 'Average PR Age (days)',
  avgAgeDaysExcludingOldest: 'Average Age Excl. Oldest (days)',
  avgComments: 'Average Comments per PR',
  avgCommentsWithComments: 'Average Comments (commented PRs)',
  approvedCount: 'Approved PRs',
  oldestAgeDays: 'Oldest PR Age (days)',
  zeroCommentCount: 'PRs Without Comments',
};

const DIRECTION_MARKERS: Record<Direction, string> = {
  increased: '↑',
  decreased: '↓',
  unchanged: '→',
};

function formatValue(value: number): string {
  return Number.isInteger(value) ? value.toString() : value.toFixed(1);
}

function flags(record: { isApproved: boolean; isDraft: boolean }): string {
  const marks = [record.isDraft ? 'draft' : '', record.isApproved ? 'approved' : ''].filter(Boolean);
  return marks.length > 0 ? ` [${marks.join(', ')}]` : '';
}

/**
 * Format one comparison line, e.g. "Total Open PRs: 5 ↑ (was 3)"
 */
export function formatMetricDelta(comparison: ComparisonResult, metric: NumericSnapshotField): string {
  const delta = comparison.metrics.find(entry => entry.metric === metric);
  if (!delta) return '';
  return `${formatValue(delta.current)} ${DIRECTION_MARKERS[delta.direction]} (was ${formatValue(delta.previous)})`;
}

/**
 * Display one repository's open-request snapshot
 */
export function displayOpenReport(
  result: OpenSnapshotResult,
  comparison: ComparisonResult | null
): void {
  const { snapshot } = result;
  const line = (metric: NumericSnapshotField) =>
    comparison ? formatMetricDelta(comparison, metric) : formatValue(snapshot[metric]);

  console.log(`\nRepository: ${snapshot.repoName} (${snapshot.date})`);
  if (comparison) {
    console.log(`  Compared with ${comparison.previousDate}`);
  }
  for (const metric of COMPARED_METRICS) {
    console.log(`  ${METRIC_LABELS[metric]}: ${line(metric)}`);
  }
  if (snapshot.oldestTitle) {
    console.log(`  Oldest PR: ${snapshot.oldestTitle}`);
  }

  const zeroComment = result.zeroCommentRequests;
  if (zeroComment.length > 0) {
    console.log('\n  ⚠️  Ready for review without comments:');
    for (const record of zeroComment) {
      console.log(`    - ${record.title} (${record.ageDays} days)${flags(record)}`);
      console.log(`      ${record.url}`);
    }
  }

  const inactive = result.inactiveRequests;
  if (inactive.length > 0) {
    console.log('\n  ⏳ No recent activity:');
    for (const record of inactive) {
      console.log(`    - ${record.title} (last activity ${record.lastActivityDays} days ago)${flags(record)}`);
      console.log(`      ${record.url}`);
    }
  }
}

/**
 * Display the per-request table for one repository
 */
export function displayCycleTimeDetails(report: CycleTimeReport): void {
  console.log(`\nDetailed PR Information for ${report.repoName}:`);
  console.log('-'.repeat(80));
  console.log(`${'PR #'.padEnd(6)} ${'Opened'.padEnd(20)} ${'Closed'.padEnd(20)} ${'Days Open'.padEnd(10)} Author`);
  console.log('-'.repeat(80));

  for (const entry of report.entries) {
    const opened = entry.createdAt.toISOString().slice(0, 16).replace('T', ' ');
    const closed = entry.closedAt.toISOString().slice(0, 16).replace('T', ' ');
    console.log(
      `${entry.id.toString().padEnd(6)} ${opened.padEnd(20)} ${closed.padEnd(20)} ${entry.daysOpen.toFixed(1).padEnd(10)} ${entry.authorId}`
    );
  }
}

/**
 * Display the closed-request analysis for all repositories
 */
export function displayCycleTimeReports(reports: CycleTimeReport[], overall: OverallCycleTime, days: number): void {
  console.log('\n' + '='.repeat(50));
  console.log('Closed PR Analysis Report');
  console.log('='.repeat(50));
  console.log(`Period: Last ${days} days`);
  console.log('='.repeat(50));

  for (const report of reports) {
    console.log(`\nRepository: ${report.repoName}`);
    console.log(`Total Closed PRs: ${report.totalClosed}`);
    if (report.totalClosed > 0) {
      console.log(`Average Days Open: ${report.avgDaysOpen.toFixed(1)}`);
      console.log(`Standard Deviation: ${report.stdDevDaysOpen.toFixed(1)}`);
      console.log(`Reopened PRs: ${report.reopenedCount}`);
    }

    for (const [authorId, stats] of Object.entries(report.perAuthor)) {
      console.log(`  ${authorId}: ${stats.count} closed, avg ${stats.avgDaysOpen.toFixed(1)} days, std dev ${stats.stdDevDaysOpen.toFixed(1)}`);
    }
  }

  console.log('\nOverall Statistics');
  console.log('-'.repeat(50));
  console.log(`Total Closed PRs: ${overall.totalClosed}`);
  if (overall.totalClosed > 0) {
    console.log(`Overall Average Days Open: ${overall.avgDaysOpen.toFixed(1)}`);
    console.log(`Overall Standard Deviation: ${overall.stdDevDaysOpen.toFixed(1)}`);
    console.log(`Reopened PRs: ${overall.reopenedCount}`);
  }
  for (const [authorId, stats] of Object.entries(overall.perAuthor)) {
    console.log(`  ${authorId}: ${stats.count} closed, avg ${stats.avgDaysOpen.toFixed(1)} days, std dev ${stats.stdDevDaysOpen.toFixed(1)}`);
  }
}

/**
 * Generate CSV content from stored snapshots
 */
export function generateHistoryCSV(snapshots: Snapshot[]): string {
  const headers = [
    'Repository',
    'Date',
    'Total Open',
    'Avg Age (days)',
    'Avg Age Excl. Oldest (days)',
    'Avg Comments',
    'Avg Comments (commented)',
    'Approved',
    'Oldest Age (days)',
    'Oldest Title',
    'Zero Comments',
  ];

  const rows = snapshots.map(snapshot => [
    snapshot.repoName,
    snapshot.date,
    snapshot.totalOpen.toString(),
    snapshot.avgAgeDays.toFixed(2),
    snapshot.avgAgeDaysExcludingOldest.toFixed(2),
    snapshot.avgComments.toFixed(2),
    snapshot.avgCommentsWithComments.toFixed(2),
    snapshot.approvedCount.toString(),
    snapshot.oldestAgeDays.toString(),
    `"${snapshot.oldestTitle.replace(/"/g, '""')}"`, // Escape quotes in title
    snapshot.zeroCommentCount.toString(),
  ]);

  return [headers.join(','), ...rows.map(row => row.join(','))].join('\n');
}

/**
 * Save CSV to file
 */
export async function saveCSV(snapshots: Snapshot[], filename?: string): Promise<string> {
  const filepath = filename || `review-health-${formatDate(new Date())}.csv`;
  await writeFile(filepath, generateHistoryCSV(snapshots));
  return filepath;
}

/**
 * Display stored snapshots as a table
 */
export function displayHistory(repoName: string, snapshots: Snapshot[]): void {
  console.log(`\n📅 HISTORY - ${repoName}\n`);
  if (snapshots.length === 0) {
    console.log('  No snapshots in range');
    return;
  }

  console.log('Date        | Open | Avg Age | Avg Comments | Approved | Zero Comments');
  console.log('-'.repeat(72));
  for (const snapshot of snapshots) {
    console.log(
      `${snapshot.date.padEnd(11)} | ${snapshot.totalOpen.toString().padStart(4)} | ${snapshot.avgAgeDays.toFixed(1).padStart(7)} | ${snapshot.avgComments.toFixed(1).padStart(12)} | ${snapshot.approvedCount.toString().padStart(8)} | ${snapshot.zeroCommentCount.toString().padStart(13)}`
    );
  }
}

export function displayMembers(members: OrgMember[]): void {
  console.log('\nLogin, Email');
  for (const member of members) {
    console.log(`${member.login}, ${member.email ?? 'N/A'}`);
  }
}

/**
 * Report a failed run. Configuration errors print without a stack trace.
 */
export function displayError(error: unknown): void {
  const message = errorMessage(error);
  console.error(`\n❌ Error: ${message}`);

  // Check if it's a rate limit error
  if (message.includes('rate limit')) {
    console.log('\n⚠️  Hit API rate limit. Wait for the reset time and try again.');
    console.log('   Use fewer repositories to reduce API calls.');
  } else if (error instanceof Error && error.stack && !(error instanceof ConfigError)) {
    console.error(error.stack);
  }
}
