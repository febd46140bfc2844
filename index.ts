#!/usr/bin/env tsx
import { parseArgs, formatDate, subtractDays } from './utils.ts';
import type { CliOptions } from './utils.ts';
import type { Config, CycleTimeReport, IdentityFilter, Snapshot } from './types.ts';
import { loadConfig, requireToken } from './config.ts';
import { GitHubSource } from './github.ts';
import { SnapshotStore } from './store.ts';
import { computeOpenSnapshot } from './metrics.ts';
import { computeCycleTimeReport, combineCycleTimeReports } from './cycle-time.ts';
import { ComparisonEngine, requireStoredSnapshot } from './comparison.ts';
import {
  displayCycleTimeDetails,
  displayCycleTimeReports,
  displayError,
  displayHistory,
  displayMembers,
  displayOpenReport,
  saveCSV,
} from './output.ts';

const HELP = `
Review Request Health

Usage:
  tsx index.ts [command] [options]

Commands:
  open       Summarize open pull requests and save today's snapshot (default)
  closed     Cycle time of recently closed pull requests
  history    Show stored snapshots
  members    List organization members and their public email

Options:
  --config PATH              Path to config file (default: ./config.json or $CONFIG_PATH)
  --help, -h                 Show this help message

open:
  --details                  List zero-comment PRs labelled ready for review
  --stale-days N             List PRs without comments or pushes for N days (implies --details)
  --compare-days N           Compare with the snapshot from N days ago (default: 7)
  --from-db                  Use stored snapshots only, without calling GitHub

closed:
  --days N                   Observation window in days (default: 28)
  --user LOGIN               Statistics for one author
  --all-authors              Statistics for every author
  --debug                    Show detailed PR information

history:
  --repo NAME                Repository (default: all configured)
  --start-date YYYY-MM-DD    Start of range (default: 30 days ago)
  --end-date YYYY-MM-DD      End of range (default: today)
  --csv PATH                 Export the rows to CSV

Configuration:
  Create a config.json file with:
  {
    "githubToken": "your_github_token",
    "organization": "your-org-name",
    "repositories": ["repo1", "repo2"],
    "databasePath": "review-health.db",
    "minZeroCommentAgeDays": 3,
    "readyForReviewLabel": "ready for review",
    "doNotMergeLabel": "do not merge"
  }
`;

async function runOpen(config: Config, options: CliOptions, store: SnapshotStore): Promise<void> {
  const engine = new ComparisonEngine(store);

  if (options.fromDb) {
    for (const repo of config.repositories) {
      const snapshot = requireStoredSnapshot(store, repo);
      const previous = engine.getComparison(repo, options.compareDays, snapshot.date);
      const comparison = previous ? engine.compare(snapshot, previous) : null;
      displayOpenReport({ snapshot, zeroCommentRequests: [], inactiveRequests: [] }, comparison);
    }
    return;
  }

  const source = new GitHubSource({ organization: config.organization, githubToken: requireToken(config) });
  await source.checkRateLimit();
  console.log('');

  for (const repo of config.repositories) {
    const requests = await source.fetchOpenRequests(repo);
    // Look up the baseline before today's row is written
    const previous = engine.getComparison(repo, options.compareDays);
    const result = await computeOpenSnapshot(repo, requests, store, {
      details: options.details,
      staleDays: options.staleDays,
      minZeroCommentAgeDays: config.minZeroCommentAgeDays,
      readyForReviewLabel: config.readyForReviewLabel,
      doNotMergeLabel: config.doNotMergeLabel,
    });
    const comparison = previous ? engine.compare(result.snapshot, previous) : null;
    displayOpenReport(result, comparison);
  }

  await source.checkRateLimit();
}

async function runClosed(config: Config, options: CliOptions): Promise<void> {
  const source = new GitHubSource({ organization: config.organization, githubToken: requireToken(config) });
  const identityFilter: IdentityFilter = options.user
    ? { mode: 'author', authorId: options.user }
    : options.allAuthors
      ? { mode: 'all' }
      : { mode: 'none' };

  const now = new Date();
  const reports: CycleTimeReport[] = [];
  const total = config.repositories.length;

  for (const [index, repo] of config.repositories.entries()) {
    console.log(`\nProcessing repository ${index + 1}/${total}: ${repo}`);
    const closed = await source.fetchClosedRequests(repo, subtractDays(now, options.days));
    const report = await computeCycleTimeReport(repo, closed, options.days, identityFilter, { now });
    if (options.debug) {
      displayCycleTimeDetails(report);
    }
    reports.push(report);
  }

  displayCycleTimeReports(reports, combineCycleTimeReports(reports), options.days);
}

async function runHistory(config: Config, options: CliOptions, store: SnapshotStore): Promise<void> {
  const end = options.endDate ?? formatDate(new Date());
  const start = options.startDate ?? formatDate(subtractDays(new Date(), 30));
  const repos = options.repo ? [options.repo] : config.repositories;

  const all: Snapshot[] = [];
  for (const repo of repos) {
    const snapshots = store.getInRange(repo, start, end);
    displayHistory(repo, snapshots);
    all.push(...snapshots);
  }

  if (options.csvPath) {
    const csvPath = await saveCSV(all, options.csvPath);
    console.log(`\n📄 CSV report saved to: ${csvPath}\n`);
  }
}

async function runMembers(config: Config): Promise<void> {
  const source = new GitHubSource({ organization: config.organization, githubToken: requireToken(config) });
  displayMembers(await source.fetchOrgMembers());
}

async function main() {
  let store: SnapshotStore | null = null;

  try {
    const options = parseArgs();
    if (options.help) {
      console.log(HELP);
      return;
    }

    console.log('🚀 Review Request Health\n');
    console.log(`Loading configuration from ${options.configPath}...`);
    const config = await loadConfig(options.configPath);

    console.log(`✓ Configuration loaded`);
    console.log(`  Organization: ${config.organization}`);
    console.log(`  Repositories: ${config.repositories.join(', ')}`);
    console.log(`  Database: ${config.databasePath}`);

    switch (options.command) {
      case 'open':
        store = new SnapshotStore(config.databasePath);
        await runOpen(config, options, store);
        break;
      case 'closed':
        await runClosed(config, options);
        break;
      case 'history':
        store = new SnapshotStore(config.databasePath);
        await runHistory(config, options, store);
        break;
      case 'members':
        await runMembers(config);
        break;
    }

    console.log(`\n✅ Done!`);
  } catch (error: unknown) {
    displayError(error);
    process.exitCode = 1;
  } finally {
    store?.close();
  }
}

void main();
