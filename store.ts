import Database from 'better-sqlite3';
import type { Snapshot, SnapshotStats } from './types.ts';
import { assertDayKey, formatDate } from './utils.ts';

interface SnapshotRow {
  repo_name: string;
  date: string;
  total_open: number;
  avg_age_days: number;
  avg_age_days_excluding_oldest: number;
  avg_comments: number;
  avg_comments_with_comments: number;
  approved_count: number;
  oldest_age_days: number;
  oldest_title: string;
  zero_comment_count: number;
}

type StatsColumn = Exclude<keyof SnapshotRow, 'repo_name' | 'date'>;

/**
 * Every stats column, with the default applied when a column is added to an
 * older database. Adding a field to SnapshotStats means adding it here.
 */
const STATS_COLUMNS: ReadonlyArray<{ name: StatsColumn; definition: string }> = [
  { name: 'total_open', definition: 'INTEGER NOT NULL DEFAULT 0' },
  { name: 'avg_age_days', definition: 'REAL NOT NULL DEFAULT 0' },
  { name: 'avg_age_days_excluding_oldest', definition: 'REAL NOT NULL DEFAULT 0' },
  { name: 'avg_comments', definition: 'REAL NOT NULL DEFAULT 0' },
  { name: 'avg_comments_with_comments', definition: 'REAL NOT NULL DEFAULT 0' },
  { name: 'approved_count', definition: 'INTEGER NOT NULL DEFAULT 0' },
  { name: 'oldest_age_days', definition: 'INTEGER NOT NULL DEFAULT 0' },
  { name: 'oldest_title', definition: "TEXT NOT NULL DEFAULT ''" },
  { name: 'zero_comment_count', definition: 'INTEGER NOT NULL DEFAULT 0' },
];

const ALL_COLUMNS = ['repo_name', 'date', ...STATS_COLUMNS.map(column => column.name)];
const SELECT_COLUMNS = ALL_COLUMNS.join(', ');

function toSnapshot(row: SnapshotRow): Snapshot {
  return {
    repoName: row.repo_name,
    date: row.date,
    totalOpen: row.total_open,
    avgAgeDays: row.avg_age_days,
    avgAgeDaysExcludingOldest: row.avg_age_days_excluding_oldest,
    avgComments: row.avg_comments,
    avgCommentsWithComments: row.avg_comments_with_comments,
    approvedCount: row.approved_count,
    oldestAgeDays: row.oldest_age_days,
    oldestTitle: row.oldest_title,
    zeroCommentCount: row.zero_comment_count,
  };
}

function toRow(repoName: string, date: string, stats: SnapshotStats): SnapshotRow {
  return {
    repo_name: repoName,
    date,
    total_open: stats.totalOpen,
    avg_age_days: stats.avgAgeDays,
    avg_age_days_excluding_oldest: stats.avgAgeDaysExcludingOldest,
    avg_comments: stats.avgComments,
    avg_comments_with_comments: stats.avgCommentsWithComments,
    approved_count: stats.approvedCount,
    oldest_age_days: stats.oldestAgeDays,
    oldest_title: stats.oldestTitle,
    zero_comment_count: stats.zeroCommentCount,
  };
}

/**
 * Subset of the store the aggregators write through
 */
export interface SnapshotWriter {
  save(repoName: string, stats: SnapshotStats, date?: string): Snapshot;
}

/**
 * Daily snapshots per repository, backed by a local SQLite file
 */
export class SnapshotStore implements SnapshotWriter {
  private db: Database.Database;

  constructor(dbPath: string) {
    this.db = new Database(dbPath);
    this.createTables();
    this.migrateSchema();
  }

  private createTables(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS snapshots (
        repo_name TEXT NOT NULL,
        date TEXT NOT NULL,
        ${STATS_COLUMNS.map(column => `${column.name} ${column.definition}`).join(',\n        ')},
        PRIMARY KEY (repo_name, date)
      )
    `);
  }

  /**
   * Add columns missing from databases written by older versions
   */
  private migrateSchema(): void {
    const existing = new Set(
      this.db
        .prepare<[], { name: string }>('PRAGMA table_info(snapshots)')
        .all()
        .map(column => column.name)
    );

    const migrate = this.db.transaction(() => {
      for (const column of STATS_COLUMNS) {
        if (!existing.has(column.name)) {
          this.db.exec(`ALTER TABLE snapshots ADD COLUMN ${column.name} ${column.definition}`);
        }
      }
    });
    migrate();
  }

  /**
   * Insert or fully replace the row for (repoName, date)
   */
  save(repoName: string, stats: SnapshotStats, date: string = formatDate(new Date())): Snapshot {
    const row = toRow(repoName, assertDayKey(date), stats);
    try {
      this.db
        .prepare<[SnapshotRow]>(`
          INSERT OR REPLACE INTO snapshots (${SELECT_COLUMNS})
          VALUES (${ALL_COLUMNS.map(name => `@${name}`).join(', ')})
        `)
        .run(row);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to save snapshot for ${repoName} on ${date}: ${message}`, { cause: error });
    }
    return toSnapshot(row);
  }

  getLatest(repoName: string): Snapshot | null {
    return this.queryOne(
      `SELECT ${SELECT_COLUMNS} FROM snapshots WHERE repo_name = ? ORDER BY date DESC LIMIT 1`,
      [repoName]
    );
  }

  getForDate(repoName: string, date: string): Snapshot | null {
    return this.queryOne(
      `SELECT ${SELECT_COLUMNS} FROM snapshots WHERE repo_name = ? AND date = ?`,
      [repoName, assertDayKey(date)]
    );
  }

  /**
   * Most recent row strictly before the given day
   */
  getBeforeDate(repoName: string, date: string): Snapshot | null {
    return this.queryOne(
      `SELECT ${SELECT_COLUMNS} FROM snapshots WHERE repo_name = ? AND date < ? ORDER BY date DESC LIMIT 1`,
      [repoName, assertDayKey(date)]
    );
  }

  getEarliest(repoName: string): Snapshot | null {
    return this.queryOne(
      `SELECT ${SELECT_COLUMNS} FROM snapshots WHERE repo_name = ? ORDER BY date ASC LIMIT 1`,
      [repoName]
    );
  }

  /**
   * Rows between start and end (inclusive), oldest first
   */
  getInRange(repoName: string, start: string, end: string): Snapshot[] {
    return this.db
      .prepare<[string, string, string], SnapshotRow>(
        `SELECT ${SELECT_COLUMNS} FROM snapshots WHERE repo_name = ? AND date >= ? AND date <= ? ORDER BY date ASC`
      )
      .all(repoName, assertDayKey(start), assertDayKey(end))
      .map(toSnapshot);
  }

  listRepositories(): string[] {
    return this.db
      .prepare<[], { repo_name: string }>('SELECT DISTINCT repo_name FROM snapshots ORDER BY repo_name ASC')
      .all()
      .map(row => row.repo_name);
  }

  close(): void {
    this.db.close();
  }

  private queryOne(sql: string, params: string[]): Snapshot | null {
    const row = this.db.prepare<string[], SnapshotRow>(sql).get(...params);
    return row ? toSnapshot(row) : null;
  }
}
