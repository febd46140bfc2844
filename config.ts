import { readFile } from 'node:fs/promises';
import type { Config } from './types.ts';
import {
  DEFAULT_DO_NOT_MERGE_LABEL,
  DEFAULT_MIN_ZERO_COMMENT_AGE_DAYS,
  DEFAULT_READY_FOR_REVIEW_LABEL,
} from './metrics.ts';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(raw: Record<string, unknown>, key: string, fallback: string): string {
  const value = raw[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigError(`"${key}" must be a non-empty string`);
  }
  return value;
}

function optionalCount(raw: Record<string, unknown>, key: string, fallback: number): number {
  const value = raw[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new ConfigError(`"${key}" must be a non-negative integer`);
  }
  return value;
}

/**
 * Validate parsed JSON and fill in defaults
 */
export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): Config {
  if (!isRecord(raw)) {
    throw new ConfigError('Configuration must be a JSON object');
  }

  const { organization, repositories, githubToken } = raw;

  if (typeof organization !== 'string' || organization.trim() === '') {
    throw new ConfigError('Invalid configuration. Please ensure organization is set.');
  }

  if (
    !Array.isArray(repositories) ||
    repositories.length === 0 ||
    !repositories.every((repo): repo is string => typeof repo === 'string' && repo.trim() !== '')
  ) {
    throw new ConfigError('Invalid configuration. Please ensure repositories is a non-empty list of names.');
  }

  if (githubToken !== undefined && typeof githubToken !== 'string') {
    throw new ConfigError('"githubToken" must be a string');
  }

  return {
    // GH_TOKEN wins over the file
    githubToken: env.GH_TOKEN || (typeof githubToken === 'string' && githubToken) || undefined,
    organization,
    repositories,
    databasePath: optionalString(raw, 'databasePath', 'review-health.db'),
    minZeroCommentAgeDays: optionalCount(raw, 'minZeroCommentAgeDays', DEFAULT_MIN_ZERO_COMMENT_AGE_DAYS),
    readyForReviewLabel: optionalString(raw, 'readyForReviewLabel', DEFAULT_READY_FOR_REVIEW_LABEL),
    doNotMergeLabel: optionalString(raw, 'doNotMergeLabel', DEFAULT_DO_NOT_MERGE_LABEL),
  };
}

/**
 * Load configuration from a JSON file
 */
export async function loadConfig(configPath: string, env: NodeJS.ProcessEnv = process.env): Promise<Config> {
  let text: string;
  try {
    text = await readFile(configPath, 'utf-8');
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Configuration file not found at ${configPath} (${message})`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Invalid JSON in ${configPath}: ${message}`);
  }

  return parseConfig(raw, env);
}

/**
 * Token for API-backed commands
 */
export function requireToken(config: Config): string {
  if (!config.githubToken) {
    throw new ConfigError('GitHub token not found. Set GH_TOKEN environment variable or include githubToken in config.json');
  }
  return config.githubToken;
}
