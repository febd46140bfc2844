const MS_PER_DAY = 1000 * 60 * 60 * 24;

/**
 * Whole days elapsed between two instants (floor, never negative)
 */
export function wholeDaysBetween(start: Date, end: Date): number {
  const diff = Math.floor((end.getTime() - start.getTime()) / MS_PER_DAY);
  return diff > 0 ? diff : 0;
}

/**
 * Fractional days elapsed between two instants
 */
export function fractionalDaysBetween(start: Date, end: Date): number {
  return (end.getTime() - start.getTime()) / MS_PER_DAY;
}

export function subtractDays(date: Date, days: number): Date {
  return new Date(date.getTime() - days * MS_PER_DAY);
}

/**
 * Format a date as YYYY-MM-DD (UTC calendar day)
 */
export function formatDate(date: Date): string {
  return date.toISOString().split('T')[0];
}

/**
 * Validate a YYYY-MM-DD day key
 */
export function assertDayKey(value: string): string {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    throw new Error(`Invalid date "${value}", expected YYYY-MM-DD`);
  }
  const parsed = new Date(`${value}T00:00:00Z`);
  if (isNaN(parsed.getTime()) || formatDate(parsed) !== value) {
    throw new Error(`Invalid date "${value}", expected YYYY-MM-DD`);
  }
  return value;
}

export function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((acc, val) => acc + val, 0) / values.length;
}

/**
 * Sample standard deviation (n - 1); 0 for fewer than two values
 */
export function sampleStdDev(values: number[]): number {
  if (values.length < 2) return 0;
  const avg = mean(values);
  const squares = values.reduce((acc, val) => acc + (val - avg) ** 2, 0);
  return Math.sqrt(squares / (values.length - 1));
}

export type Command = 'open' | 'closed' | 'history' | 'members';

export interface CliOptions {
  command: Command;
  configPath: string;
  details: boolean;
  staleDays?: number;
  compareDays: number;
  fromDb: boolean;
  days: number;
  user?: string;
  allAuthors: boolean;
  debug: boolean;
  repo?: string;
  startDate?: string;
  endDate?: string;
  csvPath?: string;
  help: boolean;
}

const COMMANDS: Command[] = ['open', 'closed', 'history', 'members'];

function isCommand(value: string): value is Command {
  return COMMANDS.some(command => command === value);
}

function parseCount(flag: string, value: string | undefined, min: number): number {
  const parsed = Number(value);
  if (value === undefined || !Number.isInteger(parsed) || parsed < min) {
    throw new Error(`${flag} expects an integer >= ${min}`);
  }
  return parsed;
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value.startsWith('--')) {
    throw new Error(`${flag} expects a value`);
  }
  return value;
}

/**
 * Parse command line arguments
 */
export function parseArgs(
  args: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): CliOptions {
  const options: CliOptions = {
    command: 'open',
    configPath: env.CONFIG_PATH || './config.json',
    details: false,
    compareDays: 7,
    fromDb: false,
    days: 28,
    allAuthors: false,
    debug: false,
    help: false,
  };

  let i = 0;
  if (args.length > 0 && isCommand(args[0])) {
    options.command = args[0];
    i = 1;
  }

  for (; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];

    switch (arg) {
      case '--config':
        options.configPath = requireValue(arg, next);
        i++;
        break;
      case '--details':
        options.details = true;
        break;
      case '--stale-days':
        options.staleDays = parseCount(arg, next, 1);
        i++;
        break;
      case '--compare-days':
        options.compareDays = parseCount(arg, next, 1);
        i++;
        break;
      case '--from-db':
        options.fromDb = true;
        break;
      case '--days':
        options.days = parseCount(arg, next, 1);
        i++;
        break;
      case '--user':
        options.user = requireValue(arg, next);
        i++;
        break;
      case '--all-authors':
        options.allAuthors = true;
        break;
      case '--debug':
        options.debug = true;
        break;
      case '--repo':
        options.repo = requireValue(arg, next);
        i++;
        break;
      case '--start-date':
        options.startDate = assertDayKey(requireValue(arg, next));
        i++;
        break;
      case '--end-date':
        options.endDate = assertDayKey(requireValue(arg, next));
        i++;
        break;
      case '--csv':
        options.csvPath = requireValue(arg, next);
        i++;
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      default:
        throw new Error(`Unknown argument: ${arg}`);
    }
  }

  if (options.user && options.allAuthors) {
    throw new Error('--user and --all-authors cannot be combined');
  }

  return options;
}
