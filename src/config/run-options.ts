import { RunOptions } from '../services/digest-runner';

export type QueryParams = Record<string, string | string[] | undefined>;

function firstValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

function isTruthyFlag(value: string | string[] | undefined): boolean {
  const flag = firstValue(value)?.trim().toLowerCase();
  return flag === 'true' || flag === '1';
}

/**
 * Reads --dry-run, --no-filter and --reset-history from command-line arguments
 */
export function parseCliArgs(argv: string[]): RunOptions {
  return {
    dryRun: argv.includes('--dry-run'),
    noFilter: argv.includes('--no-filter'),
    resetHistory: argv.includes('--reset-history'),
  };
}

/**
 * Reads dryRun, noFilter and resetHistory query flags ("true" or "1")
 */
export function parseQueryFlags(query: QueryParams): RunOptions {
  return {
    dryRun: isTruthyFlag(query.dryRun),
    noFilter: isTruthyFlag(query.noFilter),
    resetHistory: isTruthyFlag(query.resetHistory),
  };
}

export const CLI_USAGE = `
Usage:
  job-digest [--dry-run] [--no-filter] [--reset-history]

  --dry-run        Compute the digest without sending it
  --no-filter      Skip keyword and location filters
  --reset-history  Clear job history so every posting is treated as new
`.trim();
