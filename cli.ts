/**
 * Command-line front-end
 *
 * Usage:
 *   fng-history [scrape] [options]
 *   fng-history info
 *
 * Options:
 *   -s, --start-date <YYYY-MM-DD>  Start date (default: 2020-09-19)
 *   -e, --end-date <YYYY-MM-DD>    End date (default: today)
 *   -i, --input <file>             Existing CSV/Parquet dataset to merge with
 *   -o, --output <file>            Output file (default: fng_data.parquet)
 *   -f, --format <parquet|csv>     Output format (default: parquet)
 *   -b, --backfill                 Carry the last score forward instead of zero-filling
 *   --drop-unresolved              With --backfill, drop leading dates that have no prior score
 *   --summary / --no-summary       Print the summary table (default: on)
 *   --verbose                      Debug logging
 *   -h, --help                     Show help
 */

import type { FngConfig, FngOptions } from './config';
import { loadFngConfig, logFngConfig } from './config';
import { setLogLevel } from './core/logger';
import { printSummary } from './output/summary';
import { runPipeline, toFailure } from './pipeline';

export type CliCommand = 'scrape' | 'info' | 'help';

export interface CliArgs {
  command: CliCommand;
  options: FngOptions;
  verbose: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

const RECENT_PREVIEW = 5;

export function parseCliArgs(args: string[]): CliArgs {
  const result: CliArgs = { command: 'scrape', options: {}, verbose: false };
  let i = 0;

  const first = args[0];
  if (first === 'scrape' || first === 'info') {
    result.command = first;
    i = 1;
  }

  const value = (flag: string): string => {
    const next = args[++i];
    if (next === undefined || next.startsWith('-')) {
      throw new CliUsageError(`${flag} requires a value`);
    }
    return next;
  };

  for (; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--start-date':
      case '-s':
        result.options.startDate = value(arg);
        break;
      case '--end-date':
      case '-e':
        result.options.endDate = value(arg);
        break;
      case '--input':
      case '--input-csv':
      case '-i':
        result.options.inputPath = value(arg);
        break;
      case '--output':
      case '-o':
        result.options.outputPath = value(arg);
        break;
      case '--format':
      case '-f':
        result.options.format = value(arg);
        break;
      case '--backfill':
      case '-b':
        result.options.backfill = true;
        break;
      case '--drop-unresolved':
        result.options.dropUnresolved = true;
        break;
      case '--summary':
        result.options.showSummary = true;
        break;
      case '--no-summary':
        result.options.showSummary = false;
        break;
      case '--verbose':
        result.verbose = true;
        break;
      case '--help':
      case '-h':
        result.command = 'help';
        break;
      default:
        throw new CliUsageError(`Unknown option: ${arg}`);
    }
  }

  return result;
}

export const HELP_TEXT = `
Fear and Greed Index scraper

Usage: fng-history [scrape] [options]
       fng-history info

Options:
  -s, --start-date <YYYY-MM-DD>  Start date (default: 2020-09-19)
  -e, --end-date <YYYY-MM-DD>    End date (default: today)
  -i, --input <file>             Existing CSV/Parquet dataset to merge with
  -o, --output <file>            Output file (default: fng_data.parquet)
  -f, --format <parquet|csv>     Output format (default: parquet)
  -b, --backfill                 Carry the last score forward instead of zero-filling
  --drop-unresolved              With --backfill, drop leading dates with no prior score
  --summary / --no-summary       Print the summary table (default: on)
  --verbose                      Debug logging
  -h, --help                     Show help
`;

export const INFO_TEXT = `
Fear and Greed Index

The index is a 0-100 measure of US equity market sentiment built from seven indicators:
  - Stock Price Momentum: S&P 500 vs its 125-day moving average
  - Stock Price Strength: stocks at 52-week highs vs lows
  - Stock Price Breadth: volume in advancing vs declining stocks
  - Put/Call Options: put/call ratio
  - Junk Bond Demand: high-yield vs investment-grade bond spread
  - Market Volatility: VIX vs its 50-day moving average
  - Safe Haven Demand: stock vs bond returns

Scale:
   0-24  Extreme Fear
  25-49  Fear
  50-74  Greed
  75-100 Extreme Greed

Data source: CNN Fear and Greed Index
`;

/**
 * Run one command and return the process exit code.
 */
export async function runCli(args: string[]): Promise<number> {
  let parsed: CliArgs;
  try {
    parsed = parseCliArgs(args);
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    console.error(HELP_TEXT);
    return 1;
  }

  if (parsed.command === 'help') {
    console.log(HELP_TEXT);
    return 0;
  }
  if (parsed.command === 'info') {
    console.log(INFO_TEXT);
    return 0;
  }

  if (parsed.verbose) setLogLevel('debug');

  let config: FngConfig;
  try {
    config = loadFngConfig(parsed.options);
  } catch (err) {
    const failure = toFailure(err);
    console.error(`Error [${failure.kind}]: ${failure.message}`);
    return 1;
  }

  logFngConfig(config);
  const result = await runPipeline(config);

  if (!result.ok) {
    console.error(`Error [${result.error.kind}]: ${result.error.message}`);
    return 1;
  }

  console.log(`💾 Data saved to ${result.outputPath}`);
  if (result.summary) {
    printSummary(result.summary, result.dataset.slice(-RECENT_PREVIEW));
  }
  console.log(`\n✅ Successfully processed ${result.dataset.length} records!`);
  return 0;
}
