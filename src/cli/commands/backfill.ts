/**
 * Backfill Command - customs-sync backfill
 *
 * Migrates historical import declarations and unified declarations from the
 * authoritative store into the canonical store.
 *
 * @module cli/commands/backfill
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import { Option } from 'commander';
import type { Command } from 'commander';
import ora from 'ora';
import { loadConfig } from '../../config.js';
import type { Config } from '../../config.js';
import type { BackfillCounters, BackfillKindFilter, BackfillResult } from '../../services/backfill-service.js';
import { BackfillService, resolveWindow } from '../../services/backfill-service.js';
import { ExistenceChecker } from '../../services/existence-checker.js';
import { ValidationError } from '../../utils/errors.js';
import { createStderrLogger } from '../../utils/logger.js';
import { openRuntime } from '../runtime.js';
import type { Runtime } from '../runtime.js';
import { exitCodeFor, formatCount, isInteractive, parsePositiveInt, parseYear, reportError } from '../utils.js';
import type { ExitCode } from '../utils.js';

export interface BackfillCommandOptions {
  year?: number;
  from?: string;
  to?: string;
  limit?: number;
  kind: string;
  dryRun?: boolean;
  ingestUnknown?: boolean;
  json?: boolean;
}

const MAX_LISTED_ERRORS = 20;

export function parseKindFilter(value: string): BackfillKindFilter {
  switch (value.trim().toUpperCase()) {
    case 'DI':
      return 'DI';
    case 'DUIMP':
      return 'DUIMP';
    case 'ALL':
      return 'ALL';
    default:
      throw new ValidationError(`Unknown kind filter: ${value}`, 'kind');
  }
}

function counterRow(label: string, counters: BackfillCounters): string[] {
  return [
    label,
    String(counters.found),
    String(counters.unique),
    formatCount(counters.migrated, chalk.green),
    formatCount(counters.skipped),
    formatCount(counters.unknown, chalk.yellow),
    formatCount(counters.errors, chalk.red),
  ];
}

function printSummary(result: BackfillResult): void {
  if (result.dryRun) {
    console.log(chalk.yellow.bold('DRY RUN: nothing was written'));
  }
  console.log(
    chalk.dim(`Window: ${result.window.from.toISOString()} .. ${result.window.to.toISOString()} (end exclusive)`)
  );

  const table = new Table({
    head: [
      chalk.bold('Kind'),
      chalk.bold('Found'),
      chalk.bold('Unique'),
      chalk.bold(result.dryRun ? 'Would migrate' : 'Migrated'),
      chalk.bold('Skipped'),
      chalk.bold('Unknown'),
      chalk.bold('Errors'),
    ],
    style: {
      head: [],
      border: [],
    },
  });

  for (const [kind, counters] of Object.entries(result.byKind)) {
    if (counters) {
      table.push(counterRow(kind, counters));
    }
  }
  table.push(counterRow(chalk.bold('TOTAL'), result.total));
  console.log(table.toString());

  if (result.errors.length > 0) {
    console.log(chalk.red(`\nErrors (${result.errors.length}):`));
    for (const error of result.errors.slice(0, MAX_LISTED_ERRORS)) {
      console.log(`  ${error.kind} ${error.number}: ${error.error}`);
    }
    if (result.errors.length > MAX_LISTED_ERRORS) {
      console.log(chalk.dim(`  ... and ${result.errors.length - MAX_LISTED_ERRORS} more`));
    }
  }
}

/**
 * Executes the backfill command
 */
export async function backfillCommand(options: BackfillCommandOptions): Promise<ExitCode> {
  const json = options.json ?? false;
  let config: Config;
  try {
    config = loadConfig();
  } catch (error) {
    return reportError(error, json);
  }

  const logger = createStderrLogger(config.logging.level);
  const spinner = isInteractive() && !json ? ora('Backfilling historical documents...').start() : null;

  let runtime: Runtime | undefined;
  try {
    const window = resolveWindow({ year: options.year, from: options.from, to: options.to });
    const kinds = parseKindFilter(options.kind);
    runtime = openRuntime(config, logger, { cache: false });

    const retry = {
      maxAttempts: config.retry.maxAttempts,
      initialDelayMs: config.retry.initialDelayMs,
      maxDelayMs: config.retry.maxDelayMs,
    };
    const service = new BackfillService({
      source: runtime.source,
      processes: runtime.processes,
      reconciler: runtime.reconciler,
      existence: new ExistenceChecker({
        repository: runtime.documents,
        logger,
        batchSize: config.backfill.batchSize,
        retry,
      }),
      logger,
      throttleMs: config.backfill.throttleMs,
      retry,
    });

    const result = await service.run({
      window,
      limit: options.limit ?? null,
      kinds,
      dryRun: options.dryRun ?? false,
      unknownPolicy: options.ingestUnknown ? 'ingest' : 'skip',
    });

    if (result.total.errors === 0) {
      spinner?.succeed(result.dryRun ? 'Backfill plan ready' : 'Backfill complete');
    } else {
      spinner?.warn(`Backfill finished with ${result.total.errors} error(s)`);
    }

    if (json) {
      console.log(JSON.stringify({ success: result.total.errors === 0, ...result }, null, 2));
    } else {
      printSummary(result);
    }

    return exitCodeFor(result.total.errors);
  } catch (error) {
    spinner?.fail('Backfill failed');
    return reportError(error, json);
  } finally {
    await runtime?.close();
  }
}

export function registerBackfillCommand(program: Command): void {
  program
    .command('backfill')
    .description('Migrate historical declarations from the authoritative store')
    .option('--year <yyyy>', 'Calendar year to migrate', parseYear)
    .option('--from <date>', 'Window start (yyyy-mm-dd)')
    .option('--to <date>', 'Window end, inclusive (yyyy-mm-dd)')
    .option('--limit <n>', 'Maximum rows per kind', parsePositiveInt)
    .addOption(new Option('--kind <kind>', 'Document kinds to migrate').choices(['DI', 'DUIMP', 'ALL']).default('ALL'))
    .option('--dry-run', 'Run every check but write nothing')
    .option('--ingest-unknown', 'Ingest numbers whose existence could not be determined')
    .option('--json', 'Output as JSON')
    .action(async (options: BackfillCommandOptions) => {
      const code = await backfillCommand(options);
      process.exit(code);
    });
}
