/**
 * Fill Gaps Command - customs-sync fill-gaps
 *
 * Fills empty snapshot columns from cached or authoritative payloads.
 *
 * @module cli/commands/fill-gaps
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import type { Command } from 'commander';
import ora from 'ora';
import { loadConfig } from '../../config.js';
import type { Config } from '../../config.js';
import { GapFillService } from '../../services/gap-fill-service.js';
import type { GapFillResult } from '../../services/gap-fill-service.js';
import { ConfigurationError } from '../../utils/errors.js';
import { createStderrLogger } from '../../utils/logger.js';
import { openRuntime } from '../runtime.js';
import type { Runtime } from '../runtime.js';
import { exitCodeFor, formatCount, isInteractive, parsePositiveInt, reportError } from '../utils.js';
import type { ExitCode } from '../utils.js';

export interface FillGapsCommandOptions {
  limit?: number;
  dryRun?: boolean;
  json?: boolean;
}

function printSummary(result: GapFillResult): void {
  if (result.dryRun) {
    console.log(chalk.yellow.bold('DRY RUN: nothing was written'));
    for (const plan of result.planned) {
      const columns = [
        ...Object.keys(plan.fill.fields),
        ...(plan.fill.processReference !== undefined ? ['processReference'] : []),
        ...(plan.fill.version !== undefined ? ['version'] : []),
        ...(plan.fill.rawPayload !== undefined ? ['rawPayload'] : []),
      ];
      console.log(`  ${chalk.cyan(`${plan.kind} ${plan.number}`)} (#${plan.id}): ${columns.join(', ')}`);
    }
  }

  const table = new Table({
    head: [
      chalk.bold('Candidates'),
      chalk.bold(result.dryRun ? 'Would update' : 'Updated'),
      chalk.bold('Skipped'),
      chalk.bold('Errors'),
    ],
    style: {
      head: [],
      border: [],
    },
  });
  table.push([
    String(result.candidates),
    formatCount(result.updated, chalk.green),
    formatCount(result.skipped),
    formatCount(result.errors, chalk.red),
  ]);
  console.log(table.toString());
}

/**
 * Executes the fill-gaps command
 */
export async function fillGapsCommand(options: FillGapsCommandOptions): Promise<ExitCode> {
  const json = options.json ?? false;
  let config: Config;
  try {
    config = loadConfig();
  } catch (error) {
    return reportError(error, json);
  }

  const logger = createStderrLogger(config.logging.level);
  const spinner = isInteractive() && !json ? ora('Filling snapshot gaps...').start() : null;

  let runtime: Runtime | undefined;
  try {
    runtime = openRuntime(config, logger, { cache: true });
    if (!runtime.cache) {
      throw new ConfigurationError('CACHE_DB_PATH must point at the local cache store');
    }

    const service = new GapFillService({
      documents: runtime.documents,
      cache: runtime.cache,
      source: runtime.source,
      logger,
    });
    const result = await service.run({
      limit: options.limit ?? config.gapFill.limit,
      dryRun: options.dryRun ?? false,
    });

    if (result.errors === 0) {
      spinner?.succeed(result.dryRun ? 'Gap fill plan ready' : `Filled ${result.updated} snapshot(s)`);
    } else {
      spinner?.warn(`Gap fill finished with ${result.errors} error(s)`);
    }

    if (json) {
      console.log(JSON.stringify({ success: result.errors === 0, ...result }, null, 2));
    } else {
      printSummary(result);
    }

    return exitCodeFor(result.errors);
  } catch (error) {
    spinner?.fail('Gap fill failed');
    return reportError(error, json);
  } finally {
    await runtime?.close();
  }
}

export function registerFillGapsCommand(program: Command): void {
  program
    .command('fill-gaps')
    .description('Fill empty snapshot columns without overwriting stored values')
    .option('--limit <n>', 'Maximum snapshots to fill', parsePositiveInt)
    .option('--dry-run', 'Report the planned changes without writing')
    .option('--json', 'Output as JSON')
    .action(async (options: FillGapsCommandOptions) => {
      const code = await fillGapsCommand(options);
      process.exit(code);
    });
}
