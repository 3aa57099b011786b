/**
 * Reconcile Processes Command - customs-sync reconcile-processes
 *
 * Sweeps the process board and reconciles each shipment's documents and
 * financial aggregates.
 *
 * @module cli/commands/reconcile-processes
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import type { Command } from 'commander';
import ora from 'ora';
import { loadConfig } from '../../config.js';
import type { Config } from '../../config.js';
import { FinancialAggregateWriter } from '../../services/financial-aggregate-service.js';
import { ProcessReconciliationService } from '../../services/process-reconciliation-service.js';
import type { ProcessReconciliationResult } from '../../services/process-reconciliation-service.js';
import { SchemaHealer } from '../../services/schema-healer.js';
import { ConfigurationError } from '../../utils/errors.js';
import { createStderrLogger } from '../../utils/logger.js';
import { openRuntime } from '../runtime.js';
import type { Runtime } from '../runtime.js';
import { exitCodeFor, formatCount, isInteractive, parsePositiveInt, reportError } from '../utils.js';
import type { ExitCode } from '../utils.js';

export interface ReconcileProcessesCommandOptions {
  limit?: number;
  documents: boolean;
  financials: boolean;
  json?: boolean;
}

function printSummary(result: ProcessReconciliationResult): void {
  const table = new Table({
    head: [chalk.bold('Metric'), chalk.bold('Count')],
    style: {
      head: [],
      border: [],
    },
  });

  table.push(
    ['Processes read', String(result.total)],
    ['Processes upserted', formatCount(result.processesUpserted, chalk.green)],
    ['Documents upserted', formatCount(result.documentsUpserted, chalk.green)],
    ['Values upserted', formatCount(result.valuesUpserted, chalk.green)],
    ['Taxes upserted', formatCount(result.taxesUpserted, chalk.green)],
    ['Skipped', formatCount(result.skipped)],
    ['Errors', formatCount(result.errors, chalk.red)]
  );
  console.log(table.toString());

  for (const failure of result.failures) {
    console.log(`  ${chalk.red(failure.processReference)}: ${failure.error}`);
  }
}

/**
 * Executes the reconcile-processes command
 */
export async function reconcileProcessesCommand(options: ReconcileProcessesCommandOptions): Promise<ExitCode> {
  const json = options.json ?? false;
  let config: Config;
  try {
    config = loadConfig();
  } catch (error) {
    return reportError(error, json);
  }

  const logger = createStderrLogger(config.logging.level);
  const spinner = isInteractive() && !json ? ora('Reconciling processes...').start() : null;

  let runtime: Runtime | undefined;
  try {
    runtime = openRuntime(config, logger, { cache: true });
    if (!runtime.cache) {
      throw new ConfigurationError('CACHE_DB_PATH must point at the local cache store');
    }

    const service = new ProcessReconciliationService({
      cache: runtime.cache,
      source: runtime.source,
      processes: runtime.processes,
      reconciler: runtime.reconciler,
      financials: new FinancialAggregateWriter({ repository: runtime.financials, logger }),
      healer: new SchemaHealer({ executor: runtime.canonical, logger }),
      logger,
    });

    const result = await service.run({
      limit: options.limit ?? config.processSync.limit,
      includeDocuments: options.documents,
      includeFinancials: options.financials,
    });

    if (result.success) {
      spinner?.succeed(`Reconciled ${result.processesUpserted} process(es)`);
    } else {
      spinner?.warn(`Reconciliation finished with ${result.errors} error(s)`);
    }

    if (json) {
      console.log(JSON.stringify(result, null, 2));
    } else {
      printSummary(result);
    }

    return exitCodeFor(result.errors);
  } catch (error) {
    spinner?.fail('Process reconciliation failed');
    return reportError(error, json);
  } finally {
    await runtime?.close();
  }
}

export function registerReconcileProcessesCommand(program: Command): void {
  program
    .command('reconcile-processes')
    .description('Reconcile recently updated processes from the process board')
    .option('--limit <n>', 'Number of processes to read', parsePositiveInt)
    .option('--no-documents', 'Skip document reconciliation')
    .option('--no-financials', 'Skip merchandise values and taxes')
    .option('--json', 'Output as JSON')
    .action(async (options: ReconcileProcessesCommandOptions) => {
      const code = await reconcileProcessesCommand(options);
      process.exit(code);
    });
}
