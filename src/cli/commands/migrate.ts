/**
 * Migrate Command - customs-sync migrate
 *
 * Applies pending canonical-store migrations.
 *
 * @module cli/commands/migrate
 */

import chalk from 'chalk';
import type { Command } from 'commander';
import type { Pool } from 'pg';
import { loadConfig, requireDatabaseUrl } from '../../config.js';
import { createPgExecutor, createPgPool } from '../../db/pg-executor.js';
import { runMigrations } from '../../db/migrate.js';
import { createStderrLogger } from '../../utils/logger.js';
import { ExitCodes, reportError } from '../utils.js';
import type { ExitCode } from '../utils.js';

export async function migrateCommand(): Promise<ExitCode> {
  let pool: Pool | undefined;
  try {
    const config = loadConfig();
    const logger = createStderrLogger(config.logging.level);
    pool = createPgPool({
      connectionString: requireDatabaseUrl(config),
      max: 1,
      statementTimeoutMs: 0,
      applicationName: 'customs-sync-migrate',
    });

    const result = await runMigrations(createPgExecutor(pool, logger), logger);

    for (const name of result.applied) {
      console.log(`${chalk.green('applied')}  ${name}`);
    }
    for (const name of result.skipped) {
      console.log(`${chalk.dim('present')}  ${name}`);
    }
    console.log(
      result.applied.length === 0
        ? chalk.dim('Schema is up to date')
        : chalk.green(`Applied ${result.applied.length} migration(s)`)
    );
    return ExitCodes.SUCCESS;
  } catch (error) {
    return reportError(error);
  } finally {
    await pool?.end();
  }
}

export function registerMigrateCommand(program: Command): void {
  program
    .command('migrate')
    .description('Create or upgrade the canonical schema')
    .action(async () => {
      const code = await migrateCommand();
      process.exit(code);
    });
}
