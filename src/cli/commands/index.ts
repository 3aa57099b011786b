/**
 * CLI Commands Registry
 *
 * Registers every subcommand with the main program.
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerBackfillCommand } from './backfill.js';
import { registerFillGapsCommand } from './fill-gaps.js';
import { registerMigrateCommand } from './migrate.js';
import { registerReconcileProcessesCommand } from './reconcile-processes.js';

export function registerCommands(program: Command): void {
  registerMigrateCommand(program);
  registerBackfillCommand(program);
  registerReconcileProcessesCommand(program);
  registerFillGapsCommand(program);
}
