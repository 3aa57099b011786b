#!/usr/bin/env node
/**
 * customs-sync CLI
 *
 * Entry point for the `customs-sync` command.
 *
 * @module cli
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { registerCommands } from './commands/index.js';
import { findSimilarCommands } from './suggest.js';
import { shouldUseColor } from './utils.js';

if (!shouldUseColor()) {
  chalk.level = 0;
}

const program = new Command();

program
  .name('customs-sync')
  .description('Reconcile customs document snapshots and change history')
  .version('1.0.0');

registerCommands(program);

program.on('command:*', (operands: string[]) => {
  const unknownCommand = operands[0] ?? '';
  const suggestions = findSimilarCommands(
    unknownCommand,
    program.commands.map((cmd) => cmd.name())
  );

  console.error(chalk.red(`error: unknown command '${unknownCommand}'`));

  if (suggestions.length > 0) {
    console.error();
    console.error(chalk.yellow('Did you mean one of these?'));
    suggestions.forEach((cmd) => {
      console.error(`  ${chalk.cyan(cmd)}`);
    });
  }

  console.error();
  console.error(`Run ${chalk.cyan('customs-sync --help')} for a list of available commands.`);
  process.exit(1);
});

program.parse();
