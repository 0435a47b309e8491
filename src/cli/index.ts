#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import { chatCommand, chatCommandDefinition } from './commands/chat.js';
import { moodCommand } from './commands/mood.js';
import { resetCommand } from './commands/reset.js';
import { lexiconCommand } from './commands/lexicon.js';

const program = new Command();

program
  .name('haven')
  .description('Haven - a rule-based support companion for the terminal')
  .version('1.0.0')
  .action(async () => {
    await chatCommand({ persist: true });
  });

program.addCommand(chatCommandDefinition);
program.addCommand(moodCommand);
program.addCommand(resetCommand);
program.addCommand(lexiconCommand);

program.on('command:*', () => {
  console.error(chalk.red(`Invalid command: ${program.args.join(' ')}`));
  console.log(chalk.yellow('Run `haven --help` for available commands'));
  process.exit(1);
});

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(`✗ ${error instanceof Error ? error.message : String(error)}`));
  process.exit(1);
});
