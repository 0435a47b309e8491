import { Command } from 'commander';
import chalk from 'chalk';
import { createInterface } from 'readline/promises';
import { stdin as input, stdout as output } from 'process';

import { openMoodDatabase } from '../../infra/persistence/index.js';
import type { MoodDatabase } from '../../infra/persistence/index.js';
import { loadCliConfig, reportFatal } from '../lib/runtime.js';

interface ResetOptions {
  db?: string;
  yes?: boolean;
}

async function confirmReset(dbPath: string): Promise<boolean> {
  if (!input.isTTY) {
    return false;
  }

  const rl = createInterface({ input, output });
  try {
    const answer = await rl.question(
      chalk.yellow(`This will permanently delete the stored conversation and mood history in ${dbPath}. Continue? (yes/no): `)
    );
    return answer.trim().toLowerCase() === 'yes';
  } finally {
    rl.close();
  }
}

export const resetCommand = new Command('reset')
  .description('Delete stored conversation and mood history')
  .option('--db <path>', 'Mood database path')
  .option('-y, --yes', 'Skip confirmation prompt')
  .action(async (options: ResetOptions) => {
    const config = loadCliConfig();

    let database: MoodDatabase;
    try {
      database = openMoodDatabase(options.db ?? config.paths.database);
    } catch (error) {
      reportFatal(error);
    }

    try {
      if (!options.yes) {
        const confirmed = await confirmReset(database.path);
        if (!confirmed) {
          console.log(chalk.yellow('Reset cancelled.'));
          if (!input.isTTY) {
            console.log(chalk.gray('Use `haven reset --yes` in non-interactive environments.'));
          }
          process.exitCode = 1;
          return;
        }
      }

      const removed = database.repository.clear();
      console.log(chalk.green('✓ History cleared'));
      console.log(chalk.gray(`  Removed ${removed} stored message(s) from ${database.path}`));
    } catch (error) {
      reportFatal(error);
    } finally {
      database.db.close();
    }
  });
