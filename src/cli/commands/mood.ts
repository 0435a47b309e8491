import { Command } from 'commander';
import chalk from 'chalk';

import { openMoodDatabase } from '../../infra/persistence/index.js';
import { describeMood, summarizeMood } from '../../app/mood/index.js';
import { renderMoodChart } from '../lib/mood-chart.js';
import { parsePositiveInt } from '../lib/options.js';
import { loadCliConfig, reportFatal } from '../lib/runtime.js';

interface MoodOptions {
  limit?: number;
  db?: string;
}

export const moodCommand = new Command('mood')
  .description('Show the stored mood trend')
  .option('-n, --limit <n>', 'Number of most recent entries to show', parsePositiveInt)
  .option('--db <path>', 'Mood database path')
  .action((options: MoodOptions) => {
    const config = loadCliConfig();
    const limit = options.limit ?? config.mood.historyLimit;

    try {
      const { db, repository, path } = openMoodDatabase(options.db ?? config.paths.database);
      try {
        const points = repository.getMoodHistory(limit);
        const summary = summarizeMood(points);
        if (!summary) {
          console.log(chalk.gray('No mood data yet. Start a conversation with `haven chat`.'));
          return;
        }

        console.log(chalk.cyan(`📊 Mood trend (last ${summary.count} of up to ${limit})`));
        console.log(chalk.gray(`  Database: ${path}\n`));
        for (const line of renderMoodChart(points)) {
          console.log(line);
        }
        console.log(`\n${describeMood(summary)}`);
      } finally {
        db.close();
      }
    } catch (error) {
      reportFatal(error);
    }
  });
