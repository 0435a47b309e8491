import { Command } from 'commander';
import chalk from 'chalk';
import inquirer from 'inquirer';
import ora from 'ora';

import { loadLexicon } from '../../infra/lexicon/index.js';
import { InMemoryMoodRepository, openMoodDatabase } from '../../infra/persistence/index.js';
import type { MoodDatabase } from '../../infra/persistence/index.js';
import { VaderSentimentScorer } from '../../infra/sentiment/index.js';
import { createConversationSession } from '../../app/dialogue/index.js';
import type { ConversationSession, IMoodRepository } from '../../app/dialogue/index.js';
import type { ILexicon } from '../../domain/dialogue/lexicon.js';
import { describeMood, summarizeMood } from '../../app/mood/index.js';
import { debug } from '../../debug/index.js';
import { parseChatInput } from '../lib/chat-input.js';
import type { ChatCommand } from '../lib/chat-input.js';
import { renderHistory } from '../lib/history.js';
import { renderMoodChart } from '../lib/mood-chart.js';
import { loadCliConfig, reportFatal } from '../lib/runtime.js';

interface ChatOptions {
  persist: boolean;
  db?: string;
  lexicon?: string;
}

const HELP_TEXT = [
  '/coping     Get a coping strategy',
  '/mood       Show your mood trend',
  '/resources  Crisis lines and self-care reminders',
  '/history    Show the last few exchanges',
  '/clear      Start the conversation over (/clear --all also deletes stored history)',
  '/help       Show this list',
  '/quit       Leave',
].join('\n');

const HISTORY_EXCHANGES = 5;

function printMoodTrend(repository: IMoodRepository, limit: number): void {
  const points = repository.getMoodHistory(limit);
  const summary = summarizeMood(points);
  if (!summary) {
    console.log(chalk.gray('No mood data yet. Keep chatting to see your trend.\n'));
    return;
  }

  console.log(chalk.cyan('\n📊 Mood trend'));
  for (const line of renderMoodChart(points)) {
    console.log(line);
  }
  console.log(`\n${describeMood(summary)}\n`);
}

function printHistory(repository: IMoodRepository): void {
  const lines = renderHistory(repository.getRecentExchanges(HISTORY_EXCHANGES));
  if (lines.length === 0) {
    console.log(chalk.gray('No stored messages yet.\n'));
    return;
  }

  console.log(chalk.cyan('\n🕘 Recent messages'));
  for (const line of lines) {
    console.log(line);
  }
  console.log();
}

/**
 * Run a slash command. Returns false when the chat should end.
 */
function handleCommand(
  command: ChatCommand,
  flags: readonly string[],
  session: ConversationSession,
  lexicon: ILexicon,
  repository: IMoodRepository,
  historyLimit: number
): boolean {
  debug.custom('chat.command', 'cli-chat', { command, flags: [...flags] });

  switch (command) {
    case 'quit':
    case 'exit':
      return false;
    case 'help':
      console.log(chalk.gray(`${HELP_TEXT}\n`));
      return true;
    case 'coping': {
      const { text } = session.suggestCopingStrategy();
      console.log(`\n${chalk.blue('Haven:')} ${text}\n`);
      return true;
    }
    case 'mood':
      printMoodTrend(repository, historyLimit);
      return true;
    case 'history':
      printHistory(repository);
      return true;
    case 'resources':
      console.log(`\n${lexicon.resources}\n`);
      return true;
    case 'clear': {
      const result = session.clearHistory({ clearPersisted: flags.includes('--all') });
      console.log(chalk.green(`✓ Conversation cleared (${result.turnsDiscarded} turn(s))`));
      if (result.persistedRowsCleared > 0) {
        console.log(chalk.gray(`  Removed ${result.persistedRowsCleared} stored message(s)`));
      }
      if (result.warning) {
        console.log(chalk.yellow(`  ${result.warning}`));
      }
      console.log();
      return true;
    }
  }
}

export async function chatCommand(options: ChatOptions): Promise<void> {
  const config = loadCliConfig();

  const spinner = ora('Loading lexicon...').start();
  let lexicon: ILexicon;
  let database: MoodDatabase | null = null;
  try {
    lexicon = loadLexicon({ path: options.lexicon ?? config.paths.lexicon });
    if (options.persist) {
      spinner.text = 'Opening mood history...';
      database = openMoodDatabase(options.db ?? config.paths.database);
    }
    spinner.succeed(database ? `Ready (history: ${database.path})` : 'Ready (history is not stored)');
  } catch (error) {
    spinner.fail('Startup failed');
    reportFatal(error);
  }

  const repository: IMoodRepository = database ? database.repository : new InMemoryMoodRepository();
  const session = createConversationSession(lexicon, {
    sentimentScorer: new VaderSentimentScorer(),
    repository,
    persistAttempts: config.session.persistAttempts,
  });

  console.log(chalk.cyan('\n🌿 Haven'));
  console.log(chalk.gray('A safe space to talk. Type /help for commands, /quit to leave.'));
  console.log(chalk.gray('Not a substitute for professional help. In a crisis, call or text 988.\n'));

  try {
    while (true) {
      const { userMessage } = await inquirer.prompt<{ userMessage: string }>([
        {
          type: 'input',
          name: 'userMessage',
          message: chalk.green('You:'),
          prefix: '',
        },
      ]);

      const input = parseChatInput(userMessage);
      if (input.kind === 'empty') {
        continue;
      }
      if (input.kind === 'command') {
        if (!handleCommand(input.command, input.flags, session, lexicon, repository, config.mood.historyLimit)) {
          break;
        }
        continue;
      }

      const result = session.handleMessage(input.text);
      const label = result.provenance === 'crisis' ? chalk.red.bold('Haven:') : chalk.blue('Haven:');
      console.log(`\n${label} ${result.response}\n`);

      if (result.offerCoping && result.provenance !== 'emotion_specific' && result.provenance !== 'crisis') {
        console.log(chalk.gray('Type /coping for a coping strategy.\n'));
      }
    }
  } finally {
    debug.clearContext();
    database?.db.close();
  }

  console.log(chalk.cyan('\n👋 Take care of yourself.\n'));
}

export const chatCommandDefinition = new Command('chat')
  .description('Start a support conversation')
  .option('--no-persist', 'Do not store turns or mood history')
  .option('--db <path>', 'Mood database path')
  .option('--lexicon <path>', 'Lexicon file to use')
  .action(async (options: ChatOptions) => {
    await chatCommand(options);
  });
