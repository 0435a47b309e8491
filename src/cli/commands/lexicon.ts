import { Command } from 'commander';
import chalk from 'chalk';

import { readLexiconFile, resolveLexiconPath } from '../../infra/lexicon/index.js';
import { EMOTIONS, STRESSORS } from '../../domain/dialogue/categories.js';
import { loadCliConfig, reportFatal } from '../lib/runtime.js';

interface LexiconCheckOptions {
  lexicon?: string;
}

export const lexiconCommand = new Command('lexicon').description('Inspect keyword and template tables');

lexiconCommand
  .command('check')
  .description('Validate a lexicon file')
  .option('--lexicon <path>', 'Lexicon file to check (defaults to the one chat would load)')
  .action((options: LexiconCheckOptions) => {
    const config = loadCliConfig();
    const filePath = resolveLexiconPath({ path: options.lexicon ?? config.paths.lexicon });

    try {
      const lexicon = readLexiconFile(filePath);
      const emotionKeywords = EMOTIONS.reduce((sum, e) => sum + lexicon.emotions[e].keywords.length, 0);
      const stressorKeywords = STRESSORS.reduce((sum, s) => sum + lexicon.stressors[s].keywords.length, 0);

      console.log(chalk.green(`✓ ${filePath} is valid (version ${lexicon.version})`));
      console.log(chalk.gray(`  Emotion keywords:  ${emotionKeywords}`));
      console.log(chalk.gray(`  Stressor keywords: ${stressorKeywords}`));
      console.log(chalk.gray(`  Crisis keywords:   ${lexicon.crisis.keywords.length}`));
    } catch (error) {
      reportFatal(error);
    }
  });
