import chalk from 'chalk';
import { debugEmitter } from '../../debug/index.js';
import type { DebugEvent } from '../../debug/index.js';
import { isHavenDebugEnabled } from '../../infra/config/debug-flags.js';
import { loadRuntimeConfig } from '../../infra/config/runtime-config.js';
import type { HavenRuntimeConfig } from '../../infra/config/runtime-config.js';
import { LexiconConfigError, isHavenError } from '../../domain/errors.js';

export function formatDebugEvent(event: DebugEvent): string {
  const time = new Date(event.timestamp).toISOString().slice(11, 23);
  const session = event.sessionId ? chalk.gray(` [${event.sessionId.slice(0, 8)}]`) : '';
  return `${chalk.gray(time)} ${chalk.magenta(event.type)}${session} ${chalk.gray(JSON.stringify(event.data))}`;
}

/**
 * Turn on debug output to stderr when HAVEN_DEBUG or the runtime config asks for it.
 */
export function setupDebugOutput(env: NodeJS.ProcessEnv = process.env): boolean {
  if (!isHavenDebugEnabled(env)) {
    return false;
  }

  debugEmitter.enable();
  debugEmitter.onDebug((event) => {
    process.stderr.write(`${formatDebugEvent(event)}\n`);
  });
  return true;
}

export function loadCliConfig(): HavenRuntimeConfig {
  const config = loadRuntimeConfig();
  setupDebugOutput();
  return config;
}

export function reportFatal(error: unknown): never {
  if (error instanceof LexiconConfigError) {
    console.error(chalk.red(`✗ Invalid lexicon: ${error.source}`));
    for (const problem of error.problems) {
      console.error(chalk.red(`  - ${problem}`));
    }
  } else if (isHavenError(error)) {
    console.error(chalk.red(`✗ ${error.code}: ${error.message}`));
  } else {
    console.error(chalk.red(`✗ ${error instanceof Error ? error.message : String(error)}`));
  }
  process.exit(1);
}
