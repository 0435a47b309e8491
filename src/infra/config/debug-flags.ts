import { loadRuntimeConfig } from './runtime-config.js';

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);

function isTruthy(value: string | undefined): boolean {
  return typeof value === 'string' && TRUE_VALUES.has(value.trim().toLowerCase());
}

export function isHavenDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  if (env.HAVEN_DEBUG !== undefined) {
    return isTruthy(env.HAVEN_DEBUG);
  }

  return loadRuntimeConfig(env).debug.loggingEnabled;
}
