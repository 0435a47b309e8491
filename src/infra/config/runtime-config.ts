import * as fs from 'fs';
import * as path from 'path';
import { getConfigDir } from './config-paths.js';

export interface HavenRuntimeConfig {
  paths: {
    /** Relative paths live in the config directory */
    database: string;
    /** Explicit lexicon file; null means user override or packaged default */
    lexicon: string | null;
  };
  session: {
    persistAttempts: number;
  };
  mood: {
    historyLimit: number;
  };
  debug: {
    loggingEnabled: boolean;
  };
}

export const DEFAULT_RUNTIME_CONFIG: HavenRuntimeConfig = {
  paths: {
    database: 'haven.db',
    lexicon: null,
  },
  session: {
    persistAttempts: 2,
  },
  mood: {
    historyLimit: 20,
  },
  debug: {
    loggingEnabled: false,
  },
};

export function getRuntimeConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(getConfigDir(env), 'haven.json');
}

function toPositiveInt(value: unknown, fallback: number): number {
  if (typeof value === 'number' && Number.isInteger(value) && value > 0) {
    return value;
  }

  if (typeof value === 'string') {
    const parsed = Number.parseInt(value, 10);
    if (Number.isInteger(parsed) && parsed > 0) {
      return parsed;
    }
  }

  return fallback;
}

function toBoolean(value: unknown, fallback: boolean): boolean {
  if (typeof value === 'boolean') {
    return value;
  }

  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
    if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  }

  return fallback;
}

function toStringValue(value: unknown, fallback: string): string {
  return typeof value === 'string' && value.trim().length > 0 ? value : fallback;
}

function toOptionalString(value: unknown, fallback: string | null): string | null {
  return typeof value === 'string' && value.trim().length > 0 ? value : fallback;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(base: Record<string, unknown>, value: unknown): Record<string, unknown> {
  if (!isRecord(value)) {
    return { ...base };
  }

  const merged: Record<string, unknown> = { ...base };

  for (const key of Object.keys(value)) {
    const baseValue = merged[key];
    const sourceValue = value[key];

    if (isRecord(baseValue) && isRecord(sourceValue)) {
      merged[key] = deepMerge(baseValue, sourceValue);
    } else {
      merged[key] = sourceValue;
    }
  }

  return merged;
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  return isRecord(value) ? value : {};
}

function normalizeConfig(raw: Record<string, unknown>): HavenRuntimeConfig {
  const paths = section(raw, 'paths');
  const session = section(raw, 'session');
  const mood = section(raw, 'mood');
  const debug = section(raw, 'debug');
  const lexicon = toOptionalString(paths.lexicon, DEFAULT_RUNTIME_CONFIG.paths.lexicon);

  return {
    paths: {
      database: toStringValue(paths.database, DEFAULT_RUNTIME_CONFIG.paths.database),
      lexicon: lexicon === null ? null : path.resolve(lexicon),
    },
    session: {
      persistAttempts: toPositiveInt(session.persistAttempts, DEFAULT_RUNTIME_CONFIG.session.persistAttempts),
    },
    mood: {
      historyLimit: toPositiveInt(mood.historyLimit, DEFAULT_RUNTIME_CONFIG.mood.historyLimit),
    },
    debug: {
      loggingEnabled: toBoolean(debug.loggingEnabled, DEFAULT_RUNTIME_CONFIG.debug.loggingEnabled),
    },
  };
}

function applyEnvironment(
  config: HavenRuntimeConfig,
  env: NodeJS.ProcessEnv
): HavenRuntimeConfig {
  const lexicon = toOptionalString(env.HAVEN_LEXICON_PATH, config.paths.lexicon);

  return {
    paths: {
      database: toStringValue(env.HAVEN_DB_PATH, config.paths.database),
      lexicon: lexicon === null ? null : path.resolve(lexicon),
    },
    session: {
      persistAttempts: toPositiveInt(env.HAVEN_PERSIST_ATTEMPTS, config.session.persistAttempts),
    },
    mood: {
      historyLimit: toPositiveInt(env.HAVEN_MOOD_HISTORY_LIMIT, config.mood.historyLimit),
    },
    debug: {
      loggingEnabled: toBoolean(env.HAVEN_DEBUG, config.debug.loggingEnabled),
    },
  };
}

/**
 * Load `haven.json` from the config directory, fill gaps from defaults,
 * then apply `HAVEN_*` environment overrides.
 */
export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): HavenRuntimeConfig {
  const configPath = getRuntimeConfigPath(env);
  const defaults: Record<string, unknown> = { ...DEFAULT_RUNTIME_CONFIG };

  let fileConfig = normalizeConfig(defaults);
  if (fs.existsSync(configPath)) {
    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
      fileConfig = normalizeConfig(deepMerge(defaults, parsed));
    } catch (error) {
      console.warn(
        `[RuntimeConfig] Ignoring unreadable ${configPath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  return applyEnvironment(fileConfig, env);
}
