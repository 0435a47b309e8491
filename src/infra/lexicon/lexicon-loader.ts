/**
 * Lexicon Loader
 * Loads and validates keyword and template tables.
 *
 * Resolution order: explicit path, then `lexicon.json` in the config directory,
 * then the packaged `data/default-lexicon.json`. Any problem is fatal.
 */

import * as fs from 'fs';
import Ajv2020 from 'ajv/dist/2020.js';
import type { ILexicon } from '../../domain/dialogue/lexicon.js';
import { EMOTIONS, STRESSORS } from '../../domain/dialogue/categories.js';
import { ErrorCodes, LexiconConfigError, describeError } from '../../domain/errors.js';
import { getDefaultLexiconPath, getUserLexiconPath } from '../config/config-paths.js';
import { debug } from '../../debug/index.js';
import { LEXICON_SCHEMA } from './lexicon-schema.js';

export interface LoadLexiconOptions {
  /** Explicit lexicon file; skips the config-directory lookup */
  path?: string | null;
  env?: NodeJS.ProcessEnv;
}

function createValidator(): Ajv2020 {
  return new Ajv2020({ allErrors: true, strict: false });
}

/**
 * Cross-field checks the schema cannot express.
 */
function collectSemanticProblems(lexicon: ILexicon): string[] {
  const problems: string[] = [];

  for (const stressor of STRESSORS) {
    const seen = new Set<string>();
    for (const remedy of lexicon.stressors[stressor].remedies) {
      if (seen.has(remedy.topic)) {
        problems.push(`/stressors/${stressor}/remedies: duplicate topic "${remedy.topic}"`);
      }
      seen.add(remedy.topic);
    }
  }

  const crisisKeywords = new Set(lexicon.crisis.keywords.map(normalizeKeyword));
  for (const emotion of EMOTIONS) {
    for (const keyword of lexicon.emotions[emotion].keywords) {
      if (crisisKeywords.has(normalizeKeyword(keyword))) {
        problems.push(`/emotions/${emotion}/keywords: "${keyword}" is also a crisis keyword`);
      }
    }
  }

  return problems;
}

function normalizeKeyword(keyword: string): string {
  return keyword.trim().toLowerCase();
}

function normalizeKeywords(keywords: string[]): string[] {
  return [...new Set(keywords.map(normalizeKeyword))];
}

/**
 * Case-fold and de-duplicate every keyword list so matching can compare
 * against a lower-cased message directly.
 */
function normalizeLexicon(lexicon: ILexicon): ILexicon {
  const emotions = { ...lexicon.emotions };
  for (const emotion of EMOTIONS) {
    emotions[emotion] = { ...emotions[emotion], keywords: normalizeKeywords(emotions[emotion].keywords) };
  }

  const stressors = { ...lexicon.stressors };
  for (const stressor of STRESSORS) {
    stressors[stressor] = { ...stressors[stressor], keywords: normalizeKeywords(stressors[stressor].keywords) };
  }

  return {
    ...lexicon,
    emotions,
    stressors,
    crisis: { ...lexicon.crisis, keywords: normalizeKeywords(lexicon.crisis.keywords) },
  };
}

/**
 * Validate a parsed lexicon document.
 * @param source - Label used in error messages (usually the file path)
 */
export function validateLexicon(raw: unknown, source = 'inline'): ILexicon {
  const ajv = createValidator();
  const validate = ajv.compile<ILexicon>(LEXICON_SCHEMA);

  if (!validate(raw)) {
    const problems = (validate.errors || []).map(
      (err) => `${err.instancePath || '/'}: ${err.message || 'Unknown validation error'}`
    );
    throw new LexiconConfigError(source, problems);
  }

  const problems = collectSemanticProblems(raw);
  if (problems.length > 0) {
    throw new LexiconConfigError(source, problems);
  }

  return normalizeLexicon(raw);
}

export function resolveLexiconPath(options: LoadLexiconOptions = {}): string {
  if (options.path) {
    return options.path;
  }

  const userPath = getUserLexiconPath(options.env);
  if (fs.existsSync(userPath)) {
    return userPath;
  }

  return getDefaultLexiconPath();
}

export function readLexiconFile(filePath: string): ILexicon {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new LexiconConfigError(filePath, [describeError(error)], ErrorCodes.LEXICON_UNREADABLE);
  }

  return validateLexicon(parsed, filePath);
}

export function loadLexicon(options: LoadLexiconOptions = {}): ILexicon {
  const filePath = resolveLexiconPath(options);
  const lexicon = readLexiconFile(filePath);
  debug.lexiconLoaded(filePath, lexicon.version);
  return lexicon;
}
