import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import {
  loadLexicon,
  readLexiconFile,
  resolveLexiconPath,
  validateLexicon,
} from '../../../src/infra/lexicon/lexicon-loader.js';
import { getDefaultLexiconPath } from '../../../src/infra/config/config-paths.js';
import { ErrorCodes, LexiconConfigError } from '../../../src/domain/errors.js';
import type { ILexicon } from '../../../src/domain/dialogue/lexicon.js';
import { debugEmitter } from '../../../src/debug/index.js';
import type { DebugEvent } from '../../../src/debug/index.js';

function readDefault(): Record<string, unknown> {
  return JSON.parse(fs.readFileSync(getDefaultLexiconPath(), 'utf-8'));
}

function expectProblems(raw: unknown, expected: string[]): void {
  let caught: unknown;
  try {
    validateLexicon(raw, 'test-lexicon');
  } catch (error) {
    caught = error;
  }

  expect(caught).toBeInstanceOf(LexiconConfigError);
  if (caught instanceof LexiconConfigError) {
    expect(caught.code).toBe(ErrorCodes.LEXICON_INVALID);
    expect(caught.source).toBe('test-lexicon');
    expect(caught.problems).toEqual(expected);
  }
}

describe('lexicon-loader', () => {
  let defaults: ILexicon;

  beforeAll(() => {
    defaults = validateLexicon(readDefault(), 'default');
  });

  it('accepts the packaged lexicon', () => {
    expect(defaults.version).toBe('1.0.0');
    expect(defaults.emotions.anxiety.keywords).toContain('anxious');
    expect(defaults.stressors.exam_anxiety.remedies.map((remedy) => remedy.topic)).toEqual([
      'study_strategy',
      'before_exam',
      'reframe_thoughts',
      'during_exam',
    ]);
  });

  it('case-folds, trims and de-duplicates keywords', () => {
    const lexicon = structuredClone(defaults);
    lexicon.emotions.anger.keywords = ['  FURIOUS', 'furious', 'Livid'];
    lexicon.crisis.keywords = ['End My Life'];

    const validated = validateLexicon(lexicon);

    expect(validated.emotions.anger.keywords).toEqual(['furious', 'livid']);
    expect(validated.crisis.keywords).toEqual(['end my life']);
  });

  it('reports a missing category', () => {
    const raw = readDefault();
    const emotions = raw.emotions;
    if (typeof emotions === 'object' && emotions !== null) {
      Reflect.deleteProperty(emotions, 'loneliness');
    }

    expectProblems(raw, ["/emotions: must have required property 'loneliness'"]);
  });

  it('requires a closing prompt for every questioning band', () => {
    const lexicon = structuredClone(defaults);
    Reflect.deleteProperty(lexicon.generalSupport.exhaustedPrompts, 'neutral');

    expectProblems(lexicon, ["/generalSupport/exhaustedPrompts: must have required property 'neutral'"]);
  });

  it('reports an unknown category', () => {
    const lexicon: Record<string, unknown> = structuredClone({ ...defaults });
    lexicon.stressors = { ...defaults.stressors, money_stress: defaults.stressors.work_stress };

    expectProblems(lexicon, ['/stressors: must NOT have additional properties']);
  });

  it('reports empty keyword lists and blank templates together', () => {
    const lexicon = structuredClone(defaults);
    lexicon.emotions.stress.keywords = [];
    lexicon.greetings = ['   '];

    expectProblems(lexicon, [
      '/emotions/stress/keywords: must NOT have fewer than 1 items',
      '/greetings/0: must match pattern "\\S"',
    ]);
  });

  it('reports duplicate remedy topics', () => {
    const lexicon = structuredClone(defaults);
    lexicon.stressors.family_stress.remedies[1].topic = 'safe_spaces';

    expectProblems(lexicon, ['/stressors/family_stress/remedies: duplicate topic "safe_spaces"']);
  });

  it('reports emotion keywords that are also crisis keywords', () => {
    const lexicon = structuredClone(defaults);
    lexicon.emotions.sadness.keywords = [...lexicon.emotions.sadness.keywords, 'Hopeless'];

    expectProblems(lexicon, ['/emotions/sadness/keywords: "Hopeless" is also a crisis keyword']);
  });

  describe('files', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'haven-lexicon-'));
    });

    it('marks unparseable files as unreadable', () => {
      const file = path.join(dir, 'broken.json');
      fs.writeFileSync(file, '{ not json');

      expect(() => readLexiconFile(file)).toThrow(LexiconConfigError);
      try {
        readLexiconFile(file);
      } catch (error) {
        expect(error instanceof LexiconConfigError && error.code).toBe(ErrorCodes.LEXICON_UNREADABLE);
      }
    });

    it('prefers an explicit path', () => {
      expect(resolveLexiconPath({ path: '/tmp/custom.json', env: { HAVEN_CONFIG_DIR: dir } })).toBe(
        '/tmp/custom.json'
      );
    });

    it('uses lexicon.json from the config directory when present', () => {
      const userPath = path.join(dir, 'lexicon.json');
      expect(resolveLexiconPath({ env: { HAVEN_CONFIG_DIR: dir } })).toBe(getDefaultLexiconPath());

      fs.writeFileSync(userPath, JSON.stringify(defaults));
      expect(resolveLexiconPath({ env: { HAVEN_CONFIG_DIR: dir } })).toBe(userPath);
    });

    it('announces the loaded lexicon on the debug channel', () => {
      const events: DebugEvent[] = [];
      const collect = (event: DebugEvent) => {
        events.push(event);
      };
      debugEmitter.enable();
      debugEmitter.onDebug(collect);

      try {
        loadLexicon({ env: { HAVEN_CONFIG_DIR: dir } });
      } finally {
        debugEmitter.offDebug(collect);
        debugEmitter.disable();
      }

      expect(events).toHaveLength(1);
      expect(events[0].type).toBe('lexicon.loaded');
      expect(events[0].data).toEqual({ source: getDefaultLexiconPath(), version: '1.0.0' });
    });
  });
});
