import { ConversationSession } from '../../../src/app/dialogue/conversation-session.js';
import type { IMoodRepository, IPersistenceWarning } from '../../../src/app/dialogue/conversation-session.js';
import { createConversationSession } from '../../../src/app/dialogue/session-factory.js';
import { InMemoryMoodRepository } from '../../../src/infra/persistence/in-memory-mood-repository.js';
import type { IMoodRecord } from '../../../src/domain/dialogue/mood.js';
import type { ILexicon } from '../../../src/domain/dialogue/lexicon.js';
import { debugEmitter } from '../../../src/debug/index.js';
import type { DebugEvent } from '../../../src/debug/index.js';
import { defaultLexicon, firstRandom, fixedScorer } from '../../helpers/dialogue.js';

const NOW = Date.UTC(2026, 0, 5, 9, 30);

const crisisKeywords = defaultLexicon().crisis.keywords;

/** Fails the first `failures` writes, then stores normally */
class FlakyRepository extends InMemoryMoodRepository {
  saveCalls = 0;

  constructor(private failures: number) {
    super();
  }

  saveTurn(record: IMoodRecord): number {
    this.saveCalls++;
    if (this.saveCalls <= this.failures) {
      throw new Error('disk full');
    }
    return super.saveTurn(record);
  }
}

describe('ConversationSession', () => {
  let lexicon: ILexicon;
  let repository: InMemoryMoodRepository;
  let session: ConversationSession;

  const scores: Record<string, number> = {
    "I'm stressed about exams": -0.4,
    'The weather is grey today': -0.3,
  };

  function createSession(
    repo: IMoodRepository | null = repository,
    extra: { persistAttempts?: number; onWarning?: (warning: IPersistenceWarning) => void } = {}
  ): ConversationSession {
    return createConversationSession(lexicon, {
      sentimentScorer: fixedScorer(scores),
      random: firstRandom,
      repository: repo,
      now: () => NOW,
      ...extra,
    });
  }

  beforeAll(() => {
    lexicon = defaultLexicon();
  });

  beforeEach(() => {
    repository = new InMemoryMoodRepository();
    session = createSession();
  });

  describe('scenarios', () => {
    it('greets on the first turn', () => {
      const result = session.handleMessage('Hello');

      expect(result.provenance).toBe('greeting');
      expect(result.response).toBe(lexicon.greetings[0]);
      expect(result.turn.index).toBe(1);
    });

    it('answers exam stress with an exam remedy', () => {
      const result = session.handleMessage("I'm stressed about exams");

      expect(result.turn.signals.primaryStressor).toBe('exam_anxiety');
      expect(result.provenance).toBe('stressor_specific');
      expect(result.response).toContain(lexicon.stressors.exam_anxiety.remedies[0].text);
      expect(result.sentiment).toBe(-0.4);
    });

    it('returns the crisis response', () => {
      const result = session.handleMessage('I want to kill myself');

      expect(result.turn.signals.crisis).toBe(true);
      expect(result.provenance).toBe('crisis');
      expect(result.response).toBe(lexicon.crisis.response);
    });

    it.each(crisisKeywords)('answers "%s" with the crisis response mid-conversation', (keyword) => {
      session.handleMessage('Hello');
      session.handleMessage('I feel anxious');

      const result = session.handleMessage(`I feel so stressed about my exam and ${keyword}`);

      expect(result.turn.signals.crisis).toBe(true);
      expect(result.turn.signals.emotions).toContain('stress');
      expect(result.turn.signals.primaryStressor).toBe('exam_anxiety');
      expect(result.provenance).toBe('crisis');
      expect(result.response).toBe(lexicon.crisis.response);
    });

    it('varies consecutive answers to the same emotion', () => {
      const first = session.handleMessage('I feel anxious');
      const second = session.handleMessage('I feel anxious');

      expect(first.provenance).toBe('emotion_specific');
      expect(second.provenance).toBe('emotion_specific');
      expect(second.response).not.toBe(first.response);
    });

    it('starts over after clearing history', () => {
      session.handleMessage('Hello');
      session.handleMessage('I feel anxious');

      const cleared = session.clearHistory();
      const result = session.handleMessage('Hello');

      expect(cleared.turnsDiscarded).toBe(2);
      expect(result.provenance).toBe('greeting');
      expect(result.turn.index).toBe(1);
      expect(session.getHistory()).toHaveLength(1);
    });
  });

  describe('handleMessage', () => {
    it('treats empty input as general support after the first turn', () => {
      session.handleMessage('Hello');
      const result = session.handleMessage('');

      expect(result.provenance).toBe('general_support');
      expect(result.turn.message.text).toBe('');
    });

    it('appends turns in order with the context used to produce them', () => {
      session.handleMessage('Hello');
      session.handleMessage("I'm stressed about exams");

      const history = session.getHistory();
      expect(history.map((turn) => turn.index)).toEqual([1, 2]);
      expect(history[0].context.isFirstInteraction).toBe(true);
      expect(history[1].context.turnCount).toBe(2);
      expect(history[1].context.topicsDiscussed).toEqual(['exam_anxiety']);
      expect(history[1].message).toEqual({ text: "I'm stressed about exams", timestamp: NOW, sender: 'user' });
    });

    it('offers coping for the emotions that call for it', () => {
      expect(session.handleMessage("I'm stressed about exams").offerCoping).toBe(true);
    });

    it('offers coping for clearly negative messages', () => {
      session.handleMessage('Hello');
      expect(session.handleMessage('The weather is grey today').offerCoping).toBe(true);
    });

    it('does not offer coping for neutral messages', () => {
      expect(session.handleMessage('Hello').offerCoping).toBe(false);
    });

    it('keeps independent sessions apart', () => {
      const other = createSession(null);
      session.handleMessage('Hello');

      expect(other.handleMessage('Hello').provenance).toBe('greeting');
      expect(session.handleMessage('Hello').provenance).toBe('general_support');
    });
  });

  describe('persistence', () => {
    it('stores every turn', () => {
      const result = session.handleMessage("I'm stressed about exams");
      const [record] = repository.list();

      expect(result.persisted).toBe(true);
      expect(result.warning).toBeUndefined();
      expect(record.timestamp).toBe('2026-01-05T09:30:00.000Z');
      expect(record.userMessage).toBe("I'm stressed about exams");
      expect(record.botResponse).toBe(result.response);
      expect(record.sentiment).toBe(-0.4);
      expect(JSON.parse(record.context)).toMatchObject({
        provenance: 'stressor_specific',
        emotions: ['stress'],
        stressor: 'exam_anxiety',
        crisis: false,
      });
    });

    it('retries a failed write', () => {
      const flaky = new FlakyRepository(1);
      session = createSession(flaky);

      const result = session.handleMessage('Hello');

      expect(result.persisted).toBe(true);
      expect(flaky.saveCalls).toBe(2);
      expect(flaky.list()).toHaveLength(1);
    });

    describe('when storage keeps failing', () => {
      let warnSpy: jest.SpyInstance;

      beforeEach(() => {
        warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
      });

      afterEach(() => {
        warnSpy.mockRestore();
      });

      it('still responds and reports a warning', () => {
        const flaky = new FlakyRepository(Number.POSITIVE_INFINITY);
        const onWarning = jest.fn();
        session = createSession(flaky, { onWarning });

        const result = session.handleMessage('Hello');

        expect(result.response).toBe(lexicon.greetings[0]);
        expect(result.persisted).toBe(false);
        expect(result.warning).toEqual({ turnIndex: 1, attempts: 2, message: 'disk full' });
        expect(onWarning).toHaveBeenCalledWith({ turnIndex: 1, attempts: 2, message: 'disk full' });
        expect(flaky.saveCalls).toBe(2);
        expect(warnSpy).toHaveBeenCalledWith(
          '[ConversationSession] Turn 1 was not stored after 2 attempt(s): disk full'
        );
        expect(session.getHistory()).toHaveLength(1);
      });

      it('honours the configured attempt count', () => {
        const flaky = new FlakyRepository(Number.POSITIVE_INFINITY);
        session = createSession(flaky, { persistAttempts: 3 });

        expect(session.handleMessage('Hello').warning?.attempts).toBe(3);
        expect(flaky.saveCalls).toBe(3);
      });

      it('reports a failed clear without throwing', () => {
        const broken = new InMemoryMoodRepository();
        jest.spyOn(broken, 'clear').mockImplementation(() => {
          throw new Error('database is locked');
        });
        session = createSession(broken);
        session.handleMessage('Hello');

        const result = session.clearHistory({ clearPersisted: true });

        expect(result).toEqual({
          turnsDiscarded: 1,
          persistedRowsCleared: 0,
          warning: 'Could not clear stored history: database is locked',
        });
      });
    });

    it('runs without a repository', () => {
      session = createSession(null);
      const result = session.handleMessage('Hello');

      expect(result.persisted).toBe(false);
      expect(result.warning).toBeUndefined();
    });

    it('clears stored rows only when asked', () => {
      session.handleMessage('Hello');
      session.handleMessage('I feel anxious');

      expect(session.clearHistory().persistedRowsCleared).toBe(0);
      expect(repository.list()).toHaveLength(2);

      session.handleMessage('Hello');
      expect(session.clearHistory({ clearPersisted: true }).persistedRowsCleared).toBe(3);
      expect(repository.list()).toHaveLength(0);
    });
  });

  describe('suggestCopingStrategy', () => {
    it('suggests a strategy for the latest emotion without repeating one', () => {
      session.handleMessage('I feel sad');
      const suggestion = session.suggestCopingStrategy();

      expect(suggestion).toEqual({
        text: `💡 **Coping Strategy:** ${lexicon.copingStrategies.self_care[1]}`,
        family: 'self_care',
        emotion: 'sadness',
      });
      expect(session.getHistory()).toHaveLength(1);
    });

    it('draws from every family before any emotion was seen', () => {
      const suggestion = session.suggestCopingStrategy();

      expect(suggestion.family).toBe('breathing');
      expect(suggestion.emotion).toBeNull();
      expect(suggestion.text).toBe(`💡 **Coping Strategy:** ${lexicon.copingStrategies.breathing[0]}`);
    });
  });

  describe('debug events', () => {
    const events: DebugEvent[] = [];
    const collect = (event: DebugEvent) => events.push(event);

    beforeEach(() => {
      events.length = 0;
      debugEmitter.enable();
      debugEmitter.onDebug(collect);
    });

    afterEach(() => {
      debugEmitter.offDebug(collect);
      debugEmitter.disable();
      debugEmitter.clearContext();
    });

    it('emits a crisis event alongside the turn event', () => {
      session.handleMessage('I want to kill myself');

      expect(events.map((event) => event.type)).toEqual(['turn.processed', 'turn.crisis']);
      expect(events[0].sessionId).toBe(session.id);
      expect(events[0].data).toMatchObject({ index: 1, provenance: 'crisis' });
      expect(events[1].data).toEqual({ turnIndex: 1 });
    });
  });
});
