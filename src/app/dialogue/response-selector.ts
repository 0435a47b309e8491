/**
 * Response Selector
 * Priority state machine: crisis > stressor > emotion > greeting / general support.
 * Which state fires is deterministic; only the template draw is random.
 */

import type { ILexicon } from '../../domain/dialogue/lexicon.js';
import type { ISignalSet } from '../../domain/dialogue/signals.js';
import type { IContextSummary } from '../../domain/dialogue/context.js';
import type { IResponse, ITemplateUse } from '../../domain/dialogue/turn.js';
import type { Emotion, SentimentBand, Stressor } from '../../domain/dialogue/categories.js';
import { CopingAdvisor } from './coping-advisor.js';
import { drawFrom, mathRandomSource, pickUntried } from './template-picker.js';
import type { IRandomSource } from './template-picker.js';

export type SelectorState =
  | { kind: 'crisis' }
  | { kind: 'stressor_specific'; stressor: Stressor }
  | { kind: 'emotion_specific'; emotion: Emotion }
  | { kind: 'greeting' }
  | { kind: 'general_support'; band: SentimentBand };

export interface IResponseSelector {
  determineState(signals: ISignalSet, summary: IContextSummary): SelectorState;
  select(signals: ISignalSet, summary: IContextSummary): IResponse;
}

export function classifySentimentBand(sentiment: number): SentimentBand {
  if (sentiment < -0.5) return 'very_negative';
  if (sentiment < -0.1) return 'negative';
  if (sentiment > 0.3) return 'positive';
  return 'neutral';
}

export class ResponseSelector implements IResponseSelector {
  private copingAdvisor: CopingAdvisor;

  constructor(
    private lexicon: ILexicon,
    private random: IRandomSource = mathRandomSource
  ) {
    this.copingAdvisor = new CopingAdvisor(lexicon, random);
  }

  /**
   * First matching state wins; nothing falls through once a state fires.
   */
  determineState(signals: ISignalSet, summary: IContextSummary): SelectorState {
    if (signals.crisis) {
      return { kind: 'crisis' };
    }

    if (signals.primaryStressor) {
      return { kind: 'stressor_specific', stressor: signals.primaryStressor };
    }

    // emotions arrive in enumeration order, so the first one is the tie-break winner
    const emotion = signals.emotions[0];
    if (emotion) {
      return { kind: 'emotion_specific', emotion };
    }

    if (summary.isFirstInteraction) {
      return { kind: 'greeting' };
    }

    return { kind: 'general_support', band: classifySentimentBand(signals.sentiment) };
  }

  select(signals: ISignalSet, summary: IContextSummary): IResponse {
    const state = this.determineState(signals, summary);

    switch (state.kind) {
      case 'crisis':
        return this.crisisResponse();
      case 'stressor_specific':
        return this.stressorResponse(state.stressor, summary);
      case 'emotion_specific':
        return this.emotionResponse(state.emotion, summary);
      case 'greeting':
        return this.greetingResponse(summary);
      case 'general_support':
        return this.generalSupportResponse(state.band, summary);
      default: {
        const unhandled: never = state;
        throw new Error(`Unhandled selector state: ${JSON.stringify(unhandled)}`);
      }
    }
  }

  private crisisResponse(): IResponse {
    return {
      text: this.lexicon.crisis.response,
      provenance: 'crisis',
      templates: [],
    };
  }

  private stressorResponse(stressor: Stressor, summary: IContextSummary): IResponse {
    const entry = this.lexicon.stressors[stressor];
    const surfaced = new Set(summary.remediesSurfaced[stressor] ?? []);
    const available = entry.remedies
      .map((remedy, index) => ({ remedy, index }))
      .filter(({ remedy }) => !surfaced.has(remedy.topic));

    if (available.length === 0) {
      return {
        text: entry.exhaustedPrompt,
        provenance: 'stressor_specific',
        stressor,
        remediesExhausted: true,
        templates: [],
      };
    }

    const { remedy, index } = drawFrom(this.random, available);
    return {
      text: `${entry.intro}\n\n${remedy.text}\n\n${entry.followUp}`,
      provenance: 'stressor_specific',
      stressor,
      remedyTopic: remedy.topic,
      remediesExhausted: false,
      templates: [{ group: `remedy:${stressor}`, index }],
    };
  }

  private emotionResponse(emotion: Emotion, summary: IContextSummary): IResponse {
    const entry = this.lexicon.emotions[emotion];
    const group = `emotion:${emotion}`;
    const index = pickUntried(this.random, group, entry.empathy.length, summary);
    const coping = this.copingAdvisor.suggest(emotion, summary);

    return {
      text: `${entry.empathy[index]}\n\n${this.lexicon.copingIntro}\n\n${this.copingAdvisor.format(coping)}`,
      provenance: 'emotion_specific',
      emotion,
      templates: [{ group, index }, coping.template],
    };
  }

  private greetingResponse(summary: IContextSummary): IResponse {
    const group = 'greeting';
    const index = pickUntried(this.random, group, this.lexicon.greetings.length, summary);

    return {
      text: this.lexicon.greetings[index],
      provenance: 'greeting',
      templates: [{ group, index }],
    };
  }

  private generalSupportResponse(band: SentimentBand, summary: IContextSummary): IResponse {
    const general = this.lexicon.generalSupport;

    if (band === 'positive') {
      const { opener, templates } = this.pickOpener(band, summary);
      return {
        text: `${opener} ${general.positivePrompt}`,
        provenance: 'general_support',
        templates,
      };
    }

    if (summary.unaskedQuestions.length === 0) {
      const prompt = general.exhaustedPrompts[band];
      if (!prompt.withOpener) {
        return { text: prompt.text, provenance: 'general_support', templates: [] };
      }

      const { opener, templates } = this.pickOpener(band, summary);
      return {
        text: `${opener} ${prompt.text}`,
        provenance: 'general_support',
        templates,
      };
    }

    const { opener, templates } = this.pickOpener(band, summary);
    const question = drawFrom(this.random, summary.unaskedQuestions);
    return {
      text: `${opener} ${this.lexicon.followUpQuestions[question]}`,
      provenance: 'general_support',
      questionAsked: question,
      templates,
    };
  }

  private pickOpener(band: SentimentBand, summary: IContextSummary): { opener: string; templates: ITemplateUse[] } {
    const general = this.lexicon.generalSupport;

    // acknowledge the answer to the previous follow-up question
    const group = summary.lastQuestion ? 'acknowledgment' : `opener:${band}`;
    const openers = summary.lastQuestion ? general.acknowledgments : general.openers[band];
    const index = pickUntried(this.random, group, openers.length, summary);

    return { opener: openers[index], templates: [{ group, index }] };
  }
}
