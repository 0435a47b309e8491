/**
 * Context Tracker
 * Folds each turn into the session's conversation context
 */

import type { IConversationContext, IContextSummary } from '../../domain/dialogue/context.js';
import type { ISignalSet } from '../../domain/dialogue/signals.js';
import type { IResponse, ITemplateUse } from '../../domain/dialogue/turn.js';
import { EMOTIONS, QUESTION_CATEGORIES, STRESSORS } from '../../domain/dialogue/categories.js';
import type { Stressor } from '../../domain/dialogue/categories.js';

export interface IContextTracker {
  create(): IConversationContext;
  update(context: IConversationContext, signals: ISignalSet): IConversationContext;
  recordSelection(context: IConversationContext, response: IResponse): IConversationContext;
  recordTemplates(context: IConversationContext, uses: readonly ITemplateUse[]): IConversationContext;
  renderSummary(context: IConversationContext): IContextSummary;
}

export class ContextTracker implements IContextTracker {
  create(): IConversationContext {
    return {
      turnCount: 0,
      isFirstInteraction: true,
      topicsDiscussed: new Set(),
      emotionsMentioned: new Set(),
      questionsAsked: new Set(),
      remediesSurfaced: new Map(),
      usedTemplates: new Map(),
      lastTemplates: new Map(),
      lastEmotion: null,
      lastStressor: null,
      lastProvenance: null,
      lastQuestion: null,
    };
  }

  /**
   * Absorb the signals of a new turn. Runs before response selection.
   */
  update(context: IConversationContext, signals: ISignalSet): IConversationContext {
    context.turnCount += 1;
    context.isFirstInteraction = context.turnCount === 1;

    for (const emotion of signals.emotions) {
      context.emotionsMentioned.add(emotion);
    }
    for (const stressor of signals.stressors) {
      context.topicsDiscussed.add(stressor);
    }

    context.lastEmotion = signals.emotions[0] ?? context.lastEmotion;
    context.lastStressor = signals.primaryStressor ?? context.lastStressor;

    return context;
  }

  /**
   * Commit what the selector chose so later turns avoid repeating it.
   */
  recordSelection(context: IConversationContext, response: IResponse): IConversationContext {
    if (response.questionAsked) {
      context.questionsAsked.add(response.questionAsked);
    }

    if (response.stressor && response.remedyTopic) {
      this.remediesFor(context, response.stressor).add(response.remedyTopic);
    }

    this.recordTemplates(context, response.templates);
    context.lastProvenance = response.provenance;
    context.lastQuestion = response.questionAsked ?? null;

    return context;
  }

  recordTemplates(context: IConversationContext, uses: readonly ITemplateUse[]): IConversationContext {
    for (const { group, index } of uses) {
      let used = context.usedTemplates.get(group);
      if (!used) {
        used = new Set();
        context.usedTemplates.set(group, used);
      }
      used.add(index);
      context.lastTemplates.set(group, index);
    }
    return context;
  }

  renderSummary(context: IConversationContext): IContextSummary {
    const remediesSurfaced: IContextSummary['remediesSurfaced'] = {};
    for (const stressor of STRESSORS) {
      const topics = context.remediesSurfaced.get(stressor);
      if (topics && topics.size > 0) {
        remediesSurfaced[stressor] = [...topics];
      }
    }

    const usedTemplates: Record<string, number[]> = {};
    for (const [group, indices] of context.usedTemplates) {
      usedTemplates[group] = [...indices].sort((a, b) => a - b);
    }

    return {
      turnCount: context.turnCount,
      isFirstInteraction: context.isFirstInteraction,
      topicsDiscussed: STRESSORS.filter((s) => context.topicsDiscussed.has(s)),
      emotionsMentioned: EMOTIONS.filter((e) => context.emotionsMentioned.has(e)),
      questionsAsked: QUESTION_CATEGORIES.filter((q) => context.questionsAsked.has(q)),
      unaskedQuestions: QUESTION_CATEGORIES.filter((q) => !context.questionsAsked.has(q)),
      remediesSurfaced,
      usedTemplates,
      lastTemplates: Object.fromEntries(context.lastTemplates),
      lastEmotion: context.lastEmotion,
      lastStressor: context.lastStressor,
      lastProvenance: context.lastProvenance,
      lastQuestion: context.lastQuestion,
    };
  }

  private remediesFor(context: IConversationContext, stressor: Stressor): Set<string> {
    let topics = context.remediesSurfaced.get(stressor);
    if (!topics) {
      topics = new Set();
      context.remediesSurfaced.set(stressor, topics);
    }
    return topics;
  }
}
