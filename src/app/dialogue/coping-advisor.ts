/**
 * Coping Advisor
 * Chooses a coping strategy suited to an emotion
 */

import type { ILexicon } from '../../domain/dialogue/lexicon.js';
import type { IContextSummary } from '../../domain/dialogue/context.js';
import type { ITemplateUse } from '../../domain/dialogue/turn.js';
import { COPING_FAMILIES } from '../../domain/dialogue/categories.js';
import type { CopingFamily, Emotion } from '../../domain/dialogue/categories.js';
import { drawFrom, pickUntried } from './template-picker.js';
import type { IRandomSource } from './template-picker.js';

export interface ICopingSuggestion {
  family: CopingFamily;
  strategy: string;
  template: ITemplateUse;
}

export class CopingAdvisor {
  constructor(
    private lexicon: ILexicon,
    private random: IRandomSource
  ) {}

  familiesFor(emotion: Emotion | null): readonly CopingFamily[] {
    return emotion ? this.lexicon.emotions[emotion].copingFamilies : COPING_FAMILIES;
  }

  suggest(
    emotion: Emotion | null,
    summary: Pick<IContextSummary, 'usedTemplates' | 'lastTemplates'>
  ): ICopingSuggestion {
    const family = drawFrom(this.random, this.familiesFor(emotion));
    const strategies = this.lexicon.copingStrategies[family];
    const group = `coping:${family}`;
    const index = pickUntried(this.random, group, strategies.length, summary);

    return {
      family,
      strategy: strategies[index],
      template: { group, index },
    };
  }

  format(suggestion: ICopingSuggestion): string {
    return `💡 **${suggestion.strategy}**`;
  }
}
