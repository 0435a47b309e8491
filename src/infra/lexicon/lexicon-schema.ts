/**
 * Lexicon JSON Schema
 * Required keys are derived from the closed category vocabularies
 */

import {
  COPING_FAMILIES,
  EMOTIONS,
  QUESTION_CATEGORIES,
  QUESTIONING_BANDS,
  SENTIMENT_BANDS,
  STRESSORS,
} from '../../domain/dialogue/categories.js';

const nonBlankString = { type: 'string', pattern: '\\S' };

const stringList = { type: 'array', items: nonBlankString, minItems: 1 };

function closedRecord(keys: readonly string[], valueSchema: object): object {
  return {
    type: 'object',
    properties: Object.fromEntries(keys.map((key) => [key, valueSchema])),
    required: [...keys],
    additionalProperties: false,
  };
}

export const LEXICON_SCHEMA = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  $id: 'https://haven.local/schemas/lexicon.schema.json',
  title: 'Haven Lexicon',
  description: 'Keyword tables and response templates for the dialogue engine',
  type: 'object',
  properties: {
    $schema: { type: 'string' },
    version: nonBlankString,
    emotions: closedRecord(EMOTIONS, { $ref: '#/$defs/EmotionEntry' }),
    stressors: closedRecord(STRESSORS, { $ref: '#/$defs/StressorEntry' }),
    crisis: {
      type: 'object',
      properties: {
        keywords: stringList,
        response: nonBlankString,
      },
      required: ['keywords', 'response'],
      additionalProperties: false,
    },
    greetings: stringList,
    generalSupport: {
      type: 'object',
      properties: {
        openers: closedRecord(SENTIMENT_BANDS, stringList),
        acknowledgments: stringList,
        positivePrompt: nonBlankString,
        exhaustedPrompts: closedRecord(QUESTIONING_BANDS, {
          type: 'object',
          properties: {
            text: nonBlankString,
            withOpener: { type: 'boolean' },
          },
          required: ['text', 'withOpener'],
          additionalProperties: false,
        }),
      },
      required: ['openers', 'acknowledgments', 'positivePrompt', 'exhaustedPrompts'],
      additionalProperties: false,
    },
    followUpQuestions: closedRecord(QUESTION_CATEGORIES, nonBlankString),
    copingStrategies: closedRecord(COPING_FAMILIES, stringList),
    copingIntro: nonBlankString,
    resources: nonBlankString,
  },
  required: [
    'version',
    'emotions',
    'stressors',
    'crisis',
    'greetings',
    'generalSupport',
    'followUpQuestions',
    'copingStrategies',
    'copingIntro',
    'resources',
  ],
  additionalProperties: false,
  $defs: {
    EmotionEntry: {
      type: 'object',
      properties: {
        keywords: stringList,
        empathy: stringList,
        copingFamilies: {
          type: 'array',
          items: { type: 'string', enum: [...COPING_FAMILIES] },
          minItems: 1,
          uniqueItems: true,
        },
      },
      required: ['keywords', 'empathy', 'copingFamilies'],
      additionalProperties: false,
    },
    StressorEntry: {
      type: 'object',
      properties: {
        keywords: stringList,
        intro: nonBlankString,
        remedies: {
          type: 'array',
          items: {
            type: 'object',
            properties: {
              topic: nonBlankString,
              text: nonBlankString,
            },
            required: ['topic', 'text'],
            additionalProperties: false,
          },
          minItems: 1,
        },
        followUp: nonBlankString,
        exhaustedPrompt: nonBlankString,
      },
      required: ['keywords', 'intro', 'remedies', 'followUp', 'exhaustedPrompt'],
      additionalProperties: false,
    },
  },
};
