export { classifyMood, summarizeMood, moodIndicator, describeMood } from './mood-insights.js';
