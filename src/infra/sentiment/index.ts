export { VaderSentimentScorer } from './vader-sentiment-scorer.js';
