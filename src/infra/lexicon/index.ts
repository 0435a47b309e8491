export { LEXICON_SCHEMA } from './lexicon-schema.js';
export {
  type LoadLexiconOptions,
  validateLexicon,
  resolveLexiconPath,
  readLexiconFile,
  loadLexicon,
} from './lexicon-loader.js';
