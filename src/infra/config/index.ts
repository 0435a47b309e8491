/**
 * Configuration module exports
 */
export {
  getConfigDir,
  getDataDir,
  getDefaultLexiconPath,
  getUserLexiconPath,
} from './config-paths.js';

export {
  type HavenRuntimeConfig,
  DEFAULT_RUNTIME_CONFIG,
  getRuntimeConfigPath,
  loadRuntimeConfig,
} from './runtime-config.js';

export { isHavenDebugEnabled } from './debug-flags.js';
