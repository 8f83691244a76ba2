/**
 * Configuration module exports
 *
 * Centralized export point for all configuration-related components
 */

export {
  DEFAULT_CONFIG,
  CONFIG_TYPES,
  LOG_LEVEL_NAMES,
  getConfigType,
  isConfigKey,
  validateConfigValue,
} from './defaults.js';
export { TOOLCAST_HOME, getConfigFile } from './paths.js';
export { BUFFER_SIZES, MODEL_FORMAT, EXEC_EVENTS, ID_GENERATION, TURN_DIFF } from './constants.js';
