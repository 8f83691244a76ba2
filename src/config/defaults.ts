/**
 * Default configuration values for toolcast
 *
 * This file defines all default settings with their types and default values.
 * Configuration can be overridden via config file or runtime modifications.
 */

import type { Config, ConfigKey, ConfigValue, LogLevelName } from '../types/index.js';
import { formatError } from '../utils/errorUtils.js';
import { MODEL_FORMAT } from './constants.js';

export const LOG_LEVEL_NAMES: readonly LogLevelName[] = ['error', 'warn', 'info', 'verbose', 'debug'];

/**
 * Default configuration object
 */
export const DEFAULT_CONFIG: Config = {
  // ==========================================
  // LOGGING
  // ==========================================
  log_level: 'info',

  // ==========================================
  // MODEL OUTPUT FORMATTING
  // ==========================================
  model_output_max_bytes: MODEL_FORMAT.MAX_BYTES, // Byte budget for output shown to the model
  model_output_max_lines: MODEL_FORMAT.MAX_LINES, // Line budget for output shown to the model

  // ==========================================
  // TURN DIFF
  // ==========================================
  diff_context_lines: 3, // Context lines around changes in turn diffs
  emit_turn_diff: true, // Send a turn diff event after each patch

  // ==========================================
  // REJECTIONS
  // ==========================================
  // Rejection texts rewritten before they reach the model and the UI
  rejection_messages: {
    'rejected by user': 'exec command rejected by user',
  },
};

type ConfigValueType = 'level' | 'number' | 'boolean' | 'mapping';

/**
 * Type validation mapping for configuration keys
 */
export const CONFIG_TYPES: Record<ConfigKey, ConfigValueType> = {
  log_level: 'level',
  model_output_max_bytes: 'number',
  model_output_max_lines: 'number',
  diff_context_lines: 'number',
  emit_turn_diff: 'boolean',
  rejection_messages: 'mapping',
};

/**
 * Get the expected type for a configuration key
 */
export function getConfigType(key: ConfigKey): ConfigValueType {
  return CONFIG_TYPES[key];
}

export function isConfigKey(key: string): key is ConfigKey {
  return Object.prototype.hasOwnProperty.call(CONFIG_TYPES, key);
}

function isLogLevelName(value: string): value is LogLevelName {
  return LOG_LEVEL_NAMES.some(level => level === value);
}

export interface ConfigValidation {
  valid: boolean;
  coercedValue?: ConfigValue;
  error?: string;
}

/**
 * Validate and coerce a configuration value
 *
 * @param key - Configuration key
 * @param value - Raw value (from file or runtime)
 * @returns Validation result with coerced value when valid
 */
export function validateConfigValue(key: ConfigKey, value: unknown): ConfigValidation {
  const expectedType = getConfigType(key);

  try {
    switch (expectedType) {
      case 'level':
        if (typeof value === 'string') {
          const lower = value.toLowerCase();
          if (isLogLevelName(lower)) {
            return { valid: true, coercedValue: lower };
          }
        }
        return { valid: false, error: `${key} must be one of: ${LOG_LEVEL_NAMES.join(', ')}` };

      case 'number': {
        let parsed: number | undefined;
        if (typeof value === 'number') {
          parsed = value;
        } else if (typeof value === 'string') {
          parsed = parseFloat(value);
        }
        if (parsed === undefined || isNaN(parsed)) {
          return { valid: false, error: `Expected number, got ${typeof value}` };
        }
        if (!Number.isInteger(parsed) || parsed < 0) {
          return { valid: false, error: `Expected a non-negative integer, got ${parsed}` };
        }
        return { valid: true, coercedValue: parsed };
      }

      case 'boolean':
        if (typeof value === 'boolean') {
          return { valid: true, coercedValue: value };
        }
        // Coerce string to boolean
        if (typeof value === 'string') {
          const lower = value.toLowerCase();
          if (['true', 'yes', 'y', '1'].includes(lower)) {
            return { valid: true, coercedValue: true };
          }
          if (['false', 'no', 'n', '0'].includes(lower)) {
            return { valid: true, coercedValue: false };
          }
        }
        return { valid: false, error: `Expected boolean, got ${typeof value}` };

      case 'mapping': {
        if (typeof value !== 'object' || value === null || Array.isArray(value)) {
          return { valid: false, error: `Expected object, got ${Array.isArray(value) ? 'array' : typeof value}` };
        }
        const mapping: Record<string, string> = {};
        for (const [from, to] of Object.entries(value)) {
          if (typeof to !== 'string') {
            return { valid: false, error: `Expected string value for '${from}', got ${typeof to}` };
          }
          mapping[from] = to;
        }
        return { valid: true, coercedValue: mapping };
      }
    }
  } catch (error) {
    return {
      valid: false,
      error: `Validation error: ${formatError(error)}`,
    };
  }
}
