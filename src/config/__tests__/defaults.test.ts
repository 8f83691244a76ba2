/**
 * Tests for configuration defaults and value validation
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, isConfigKey, validateConfigValue } from '../defaults.js';

describe('config defaults', () => {
  it('should map the stock rejection text', () => {
    expect(DEFAULT_CONFIG.rejection_messages).toEqual({
      'rejected by user': 'exec command rejected by user',
    });
  });

  it('should recognise configuration keys', () => {
    expect(isConfigKey('emit_turn_diff')).toBe(true);
    expect(isConfigKey('temperature')).toBe(false);
    expect(isConfigKey('toString')).toBe(false);
  });

  describe('validateConfigValue', () => {
    it('should accept and lowercase log levels', () => {
      expect(validateConfigValue('log_level', 'WARN')).toEqual({ valid: true, coercedValue: 'warn' });
      expect(validateConfigValue('log_level', 'loud')).toEqual({
        valid: false,
        error: 'log_level must be one of: error, warn, info, verbose, debug',
      });
    });

    it('should accept non-negative integers', () => {
      expect(validateConfigValue('model_output_max_lines', 128)).toEqual({ valid: true, coercedValue: 128 });
      expect(validateConfigValue('model_output_max_lines', '12')).toEqual({ valid: true, coercedValue: 12 });
      expect(validateConfigValue('model_output_max_lines', -3)).toEqual({
        valid: false,
        error: 'Expected a non-negative integer, got -3',
      });
      expect(validateConfigValue('model_output_max_lines', 'many')).toEqual({
        valid: false,
        error: 'Expected number, got string',
      });
    });

    it('should coerce boolean strings', () => {
      expect(validateConfigValue('emit_turn_diff', 'yes')).toEqual({ valid: true, coercedValue: true });
      expect(validateConfigValue('emit_turn_diff', '0')).toEqual({ valid: true, coercedValue: false });
      expect(validateConfigValue('emit_turn_diff', 'maybe')).toEqual({
        valid: false,
        error: 'Expected boolean, got string',
      });
    });

    it('should require string values in mappings', () => {
      expect(validateConfigValue('rejection_messages', { a: 'b' })).toEqual({ valid: true, coercedValue: { a: 'b' } });
      expect(validateConfigValue('rejection_messages', { a: 1 })).toEqual({
        valid: false,
        error: "Expected string value for 'a', got number",
      });
      expect(validateConfigValue('rejection_messages', ['a'])).toEqual({
        valid: false,
        error: 'Expected object, got array',
      });
    });
  });
});
