/**
 * ID generation utilities
 */

import { randomBytes } from 'crypto';
import { ID_GENERATION } from '../config/constants.js';

/**
 * Generate a unique ID
 */
export function generateId(): string {
  return randomBytes(16).toString('hex');
}

/**
 * Generate an event ID: {prefix}-{timestamp}-{9-char-random} (base-36)
 */
export function generateEventId(prefix: string = 'evt'): string {
  const start = ID_GENERATION.RANDOM_STRING_SUBSTRING_START;
  const random = Math.random()
    .toString(ID_GENERATION.RANDOM_STRING_RADIX)
    .substring(start, start + ID_GENERATION.RANDOM_STRING_LENGTH_LONG);
  return `${prefix}-${Date.now()}-${random}`;
}
