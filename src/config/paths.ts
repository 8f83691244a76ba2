/**
 * Path configuration for toolcast
 */

import { homedir } from 'os';
import { join } from 'path';

/**
 * Base directory for all toolcast data.
 * TOOLCAST_HOME overrides the default location.
 */
export const TOOLCAST_HOME = process.env.TOOLCAST_HOME || join(homedir(), '.toolcast');

/**
 * Get the configuration file path
 */
export function getConfigFile(): string {
  return join(TOOLCAST_HOME, 'config.json');
}
