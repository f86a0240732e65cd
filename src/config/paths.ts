/**
 * Centralized Path Definitions
 *
 * Directory structure:
 * ~/.ragline/
 * └── config.toml     (User configuration)
 *
 * RAGLINE_HOME overrides the directory (used by tests and CI).
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

/**
 * Get the ragline directory path (~/.ragline, or $RAGLINE_HOME)
 * @returns Absolute path to the ragline directory
 */
export function getRaglineDir(): string {
  const override = process.env.RAGLINE_HOME?.trim();
  return override ? override : join(homedir(), '.ragline');
}

/**
 * Get the config file path (~/.ragline/config.toml)
 * @returns Absolute path to the TOML config file
 */
export function getConfigPath(): string {
  return join(getRaglineDir(), 'config.toml');
}
