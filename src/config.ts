/**
 * Configuration file loading
 */

import { readFile } from 'fs/promises';
import { formatValidationErrors, safeValidateConfig } from '../schemas/index.js';
import type { SchedulerConfig } from '../schemas/index.js';

export const DEFAULT_CONFIG_PATH = './config.json';

/**
 * Read the raw config file, or null when an optional file is missing
 */
async function readConfigFile(configPath: string, required: boolean): Promise<string | null> {
  try {
    return await readFile(configPath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
      throw new Error(`Failed to read config file ${configPath}: ${(error as Error).message}`);
    }
    if (required) {
      throw new Error(`Config file not found: ${configPath}`);
    }
    return null;
  }
}

/**
 * Load configuration from file and fill in defaults
 *
 * @param configPath - Path to the JSON config file
 * @param required - Fail when the file is missing; otherwise defaults are used
 */
export async function loadConfig(configPath: string, required: boolean): Promise<SchedulerConfig> {
  const content = await readConfigFile(configPath, required);

  let raw: unknown = {};
  if (content !== null) {
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new Error(`Failed to parse config file ${configPath}: ${(error as Error).message}`);
    }
  }

  const result = safeValidateConfig(raw);
  if (!result.success) {
    throw new Error(`Invalid config file ${configPath}:\n  ${formatValidationErrors(result.error).join('\n  ')}`);
  }
  return result.data;
}
