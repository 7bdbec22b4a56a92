/**
 * Startup
 */

import { loadConfig, type CliConfig } from '../config/index.js';
import { printError } from './output.js';

/**
 * Load the configuration, printing the problem instead of throwing
 */
export function loadConfigOrReport(env: NodeJS.ProcessEnv = process.env): CliConfig | null {
  try {
    return loadConfig(env);
  } catch (error) {
    printError(error instanceof Error ? error.message : String(error));
    return null;
  }
}
