import * as fs from 'fs-extra';
import * as path from 'path';
import { Configuration } from './types';
import { CONFIG_FILE, DEFAULT_CONFIGURATION, configSchema } from './constants';
import { ConfigurationError } from './errors';

export function getConfigPath(sourceRoot: string): string {
  return path.join(sourceRoot, CONFIG_FILE);
}

/**
 * Reads `downstream-sync.json` from the source root. A missing file yields the
 * defaults; a present one is validated and has its gaps filled in.
 */
export function loadConfiguration(sourceRoot: string): Configuration {
  const configPath = getConfigPath(sourceRoot);

  if (!fs.pathExistsSync(configPath)) {
    return parseConfiguration({});
  }

  let raw: unknown;
  try {
    raw = fs.readJsonSync(configPath);
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    throw new ConfigurationError(`Failed to read ${CONFIG_FILE}: ${errorMessage}`);
  }

  return parseConfiguration(raw);
}

export function parseConfiguration(raw: unknown): Configuration {
  const { error, value } = configSchema.validate(raw);
  if (error) {
    throw new ConfigurationError(`Configuration validation failed: ${error.message}`);
  }
  return value;
}

export async function writeDefaultConfiguration(sourceRoot: string): Promise<boolean> {
  const configPath = getConfigPath(sourceRoot);
  if (await fs.pathExists(configPath)) {
    return false;
  }
  await fs.writeJson(configPath, DEFAULT_CONFIGURATION, { spaces: 2 });
  return true;
}
