// Licensed under the Hungry Ghost Hive License. See LICENSE.

import { existsSync, readFileSync } from 'fs';
import { ConfigurationError } from '../errors/index.js';
import { BridgeEnvSchema, toBridgeConfig, type BridgeConfig } from './schema.js';

export type EnvSource = Record<string, string | undefined>;

/**
 * Parse a .env file into a key-value record.
 */
export function parseEnvFile(content: string): Record<string, string> {
  const result: Record<string, string> = {};
  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    const eqIndex = trimmed.indexOf('=');
    if (eqIndex === -1) continue;
    const key = trimmed.slice(0, eqIndex).trim();
    let value = trimmed.slice(eqIndex + 1).trim();
    // Strip surrounding quotes
    if (
      (value.startsWith('"') && value.endsWith('"')) ||
      (value.startsWith("'") && value.endsWith("'"))
    ) {
      value = value.slice(1, -1);
    }
    result[key] = value;
  }
  return result;
}

/**
 * Read a .env file. A path that was given but does not exist is an error.
 */
export function readEnvFile(envFilePath: string): Record<string, string> {
  if (!existsSync(envFilePath)) {
    throw new ConfigurationError(`Env file not found: ${envFilePath}`);
  }
  return parseEnvFile(readFileSync(envFilePath, 'utf-8'));
}

/**
 * Merge sources left to right; later sources win. Empty values count as unset.
 */
function mergeEnv(...sources: EnvSource[]): Record<string, string> {
  const merged: Record<string, string> = {};
  for (const source of sources) {
    for (const [key, value] of Object.entries(source)) {
      if (value !== undefined && value.trim() !== '') {
        merged[key] = value;
      }
    }
  }
  return merged;
}

/**
 * Resolve the bridge configuration from the process environment, optionally
 * layered over a .env file (the process environment wins).
 *
 * Throws ConfigurationError listing every missing or invalid variable.
 */
export function loadConfig(env: EnvSource, envFilePath?: string): BridgeConfig {
  const fileEnv = envFilePath ? readEnvFile(envFilePath) : {};
  const result = BridgeEnvSchema.safeParse(mergeEnv(fileEnv, env));

  if (!result.success) {
    const errors = result.error.errors
      .map(e => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new ConfigurationError(`Invalid configuration:\n${errors}`);
  }

  return toBridgeConfig(result.data);
}
