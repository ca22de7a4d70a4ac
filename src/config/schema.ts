// Licensed under the Hungry Ghost Hive License. See LICENSE.

import { z } from 'zod';
import { DEFAULT_REQUEST_TIMEOUT_MS } from '../integrations/jira/client.js';
import { LOG_LEVEL_NAMES, type LogLevel } from '../utils/logger.js';

const requiredString = (name: string) =>
  z
    .string({ required_error: `${name} environment variable is required` })
    .trim()
    .min(1, `${name} environment variable is required`);

const logLevelSchema = z.enum(LOG_LEVEL_NAMES);

/**
 * Environment variables read at startup. Names match what users put in
 * their MCP client configuration.
 */
export const BridgeEnvSchema = z.object({
  JIRA_BASE_URL: requiredString('JIRA_BASE_URL').url('JIRA_BASE_URL must be a valid URL'),
  JIRA_EMAIL: requiredString('JIRA_EMAIL'),
  JIRA_API_TOKEN: requiredString('JIRA_API_TOKEN'),
  JIRA_REQUEST_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_REQUEST_TIMEOUT_MS),
  LOG_LEVEL: logLevelSchema.default('info'),
});

export type BridgeEnv = z.infer<typeof BridgeEnvSchema>;

/** Resolved process configuration */
export interface BridgeConfig {
  jira: {
    baseUrl: string;
    email: string;
    apiToken: string;
    requestTimeoutMs: number;
  };
  logLevel: LogLevel;
}

export function toBridgeConfig(env: BridgeEnv): BridgeConfig {
  return {
    jira: {
      baseUrl: env.JIRA_BASE_URL,
      email: env.JIRA_EMAIL,
      apiToken: env.JIRA_API_TOKEN,
      requestTimeoutMs: env.JIRA_REQUEST_TIMEOUT_MS,
    },
    logLevel: env.LOG_LEVEL,
  };
}
