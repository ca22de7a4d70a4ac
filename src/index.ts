#!/usr/bin/env node

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import chalk from 'chalk';
import { Command, InvalidArgumentError } from 'commander';
import { loadConfig } from './config/loader.js';
import { ConfigurationError, describeError } from './errors/index.js';
import { JiraClient } from './integrations/jira/client.js';
import { createServer, SERVER_NAME, TOOL_NAMES } from './server.js';
import * as logger from './utils/logger.js';
import { getVersion } from './utils/version.js';

interface CliOptions {
  envFile?: string;
  logLevel?: logger.LogLevel;
}

function parseLogLevel(value: string): logger.LogLevel {
  if (!logger.isLogLevel(value)) {
    throw new InvalidArgumentError(`Expected one of: ${logger.LOG_LEVEL_NAMES.join(', ')}`);
  }
  return value;
}

async function startServer(options: CliOptions): Promise<void> {
  const config = loadConfig(process.env, options.envFile);
  logger.setLogLevel(options.logLevel ?? config.logLevel);

  const client = new JiraClient(config.jira);
  const server = createServer(client);

  logger.info(`Starting ${SERVER_NAME} for ${logger.highlight(client.baseUrl)}`);
  logger.debug(`Registered tools: ${TOOL_NAMES.join(', ')}`);

  await server.connect(new StdioServerTransport());
  logger.success('Listening on stdio');
}

const program = new Command();

program
  .name(SERVER_NAME)
  .description('MCP server exposing Jira search, issues, comments and updates as tools')
  .version(getVersion())
  .option('-e, --env-file <path>', 'Read Jira settings from a .env file (environment wins)')
  .option('-l, --log-level <level>', 'Log level: debug, info, warn, error', parseLogLevel)
  .action(async (options: CliOptions) => {
    try {
      await startServer(options);
    } catch (err) {
      if (err instanceof ConfigurationError) {
        console.error(chalk.red('Configuration error:'), err.message);
      } else {
        console.error(chalk.red('Failed to start server:'), describeError(err));
      }
      process.exit(1);
    }
  });

await program.parseAsync();
