// Licensed under the Hungry Ghost Hive License. See LICENSE.

import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, describe, expect, it } from 'vitest';
import { ConfigurationError } from '../errors/index.js';
import { loadConfig, parseEnvFile, readEnvFile } from './loader.js';

const tempDirs: string[] = [];

function createTempDir(): string {
  const dir = mkdtempSync(join(tmpdir(), 'jira-bridge-config-test-'));
  tempDirs.push(dir);
  return dir;
}

function writeEnvFile(content: string): string {
  const path = join(createTempDir(), '.env');
  writeFileSync(path, content, 'utf-8');
  return path;
}

const VALID_ENV = {
  JIRA_BASE_URL: 'https://example.atlassian.net',
  JIRA_EMAIL: 'test@example.com',
  JIRA_API_TOKEN: 'test-token',
};

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    rmSync(dir, { recursive: true, force: true });
  }
});

describe('parseEnvFile', () => {
  it('should parse key-value pairs', () => {
    expect(parseEnvFile('FOO=bar\nBAZ=qux')).toEqual({ FOO: 'bar', BAZ: 'qux' });
  });

  it('should skip comments, blank lines and lines without =', () => {
    expect(parseEnvFile('# comment\n\nNOT_A_PAIR\nKEY=value\n')).toEqual({ KEY: 'value' });
  });

  it('should strip surrounding quotes', () => {
    expect(parseEnvFile(`A="double"\nB='single'\nC="unbalanced`)).toEqual({
      A: 'double',
      B: 'single',
      C: '"unbalanced',
    });
  });

  it('should keep = characters inside values', () => {
    expect(parseEnvFile('JIRA_API_TOKEN=abc==')).toEqual({ JIRA_API_TOKEN: 'abc==' });
  });
});

describe('readEnvFile', () => {
  it('should throw ConfigurationError for a missing file', () => {
    const missing = join(createTempDir(), 'absent.env');

    expect(() => readEnvFile(missing)).toThrow(ConfigurationError);
    expect(() => readEnvFile(missing)).toThrow(`Env file not found: ${missing}`);
  });
});

describe('loadConfig', () => {
  it('should resolve a complete environment with defaults', () => {
    expect(loadConfig(VALID_ENV)).toEqual({
      jira: {
        baseUrl: 'https://example.atlassian.net',
        email: 'test@example.com',
        apiToken: 'test-token',
        requestTimeoutMs: 30000,
      },
      logLevel: 'info',
    });
  });

  it('should list every missing variable', () => {
    expect(() => loadConfig({})).toThrow(
      'Invalid configuration:\n' +
        '  - JIRA_BASE_URL: JIRA_BASE_URL environment variable is required\n' +
        '  - JIRA_EMAIL: JIRA_EMAIL environment variable is required\n' +
        '  - JIRA_API_TOKEN: JIRA_API_TOKEN environment variable is required'
    );
  });

  it('should treat empty values as missing', () => {
    expect(() => loadConfig({ ...VALID_ENV, JIRA_EMAIL: '' })).toThrow(
      'Invalid configuration:\n  - JIRA_EMAIL: JIRA_EMAIL environment variable is required'
    );
  });

  it('should reject an invalid base URL', () => {
    expect(() => loadConfig({ ...VALID_ENV, JIRA_BASE_URL: 'not-a-url' })).toThrow(
      'Invalid configuration:\n  - JIRA_BASE_URL: JIRA_BASE_URL must be a valid URL'
    );
  });

  it('should parse the request timeout and log level', () => {
    const config = loadConfig({ ...VALID_ENV, JIRA_REQUEST_TIMEOUT_MS: '5000', LOG_LEVEL: 'debug' });

    expect(config.jira.requestTimeoutMs).toBe(5000);
    expect(config.logLevel).toBe('debug');
  });

  it('should reject a non-numeric timeout and an unknown log level', () => {
    expect(() => loadConfig({ ...VALID_ENV, JIRA_REQUEST_TIMEOUT_MS: 'soon' })).toThrow(
      /JIRA_REQUEST_TIMEOUT_MS/
    );
    expect(() => loadConfig({ ...VALID_ENV, LOG_LEVEL: 'verbose' })).toThrow(/LOG_LEVEL/);
  });

  it('should read variables from an env file', () => {
    const envFile = writeEnvFile(
      'JIRA_BASE_URL=https://file.atlassian.net\nJIRA_EMAIL=file@example.com\nJIRA_API_TOKEN="test-token"\n'
    );

    const config = loadConfig({}, envFile);

    expect(config.jira).toEqual({
      baseUrl: 'https://file.atlassian.net',
      email: 'file@example.com',
      apiToken: 'test-token',
      requestTimeoutMs: 30000,
    });
  });

  it('should let the process environment win over the env file', () => {
    const envFile = writeEnvFile(
      'JIRA_BASE_URL=https://file.atlassian.net\nJIRA_EMAIL=file@example.com\nJIRA_API_TOKEN=test-token\n'
    );

    const config = loadConfig({ JIRA_EMAIL: 'env@example.com', JIRA_BASE_URL: '' }, envFile);

    expect(config.jira.email).toBe('env@example.com');
    expect(config.jira.baseUrl).toBe('https://file.atlassian.net');
  });

  it('should throw ConfigurationError when the env file is missing', () => {
    expect(() => loadConfig(VALID_ENV, join(createTempDir(), 'nope.env'))).toThrow(
      ConfigurationError
    );
  });
});
