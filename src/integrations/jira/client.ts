// Licensed under the Hungry Ghost Hive License. See LICENSE.

import { Buffer } from 'buffer';
import type { z } from 'zod';
import { describeError, OperationalError, TransportError } from '../../errors/index.js';
import * as logger from '../../utils/logger.js';

/** Default per-request timeout in milliseconds */
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

/** Options for constructing a JiraClient */
export interface JiraClientOptions {
  /** Site URL, e.g. https://your-domain.atlassian.net */
  baseUrl: string;
  /** Account email used as the Basic auth identity */
  email: string;
  /** API token used as the Basic auth secret */
  apiToken: string;
  /** Abort a request after this many milliseconds. Default: 30000 */
  requestTimeoutMs?: number;
}

/** Error thrown when Jira answers with a non-2xx status */
export class JiraApiError extends OperationalError {
  public readonly statusCode: number;
  public readonly responseBody: string;

  constructor(message: string, statusCode: number, responseBody: string) {
    super(message);
    this.statusCode = statusCode;
    this.responseBody = responseBody;
    Object.setPrototypeOf(this, JiraApiError.prototype);
  }
}

/** Strip every trailing slash from a base URL. */
export function normalizeBaseUrl(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, '');
}

/** Build the `Authorization` header value for an identity/secret pair. */
export function buildBasicAuthHeader(email: string, apiToken: string): string {
  return `Basic ${Buffer.from(`${email}:${apiToken}`, 'utf-8').toString('base64')}`;
}

/**
 * HTTP client for the Jira REST API v3.
 *
 * The Basic credential is computed once here and reused for every request;
 * the client holds no other state, so one instance is shared by all tool calls.
 */
export class JiraClient {
  readonly baseUrl: string;
  readonly authHeader: string;
  private readonly requestTimeoutMs: number;

  constructor(options: JiraClientOptions) {
    this.baseUrl = normalizeBaseUrl(options.baseUrl);
    this.authHeader = buildBasicAuthHeader(options.email, options.apiToken);
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  }

  /**
   * Build the base URL for Jira REST API v3 requests.
   */
  getApiBaseUrl(): string {
    return `${this.baseUrl}/rest/api/3`;
  }

  /**
   * Perform an authenticated request to the Jira API and decode the JSON reply.
   * Resolves to `undefined` for 204 and empty bodies.
   */
  async request(path: string, options: RequestInit = {}): Promise<unknown> {
    const method = options.method ?? 'GET';
    const url = `${this.getApiBaseUrl()}${path}`;
    const headers: Record<string, string> = {
      Authorization: this.authHeader,
      Accept: 'application/json',
    };

    if (options.body) {
      headers['Content-Type'] = 'application/json';
    }

    logger.debug(`Jira ${method} ${path}`);

    let response: Response;
    try {
      response = await fetch(url, {
        ...options,
        method,
        headers,
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });
    } catch (err) {
      throw new TransportError(`Jira request failed: ${method} ${path}: ${describeError(err)}`);
    }

    if (!response.ok) {
      const body = await readBodySafely(response);
      throw new JiraApiError(
        `Jira API error (${response.status}) on ${method} ${path}: ${body}`,
        response.status,
        body
      );
    }

    if (response.status === 204) {
      return undefined;
    }

    let text: string;
    try {
      text = await response.text();
    } catch (err) {
      throw new TransportError(
        `Failed to read Jira response for ${method} ${path}: ${describeError(err)}`
      );
    }
    if (!text) {
      return undefined;
    }

    try {
      return JSON.parse(text);
    } catch (err) {
      throw new TransportError(
        `Invalid JSON in Jira response for ${method} ${path}: ${describeError(err)}`
      );
    }
  }

  /**
   * Like `request`, but requires a body matching `schema`. An empty body or
   * one of the wrong shape is a TransportError.
   */
  async requestJson<T>(
    path: string,
    schema: z.ZodType<T>,
    options: RequestInit = {}
  ): Promise<T> {
    const method = options.method ?? 'GET';
    const result = await this.request(path, options);
    if (result === undefined) {
      throw new TransportError(`Empty Jira response for ${method} ${path}`);
    }

    const parsed = schema.safeParse(result);
    if (!parsed.success) {
      const issues = parsed.error.errors
        .map(e => `${e.path.length > 0 ? e.path.join('.') : '(root)'}: ${e.message}`)
        .join('; ');
      throw new TransportError(`Unexpected Jira response for ${method} ${path}: ${issues}`);
    }
    return parsed.data;
  }
}

async function readBodySafely(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch {
    return '';
  }
}
