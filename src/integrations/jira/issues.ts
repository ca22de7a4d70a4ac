// Licensed under the Hungry Ghost Hive License. See LICENSE.

import { JiraClient } from './client.js';
import { JiraIssueSchema, JiraSearchResponseSchema } from './schemas.js';
import type { UpdateRequest } from './update-request.js';
import type { JiraIssue, JiraSearchResponse, SearchRequest } from './types.js';

/**
 * Fields requested by every search. Kept fixed so response size does not
 * depend on the caller.
 */
export const SEARCH_FIELDS: readonly string[] = [
  'summary',
  'status',
  'assignee',
  'priority',
  'issuetype',
  'created',
  'updated',
];

/**
 * Search for issues using JQL (Jira Query Language).
 * `maxResults` is sent as given; callers enforce their own bounds.
 */
export async function searchIssues(
  client: JiraClient,
  jql: string,
  maxResults: number
): Promise<JiraSearchResponse> {
  const request: SearchRequest = {
    jql,
    maxResults,
    fields: [...SEARCH_FIELDS],
  };
  return client.requestJson('/search/jql', JiraSearchResponseSchema, {
    method: 'POST',
    body: JSON.stringify(request),
  });
}

/**
 * Fetch a Jira issue by key or ID.
 */
export async function getIssue(client: JiraClient, issueIdOrKey: string): Promise<JiraIssue> {
  return client.requestJson(`/issue/${encodeURIComponent(issueIdOrKey)}`, JiraIssueSchema);
}

/**
 * List the direct children of an issue (epic children or subtasks).
 */
export async function getChildIssues(
  client: JiraClient,
  parentKey: string,
  maxResults: number
): Promise<JiraSearchResponse> {
  return searchIssues(client, `parent = ${quoteJqlValue(parentKey)}`, maxResults);
}

/**
 * List the epics of a project, newest first.
 */
export async function listEpics(
  client: JiraClient,
  projectKey: string,
  maxResults: number
): Promise<JiraSearchResponse> {
  return searchIssues(
    client,
    `project = ${quoteJqlValue(projectKey)} AND issuetype = Epic ORDER BY created DESC`,
    maxResults
  );
}

/**
 * Update an existing Jira issue by key or ID. Only the fields set on the
 * request are sent.
 */
export async function updateIssue(
  client: JiraClient,
  issueIdOrKey: string,
  update: UpdateRequest
): Promise<void> {
  await client.request(`/issue/${encodeURIComponent(issueIdOrKey)}`, {
    method: 'PUT',
    body: JSON.stringify(update.toPayload()),
  });
}

/**
 * Quote a value for use on the right-hand side of a JQL clause.
 * Plain issue and project keys pass through unchanged.
 */
export function quoteJqlValue(value: string): string {
  if (/^[A-Za-z0-9_-]+$/.test(value)) {
    return value;
  }
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}
