// Licensed under the Hungry Ghost Hive License. See LICENSE.

import { z } from 'zod';

export const DEFAULT_MAX_RESULTS = 50;
export const MAX_RESULTS_CEILING = 100;

/**
 * Resolve a caller-supplied page size: default 50, clamped to [1, 100].
 */
export function normalizeMaxResults(value: number | undefined): number {
  if (value === undefined) return DEFAULT_MAX_RESULTS;
  return Math.min(Math.max(Math.trunc(value), 1), MAX_RESULTS_CEILING);
}

/**
 * Resolve a caller-supplied page offset: default 0, never negative.
 */
export function normalizeStartAt(value: number | undefined): number {
  if (value === undefined) return 0;
  return Math.max(Math.trunc(value), 0);
}

const issueKey = z.string().describe("The issue key (e.g., 'PROJ-123')");
const maxResults = z
  .number()
  .optional()
  .describe(
    `Maximum number of results to return (default: ${DEFAULT_MAX_RESULTS}, max: ${MAX_RESULTS_CEILING})`
  );

// Raw shapes are what McpServer.registerTool takes as inputSchema.

export const searchIssuesShape = {
  jql: z.string().describe("JQL query string (e.g., 'project = PROJ AND status = Open')"),
  max_results: maxResults,
};

export const getIssueShape = {
  issue_key: issueKey,
};

export const addCommentShape = {
  issue_key: issueKey,
  comment: z.string().describe('The comment text to add to the issue'),
};

export const getChildrenShape = {
  parent_key: z.string().describe("The parent issue key, typically an epic (e.g., 'PROJ-100')"),
  max_results: maxResults,
};

export const getCommentsShape = {
  issue_key: issueKey,
  start_at: z.number().optional().describe('Index of the first comment to return (default: 0)'),
  max_results: maxResults,
};

export const updateIssueShape = {
  issue_key: issueKey,
  summary: z.string().optional().describe('New summary (title)'),
  description: z.string().optional().describe('New description as plain text'),
  due_date: z.string().optional().describe('Due date in YYYY-MM-DD format'),
  priority: z.string().optional().describe("Priority name (e.g., 'High')"),
  assignee_account_id: z.string().optional().describe('Account ID of the new assignee'),
  parent_key: z.string().optional().describe("Key of the new parent issue (e.g., 'PROJ-100')"),
  labels: z.array(z.string()).optional().describe('Replacement list of labels'),
};

export const listEpicsShape = {
  project_key: z.string().describe("The project key (e.g., 'PROJ')"),
  max_results: maxResults,
};

/** Parsed arguments for a tool with the given input shape */
type ToolParams<Shape extends z.ZodRawShape> = z.infer<z.ZodObject<Shape>>;

export type SearchIssuesParams = ToolParams<typeof searchIssuesShape>;
export type GetIssueParams = ToolParams<typeof getIssueShape>;
export type AddCommentParams = ToolParams<typeof addCommentShape>;
export type GetChildrenParams = ToolParams<typeof getChildrenShape>;
export type GetCommentsParams = ToolParams<typeof getCommentsShape>;
export type UpdateIssueParams = ToolParams<typeof updateIssueShape>;
export type ListEpicsParams = ToolParams<typeof listEpicsShape>;
