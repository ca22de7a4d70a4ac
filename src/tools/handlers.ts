// Licensed under the Hungry Ghost Hive License. See LICENSE.

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { describeError, ValidationError } from '../errors/index.js';
import { JiraClient } from '../integrations/jira/client.js';
import { addComment, getComments } from '../integrations/jira/comments.js';
import {
  getChildIssues,
  getIssue,
  listEpics,
  searchIssues,
  updateIssue,
} from '../integrations/jira/issues.js';
import { UpdateRequest } from '../integrations/jira/update-request.js';
import * as logger from '../utils/logger.js';
import {
  formatChildren,
  formatComment,
  formatCommentPage,
  formatEpics,
  formatIssue,
  formatSearchResult,
  formatUpdateResult,
} from './formatters.js';
import {
  normalizeMaxResults,
  normalizeStartAt,
  type AddCommentParams,
  type GetChildrenParams,
  type GetCommentsParams,
  type GetIssueParams,
  type ListEpicsParams,
  type SearchIssuesParams,
  type UpdateIssueParams,
} from './params.js';

export function textResult(text: string): CallToolResult {
  return { content: [{ type: 'text', text }] };
}

export function errorResult(text: string): CallToolResult {
  return { content: [{ type: 'text', text }], isError: true };
}

/**
 * Run one tool operation and turn any failure into an error result.
 * `operation` is the human phrase used in "Failed to <operation>: ...".
 */
async function runTool(operation: string, fn: () => Promise<string>): Promise<CallToolResult> {
  try {
    return textResult(await fn());
  } catch (err) {
    const detail = describeError(err);
    logger.warn(`Failed to ${operation}: ${detail}`);
    return errorResult(`Failed to ${operation}: ${detail}`);
  }
}

/**
 * Translate update_issue parameters into an UpdateRequest, in a fixed field
 * order. Parameters left undefined are not set.
 */
export function buildUpdateRequest(params: UpdateIssueParams): UpdateRequest {
  const update = new UpdateRequest();
  if (params.summary !== undefined) update.setSummary(params.summary);
  if (params.description !== undefined) update.setDescription(params.description);
  if (params.due_date !== undefined) update.setDueDate(params.due_date);
  if (params.priority !== undefined) update.setPriorityByName(params.priority);
  if (params.assignee_account_id !== undefined) {
    update.setAssigneeByAccountId(params.assignee_account_id);
  }
  if (params.parent_key !== undefined) update.setParentByKey(params.parent_key);
  if (params.labels !== undefined) update.setLabels(params.labels);
  return update;
}

export interface ToolHandlers {
  searchIssues(params: SearchIssuesParams): Promise<CallToolResult>;
  getIssue(params: GetIssueParams): Promise<CallToolResult>;
  addComment(params: AddCommentParams): Promise<CallToolResult>;
  getChildren(params: GetChildrenParams): Promise<CallToolResult>;
  getComments(params: GetCommentsParams): Promise<CallToolResult>;
  updateIssue(params: UpdateIssueParams): Promise<CallToolResult>;
  listEpics(params: ListEpicsParams): Promise<CallToolResult>;
}

/**
 * Bind the tool operations to a Jira client. Handlers never throw: every
 * outcome is a well-formed CallToolResult.
 */
export function createToolHandlers(client: JiraClient): ToolHandlers {
  return {
    searchIssues: params =>
      runTool('search issues', async () => {
        const result = await searchIssues(
          client,
          params.jql,
          normalizeMaxResults(params.max_results)
        );
        return formatSearchResult(result);
      }),

    getIssue: params =>
      runTool('get issue', async () => formatIssue(await getIssue(client, params.issue_key))),

    addComment: params =>
      runTool('add comment', async () => {
        const comment = await addComment(client, params.issue_key, params.comment);
        return formatComment(params.issue_key, comment);
      }),

    getChildren: params =>
      runTool('get children', async () => {
        const result = await getChildIssues(
          client,
          params.parent_key,
          normalizeMaxResults(params.max_results)
        );
        return formatChildren(params.parent_key, result);
      }),

    getComments: params =>
      runTool('get comments', async () => {
        const page = await getComments(
          client,
          params.issue_key,
          normalizeStartAt(params.start_at),
          normalizeMaxResults(params.max_results)
        );
        return formatCommentPage(params.issue_key, page);
      }),

    updateIssue: params =>
      runTool('update issue', async () => {
        const update = buildUpdateRequest(params);
        if (update.isEmpty()) {
          throw new ValidationError(
            'At least one field (summary, description, due_date, priority, assignee_account_id, parent_key, labels) must be provided'
          );
        }
        await updateIssue(client, params.issue_key, update);
        return formatUpdateResult(params.issue_key, update.fieldNames());
      }),

    listEpics: params =>
      runTool('list epics', async () => {
        const result = await listEpics(
          client,
          params.project_key,
          normalizeMaxResults(params.max_results)
        );
        return formatEpics(params.project_key, result);
      }),
  };
}
