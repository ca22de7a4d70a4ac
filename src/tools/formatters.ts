// Licensed under the Hungry Ghost Hive License. See LICENSE.

/**
 * Text renderers for tool results. Pure functions: the same input always
 * yields the same text, and a missing optional field renders a fixed
 * placeholder instead of being dropped.
 */

import { adfToPlainText } from '../integrations/jira/adf-utils.js';
import type {
  JiraComment,
  JiraCommentPage,
  JiraIssue,
  JiraSearchResponse,
  JiraUser,
} from '../integrations/jira/types.js';

const UNKNOWN = 'Unknown';

export function formatUser(user: JiraUser | null | undefined, fallback: string): string {
  if (!user) return fallback;
  return `${user.displayName} (${user.accountId ?? 'No ID'})`;
}

/** Flatten a rich-text body, or "No content" when nothing is left. */
export function formatBody(body: JiraComment['body']): string {
  const text = adfToPlainText(body).trim();
  return text || 'No content';
}

function formatIssueLine(issue: JiraIssue): string {
  const { fields } = issue;
  const status = fields.status?.name ?? UNKNOWN;
  const issueType = fields.issuetype?.name ?? UNKNOWN;
  const summary = fields.summary ?? 'No summary';
  const assignee = formatUser(fields.assignee, 'Unassigned');
  return `- **${issue.key}** [${issueType}/${status}] ${summary}\n  Assignee: ${assignee}\n\n`;
}

function moreResultsNote(result: JiraSearchResponse): string {
  return result.isLast === false
    ? 'More results available. Narrow the query or raise max_results.\n'
    : '';
}

export function formatSearchResult(result: JiraSearchResponse): string {
  const shown = result.issues.length;
  // A missing total stays unknown; the page size is not a match count.
  const header =
    result.total === undefined
      ? `Found issues (showing ${shown} of unknown total):\n\n`
      : `Found ${result.total} issues (showing ${shown} of ${result.total}):\n\n`;

  return header + result.issues.map(formatIssueLine).join('') + moreResultsNote(result);
}

export function formatChildren(parentKey: string, result: JiraSearchResponse): string {
  if (result.issues.length === 0) {
    return `No child issues found for ${parentKey}`;
  }

  const shown = result.issues.length;
  const header =
    result.total === undefined
      ? `Found child issues of ${parentKey} (showing ${shown} of unknown total):\n\n`
      : `Found ${result.total} child issue(s) of ${parentKey} (showing ${shown} of ${result.total}):\n\n`;
  return header + result.issues.map(formatIssueLine).join('') + moreResultsNote(result);
}

export function formatEpics(projectKey: string, result: JiraSearchResponse): string {
  if (result.issues.length === 0) {
    return `No epics found in project ${projectKey}`;
  }

  let output =
    result.total === undefined
      ? `Found epics in project ${projectKey} (showing ${result.issues.length} of unknown total):\n\n`
      : `Found ${result.total} epic(s) in project ${projectKey}:\n\n`;
  for (const issue of result.issues) {
    const status = issue.fields.status?.name ?? UNKNOWN;
    const summary = issue.fields.summary ?? 'No summary';
    output += `- **${issue.key}** [${status}] ${summary}\n`;
  }
  return output + moreResultsNote(result);
}

function formatCommentEntry(comment: JiraComment): string {
  const author = formatUser(comment.author, UNKNOWN);
  const created = comment.created ?? UNKNOWN;
  return `### Comment by ${author} (${created})\n${formatBody(comment.body)}\n\n`;
}

export function formatIssue(issue: JiraIssue): string {
  const { fields } = issue;
  const lines = [
    `# ${issue.key} - ${fields.summary ?? 'No summary'}`,
    '',
    `**Type:** ${fields.issuetype?.name ?? UNKNOWN}`,
    `**Status:** ${fields.status?.name ?? UNKNOWN}`,
    `**Assignee:** ${formatUser(fields.assignee, 'Unassigned')}`,
    `**Priority:** ${fields.priority?.name ?? 'None'}`,
    `**Created:** ${fields.created ?? UNKNOWN}`,
    `**Updated:** ${fields.updated ?? UNKNOWN}`,
  ];

  if (fields.duedate) {
    lines.push(`**Due date:** ${fields.duedate}`);
  }
  if (fields.parent) {
    lines.push(`**Parent:** ${fields.parent.key}`);
  }
  if (fields.labels && fields.labels.length > 0) {
    lines.push(`**Labels:** ${fields.labels.join(', ')}`);
  }
  lines.push(`**URL:** ${issue.self}`);

  let output = lines.join('\n') + '\n';

  if (fields.description) {
    output += `\n## Description\n\n${formatBody(fields.description)}\n`;
  }

  const comments = fields.comment?.comments ?? [];
  if (comments.length > 0) {
    output += '\n## Comments\n\n';
    output += comments.map(formatCommentEntry).join('');
  }

  return output;
}

/** Confirmation for a newly created comment */
export function formatComment(issueKey: string, comment: JiraComment): string {
  return [
    `Comment added successfully to ${issueKey}`,
    '',
    `**Comment ID:** ${comment.id}`,
    `**Author:** ${formatUser(comment.author, UNKNOWN)}`,
    `**Created:** ${comment.created ?? UNKNOWN}`,
    '',
  ].join('\n');
}

export function formatCommentPage(issueKey: string, page: JiraCommentPage): string {
  if (page.comments.length === 0) {
    return `No comments found on ${issueKey} (total: ${page.total ?? 'unknown'})`;
  }

  const total = page.total ?? 'unknown total';
  const header = `Comments on ${issueKey} (showing ${page.comments.length} of ${total}, starting at ${page.startAt ?? 0}):\n\n`;
  return header + page.comments.map(formatCommentEntry).join('');
}

export function formatUpdateResult(issueKey: string, updatedFields: string[]): string {
  if (updatedFields.length === 0) {
    return `No fields were updated for ${issueKey}`;
  }
  return `Issue ${issueKey} updated successfully.\n\n**Updated fields:** ${updatedFields.join(', ')}`;
}
