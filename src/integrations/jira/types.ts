// Licensed under the Hungry Ghost Hive License. See LICENSE.

/**
 * TypeScript types for the Jira REST API v3 payloads this bridge reads and writes.
 *
 * Jira omits fields that were not requested or are not populated, so every
 * field below `id`/`key`/`self` is optional. Older and newer response shapes
 * (with or without issue type, account IDs, embedded comments, paging counts)
 * all deserialize into these same types.
 */

// ── JSON ────────────────────────────────────────────────────────────────────

/** Any JSON-serializable value */
export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;

/** A JSON object with JSON-serializable values */
export interface JsonObject {
  [key: string]: JsonValue;
}

// ── User ────────────────────────────────────────────────────────────────────

/** Jira user (Atlassian account) */
export interface JiraUser {
  displayName: string;
  emailAddress?: string;
  accountId?: string;
  active?: boolean;
  self?: string;
}

// ── ADF (Atlassian Document Format) ─────────────────────────────────────────

/** A node within an Atlassian Document Format document */
export interface AdfNode {
  type: string;
  text?: string;
  attrs?: Record<string, unknown>;
  marks?: AdfMark[];
  content?: AdfNode[];
}

/** Inline mark applied to ADF text nodes */
export interface AdfMark {
  type: string;
  attrs?: Record<string, unknown>;
}

/** Top-level Atlassian Document Format document */
export interface AdfDocument {
  version: 1;
  type: 'doc';
  content: AdfNode[];
}

// ── Issue Status / Priority / Type ──────────────────────────────────────────

/** Jira issue status */
export interface JiraStatus {
  name: string;
  id?: string;
}

/** Jira issue priority */
export interface JiraPriority {
  name: string;
  id?: string;
}

/** Jira issue type (e.g., Story, Bug, Epic, Subtask) */
export interface JiraIssueType {
  name: string;
  subtask?: boolean;
  id?: string;
}

// ── Comment ─────────────────────────────────────────────────────────────────

/** A comment on a Jira issue */
export interface JiraComment {
  id: string;
  self: string;
  author?: JiraUser | null;
  body?: AdfDocument | null;
  created?: string;
  updated?: string;
}

/**
 * A page of comments, as returned by `GET /issue/{key}/comment` and embedded
 * in the `comment` field of an issue.
 */
export interface JiraCommentPage {
  comments: JiraComment[];
  startAt?: number;
  maxResults?: number;
  total?: number;
}

/** Request body for `POST /issue/{key}/comment` */
export interface AddCommentRequest {
  body: AdfDocument;
}

// ── Issue ───────────────────────────────────────────────────────────────────

/** Jira issue fields as returned by the API */
export interface JiraIssueFields {
  summary?: string;
  status?: JiraStatus | null;
  assignee?: JiraUser | null;
  priority?: JiraPriority | null;
  issuetype?: JiraIssueType | null;
  created?: string;
  updated?: string;
  duedate?: string | null;
  labels?: string[];
  parent?: { key: string; id?: string } | null;
  description?: AdfDocument | null;
  comment?: JiraCommentPage;
}

/** A Jira issue */
export interface JiraIssue {
  id: string;
  key: string;
  self: string;
  fields: JiraIssueFields;
}

// ── Search ──────────────────────────────────────────────────────────────────

/** Request body for `POST /search/jql` */
export interface SearchRequest {
  jql: string;
  maxResults: number;
  fields: string[];
}

/**
 * Search response.
 *
 * The enhanced search endpoint omits `total`, `maxResults` and `startAt` and
 * reports paging through `isLast`/`nextPageToken` instead. A missing count is
 * unknown, not zero.
 */
export interface JiraSearchResponse {
  issues: JiraIssue[];
  total?: number;
  maxResults?: number;
  startAt?: number;
  isLast?: boolean;
  nextPageToken?: string;
}

// ── Update ──────────────────────────────────────────────────────────────────

/** Request body for `PUT /issue/{key}` */
export interface UpdateIssuePayload {
  fields: JsonObject;
}
