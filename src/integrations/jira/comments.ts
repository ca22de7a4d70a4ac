// Licensed under the Hungry Ghost Hive License. See LICENSE.

import { textToAdf } from './adf-utils.js';
import { JiraClient } from './client.js';
import { JiraCommentPageSchema, JiraCommentSchema } from './schemas.js';
import type { AddCommentRequest, JiraComment, JiraCommentPage } from './types.js';

/**
 * Add a plain-text comment to an issue and return the created comment.
 */
export async function addComment(
  client: JiraClient,
  issueKey: string,
  text: string
): Promise<JiraComment> {
  const request: AddCommentRequest = { body: textToAdf(text) };
  return client.requestJson(
    `/issue/${encodeURIComponent(issueKey)}/comment`,
    JiraCommentSchema,
    {
      method: 'POST',
      body: JSON.stringify(request),
    }
  );
}

/**
 * Fetch one page of comments for an issue.
 */
export async function getComments(
  client: JiraClient,
  issueKey: string,
  startAt: number,
  maxResults: number
): Promise<JiraCommentPage> {
  const params = new URLSearchParams();
  params.set('startAt', String(startAt));
  params.set('maxResults', String(maxResults));
  return client.requestJson(
    `/issue/${encodeURIComponent(issueKey)}/comment?${params.toString()}`,
    JiraCommentPageSchema
  );
}
