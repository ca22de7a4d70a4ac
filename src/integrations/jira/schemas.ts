// Licensed under the Hungry Ghost Hive License. See LICENSE.

import { z } from 'zod';
import type {
  AdfDocument,
  AdfMark,
  AdfNode,
  JiraComment,
  JiraCommentPage,
  JiraIssue,
  JiraIssueFields,
  JiraSearchResponse,
  JiraUser,
} from './types.js';

// Response schemas for the payloads the bridge reads. Unknown keys are
// stripped; anything the formatters read must have the declared shape.

export const JiraUserSchema: z.ZodType<JiraUser> = z.object({
  displayName: z.string(),
  emailAddress: z.string().optional(),
  accountId: z.string().optional(),
  active: z.boolean().optional(),
  self: z.string().optional(),
});

const AdfMarkSchema: z.ZodType<AdfMark> = z.object({
  type: z.string(),
  attrs: z.record(z.unknown()).optional(),
});

export const AdfNodeSchema: z.ZodType<AdfNode> = z.lazy(() =>
  z.object({
    type: z.string(),
    text: z.string().optional(),
    attrs: z.record(z.unknown()).optional(),
    marks: z.array(AdfMarkSchema).optional(),
    content: z.array(AdfNodeSchema).optional(),
  })
);

export const AdfDocumentSchema: z.ZodType<AdfDocument> = z.object({
  version: z.literal(1),
  type: z.literal('doc'),
  content: z.array(AdfNodeSchema),
});

const namedSchema = z.object({ name: z.string(), id: z.string().optional() });

export const JiraCommentSchema: z.ZodType<JiraComment> = z.object({
  id: z.string(),
  self: z.string(),
  author: JiraUserSchema.nullable().optional(),
  body: AdfDocumentSchema.nullable().optional(),
  created: z.string().optional(),
  updated: z.string().optional(),
});

export const JiraCommentPageSchema: z.ZodType<JiraCommentPage> = z.object({
  comments: z.array(JiraCommentSchema),
  startAt: z.number().optional(),
  maxResults: z.number().optional(),
  total: z.number().optional(),
});

const JiraIssueFieldsSchema: z.ZodType<JiraIssueFields> = z.object({
  summary: z.string().optional(),
  status: namedSchema.nullable().optional(),
  assignee: JiraUserSchema.nullable().optional(),
  priority: namedSchema.nullable().optional(),
  issuetype: z
    .object({ name: z.string(), subtask: z.boolean().optional(), id: z.string().optional() })
    .nullable()
    .optional(),
  created: z.string().optional(),
  updated: z.string().optional(),
  duedate: z.string().nullable().optional(),
  labels: z.array(z.string()).optional(),
  parent: z
    .object({ key: z.string(), id: z.string().optional() })
    .nullable()
    .optional(),
  description: AdfDocumentSchema.nullable().optional(),
  comment: JiraCommentPageSchema.optional(),
});

export const JiraIssueSchema: z.ZodType<JiraIssue> = z.object({
  id: z.string(),
  key: z.string(),
  self: z.string(),
  fields: JiraIssueFieldsSchema,
});

export const JiraSearchResponseSchema: z.ZodType<JiraSearchResponse> = z.object({
  issues: z.array(JiraIssueSchema),
  total: z.number().optional(),
  maxResults: z.number().optional(),
  startAt: z.number().optional(),
  isLast: z.boolean().optional(),
  nextPageToken: z.string().optional(),
});
