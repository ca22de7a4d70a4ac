// Licensed under the Hungry Ghost Hive License. See LICENSE.

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { JiraClient } from './integrations/jira/client.js';
import { createToolHandlers } from './tools/handlers.js';
import {
  addCommentShape,
  getChildrenShape,
  getCommentsShape,
  getIssueShape,
  listEpicsShape,
  searchIssuesShape,
  updateIssueShape,
} from './tools/params.js';
import { getVersion } from './utils/version.js';

export const SERVER_NAME = 'jira-mcp-bridge';

/** Tool names exposed to MCP clients, in registration order */
export const TOOL_NAMES = [
  'search_issues',
  'get_issue',
  'add_comment',
  'get_children',
  'get_comments',
  'update_issue',
  'list_epics',
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

/**
 * Build an MCP server with every Jira tool registered against `client`.
 * The caller connects it to a transport.
 */
export function createServer(client: JiraClient): McpServer {
  const server = new McpServer(
    { name: SERVER_NAME, version: getVersion() },
    {
      instructions:
        'Jira MCP server - search, retrieve, comment on and update Jira issues, and browse epics and their children.',
    }
  );
  const handlers = createToolHandlers(client);

  server.registerTool(
    'search_issues',
    {
      title: 'Search Issues',
      description:
        'Search for Jira issues using JQL (Jira Query Language). Returns a list of issues matching the query.',
      inputSchema: searchIssuesShape,
    },
    params => handlers.searchIssues(params)
  );

  server.registerTool(
    'get_issue',
    {
      title: 'Get Issue',
      description:
        'Get detailed information about a specific Jira issue by its key (e.g., PROJ-123), including its comments.',
      inputSchema: getIssueShape,
    },
    params => handlers.getIssue(params)
  );

  server.registerTool(
    'add_comment',
    {
      title: 'Add Comment',
      description:
        'Add a comment to a Jira issue. Use this to leave notes, updates, or feedback on an issue.',
      inputSchema: addCommentShape,
    },
    params => handlers.addComment(params)
  );

  server.registerTool(
    'get_children',
    {
      title: 'Get Child Issues',
      description:
        'List the child issues of a parent issue, such as the stories of an epic or the subtasks of a story.',
      inputSchema: getChildrenShape,
    },
    params => handlers.getChildren(params)
  );

  server.registerTool(
    'get_comments',
    {
      title: 'Get Comments',
      description: 'List the comments on a Jira issue, one page at a time.',
      inputSchema: getCommentsShape,
    },
    params => handlers.getComments(params)
  );

  server.registerTool(
    'update_issue',
    {
      title: 'Update Issue',
      description:
        'Update fields of a Jira issue. Only the fields provided are changed; at least one must be given.',
      inputSchema: updateIssueShape,
    },
    params => handlers.updateIssue(params)
  );

  server.registerTool(
    'list_epics',
    {
      title: 'List Epics',
      description: 'List the epics of a Jira project, newest first.',
      inputSchema: listEpicsShape,
    },
    params => handlers.listEpics(params)
  );

  return server;
}
