// Licensed under the Hungry Ghost Hive License. See LICENSE.

import type { AdfDocument, AdfNode } from './types.js';

/**
 * Wrap plain text in the minimal ADF envelope Jira requires for comment and
 * description bodies: one paragraph holding one text run. The text is kept
 * exactly as given.
 */
export function textToAdf(text: string): AdfDocument {
  return {
    version: 1,
    type: 'doc',
    content: [
      {
        type: 'paragraph',
        content: [{ type: 'text', text }],
      },
    ],
  };
}

/** Node types that sit inside a paragraph rather than forming a block */
const INLINE_NODE_TYPES = new Set([
  'text',
  'hardBreak',
  'mention',
  'emoji',
  'inlineCard',
  'date',
  'status',
]);

/**
 * Flatten an ADF document to plain text, one line per paragraph.
 * Text runs inside a paragraph are concatenated; container blocks (lists,
 * list items, quotes, panels) put each nested block on its own line.
 */
export function adfToPlainText(doc: AdfDocument | null | undefined): string {
  if (!doc || !doc.content) return '';

  return collectBlocks(doc.content);
}

function collectBlocks(nodes: AdfNode[]): string {
  return nodes.map(node => collectText(node)).join('\n');
}

function collectText(node: AdfNode): string {
  if (node.type === 'text') {
    return node.text ?? '';
  }
  if (node.type === 'hardBreak') {
    return '\n';
  }
  if (!node.content) {
    return '';
  }
  if (node.content.some(child => !INLINE_NODE_TYPES.has(child.type))) {
    return collectBlocks(node.content);
  }
  return node.content.map(child => collectText(child)).join('');
}
