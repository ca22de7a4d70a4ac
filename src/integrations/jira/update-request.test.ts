// Licensed under the Hungry Ghost Hive License. See LICENSE.

import { describe, expect, it } from 'vitest';
import { UpdateRequest } from './update-request.js';

describe('UpdateRequest', () => {
  it('should start empty and serialize no fields', () => {
    const update = new UpdateRequest();

    expect(update.isEmpty()).toBe(true);
    expect(update.fieldNames()).toEqual([]);
    expect(update.toPayload()).toEqual({ fields: {} });
  });

  it('should serialize only the fields that were set', () => {
    const update = new UpdateRequest().setSummary('New title').setPriorityByName('High');

    expect(update.toPayload()).toEqual({
      fields: { summary: 'New title', priority: { name: 'High' } },
    });
    expect(Object.keys(update.toPayload().fields)).toEqual(['summary', 'priority']);
  });

  it('should map every setter to its Jira field shape', () => {
    const update = new UpdateRequest()
      .setSummary('S')
      .setDescription('Body text')
      .setDueDate('2024-06-30')
      .setPriorityByName('Low')
      .setAssigneeByAccountId('acc-42')
      .setParentByKey('PROJ-1')
      .setLabels(['a', 'b']);

    expect(update.toPayload()).toEqual({
      fields: {
        summary: 'S',
        description: {
          version: 1,
          type: 'doc',
          content: [{ type: 'paragraph', content: [{ type: 'text', text: 'Body text' }] }],
        },
        duedate: '2024-06-30',
        priority: { name: 'Low' },
        assignee: { accountId: 'acc-42' },
        parent: { key: 'PROJ-1' },
        labels: ['a', 'b'],
      },
    });
    expect(update.fieldNames()).toEqual([
      'summary',
      'description',
      'duedate',
      'priority',
      'assignee',
      'parent',
      'labels',
    ]);
  });

  it('should keep the latest value when a field is set twice', () => {
    const update = new UpdateRequest().setSummary('first').setLabels([]).setSummary('second');

    expect(update.toPayload()).toEqual({ fields: { summary: 'second', labels: [] } });
    expect(update.fieldNames()).toEqual(['summary', 'labels']);
  });

  it('should copy label arrays', () => {
    const labels = ['one'];
    const update = new UpdateRequest().setLabels(labels);
    labels.push('two');

    expect(update.toPayload()).toEqual({ fields: { labels: ['one'] } });
  });

  it('should accept arbitrary fields through set', () => {
    const update = new UpdateRequest().set('customfield_10016', 5);

    expect(update.toPayload()).toEqual({ fields: { customfield_10016: 5 } });
  });
});
