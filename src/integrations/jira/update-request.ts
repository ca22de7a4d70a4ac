// Licensed under the Hungry Ghost Hive License. See LICENSE.

import { textToAdf } from './adf-utils.js';
import type { AdfDocument, JsonObject, JsonValue, UpdateIssuePayload } from './types.js';

/**
 * Builder for a partial issue update.
 *
 * Jira's `PUT /issue/{key}` replaces only the fields named in the payload, so
 * the builder records exactly the fields a caller sets and nothing else.
 */
export class UpdateRequest {
  private readonly fields = new Map<string, JsonValue>();

  set(field: string, value: JsonValue): this {
    this.fields.set(field, value);
    return this;
  }

  setSummary(summary: string): this {
    return this.set('summary', summary);
  }

  setDescription(description: string | AdfDocument): this {
    const doc = typeof description === 'string' ? textToAdf(description) : description;
    return this.set('description', adfToJson(doc));
  }

  /** Due date in `YYYY-MM-DD` form */
  setDueDate(dueDate: string): this {
    return this.set('duedate', dueDate);
  }

  setPriorityByName(name: string): this {
    return this.set('priority', { name });
  }

  setAssigneeByAccountId(accountId: string): this {
    return this.set('assignee', { accountId });
  }

  setParentByKey(key: string): this {
    return this.set('parent', { key });
  }

  setLabels(labels: string[]): this {
    return this.set('labels', [...labels]);
  }

  isEmpty(): boolean {
    return this.fields.size === 0;
  }

  /** Names of the fields set so far, in the order they were first set */
  fieldNames(): string[] {
    return [...this.fields.keys()];
  }

  toPayload(): UpdateIssuePayload {
    const fields: JsonObject = {};
    for (const [name, value] of this.fields) {
      fields[name] = value;
    }
    return { fields };
  }
}

function adfToJson(doc: AdfDocument): JsonValue {
  return JSON.parse(JSON.stringify(doc)) as JsonValue;
}
