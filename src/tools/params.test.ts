// Licensed under the Hungry Ghost Hive License. See LICENSE.

import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import {
  addCommentShape,
  DEFAULT_MAX_RESULTS,
  getCommentsShape,
  MAX_RESULTS_CEILING,
  normalizeMaxResults,
  normalizeStartAt,
  searchIssuesShape,
  updateIssueShape,
} from './params.js';

describe('normalizeMaxResults', () => {
  it('should default to 50', () => {
    expect(normalizeMaxResults(undefined)).toBe(DEFAULT_MAX_RESULTS);
    expect(DEFAULT_MAX_RESULTS).toBe(50);
  });

  it('should clamp to the ceiling of 100', () => {
    expect(normalizeMaxResults(500)).toBe(MAX_RESULTS_CEILING);
    expect(normalizeMaxResults(101)).toBe(100);
  });

  it('should pass values within range through', () => {
    expect(normalizeMaxResults(1)).toBe(1);
    expect(normalizeMaxResults(75)).toBe(75);
    expect(normalizeMaxResults(100)).toBe(100);
  });

  it('should raise zero and negative values to 1', () => {
    expect(normalizeMaxResults(0)).toBe(1);
    expect(normalizeMaxResults(-5)).toBe(1);
  });

  it('should truncate fractional values before clamping', () => {
    expect(normalizeMaxResults(2.5)).toBe(2);
    expect(normalizeMaxResults(0.9)).toBe(1);
    expect(normalizeMaxResults(100.7)).toBe(100);
  });
});

describe('normalizeStartAt', () => {
  it('should default to 0', () => {
    expect(normalizeStartAt(undefined)).toBe(0);
  });

  it('should never go below 0', () => {
    expect(normalizeStartAt(-3)).toBe(0);
    expect(normalizeStartAt(40)).toBe(40);
  });

  it('should truncate fractional offsets', () => {
    expect(normalizeStartAt(1.5)).toBe(1);
  });
});

describe('parameter shapes', () => {
  const searchIssues = z.object(searchIssuesShape);
  const addComment = z.object(addCommentShape);
  const getComments = z.object(getCommentsShape);
  const updateIssue = z.object(updateIssueShape);

  it('should accept a search without max_results', () => {
    expect(searchIssues.parse({ jql: 'project = PROJ' })).toEqual({ jql: 'project = PROJ' });
  });

  it('should leave out-of-range and fractional limits to normalization', () => {
    expect(searchIssues.safeParse({ jql: 'x', max_results: 500 }).success).toBe(true);
    expect(searchIssues.safeParse({ jql: 'x', max_results: 2.5 }).success).toBe(true);
    expect(getComments.safeParse({ issue_key: 'A-1', start_at: 1.5 }).success).toBe(true);
  });

  it('should reject a missing query', () => {
    expect(searchIssues.safeParse({}).success).toBe(false);
  });

  it('should accept an empty comment', () => {
    expect(addComment.parse({ issue_key: 'A-1', comment: '' })).toEqual({
      issue_key: 'A-1',
      comment: '',
    });
  });

  it('should accept an update with only the issue key', () => {
    expect(updateIssue.safeParse({ issue_key: 'A-1' }).success).toBe(true);
  });

  it('should pass the due date through for Jira to validate', () => {
    expect(updateIssue.parse({ issue_key: 'A-1', due_date: '31/12/2024' })).toEqual({
      issue_key: 'A-1',
      due_date: '31/12/2024',
    });
  });
});
