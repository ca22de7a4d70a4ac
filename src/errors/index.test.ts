// Licensed under the Hungry Ghost Hive License. See LICENSE.

import { describe, expect, it } from 'vitest';
import { JiraApiError } from '../integrations/jira/client.js';
import {
  BridgeError,
  ConfigurationError,
  describeError,
  OperationalError,
  TransportError,
  ValidationError,
} from './index.js';

describe('error hierarchy', () => {
  it('should tag each error class with its code', () => {
    expect(new BridgeError('x').code).toBe('BRIDGE_ERROR');
    expect(new ConfigurationError('x').code).toBe('CONFIGURATION_ERROR');
    expect(new ValidationError('x').code).toBe('VALIDATION_ERROR');
    expect(new TransportError('x').code).toBe('TRANSPORT_ERROR');
    expect(new OperationalError('x').code).toBe('OPERATIONAL_ERROR');
  });

  it('should keep instanceof working through subclasses', () => {
    const err = new JiraApiError('Jira API error (500) on GET /myself: boom', 500, 'boom');

    expect(err).toBeInstanceOf(JiraApiError);
    expect(err).toBeInstanceOf(OperationalError);
    expect(err).toBeInstanceOf(BridgeError);
    expect(err.name).toBe('JiraApiError');
    expect(err.statusCode).toBe(500);
    expect(err.responseBody).toBe('boom');
  });
});

describe('describeError', () => {
  it('should use the message of an Error', () => {
    expect(describeError(new Error('nope'))).toBe('nope');
  });

  it('should stringify anything else', () => {
    expect(describeError('plain')).toBe('plain');
    expect(describeError(42)).toBe('42');
  });
});

