// Licensed under the Hungry Ghost Hive License. See LICENSE.

/**
 * Base error class for all bridge errors
 */
export class BridgeError extends Error {
  public readonly code: string;

  constructor(message: string, code: string = 'BRIDGE_ERROR') {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    Object.setPrototypeOf(this, BridgeError.prototype);
  }
}

/**
 * Configuration-related errors (missing environment values, malformed URLs, etc.)
 */
export class ConfigurationError extends BridgeError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Tool parameter errors detected before any request is sent
 */
export class ValidationError extends BridgeError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * Connection failures, timeouts and response bodies that cannot be decoded
 */
export class TransportError extends BridgeError {
  constructor(message: string) {
    super(message, 'TRANSPORT_ERROR');
    Object.setPrototypeOf(this, TransportError.prototype);
  }
}

/**
 * Runtime operational errors (remote service rejected a request, etc.)
 */
export class OperationalError extends BridgeError {
  constructor(message: string) {
    super(message, 'OPERATIONAL_ERROR');
    Object.setPrototypeOf(this, OperationalError.prototype);
  }
}

/**
 * Extract a displayable message from anything that was thrown.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

