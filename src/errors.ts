/**
 * Error taxonomy for element handles.
 *
 * Drivers report failures as DriverError with a machine-readable `kind`.
 * The retry wrapper and stale reference recovery match those kinds against
 * explicit allow-lists (see isDriverError); anything else propagates.
 */

import type { ZodIssue } from 'zod';

/**
 * Failure classes a driver can report.
 */
export type DriverErrorKind =
  | 'stale_reference'
  | 'obsolete_node'
  | 'detached'
  | 'not_ready'
  | 'element_not_found'
  | 'not_supported'
  | 'invalid_selector'
  | 'protocol'
  | 'script';

/**
 * Tagged error raised at the driver boundary.
 */
export class DriverError extends Error {
  readonly error = 'driver_error';
  readonly kind: DriverErrorKind;

  constructor(kind: DriverErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DriverError';
    this.kind = kind;
  }
}

/**
 * The operation is not available on the current backend at all.
 */
export class NotSupportedByDriverError extends DriverError {
  readonly operation: string;

  constructor(operation: string, driverName?: string) {
    super(
      'not_supported',
      driverName
        ? `${operation} is not supported by the ${driverName} driver`
        : `${operation} is not supported by the driver`
    );
    this.name = 'NotSupportedByDriverError';
    this.operation = operation;
  }
}

/**
 * No node matched a locator.
 */
export class ElementNotFoundError extends DriverError {
  constructor(message: string) {
    super('element_not_found', message);
    this.name = 'ElementNotFoundError';
  }

  static forLocator(selector: string, value: string): ElementNotFoundError {
    return new ElementNotFoundError(`Unable to find ${selector} ${JSON.stringify(value)}`);
  }
}

/**
 * Extended arguments were supplied but the node binding does not accept them.
 */
export class UnsupportedCapabilityError extends Error {
  readonly error = 'unsupported_capability';
  readonly detail: string;
  readonly capability: string;

  constructor(capability: string, detail?: string) {
    const message = detail ?? `${capability} not supported by driver`;
    super(message);
    this.name = 'UnsupportedCapabilityError';
    this.detail = message;
    this.capability = capability;
  }
}

/**
 * Mutation attempted on a read-only element.
 */
export class ReadOnlyElementError extends Error {
  readonly error = 'readonly_element';

  constructor(message: string) {
    super(message);
    this.name = 'ReadOnlyElementError';
  }
}

/**
 * Every attempt within the wait budget raised a transient driver error.
 */
export class SynchronizeTimeoutError extends Error {
  readonly error: string = 'synchronize_timeout';
  readonly lastError: DriverError;
  readonly waitMs: number;

  constructor(lastError: DriverError, waitMs: number) {
    super(`Gave up after ${waitMs}ms: ${lastError.message}`, { cause: lastError });
    this.name = 'SynchronizeTimeoutError';
    this.lastError = lastError;
    this.waitMs = waitMs;
  }
}

/**
 * The handle's node stayed invalid (stale, obsolete or detached) until the
 * wait budget ran out and recovery could not replace it.
 */
export class ObsoleteElementError extends SynchronizeTimeoutError {
  override readonly error: string = 'obsolete_element';

  constructor(lastError: DriverError, waitMs: number) {
    super(lastError, waitMs);
    this.name = 'ObsoleteElementError';
    this.message = `Element is obsolete: ${lastError.message}`;
  }
}

/**
 * Session configuration failed validation.
 */
export class ConfigError extends Error {
  readonly error = 'invalid_config';
  readonly issues: ZodIssue[];

  constructor(issues: ZodIssue[]) {
    super(
      `Invalid session configuration: ${issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ')}`
    );
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * True when `error` is a DriverError whose kind is in `kinds`.
 */
export function isDriverError(
  error: unknown,
  kinds: readonly DriverErrorKind[]
): error is DriverError {
  return error instanceof DriverError && kinds.includes(error.kind);
}
