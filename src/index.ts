/**
 * dom-tether - stable element handles over interchangeable drivers.
 *
 *   import { Session, StaticDriver } from 'dom-tether';
 *
 *   const session = new Session(new StaticDriver('<input id="q">'));
 *   const input = await session.find('css', '#q');
 *   await input.set('hello');
 *   await input.value(); // 'hello'
 */

export { Session, SessionOptions, ElementWarning, WarningListener } from './session';
export { SessionConfig, SessionConfigInput, SessionConfigSchema, resolveSessionConfig } from './config';

// Handles
export { NodeBase, QueryScope, SynchronizeOptions } from './node/base';
export { DocumentNode } from './node/document';
export { ElementHandle, TextType } from './node/element';
export { ClickOptions, requireExtended, supportsExtended, toExtendedClick } from './node/capabilities';

// Errors
export {
  ConfigError,
  DriverError,
  DriverErrorKind,
  ElementNotFoundError,
  NotSupportedByDriverError,
  ObsoleteElementError,
  ReadOnlyElementError,
  SynchronizeTimeoutError,
  UnsupportedCapabilityError,
  isDriverError,
} from './errors';

export { Logger, consoleLogger } from './utils/logger';

export * from './drivers';
