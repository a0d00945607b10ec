/**
 * Driver backends for element handles.
 *
 * Drivers
 * -------
 *
 * **CDPDriver**
 *     DevTools protocol over any CDPTransport. Use this when you hold a raw
 *     CDP client or session.
 *
 * **PlaywrightDriver**
 *     Wraps a playwright-core Page; nodes are Playwright element handles.
 *
 * **StaticDriver**
 *     In-memory HTML document. Non-waiting; loading new HTML makes every
 *     earlier node obsolete.
 *
 *   import { StaticDriver } from 'dom-tether';
 *
 *   const driver = new StaticDriver('<button id="go">Go</button>');
 *   driver.load('<button id="go" disabled>Go</button>');
 */

// Protocol and types
export {
  Driver,
  DriverNode,
  ErrorTaxonomy,
  DEFAULT_ERROR_TAXONOMY,
  ExtendedClickOptions,
  ExtendedOperation,
  FieldValue,
  KeyInput,
  KeyModifier,
  Locator,
  LookupOptions,
  MINIMAL_CAPABILITIES,
  NamedKey,
  NodeCapabilities,
  NodeValue,
  SelectorKind,
  SetOptions,
  SpecialKey,
  key,
} from './protocol';

// CDP
export { CDPTransport, CDPDriver, CDPRuntime, toDriverError } from './cdp-driver';
export { CDPNode } from './cdp-node';

// Playwright
export {
  DEFAULT_ACTION_TIMEOUT_MS,
  PlaywrightDriver,
  PlaywrightDriverOptions,
  PlaywrightNode,
  fromPlaywrightError,
} from './playwright-driver';

// Simulated document
export { StaticDriver, StaticDocument } from './static-driver';
export { StaticNode } from './static-node';
