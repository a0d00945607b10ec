/**
 * Driver protocol - the boundary between element handles and a backend.
 *
 * A Driver resolves locators to DriverNodes; a DriverNode is the native
 * binding an ElementHandle wraps. Every backend declares up front which
 * extended argument forms its nodes accept (NodeCapabilities) and which
 * failure kinds count as transient or as an invalid element reference
 * (ErrorTaxonomy).
 *
 * Implementers:
 * - CDPDriver: DevTools protocol over any CDPTransport
 * - PlaywrightDriver: playwright-core Page / ElementHandle
 * - StaticDriver: in-memory HTML document (cheerio), non-waiting
 */

import type { DriverErrorKind } from '../errors';

/**
 * Selector language of a locator.
 */
export type SelectorKind = 'css' | 'xpath';

/**
 * Options captured with a locator at lookup time.
 */
export interface LookupOptions {
  /** Only match visible nodes. Default: session's ignoreHiddenElements */
  visible?: boolean;
}

/**
 * Immutable description of how a node was found.
 */
export interface Locator {
  readonly selector: SelectorKind;
  readonly value: string;
  readonly options: Readonly<LookupOptions>;
}

/**
 * Keys that can be held down during a click.
 */
export type KeyModifier = 'alt' | 'control' | 'meta' | 'shift';

/**
 * Offset from the top-left corner of the node.
 */
export interface ClickOffset {
  x: number;
  y: number;
}

/**
 * Extended click form: modifier keys plus an optional offset.
 */
export interface ExtendedClickOptions {
  modifiers: KeyModifier[];
  offset?: ClickOffset;
}

/**
 * Extended set form.
 */
export interface SetOptions {
  /** How existing content is cleared before typing. Default: replace the value */
  clear?: 'none' | 'backspace';
}

/**
 * Values a form field can be set to: text for inputs, a boolean for
 * checkboxes and radio buttons.
 */
export type FieldValue = string | boolean;

/**
 * A node's value: text for most fields, a list for multi-selects.
 */
export type NodeValue = string | string[] | null;

/**
 * A non-printing key, e.g. `{ key: 'enter' }`.
 */
export interface SpecialKey {
  readonly key: NamedKey;
}

/**
 * A keystroke: literal text, a special key, or a chord (held together).
 */
export type KeyInput = string | SpecialKey | Array<string | SpecialKey>;

/**
 * Build a SpecialKey.
 */
export function key(name: NamedKey): SpecialKey {
  return { key: name };
}

/**
 * Named keys understood by sendKeys.
 */
export type NamedKey =
  | 'backspace'
  | 'tab'
  | 'enter'
  | 'escape'
  | 'space'
  | 'page_up'
  | 'page_down'
  | 'end'
  | 'home'
  | 'left'
  | 'up'
  | 'right'
  | 'down'
  | 'insert'
  | 'delete'
  | KeyModifier;

/**
 * Operations with an optional extended argument form.
 */
export type ExtendedOperation = 'click' | 'rightClick' | 'doubleClick' | 'set';

/**
 * Static capability descriptor: which operations accept their extended form.
 */
export type NodeCapabilities = Readonly<Record<ExtendedOperation, boolean>>;

/**
 * Capability descriptor for bindings that only take minimal forms.
 */
export const MINIMAL_CAPABILITIES: NodeCapabilities = {
  click: false,
  rightClick: false,
  doubleClick: false,
  set: false,
};

/**
 * Which DriverError kinds the core treats as expected.
 */
export interface ErrorTaxonomy {
  /** Retried by synchronize until the deadline */
  readonly transient: readonly DriverErrorKind[];
  /** The node reference is no longer usable (stale, obsolete, detached) */
  readonly invalidElement: readonly DriverErrorKind[];
}

export const DEFAULT_ERROR_TAXONOMY: ErrorTaxonomy = {
  invalidElement: ['stale_reference', 'obsolete_node', 'detached'],
  transient: ['stale_reference', 'obsolete_node', 'detached', 'element_not_found', 'not_ready'],
};

/**
 * Driver-specific representation of a remote node.
 *
 * Methods taking an optional options argument have a minimal form (called
 * without it) and an extended form; callers must check capabilities()
 * before passing options.
 */
export interface DriverNode {
  /** Static descriptor of supported extended forms */
  capabilities(): NodeCapabilities;
  /** Whether `other` is a binding to the same remote node */
  equals(other: DriverNode): boolean;
  /** Release the remote reference once no handle is bound to it */
  dispose(): Promise<void>;

  getAttribute(name: string): Promise<string | null>;
  allText(): Promise<string>;
  visibleText(): Promise<string>;
  value(): Promise<NodeValue>;
  set(value: FieldValue, options?: SetOptions): Promise<void>;
  selectOption(): Promise<void>;
  unselectOption(): Promise<void>;

  click(options?: ExtendedClickOptions): Promise<void>;
  rightClick(options?: ExtendedClickOptions): Promise<void>;
  doubleClick(options?: ExtendedClickOptions): Promise<void>;
  hover(): Promise<void>;
  dragTo(target: DriverNode): Promise<void>;
  sendKeys(...keys: KeyInput[]): Promise<void>;
  trigger(event: string): Promise<void>;

  tagName(): Promise<string>;
  /** XPath describing where the node sits in the document */
  path(): Promise<string>;
  isVisible(): Promise<boolean>;
  isChecked(): Promise<boolean>;
  isSelected(): Promise<boolean>;
  isDisabled(): Promise<boolean>;
  isReadonly(): Promise<boolean>;
  isMultiple(): Promise<boolean>;
}

/**
 * A backend able to resolve locators to nodes.
 */
export interface Driver {
  readonly name: string;
  /**
   * Whether the backend's document changes asynchronously. Non-waiting
   * drivers are retried only when a reload actually replaced the node.
   */
  readonly waits: boolean;
  readonly errorTaxonomy: ErrorTaxonomy;

  /**
   * Find every node matching `locator`, in document order.
   *
   * @param within - Restrict the search to descendants of this node
   * @throws DriverError(kind='invalid_selector') for malformed selectors
   */
  findAll(locator: Locator, within?: DriverNode): Promise<DriverNode[]>;
}
