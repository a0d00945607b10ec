/**
 * Playwright driver - element handles over a playwright-core Page.
 *
 * Playwright handles survive re-renders only as long as the DOM node does;
 * once the node is removed calls fail with "not attached to the DOM",
 * which is reported as `stale_reference` so handles reload. Actions run
 * with a short actionability timeout so that a single attempt never holds
 * synchronize() past its deadline; the timeout surfaces as `not_ready` and
 * is retried.
 *
 *   const browser = await chromium.launch();
 *   const page = await browser.newPage();
 *   const session = new Session(new PlaywrightDriver(page));
 */

import { errors } from 'playwright-core';
import type { ElementHandle, Page } from 'playwright-core';

import { DriverError, NotSupportedByDriverError } from '../errors';
import {
  DEFAULT_ERROR_TAXONOMY,
  Driver,
  DriverNode,
  ErrorTaxonomy,
  ExtendedClickOptions,
  FieldValue,
  KeyInput,
  KeyModifier,
  Locator,
  NamedKey,
  NodeCapabilities,
  NodeValue,
  SetOptions,
  SpecialKey,
} from './protocol';

type PlaywrightHandle = ElementHandle<SVGElement | HTMLElement>;
type PlaywrightModifier = 'Alt' | 'Control' | 'Meta' | 'Shift';

export const DEFAULT_ACTION_TIMEOUT_MS = 100;

export interface PlaywrightDriverOptions {
  /** Actionability timeout of a single click, fill or hover. Default: 100 */
  actionTimeoutMs?: number;
}

const CAPABILITIES: NodeCapabilities = {
  click: true,
  rightClick: true,
  doubleClick: true,
  set: false,
};

const MODIFIERS: Record<KeyModifier, PlaywrightModifier> = {
  alt: 'Alt',
  control: 'Control',
  meta: 'Meta',
  shift: 'Shift',
};

const KEY_NAMES: Record<NamedKey, string> = {
  backspace: 'Backspace',
  tab: 'Tab',
  enter: 'Enter',
  escape: 'Escape',
  space: 'Space',
  page_up: 'PageUp',
  page_down: 'PageDown',
  end: 'End',
  home: 'Home',
  left: 'ArrowLeft',
  up: 'ArrowUp',
  right: 'ArrowRight',
  down: 'ArrowDown',
  insert: 'Insert',
  delete: 'Delete',
  ...MODIFIERS,
};

const STALE_PATTERN = /not attached to the DOM|Element is detached|JSHandle is disposed/i;
const DETACHED_PATTERN = /has been closed|Target closed/i;
const SELECTOR_PATTERN = /is not a valid selector|Unexpected token|Failed to parse selector/i;

/**
 * Map a Playwright failure onto the driver error taxonomy. Errors that are
 * not Playwright's own (assertions, type errors) are returned unchanged.
 */
export function fromPlaywrightError(error: unknown): unknown {
  if (error instanceof DriverError) {
    return error;
  }
  if (error instanceof errors.TimeoutError) {
    return new DriverError('not_ready', error.message, { cause: error });
  }
  if (!(error instanceof Error)) {
    return error;
  }
  if (STALE_PATTERN.test(error.message)) {
    return new DriverError('stale_reference', error.message, { cause: error });
  }
  if (DETACHED_PATTERN.test(error.message)) {
    return new DriverError('detached', error.message, { cause: error });
  }
  if (SELECTOR_PATTERN.test(error.message)) {
    return new DriverError('invalid_selector', error.message, { cause: error });
  }
  return error;
}

async function guarded<T>(call: () => Promise<T>): Promise<T> {
  try {
    return await call();
  } catch (error) {
    throw fromPlaywrightError(error);
  }
}

function selectorFor(locator: Locator): string {
  return locator.selector === 'xpath' ? `xpath=${locator.value}` : locator.value;
}

export class PlaywrightNode implements DriverNode {
  readonly handle: PlaywrightHandle;
  private page: Page;
  private timeout: number;

  constructor(page: Page, handle: PlaywrightHandle, actionTimeoutMs = DEFAULT_ACTION_TIMEOUT_MS) {
    this.page = page;
    this.handle = handle;
    this.timeout = actionTimeoutMs;
  }

  capabilities(): NodeCapabilities {
    return CAPABILITIES;
  }

  equals(other: DriverNode): boolean {
    return other instanceof PlaywrightNode && other.handle === this.handle;
  }

  async dispose(): Promise<void> {
    await guarded(() => this.handle.dispose());
  }

  getAttribute(name: string): Promise<string | null> {
    return guarded(() => this.handle.getAttribute(name));
  }

  async allText(): Promise<string> {
    return (await guarded(() => this.handle.textContent())) ?? '';
  }

  visibleText(): Promise<string> {
    return guarded(() => this.handle.innerText());
  }

  value(): Promise<NodeValue> {
    return guarded(() =>
      this.handle.evaluate((el): string | string[] | null => {
        if (el instanceof HTMLSelectElement && el.multiple) {
          return Array.from(el.selectedOptions, option => option.value);
        }
        if (
          el instanceof HTMLInputElement ||
          el instanceof HTMLTextAreaElement ||
          el instanceof HTMLSelectElement ||
          el instanceof HTMLOptionElement ||
          el instanceof HTMLButtonElement
        ) {
          return el.value;
        }
        return null;
      })
    );
  }

  async set(value: FieldValue, options?: SetOptions): Promise<void> {
    if (options !== undefined) {
      throw new NotSupportedByDriverError('set options', 'playwright');
    }
    if (typeof value === 'boolean') {
      await guarded(() => this.handle.setChecked(value, { timeout: this.timeout }));
    } else {
      await guarded(() => this.handle.fill(value, { timeout: this.timeout }));
    }
  }

  async selectOption(): Promise<void> {
    await this.markOption(true);
  }

  async unselectOption(): Promise<void> {
    if (!(await this.markOption(false))) {
      throw new DriverError('not_supported', 'Cannot unselect option from single select box');
    }
  }

  async click(options?: ExtendedClickOptions): Promise<void> {
    await guarded(() => this.handle.click(this.clickOptions(options)));
  }

  async rightClick(options?: ExtendedClickOptions): Promise<void> {
    await guarded(() => this.handle.click({ ...this.clickOptions(options), button: 'right' }));
  }

  async doubleClick(options?: ExtendedClickOptions): Promise<void> {
    await guarded(() => this.handle.dblclick(this.clickOptions(options)));
  }

  async hover(): Promise<void> {
    await guarded(() => this.handle.hover({ timeout: this.timeout }));
  }

  async dragTo(target: DriverNode): Promise<void> {
    if (!(target instanceof PlaywrightNode)) {
      throw new DriverError('protocol', 'Cannot drag to a node from another driver');
    }
    const from = await this.center();
    const to = await target.center();
    await guarded(async () => {
      await this.page.mouse.move(from.x, from.y);
      await this.page.mouse.down();
      await this.page.mouse.move(to.x, to.y);
      await this.page.mouse.up();
    });
  }

  async sendKeys(...keys: KeyInput[]): Promise<void> {
    await guarded(async () => {
      await this.handle.focus();
      const keyboard = this.page.keyboard;
      for (const input of keys) {
        if (!Array.isArray(input)) {
          await this.type(input);
          continue;
        }
        const held: string[] = [];
        for (const part of input) {
          if (typeof part !== 'string' && part.key in MODIFIERS) {
            const name = KEY_NAMES[part.key];
            held.push(name);
            await keyboard.down(name);
          } else {
            await this.type(part);
          }
        }
        for (const name of held.reverse()) {
          await keyboard.up(name);
        }
      }
    });
  }

  async trigger(event: string): Promise<void> {
    await guarded(() => this.handle.dispatchEvent(event));
  }

  tagName(): Promise<string> {
    return guarded(() => this.handle.evaluate(el => el.tagName.toLowerCase()));
  }

  path(): Promise<string> {
    return guarded(() =>
      this.handle.evaluate(el => {
        const segments: string[] = [];
        for (let current: Element | null = el; current; current = current.parentElement) {
          const tag = current.tagName;
          const parent: Element | null = current.parentElement;
          const siblings = parent
            ? Array.from(parent.children).filter(child => child.tagName === tag)
            : [current];
          const name = tag.toLowerCase();
          segments.unshift(
            siblings.length > 1 ? `${name}[${siblings.indexOf(current) + 1}]` : name
          );
        }
        return `/${segments.join('/')}`;
      })
    );
  }

  isVisible(): Promise<boolean> {
    return guarded(() => this.handle.isVisible());
  }

  isChecked(): Promise<boolean> {
    return guarded(() => this.handle.evaluate(el => el instanceof HTMLInputElement && el.checked));
  }

  isSelected(): Promise<boolean> {
    return guarded(() =>
      this.handle.evaluate(el => el instanceof HTMLOptionElement && el.selected)
    );
  }

  isDisabled(): Promise<boolean> {
    return guarded(() => this.handle.isDisabled());
  }

  isReadonly(): Promise<boolean> {
    return guarded(() =>
      this.handle.evaluate(
        el => (el instanceof HTMLInputElement || el instanceof HTMLTextAreaElement) && el.readOnly
      )
    );
  }

  isMultiple(): Promise<boolean> {
    return guarded(() =>
      this.handle.evaluate(
        el => (el instanceof HTMLSelectElement || el instanceof HTMLInputElement) && el.multiple
      )
    );
  }

  private clickOptions(options?: ExtendedClickOptions): {
    timeout: number;
    modifiers?: PlaywrightModifier[];
    position?: { x: number; y: number };
  } {
    const result: {
      timeout: number;
      modifiers?: PlaywrightModifier[];
      position?: { x: number; y: number };
    } = { timeout: this.timeout };
    if (!options) {
      return result;
    }
    if (options.modifiers.length > 0) {
      result.modifiers = options.modifiers.map(modifier => MODIFIERS[modifier]);
    }
    if (options.offset) {
      result.position = { x: options.offset.x, y: options.offset.y };
    }
    return result;
  }

  private async type(input: string | SpecialKey): Promise<void> {
    if (typeof input === 'string') {
      await this.page.keyboard.type(input);
    } else {
      await this.page.keyboard.press(KEY_NAMES[input.key]);
    }
  }

  private async center(): Promise<{ x: number; y: number }> {
    const box = await guarded(() => this.handle.boundingBox());
    if (!box) {
      throw new DriverError('not_ready', 'Element has no layout box');
    }
    return { x: box.x + box.width / 2, y: box.y + box.height / 2 };
  }

  private markOption(selected: boolean): Promise<boolean> {
    return guarded(() =>
      this.handle.evaluate((el, on) => {
        if (!(el instanceof HTMLOptionElement)) {
          return false;
        }
        const select = el.closest('select');
        if (!on && (!select || !select.multiple)) {
          return false;
        }
        el.selected = on;
        select?.dispatchEvent(new Event('change', { bubbles: true }));
        return true;
      }, selected)
    );
  }
}

export class PlaywrightDriver implements Driver {
  readonly name = 'playwright';
  readonly waits = true;
  readonly errorTaxonomy: ErrorTaxonomy = DEFAULT_ERROR_TAXONOMY;
  private page: Page;
  private actionTimeoutMs: number;

  constructor(page: Page, options: PlaywrightDriverOptions = {}) {
    this.page = page;
    this.actionTimeoutMs = options.actionTimeoutMs ?? DEFAULT_ACTION_TIMEOUT_MS;
  }

  async findAll(locator: Locator, within?: DriverNode): Promise<DriverNode[]> {
    const root = within instanceof PlaywrightNode ? within.handle : undefined;
    if (within !== undefined && root === undefined) {
      throw new DriverError('protocol', 'Cannot search within a node from another driver');
    }
    const selector = selectorFor(locator);
    const handles = await guarded(() => (root ? root.$$(selector) : this.page.$$(selector)));
    return handles.map(handle => new PlaywrightNode(this.page, handle, this.actionTimeoutMs));
  }
}
