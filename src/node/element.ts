/**
 * ElementHandle - a stable local handle onto a remote DOM node.
 *
 * Every operation runs through synchronize(), so it tolerates a page that
 * is still settling. Click and set variants that take extra arguments
 * check the node's declared capabilities before dispatching them.
 * Reloadable handles re-run their locator when the node goes stale.
 *
 *   const field = await session.find('css', '#email');
 *   await field.set('someone@example.com');
 *   await (await session.find('css', 'button[type=submit]')).click({ modifiers: ['shift'] });
 */

import type {
  DriverNode,
  FieldValue,
  KeyInput,
  Locator,
  NodeValue,
  SetOptions,
} from '../drivers/protocol';
import { ReadOnlyElementError, isDriverError } from '../errors';
import type { Session } from '../session';
import { NodeBase, QueryScope } from './base';
import { ClickOptions, requireExtended, supportsExtended, toExtendedClick } from './capabilities';

export type TextType = 'all' | 'visible';

type ClickOperation = 'click' | 'rightClick' | 'doubleClick';

export class ElementHandle extends NodeBase {
  readonly locator: Locator;
  private nativeBinding: DriverNode;
  private readonly scope: QueryScope;
  private reloadable: boolean = false;

  constructor(session: Session, nativeBinding: DriverNode, scope: QueryScope, locator: Locator) {
    super(session);
    this.nativeBinding = nativeBinding;
    this.scope = scope;
    this.locator = Object.freeze({
      selector: locator.selector,
      value: locator.value,
      options: Object.freeze({ ...locator.options }),
    });
  }

  get isReloadable(): boolean {
    return this.reloadable;
  }

  /**
   * Opt this handle into stale reference recovery.
   */
  allowReload(): this {
    this.reloadable = true;
    return this;
  }

  /**
   * Text of the element. Without `type`, visible text is returned when the
   * session ignores hidden elements or asks for visible text only.
   */
  async text(type?: TextType): Promise<string> {
    return this.synchronize(() => this.textOf(this.nativeBinding, type));
  }

  async getAttribute(name: string): Promise<string | null> {
    return this.synchronize(() => this.nativeBinding.getAttribute(name));
  }

  async value(): Promise<NodeValue> {
    return this.synchronize(() => this.nativeBinding.value());
  }

  /**
   * Set the value of a form field.
   *
   * Options are driver specific. When the driver cannot take them the
   * session's unsupportedSetOptions policy decides between failing and
   * warning then setting the plain value.
   *
   * @throws ReadOnlyElementError before touching the field if it is read-only
   * @throws UnsupportedCapabilityError for options the driver does not support
   */
  async set(value: FieldValue, options: SetOptions = {}): Promise<this> {
    if (await this.isReadonly()) {
      throw new ReadOnlyElementError(`Attempt to set readonly element with value: ${value}`);
    }

    const hasOptions = Object.values(options).some(option => option !== undefined);
    const warnOnly = this.session.config.unsupportedSetOptions === 'warn';

    let warned = false;

    await this.synchronize(async () => {
      const node = this.nativeBinding;
      if (!hasOptions) {
        return node.set(value);
      }
      if (!warnOnly) {
        requireExtended('set', node);
        return node.set(value, options);
      }
      if (supportsExtended('set', node)) {
        return node.set(value, options);
      }
      if (!warned) {
        warned = true;
        this.session.warn({
          code: 'unsupported_set_options',
          message: "Options passed to set() but the driver doesn't support them",
        });
      }
      return node.set(value);
    });
    return this;
  }

  /**
   * Select this option element. Selecting a disabled option proceeds but
   * emits a `disabled_option_selected` warning.
   */
  async selectOption(): Promise<this> {
    let warned = false;
    await this.synchronize(async () => {
      const node = this.nativeBinding;
      if (!warned && (await node.isDisabled())) {
        const current = await node.value();
        const label =
          typeof current === 'string' && current !== '' ? current : await this.textOf(node);
        this.session.warn({
          code: 'disabled_option_selected',
          message: `Attempt to select disabled option: ${label}`,
        });
        warned = true;
      }
      await node.selectOption();
    });
    return this;
  }

  async unselectOption(): Promise<this> {
    await this.synchronize(() => this.nativeBinding.unselectOption());
    return this;
  }

  /**
   * Click the element, optionally holding modifier keys and offsetting the
   * click from the top-left corner. Without options the element's centre
   * is clicked and the driver's capabilities are not consulted.
   */
  async click(options: ClickOptions = {}): Promise<this> {
    return this.dispatchClick('click', options);
  }

  async rightClick(options: ClickOptions = {}): Promise<this> {
    return this.dispatchClick('rightClick', options);
  }

  async doubleClick(options: ClickOptions = {}): Promise<this> {
    return this.dispatchClick('doubleClick', options);
  }

  /**
   * Send keystrokes to the element.
   *
   *   await input.sendKeys('tet', key('left'), 's');     // value: 'test'
   *   await input.sendKeys([key('control'), 'a'], key('delete'));
   */
  async sendKeys(...keys: KeyInput[]): Promise<this> {
    await this.synchronize(() => this.nativeBinding.sendKeys(...keys));
    return this;
  }

  async hover(): Promise<this> {
    await this.synchronize(() => this.nativeBinding.hover());
    return this;
  }

  /**
   * Dispatch a DOM event such as `focus` or `mouseover`.
   */
  async trigger(event: string): Promise<this> {
    await this.synchronize(() => this.nativeBinding.trigger(event));
    return this;
  }

  async dragTo(target: ElementHandle): Promise<this> {
    await this.synchronize(() => this.nativeBinding.dragTo(target.nativeBinding));
    return this;
  }

  async tagName(): Promise<string> {
    return this.synchronize(() => this.nativeBinding.tagName());
  }

  /**
   * XPath expression describing where the element sits on the page.
   */
  async path(): Promise<string> {
    return this.synchronize(() => this.nativeBinding.path());
  }

  async isVisible(): Promise<boolean> {
    return this.synchronize(() => this.nativeBinding.isVisible());
  }

  async isChecked(): Promise<boolean> {
    return this.synchronize(() => this.nativeBinding.isChecked());
  }

  async isSelected(): Promise<boolean> {
    return this.synchronize(() => this.nativeBinding.isSelected());
  }

  async isDisabled(): Promise<boolean> {
    return this.synchronize(() => this.nativeBinding.isDisabled());
  }

  async isReadonly(): Promise<boolean> {
    return this.synchronize(() => this.nativeBinding.isReadonly());
  }

  async isMultiple(): Promise<boolean> {
    return this.synchronize(() => this.nativeBinding.isMultiple());
  }

  /**
   * Re-resolve the locator against the scope and swap in the fresh node.
   *
   * Only reloadable handles do anything. When the element no longer exists
   * the current node is kept; lookup failures other than "not found" or an
   * invalid element reference propagate.
   */
  async reload(): Promise<this> {
    if (!this.reloadable) {
      return this;
    }
    const expected = [...this.session.driver.errorTaxonomy.invalidElement, 'element_not_found' as const];
    try {
      const scope = await this.scope.reload();
      const fresh = await scope.resolveFirst(this.locator);
      if (fresh && !fresh.equals(this.nativeBinding)) {
        const previous = this.nativeBinding;
        this.nativeBinding = fresh;
        await this.release(previous);
      }
    } catch (error) {
      if (!isDriverError(error, expected)) {
        throw error;
      }
      this.session.logger.debug(`Reload kept previous node: ${error.message}`);
    }
    return this;
  }

  /**
   * Human-readable summary for logs. Leaves out the path when the driver
   * cannot produce one and reports an obsolete handle instead of throwing.
   */
  async inspect(): Promise<string> {
    const node = this.nativeBinding;
    try {
      const tag = await node.tagName();
      try {
        const path = await node.path();
        return `#<ElementHandle tag="${tag}" path="${path}">`;
      } catch (error) {
        if (!isDriverError(error, ['not_supported'])) {
          throw error;
        }
        return `#<ElementHandle tag="${tag}">`;
      }
    } catch (error) {
      if (!isDriverError(error, this.session.driver.errorTaxonomy.invalidElement)) {
        throw error;
      }
      return 'Obsolete #<ElementHandle>';
    }
  }

  protected searchRoot(): DriverNode {
    return this.nativeBinding;
  }

  protected boundNode(): DriverNode {
    return this.nativeBinding;
  }

  protected wrap(node: DriverNode, locator: Locator): ElementHandle {
    return new ElementHandle(this.session, node, this, locator);
  }

  private textOf(node: DriverNode, type?: TextType): Promise<string> {
    const { ignoreHiddenElements, visibleTextOnly } = this.session.config;
    const resolved = type ?? (ignoreHiddenElements || visibleTextOnly ? 'visible' : 'all');
    return resolved === 'all' ? node.allText() : node.visibleText();
  }

  private async release(node: DriverNode): Promise<void> {
    try {
      await node.dispose();
    } catch (error) {
      if (!isDriverError(error, this.session.driver.errorTaxonomy.invalidElement)) {
        throw error;
      }
      this.session.logger.debug(`Previous node was already gone: ${error.message}`);
    }
  }

  private async dispatchClick(operation: ClickOperation, options: ClickOptions): Promise<this> {
    const extended = toExtendedClick(options);
    await this.synchronize(async () => {
      const node = this.nativeBinding;
      if (extended === null) {
        return node[operation]();
      }
      requireExtended(operation, node);
      return node[operation](extended);
    });
    return this;
  }
}
