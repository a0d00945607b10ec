/**
 * Recording fake driver for unit tests.
 *
 * FakeNode keeps plain field state, records every call it receives and can
 * be told to fail its next calls with queued errors. Nodes with the same id
 * count as bindings to the same element.
 */

import {
  DEFAULT_ERROR_TAXONOMY,
  Driver,
  DriverNode,
  ErrorTaxonomy,
  ExtendedClickOptions,
  FieldValue,
  KeyInput,
  Locator,
  MINIMAL_CAPABILITIES,
  NodeCapabilities,
  NodeValue,
  SetOptions,
} from '../../src/drivers/protocol';

export type NodeMethod = Exclude<keyof DriverNode, 'capabilities' | 'equals'>;

export interface FakeNodeState {
  tag: string;
  path: string;
  text: string;
  visibleText: string;
  attributes: Record<string, string>;
  value: NodeValue;
  visible: boolean;
  checked: boolean;
  selected: boolean;
  disabled: boolean;
  readonly: boolean;
  multiple: boolean;
}

export const FULL_CAPABILITIES: NodeCapabilities = {
  click: true,
  rightClick: true,
  doubleClick: true,
  set: true,
};

export class FakeNode implements DriverNode {
  readonly id: string;
  state: FakeNodeState;
  caps: NodeCapabilities = MINIMAL_CAPABILITIES;
  calls: Array<{ method: NodeMethod; args: unknown[] }> = [];

  capabilities = jest.fn((): NodeCapabilities => this.caps);

  private failures = new Map<NodeMethod, Error[]>();
  private permanentFailures = new Map<NodeMethod, Error>();

  constructor(id: string, state: Partial<FakeNodeState> = {}) {
    this.id = id;
    this.state = {
      tag: 'div',
      path: `/html/body/div`,
      text: '',
      visibleText: '',
      attributes: {},
      value: '',
      visible: true,
      checked: false,
      selected: false,
      disabled: false,
      readonly: false,
      multiple: false,
      ...state,
    };
  }

  /**
   * Make the next calls to `method` throw `errors`, one per call.
   */
  failNext(method: NodeMethod, ...errors: Error[]): this {
    const queue = this.failures.get(method) ?? [];
    queue.push(...errors);
    this.failures.set(method, queue);
    return this;
  }

  /**
   * Make every call to `method` throw `error`.
   */
  failAlways(method: NodeMethod, error: Error): this {
    this.permanentFailures.set(method, error);
    return this;
  }

  callsTo(method: NodeMethod): unknown[][] {
    return this.calls.filter(call => call.method === method).map(call => call.args);
  }

  equals(other: DriverNode): boolean {
    return other instanceof FakeNode && other.id === this.id;
  }

  async dispose(): Promise<void> {
    this.record('dispose', []);
  }

  async getAttribute(name: string): Promise<string | null> {
    this.record('getAttribute', [name]);
    return this.state.attributes[name] ?? null;
  }

  async allText(): Promise<string> {
    this.record('allText', []);
    return this.state.text;
  }

  async visibleText(): Promise<string> {
    this.record('visibleText', []);
    return this.state.visibleText;
  }

  async value(): Promise<NodeValue> {
    this.record('value', []);
    return this.state.value;
  }

  async set(value: FieldValue, options?: SetOptions): Promise<void> {
    this.record('set', options === undefined ? [value] : [value, options]);
    if (typeof value === 'boolean') {
      this.state.checked = value;
    } else {
      this.state.value = value;
    }
  }

  async selectOption(): Promise<void> {
    this.record('selectOption', []);
    this.state.selected = true;
  }

  async unselectOption(): Promise<void> {
    this.record('unselectOption', []);
    this.state.selected = false;
  }

  async click(options?: ExtendedClickOptions): Promise<void> {
    this.record('click', options === undefined ? [] : [options]);
  }

  async rightClick(options?: ExtendedClickOptions): Promise<void> {
    this.record('rightClick', options === undefined ? [] : [options]);
  }

  async doubleClick(options?: ExtendedClickOptions): Promise<void> {
    this.record('doubleClick', options === undefined ? [] : [options]);
  }

  async hover(): Promise<void> {
    this.record('hover', []);
  }

  async dragTo(target: DriverNode): Promise<void> {
    this.record('dragTo', [target]);
  }

  async sendKeys(...keys: KeyInput[]): Promise<void> {
    this.record('sendKeys', keys);
  }

  async trigger(event: string): Promise<void> {
    this.record('trigger', [event]);
  }

  async tagName(): Promise<string> {
    this.record('tagName', []);
    return this.state.tag;
  }

  async path(): Promise<string> {
    this.record('path', []);
    return this.state.path;
  }

  async isVisible(): Promise<boolean> {
    this.record('isVisible', []);
    return this.state.visible;
  }

  async isChecked(): Promise<boolean> {
    this.record('isChecked', []);
    return this.state.checked;
  }

  async isSelected(): Promise<boolean> {
    this.record('isSelected', []);
    return this.state.selected;
  }

  async isDisabled(): Promise<boolean> {
    this.record('isDisabled', []);
    return this.state.disabled;
  }

  async isReadonly(): Promise<boolean> {
    this.record('isReadonly', []);
    return this.state.readonly;
  }

  async isMultiple(): Promise<boolean> {
    this.record('isMultiple', []);
    return this.state.multiple;
  }

  private record(method: NodeMethod, args: unknown[]): void {
    this.calls.push({ method, args });
    const next = this.failures.get(method)?.shift() ?? this.permanentFailures.get(method);
    if (next) {
      throw next;
    }
  }
}

/**
 * Driver serving FakeNodes keyed by locator value. Results can be swapped
 * between lookups to simulate a page re-rendering.
 */
export class FakeDriver implements Driver {
  readonly name = 'fake';
  readonly waits: boolean;
  readonly errorTaxonomy: ErrorTaxonomy = DEFAULT_ERROR_TAXONOMY;

  findAll = jest.fn(async (locator: Locator, within?: DriverNode): Promise<DriverNode[]> => {
    const failure = this.findFailures.shift();
    if (failure) {
      throw failure;
    }
    const key = within instanceof FakeNode ? `${within.id} ${locator.value}` : locator.value;
    return [...(this.results.get(key) ?? [])];
  });

  private results = new Map<string, FakeNode[]>();
  private findFailures: Error[] = [];

  constructor(options: { waits?: boolean } = {}) {
    this.waits = options.waits ?? true;
  }

  /**
   * Serve `nodes` for `value`. Pass `within` to serve them only for
   * lookups scoped to that node.
   */
  respond(value: string, nodes: FakeNode[], within?: FakeNode): this {
    this.results.set(within ? `${within.id} ${value}` : value, nodes);
    return this;
  }

  failFind(...errors: Error[]): this {
    this.findFailures.push(...errors);
    return this;
  }
}
