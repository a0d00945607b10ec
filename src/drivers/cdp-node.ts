import { DriverError } from '../errors';
import type { CDPRuntime } from './cdp-driver';
import {
  DriverNode,
  ExtendedClickOptions,
  FieldValue,
  KeyInput,
  KeyModifier,
  NamedKey,
  NodeCapabilities,
  NodeValue,
  SetOptions,
  SpecialKey,
} from './protocol';

type MouseButton = 'left' | 'right';

interface Point {
  x: number;
  y: number;
}

interface KeyDefinition {
  key: string;
  code: string;
  keyCode: number;
  text?: string;
}

const FULL_CAPABILITIES: NodeCapabilities = {
  click: true,
  rightClick: true,
  doubleClick: true,
  set: true,
};

// Input.dispatch*Event modifier bitmask
const MODIFIER_BITS: Record<KeyModifier, number> = {
  alt: 1,
  control: 2,
  meta: 4,
  shift: 8,
};

const KEYS: Record<NamedKey, KeyDefinition> = {
  backspace: { key: 'Backspace', code: 'Backspace', keyCode: 8 },
  tab: { key: 'Tab', code: 'Tab', keyCode: 9 },
  enter: { key: 'Enter', code: 'Enter', keyCode: 13, text: '\r' },
  escape: { key: 'Escape', code: 'Escape', keyCode: 27 },
  space: { key: ' ', code: 'Space', keyCode: 32, text: ' ' },
  page_up: { key: 'PageUp', code: 'PageUp', keyCode: 33 },
  page_down: { key: 'PageDown', code: 'PageDown', keyCode: 34 },
  end: { key: 'End', code: 'End', keyCode: 35 },
  home: { key: 'Home', code: 'Home', keyCode: 36 },
  left: { key: 'ArrowLeft', code: 'ArrowLeft', keyCode: 37 },
  up: { key: 'ArrowUp', code: 'ArrowUp', keyCode: 38 },
  right: { key: 'ArrowRight', code: 'ArrowRight', keyCode: 39 },
  down: { key: 'ArrowDown', code: 'ArrowDown', keyCode: 40 },
  insert: { key: 'Insert', code: 'Insert', keyCode: 45 },
  delete: { key: 'Delete', code: 'Delete', keyCode: 46 },
  shift: { key: 'Shift', code: 'ShiftLeft', keyCode: 16 },
  control: { key: 'Control', code: 'ControlLeft', keyCode: 17 },
  alt: { key: 'Alt', code: 'AltLeft', keyCode: 18 },
  meta: { key: 'Meta', code: 'MetaLeft', keyCode: 91 },
};

function isModifier(name: NamedKey): name is KeyModifier {
  return name in MODIFIER_BITS;
}

function modifierMask(modifiers: readonly KeyModifier[]): number {
  return modifiers.reduce((mask, modifier) => mask | MODIFIER_BITS[modifier], 0);
}

const FN_RECT = `function() {
  this.scrollIntoView({ block: 'center', inline: 'center' });
  const rect = this.getBoundingClientRect();
  return { x: rect.left, y: rect.top, width: rect.width, height: rect.height };
}`;

const FN_PATH = `function() {
  const segments = [];
  for (let el = this; el && el.nodeType === Node.ELEMENT_NODE; el = el.parentElement) {
    const name = el.tagName.toLowerCase();
    const siblings = el.parentElement
      ? Array.from(el.parentElement.children).filter(child => child.tagName === el.tagName)
      : [el];
    segments.unshift(siblings.length > 1 ? name + '[' + (siblings.indexOf(el) + 1) + ']' : name);
  }
  return '/' + segments.join('/');
}`;

const FN_VISIBLE = `function() {
  const style = window.getComputedStyle(this);
  if (style.display === 'none' || style.visibility === 'hidden') return false;
  return this.getClientRects().length > 0;
}`;

const FN_VALUE = `function() {
  if (this.tagName === 'SELECT' && this.multiple) {
    return Array.from(this.selectedOptions, option => option.value);
  }
  return this.value === undefined ? null : this.value;
}`;

const FN_PREPARE_TEXT = `function(mode) {
  this.focus();
  if (mode === 'replace') {
    this.value = '';
    this.dispatchEvent(new Event('input', { bubbles: true }));
  } else if (typeof this.setSelectionRange === 'function') {
    const end = String(this.value).length;
    this.setSelectionRange(end, end);
  }
  return String(this.value).length;
}`;

const FN_SET_CHECKED = `function(checked) {
  if (this.checked !== checked) this.click();
}`;

const FN_SELECT_OPTION = `function(selected) {
  const select = this.closest('select');
  if (!selected && (!select || !select.multiple)) return false;
  this.selected = selected;
  if (select) select.dispatchEvent(new Event('change', { bubbles: true }));
  return true;
}`;

/**
 * Node bound to a CDP remote object id.
 */
export class CDPNode implements DriverNode {
  readonly objectId: string;
  private runtime: CDPRuntime;

  constructor(runtime: CDPRuntime, objectId: string) {
    this.runtime = runtime;
    this.objectId = objectId;
  }

  capabilities(): NodeCapabilities {
    return FULL_CAPABILITIES;
  }

  equals(other: DriverNode): boolean {
    return other instanceof CDPNode && other.objectId === this.objectId;
  }

  async dispose(): Promise<void> {
    await this.runtime.send('Runtime.releaseObject', { objectId: this.objectId });
  }

  async getAttribute(name: string): Promise<string | null> {
    const value = await this.call('function(name) { return this.getAttribute(name); }', [name]);
    return typeof value === 'string' ? value : null;
  }

  async allText(): Promise<string> {
    return this.callString('function() { return this.textContent; }');
  }

  async visibleText(): Promise<string> {
    return this.callString('function() { return this.innerText; }');
  }

  async value(): Promise<NodeValue> {
    const value = await this.call(FN_VALUE);
    if (Array.isArray(value)) {
      return value.map(item => String(item));
    }
    return value === null ? null : String(value);
  }

  async set(value: FieldValue, options?: SetOptions): Promise<void> {
    if (typeof value === 'boolean') {
      await this.call(FN_SET_CHECKED, [value]);
      return;
    }

    const clear = options?.clear;
    const existing = await this.call(FN_PREPARE_TEXT, [clear === undefined ? 'replace' : 'append']);
    if (clear === 'backspace' && typeof existing === 'number') {
      for (let i = 0; i < existing; i++) {
        await this.pressKey(KEYS.backspace, 0);
      }
    }
    if (value !== '') {
      await this.runtime.send('Input.insertText', { text: value });
    }
    await this.call(`function() { this.dispatchEvent(new Event('change', { bubbles: true })); }`);
  }

  async selectOption(): Promise<void> {
    await this.call(FN_SELECT_OPTION, [true]);
  }

  async unselectOption(): Promise<void> {
    const changed = await this.call(FN_SELECT_OPTION, [false]);
    if (changed !== true) {
      throw new DriverError('not_supported', 'Cannot unselect option from single select box');
    }
  }

  async click(options?: ExtendedClickOptions): Promise<void> {
    await this.mouseClick('left', 1, options);
  }

  async rightClick(options?: ExtendedClickOptions): Promise<void> {
    await this.mouseClick('right', 1, options);
  }

  async doubleClick(options?: ExtendedClickOptions): Promise<void> {
    await this.mouseClick('left', 2, options);
  }

  async hover(): Promise<void> {
    const point = await this.clickPoint();
    await this.mouseEvent('mouseMoved', point, 0);
  }

  async dragTo(target: DriverNode): Promise<void> {
    if (!(target instanceof CDPNode)) {
      throw new DriverError('protocol', 'Cannot drag to a node from another driver');
    }
    const start = await this.clickPoint();
    const end = await target.clickPoint();
    await this.mouseEvent('mouseMoved', start, 0);
    await this.mouseEvent('mousePressed', start, 0, 'left', 1);
    await this.mouseEvent('mouseMoved', end, 0, 'left');
    await this.mouseEvent('mouseReleased', end, 0, 'left', 1);
  }

  async sendKeys(...keys: KeyInput[]): Promise<void> {
    await this.call('function() { this.focus(); }');
    for (const input of keys) {
      if (Array.isArray(input)) {
        await this.sendChord(input);
      } else {
        await this.sendKey(input, 0);
      }
    }
  }

  async trigger(event: string): Promise<void> {
    await this.call(
      'function(type) { this.dispatchEvent(new Event(type, { bubbles: true, cancelable: true })); }',
      [event]
    );
  }

  async tagName(): Promise<string> {
    return this.callString('function() { return this.tagName.toLowerCase(); }');
  }

  async path(): Promise<string> {
    return this.callString(FN_PATH);
  }

  async isVisible(): Promise<boolean> {
    return (await this.call(FN_VISIBLE)) === true;
  }

  async isChecked(): Promise<boolean> {
    return (await this.call('function() { return !!this.checked; }')) === true;
  }

  async isSelected(): Promise<boolean> {
    return (await this.call('function() { return !!this.selected; }')) === true;
  }

  async isDisabled(): Promise<boolean> {
    return (await this.call("function() { return this.matches(':disabled'); }")) === true;
  }

  async isReadonly(): Promise<boolean> {
    return (await this.call('function() { return !!this.readOnly; }')) === true;
  }

  async isMultiple(): Promise<boolean> {
    return (await this.call('function() { return !!this.multiple; }')) === true;
  }

  private call(functionDeclaration: string, args: unknown[] = []): Promise<unknown> {
    return this.runtime.callOn(this.objectId, functionDeclaration, args);
  }

  private async callString(functionDeclaration: string): Promise<string> {
    const value = await this.call(functionDeclaration);
    return typeof value === 'string' ? value : '';
  }

  private async clickPoint(offset?: Point): Promise<Point> {
    const rect = await this.call(FN_RECT);
    if (
      typeof rect !== 'object' ||
      rect === null ||
      !('x' in rect && 'y' in rect && 'width' in rect && 'height' in rect)
    ) {
      throw new DriverError('not_ready', 'Element has no layout box');
    }
    const x = Number(rect.x);
    const y = Number(rect.y);
    if (offset) {
      return { x: x + offset.x, y: y + offset.y };
    }
    return { x: x + Number(rect.width) / 2, y: y + Number(rect.height) / 2 };
  }

  private async mouseClick(
    button: MouseButton,
    clickCount: number,
    options?: ExtendedClickOptions
  ): Promise<void> {
    const point = await this.clickPoint(options?.offset);
    const modifiers = modifierMask(options?.modifiers ?? []);
    await this.mouseEvent('mouseMoved', point, modifiers);
    for (let count = 1; count <= clickCount; count++) {
      await this.mouseEvent('mousePressed', point, modifiers, button, count);
      await this.mouseEvent('mouseReleased', point, modifiers, button, count);
    }
  }

  private async mouseEvent(
    type: 'mouseMoved' | 'mousePressed' | 'mouseReleased',
    point: Point,
    modifiers: number,
    button?: MouseButton,
    clickCount?: number
  ): Promise<void> {
    const params: Record<string, unknown> = { type, x: point.x, y: point.y, modifiers };
    if (button !== undefined) {
      params.button = button;
    }
    if (clickCount !== undefined) {
      params.clickCount = clickCount;
    }
    await this.runtime.send('Input.dispatchMouseEvent', params);
  }

  private async sendKey(input: string | SpecialKey, modifiers: number): Promise<void> {
    if (typeof input !== 'string') {
      await this.pressKey(KEYS[input.key], modifiers);
      return;
    }
    for (const char of input) {
      await this.runtime.send('Input.dispatchKeyEvent', { type: 'keyDown', key: char, text: char, modifiers });
      await this.runtime.send('Input.dispatchKeyEvent', { type: 'keyUp', key: char, modifiers });
    }
  }

  private async sendChord(chord: Array<string | SpecialKey>): Promise<void> {
    const held: KeyModifier[] = [];
    for (const input of chord) {
      if (typeof input !== 'string' && isModifier(input.key)) {
        held.push(input.key);
        await this.keyEvent('rawKeyDown', KEYS[input.key], modifierMask(held));
      } else {
        await this.sendKey(input, modifierMask(held));
      }
    }
    while (held.length > 0) {
      const modifier = held.pop();
      if (modifier !== undefined) {
        await this.keyEvent('keyUp', KEYS[modifier], modifierMask(held));
      }
    }
  }

  private async pressKey(definition: KeyDefinition, modifiers: number): Promise<void> {
    await this.keyEvent(definition.text ? 'keyDown' : 'rawKeyDown', definition, modifiers);
    await this.keyEvent('keyUp', definition, modifiers);
  }

  private async keyEvent(
    type: 'keyDown' | 'rawKeyDown' | 'keyUp',
    definition: KeyDefinition,
    modifiers: number
  ): Promise<void> {
    const params: Record<string, unknown> = {
      type,
      key: definition.key,
      code: definition.code,
      windowsVirtualKeyCode: definition.keyCode,
      modifiers,
    };
    if (type === 'keyDown' && definition.text !== undefined) {
      params.text = definition.text;
    }
    await this.runtime.send('Input.dispatchKeyEvent', params);
  }
}
