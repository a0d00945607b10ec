import type { Cheerio } from 'cheerio';
import { AnyNode, Element as DomElement, ParentNode, isTag, isText } from 'domhandler';

import { DriverError, NotSupportedByDriverError } from '../errors';
import {
  DriverNode,
  ExtendedClickOptions,
  FieldValue,
  KeyInput,
  MINIMAL_CAPABILITIES,
  NodeCapabilities,
  NodeValue,
  SetOptions,
} from './protocol';
import type { StaticDocument } from './static-driver';

const NON_RENDERED_TAGS = new Set(['head', 'script', 'style', 'template', 'noscript', 'title']);
const DISABLEABLE_TAGS = new Set(['button', 'input', 'select', 'textarea', 'optgroup', 'option', 'fieldset']);
const TEXT_INPUT_EXCLUDED = new Set(['checkbox', 'radio', 'file', 'submit', 'reset', 'button', 'image', 'hidden']);

function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function isHiddenElement(el: DomElement): boolean {
  if (NON_RENDERED_TAGS.has(el.name)) {
    return true;
  }
  if (el.attribs.hidden !== undefined) {
    return true;
  }
  return /display\s*:\s*none/i.test(el.attribs.style ?? '');
}

function visibleTextOf(node: AnyNode): string {
  if (isText(node)) {
    return node.data;
  }
  if (isTag(node)) {
    if (isHiddenElement(node)) {
      return '';
    }
    return node.children.map(visibleTextOf).join('');
  }
  return '';
}

function closestTag(el: DomElement, name: string): DomElement | null {
  let current = el.parent;
  while (current && isTag(current)) {
    if (current.name === name) {
      return current;
    }
    current = current.parent;
  }
  return null;
}

/**
 * Node of a StaticDocument. Bound to the document generation it was found
 * in; after the document is reloaded every call raises `obsolete_node`.
 */
export class StaticNode implements DriverNode {
  private document: StaticDocument;
  private el: DomElement;
  private generation: number;

  constructor(document: StaticDocument, el: DomElement, generation: number) {
    this.document = document;
    this.el = el;
    this.generation = generation;
  }

  /**
   * The underlying DOM element.
   *
   * @throws DriverError(kind='obsolete_node') once the document was replaced
   */
  element(): DomElement {
    if (this.document.generation !== this.generation) {
      throw new DriverError('obsolete_node', `<${this.el.name}> belongs to a replaced document`);
    }
    return this.el;
  }

  capabilities(): NodeCapabilities {
    return MINIMAL_CAPABILITIES;
  }

  equals(other: DriverNode): boolean {
    return other instanceof StaticNode && other.el === this.el && other.generation === this.generation;
  }

  async dispose(): Promise<void> {}

  async getAttribute(name: string): Promise<string | null> {
    return this.element().attribs[name] ?? null;
  }

  async allText(): Promise<string> {
    return normalizeWhitespace(this.wrapped().text());
  }

  async visibleText(): Promise<string> {
    return normalizeWhitespace(visibleTextOf(this.element()));
  }

  async value(): Promise<NodeValue> {
    const el = this.element();
    switch (el.name) {
      case 'textarea':
        return this.wrapped().text();
      case 'select': {
        const options = this.document.$(el).find('option').toArray();
        const selected = options.filter(option => option.attribs.selected !== undefined);
        if (el.attribs.multiple !== undefined) {
          return selected.map(option => this.optionValue(option));
        }
        const chosen = selected[selected.length - 1] ?? options[0];
        return chosen ? this.optionValue(chosen) : null;
      }
      case 'option':
        return this.optionValue(el);
      case 'input': {
        const type = this.inputType(el);
        if (type === 'checkbox' || type === 'radio') {
          return el.attribs.value ?? 'on';
        }
        return el.attribs.value ?? '';
      }
      default:
        return el.attribs.value ?? null;
    }
  }

  async set(value: FieldValue, options?: SetOptions): Promise<void> {
    if (options !== undefined) {
      throw new NotSupportedByDriverError('set options', 'static');
    }
    const el = this.element();

    if (el.name === 'textarea') {
      this.wrapped().text(this.requireText(value));
      return;
    }
    if (el.name !== 'input') {
      throw new NotSupportedByDriverError(`set on <${el.name}>`, 'static');
    }

    const type = this.inputType(el);
    if (type === 'checkbox') {
      this.toggleAttribute(el, 'checked', this.requireBoolean(value));
    } else if (type === 'radio') {
      if (this.requireBoolean(value)) {
        this.checkRadio(el);
      } else {
        this.toggleAttribute(el, 'checked', false);
      }
    } else if (TEXT_INPUT_EXCLUDED.has(type)) {
      throw new NotSupportedByDriverError(`set on input[type=${type}]`, 'static');
    } else {
      const text = this.requireText(value);
      const maxLength = Number.parseInt(el.attribs.maxlength ?? '', 10);
      el.attribs.value = Number.isNaN(maxLength) ? text : text.slice(0, maxLength);
    }
  }

  async selectOption(): Promise<void> {
    const el = this.requireOption();
    const select = closestTag(el, 'select');
    if (select && select.attribs.multiple === undefined) {
      for (const option of this.document.$(select).find('option').toArray()) {
        this.toggleAttribute(option, 'selected', false);
      }
    }
    this.toggleAttribute(el, 'selected', true);
  }

  async unselectOption(): Promise<void> {
    const el = this.requireOption();
    const select = closestTag(el, 'select');
    if (!select || select.attribs.multiple === undefined) {
      throw new DriverError('not_supported', 'Cannot unselect option from single select box');
    }
    this.toggleAttribute(el, 'selected', false);
  }

  async click(options?: ExtendedClickOptions): Promise<void> {
    if (options !== undefined) {
      throw new NotSupportedByDriverError('click options', 'static');
    }
    const el = this.element();
    if (this.disabled(el)) {
      return;
    }

    if (el.name === 'label') {
      const target = this.labelTarget(el);
      if (target) {
        await new StaticNode(this.document, target, this.generation).click();
      }
      return;
    }
    if (el.name === 'option') {
      const select = closestTag(el, 'select');
      if (select?.attribs.multiple !== undefined && el.attribs.selected !== undefined) {
        await this.unselectOption();
      } else {
        await this.selectOption();
      }
      return;
    }
    if (el.name === 'input') {
      const type = this.inputType(el);
      if (type === 'checkbox') {
        this.toggleAttribute(el, 'checked', el.attribs.checked === undefined);
      } else if (type === 'radio') {
        this.checkRadio(el);
      }
    }
  }

  async rightClick(): Promise<void> {
    throw new NotSupportedByDriverError('rightClick', 'static');
  }

  async doubleClick(): Promise<void> {
    throw new NotSupportedByDriverError('doubleClick', 'static');
  }

  async hover(): Promise<void> {
    throw new NotSupportedByDriverError('hover', 'static');
  }

  async dragTo(): Promise<void> {
    throw new NotSupportedByDriverError('dragTo', 'static');
  }

  async sendKeys(..._keys: KeyInput[]): Promise<void> {
    throw new NotSupportedByDriverError('sendKeys', 'static');
  }

  async trigger(_event: string): Promise<void> {
    throw new NotSupportedByDriverError('trigger', 'static');
  }

  async tagName(): Promise<string> {
    return this.element().name;
  }

  async path(): Promise<string> {
    const segments: string[] = [];
    let current: DomElement | null = this.element();
    while (current) {
      const name = current.name;
      const parent: ParentNode | null = current.parent;
      const siblings = parent
        ? parent.children.filter((child): child is DomElement => isTag(child) && child.name === name)
        : [current];
      const segment =
        siblings.length > 1 ? `${name}[${siblings.indexOf(current) + 1}]` : name;
      segments.unshift(segment);
      current = parent && isTag(parent) ? parent : null;
    }
    return `/${segments.join('/')}`;
  }

  async isVisible(): Promise<boolean> {
    let current: DomElement | null = this.element();
    while (current) {
      if (isHiddenElement(current)) {
        return false;
      }
      const parent: ParentNode | null = current.parent;
      current = parent && isTag(parent) ? parent : null;
    }
    return true;
  }

  async isChecked(): Promise<boolean> {
    return this.element().attribs.checked !== undefined;
  }

  async isSelected(): Promise<boolean> {
    return this.element().attribs.selected !== undefined;
  }

  async isDisabled(): Promise<boolean> {
    return this.disabled(this.element());
  }

  async isReadonly(): Promise<boolean> {
    return this.element().attribs.readonly !== undefined;
  }

  async isMultiple(): Promise<boolean> {
    return this.element().attribs.multiple !== undefined;
  }

  private wrapped(): Cheerio<DomElement> {
    return this.document.$(this.element());
  }

  private disabled(el: DomElement): boolean {
    if (!DISABLEABLE_TAGS.has(el.name)) {
      return false;
    }
    if (el.attribs.disabled !== undefined) {
      return true;
    }
    if (el.name === 'option') {
      const group = closestTag(el, 'optgroup');
      const select = closestTag(el, 'select');
      return group?.attribs.disabled !== undefined || select?.attribs.disabled !== undefined;
    }
    return closestTag(el, 'fieldset')?.attribs.disabled !== undefined;
  }

  private inputType(el: DomElement): string {
    return (el.attribs.type ?? 'text').toLowerCase();
  }

  private optionValue(option: DomElement): string {
    return option.attribs.value ?? normalizeWhitespace(this.document.$(option).text());
  }

  private requireOption(): DomElement {
    const el = this.element();
    if (el.name !== 'option') {
      throw new NotSupportedByDriverError(`option selection on <${el.name}>`, 'static');
    }
    return el;
  }

  private requireText(value: FieldValue): string {
    if (typeof value !== 'string') {
      throw new TypeError(`Expected a string value, got ${typeof value}`);
    }
    return value;
  }

  private requireBoolean(value: FieldValue): boolean {
    if (typeof value !== 'boolean') {
      throw new TypeError(`Expected a boolean value, got ${typeof value}`);
    }
    return value;
  }

  private toggleAttribute(el: DomElement, name: string, on: boolean): void {
    if (on) {
      el.attribs[name] = name;
    } else {
      delete el.attribs[name];
    }
  }

  private checkRadio(el: DomElement): void {
    const name = el.attribs.name;
    if (name !== undefined) {
      const container = closestTag(el, 'form');
      const $ = this.document.$;
      const group = (container ? $(container).find('input') : $.root().find('input'))
        .toArray()
        .filter(input => this.inputType(input) === 'radio' && input.attribs.name === name);
      for (const radio of group) {
        this.toggleAttribute(radio, 'checked', false);
      }
    }
    this.toggleAttribute(el, 'checked', true);
  }

  private labelTarget(label: DomElement): DomElement | null {
    const $ = this.document.$;
    const forId = label.attribs.for;
    if (forId !== undefined) {
      return $.root().find(`[id="${forId}"]`).toArray()[0] ?? null;
    }
    return $(label).find('input, select, textarea').toArray()[0] ?? null;
  }
}
