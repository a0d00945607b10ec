/**
 * Static driver - a simulated document held in memory.
 *
 * Parses HTML with cheerio and serves lookups and form interactions
 * without a browser. Nothing changes asynchronously, so the driver is
 * non-waiting: synchronize() only retries after a reload swapped a node.
 * Loading new HTML makes every node from the previous document obsolete.
 *
 *   const driver = new StaticDriver('<input id="q" value="hello">');
 *   const session = new Session(driver);
 *   await (await session.find('css', '#q')).value(); // 'hello'
 */

import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import type { Element as DomElement } from 'domhandler';

import { DriverError, NotSupportedByDriverError } from '../errors';
import { DEFAULT_ERROR_TAXONOMY, Driver, DriverNode, ErrorTaxonomy, Locator } from './protocol';
import { StaticNode } from './static-node';

/**
 * The current parsed document plus a generation counter bumped on load.
 */
export class StaticDocument {
  private _$: CheerioAPI;
  private _generation: number = 0;

  constructor(html: string) {
    this._$ = cheerio.load(html);
  }

  get $(): CheerioAPI {
    return this._$;
  }

  get generation(): number {
    return this._generation;
  }

  load(html: string): void {
    this._$ = cheerio.load(html);
    this._generation++;
  }

  html(): string {
    return this._$.html();
  }
}

export class StaticDriver implements Driver {
  readonly name = 'static';
  readonly waits = false;
  readonly errorTaxonomy: ErrorTaxonomy = DEFAULT_ERROR_TAXONOMY;
  readonly document: StaticDocument;

  constructor(html: string = '<html><body></body></html>') {
    this.document = new StaticDocument(html);
  }

  /**
   * Replace the document. Existing nodes become obsolete.
   */
  load(html: string): void {
    this.document.load(html);
  }

  async findAll(locator: Locator, within?: DriverNode): Promise<DriverNode[]> {
    if (locator.selector !== 'css') {
      throw new NotSupportedByDriverError(`${locator.selector} lookup`, this.name);
    }

    let scope: DomElement | undefined;
    if (within instanceof StaticNode) {
      scope = within.element();
    } else if (within !== undefined) {
      throw new DriverError('protocol', 'Cannot search within a node from another driver');
    }

    let matches: DomElement[];
    try {
      matches = this.select(locator.value, scope);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new DriverError(
        'invalid_selector',
        `Invalid css selector ${JSON.stringify(locator.value)}: ${reason}`,
        { cause: error }
      );
    }
    const generation = this.document.generation;
    return matches.map(el => new StaticNode(this.document, el, generation));
  }

  private select(selector: string, scope?: DomElement): DomElement[] {
    const $ = this.document.$;
    return scope ? $(scope).find(selector).toArray() : $.root().find(selector).toArray();
  }
}
