/**
 * CDP driver - element handles over the Chrome DevTools Protocol.
 *
 * Nodes are remote object ids; every node call goes through
 * Runtime.callFunctionOn behind an isConnected guard, so a node that left
 * the document reports `obsolete_node` instead of acting on a detached tree.
 *
 * Usage with any CDP client:
 *   const transport: CDPTransport = {
 *     send: (method, params) => client.send(method, params),
 *   };
 *   const session = new Session(new CDPDriver(transport));
 *   await (await session.find('css', 'button.primary')).click();
 */

import { DriverError } from '../errors';
import { DEFAULT_ERROR_TAXONOMY, Driver, DriverNode, ErrorTaxonomy, Locator } from './protocol';
import { CDPNode } from './cdp-node';

/**
 * Protocol for CDP transport layer.
 *
 * This abstracts the actual CDP communication, allowing different
 * implementations (Playwright CDP session, raw WebSocket, ...).
 */
export interface CDPTransport {
  /**
   * Send a CDP command and return the result.
   *
   * @param method - CDP method name, e.g., "Runtime.evaluate"
   * @param params - Method parameters
   * @returns CDP response dict
   */
  send(method: string, params?: Record<string, unknown>): Promise<Record<string, unknown>>;
}

const STALE_PATTERNS = [
  /Could not find object with given id/i,
  /Cannot find context with specified id/i,
  /Execution context was destroyed/i,
  /Node with given id does not belong to the document/i,
  /No node with given id found/i,
];

const DETACHED_PATTERNS = [/Target closed/i, /Session closed/i, /has been closed/i];

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Map a transport failure onto the driver error taxonomy.
 */
export function toDriverError(error: unknown): DriverError {
  if (error instanceof DriverError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  if (STALE_PATTERNS.some(pattern => pattern.test(message))) {
    return new DriverError('stale_reference', message, { cause: error });
  }
  if (DETACHED_PATTERNS.some(pattern => pattern.test(message))) {
    return new DriverError('detached', message, { cause: error });
  }
  return new DriverError('protocol', message, { cause: error });
}

/**
 * Runtime domain helpers shared by the driver and its nodes.
 */
export class CDPRuntime {
  private transport: CDPTransport;

  constructor(transport: CDPTransport) {
    this.transport = transport;
  }

  async send(method: string, params?: Record<string, unknown>): Promise<Record<string, unknown>> {
    try {
      return await this.transport.send(method, params);
    } catch (error) {
      throw toDriverError(error);
    }
  }

  /**
   * Call `functionDeclaration` with `this` bound to the remote object and
   * return its result by value.
   *
   * @throws DriverError(kind='obsolete_node') when the node is no longer connected
   */
  async callOn(objectId: string, functionDeclaration: string, args: unknown[] = []): Promise<unknown> {
    const response = await this.send('Runtime.callFunctionOn', {
      functionDeclaration: `function(...args) {
  if (!this.isConnected) return { connected: false };
  return { connected: true, value: (${functionDeclaration}).apply(this, args) };
}`,
      objectId,
      arguments: args.map(value => ({ value })),
      returnByValue: true,
      awaitPromise: true,
    });
    this.throwOnException(response);

    const result = isRecord(response.result) ? response.result.value : undefined;
    if (!isRecord(result) || result.connected !== true) {
      throw new DriverError('obsolete_node', 'Node is no longer attached to the document');
    }
    return result.value ?? null;
  }

  /**
   * Call `functionDeclaration` on the remote object; it must return an
   * array of nodes, or null when the receiver is disconnected.
   *
   * @returns Object ids of the returned nodes, in order
   */
  async queryOn(objectId: string, functionDeclaration: string, args: unknown[]): Promise<string[]> {
    const response = await this.send('Runtime.callFunctionOn', {
      functionDeclaration,
      objectId,
      arguments: args.map(value => ({ value })),
      returnByValue: false,
    });
    this.throwOnException(response);

    const result: Record<string, unknown> = isRecord(response.result) ? response.result : {};
    if (result.subtype === 'null' || typeof result.objectId !== 'string') {
      throw new DriverError('obsolete_node', 'Search root is no longer attached to the document');
    }

    const listId = result.objectId;
    try {
      const properties = await this.send('Runtime.getProperties', {
        objectId: listId,
        ownProperties: true,
      });
      const entries: unknown[] = Array.isArray(properties.result) ? properties.result : [];
      const ids: Array<{ index: number; objectId: string }> = [];
      for (const entry of entries) {
        if (!isRecord(entry) || typeof entry.name !== 'string' || !/^\d+$/.test(entry.name)) {
          continue;
        }
        const value = entry.value;
        if (isRecord(value) && typeof value.objectId === 'string') {
          ids.push({ index: Number(entry.name), objectId: value.objectId });
        }
      }
      return ids.sort((a, b) => a.index - b.index).map(item => item.objectId);
    } finally {
      await this.send('Runtime.releaseObject', { objectId: listId });
    }
  }

  async documentObjectId(): Promise<string> {
    const response = await this.send('Runtime.evaluate', {
      expression: 'document',
      returnByValue: false,
    });
    const result: Record<string, unknown> = isRecord(response.result) ? response.result : {};
    if (typeof result.objectId !== 'string') {
      throw new DriverError('not_ready', 'Document is not available yet');
    }
    return result.objectId;
  }

  private throwOnException(response: Record<string, unknown>): void {
    const details = response.exceptionDetails;
    if (!isRecord(details)) {
      return;
    }
    const exception: Record<string, unknown> = isRecord(details.exception) ? details.exception : {};
    const description =
      typeof exception.description === 'string'
        ? exception.description
        : typeof details.text === 'string'
          ? details.text
          : 'Unknown error';
    const kind = /SyntaxError/.test(description) ? 'invalid_selector' : 'script';
    throw new DriverError(kind, `JavaScript call failed: ${description}`);
  }
}

const QUERY_CSS = `function(selector) {
  if (this.nodeType !== Node.DOCUMENT_NODE && !this.isConnected) return null;
  return Array.from(this.querySelectorAll(selector));
}`;

const QUERY_XPATH = `function(expression) {
  if (this.nodeType !== Node.DOCUMENT_NODE && !this.isConnected) return null;
  const doc = this.ownerDocument || this;
  const snapshot = doc.evaluate(expression, this, null, XPathResult.ORDERED_NODE_SNAPSHOT_TYPE, null);
  const nodes = [];
  for (let i = 0; i < snapshot.snapshotLength; i++) {
    const node = snapshot.snapshotItem(i);
    if (node && node.nodeType === Node.ELEMENT_NODE) nodes.push(node);
  }
  return nodes;
}`;

export class CDPDriver implements Driver {
  readonly name = 'cdp';
  readonly waits = true;
  readonly errorTaxonomy: ErrorTaxonomy = DEFAULT_ERROR_TAXONOMY;
  private runtime: CDPRuntime;

  constructor(transport: CDPTransport) {
    this.runtime = new CDPRuntime(transport);
  }

  async findAll(locator: Locator, within?: DriverNode): Promise<DriverNode[]> {
    let rootId: string;
    if (within === undefined) {
      rootId = await this.runtime.documentObjectId();
    } else if (within instanceof CDPNode) {
      rootId = within.objectId;
    } else {
      throw new DriverError('protocol', 'Cannot search within a node from another driver');
    }

    const query = locator.selector === 'css' ? QUERY_CSS : QUERY_XPATH;
    const ids = await this.runtime.queryOn(rootId, query, [locator.value]);
    return ids.map(objectId => new CDPNode(this.runtime, objectId));
  }
}
