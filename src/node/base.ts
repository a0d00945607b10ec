/**
 * Shared machinery of every query scope (document root and elements):
 * the retry wrapper and locator lookups.
 */

import type { DriverNode, Locator, LookupOptions, SelectorKind } from '../drivers/protocol';
import {
  DriverError,
  DriverErrorKind,
  ElementNotFoundError,
  ObsoleteElementError,
  SynchronizeTimeoutError,
  isDriverError,
} from '../errors';
import type { Session } from '../session';
import type { ElementHandle } from './element';

/**
 * Something a locator can be re-resolved against.
 */
export interface QueryScope {
  /** Refresh the scope itself (if it can go stale) and return it */
  reload(): Promise<QueryScope>;
  /** Single, non-waiting first-match lookup */
  resolveFirst(locator: Locator): Promise<DriverNode | null>;
}

export interface SynchronizeOptions {
  /** Wait budget in milliseconds. Default: session defaultMaxWaitTimeMs */
  waitMs?: number;
  /** Error kinds worth retrying. Default: driver's transient kinds */
  errors?: readonly DriverErrorKind[];
}

export abstract class NodeBase implements QueryScope {
  readonly session: Session;

  constructor(session: Session) {
    this.session = session;
  }

  abstract reload(): Promise<QueryScope>;

  /** Node that lookups are restricted to; undefined for the document root */
  protected abstract searchRoot(): DriverNode | undefined;

  /** Current native binding, if this scope has one */
  protected abstract boundNode(): DriverNode | undefined;

  protected abstract wrap(node: DriverNode, locator: Locator): ElementHandle;

  /**
   * Run `action` until it succeeds, retrying on transient driver errors.
   *
   * Waiting drivers retry every pollIntervalMs until the wait budget is
   * spent. Non-waiting drivers retry only after a reload bound a different
   * node, and never past the wait budget. Reloadable handles are reloaded
   * between attempts when automaticReload is on. Calls nested inside
   * another synchronize of the same call chain run once.
   *
   * @throws ObsoleteElementError when the last failure was an invalid element reference
   * @throws SynchronizeTimeoutError when the last failure was any other transient kind
   */
  async synchronize<T>(action: () => Promise<T>, options: SynchronizeOptions = {}): Promise<T> {
    const session = this.session;
    if (session.synchronized) {
      return action();
    }

    const { config, driver, logger } = session;
    const waitMs = options.waitMs ?? config.defaultMaxWaitTimeMs;
    const retryOn = options.errors ?? driver.errorTaxonomy.transient;
    const startTime = Date.now();
    let attempt = 0;

    return session.runSynchronized(async () => {
      while (true) {
        attempt++;
        try {
          return await action();
        } catch (error) {
          if (!isDriverError(error, retryOn)) {
            throw error;
          }

          if (!driver.waits) {
            if (!(config.automaticReload && (await this.reloadReplacedNode()))) {
              throw this.giveUp(error, 0);
            }
            if (Date.now() - startTime > waitMs) {
              throw this.giveUp(error, waitMs);
            }
            continue;
          }

          const elapsedMs = Date.now() - startTime;
          if (elapsedMs + config.pollIntervalMs > waitMs) {
            throw this.giveUp(error, waitMs);
          }
          logger.debug(`Retrying after ${error.kind} (attempt ${attempt}, ${elapsedMs}ms elapsed)`);
          await this.sleep(config.pollIntervalMs);
          if (config.automaticReload) {
            await this.reload();
          }
        }
      }
    });
  }

  /**
   * Find the first node matching the locator, waiting for it to appear.
   * The handle is reloadable and scoped to this node.
   *
   * @throws ElementNotFoundError when nothing matched within the wait budget
   */
  async find(
    selector: SelectorKind,
    value: string,
    options: LookupOptions = {}
  ): Promise<ElementHandle> {
    const handle = await this.lookup(selector, value, options);
    if (!handle) {
      throw ElementNotFoundError.forLocator(selector, value);
    }
    return handle;
  }

  /**
   * Like find(), but resolves null when nothing matched.
   */
  async first(
    selector: SelectorKind,
    value: string,
    options: LookupOptions = {}
  ): Promise<ElementHandle | null> {
    return this.lookup(selector, value, options);
  }

  /**
   * Single, non-waiting lookup. Matches other than the returned one are
   * disposed.
   */
  async resolveFirst(locator: Locator): Promise<DriverNode | null> {
    const nodes = await this.session.driver.findAll(locator, this.searchRoot());
    const visibleOnly = locator.options.visible ?? this.session.config.ignoreHiddenElements;
    let found: DriverNode | null = null;
    try {
      for (const node of nodes) {
        if (!visibleOnly || (await node.isVisible())) {
          found = node;
          break;
        }
      }
    } finally {
      await Promise.all(nodes.filter(node => node !== found).map(node => node.dispose()));
    }
    return found;
  }

  private async lookup(
    selector: SelectorKind,
    value: string,
    options: LookupOptions
  ): Promise<ElementHandle | null> {
    const locator: Locator = Object.freeze({
      selector,
      value,
      options: Object.freeze({ ...options }),
    });

    let node: DriverNode;
    try {
      node = await this.synchronize(async () => {
        const found = await this.resolveFirst(locator);
        if (!found) {
          throw ElementNotFoundError.forLocator(selector, value);
        }
        return found;
      });
    } catch (error) {
      if (error instanceof SynchronizeTimeoutError && error.lastError instanceof ElementNotFoundError) {
        return null;
      }
      throw error;
    }

    const handle = this.wrap(node, locator);
    handle.allowReload();
    return handle;
  }

  private async reloadReplacedNode(): Promise<boolean> {
    const before = this.boundNode();
    await this.reload();
    const after = this.boundNode();
    if (before === undefined || after === undefined) {
      return before !== after;
    }
    return !after.equals(before);
  }

  private giveUp(error: DriverError, waitMs: number): SynchronizeTimeoutError {
    if (isDriverError(error, this.session.driver.errorTaxonomy.invalidElement)) {
      return new ObsoleteElementError(error, waitMs);
    }
    return new SynchronizeTimeoutError(error, waitMs);
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}
