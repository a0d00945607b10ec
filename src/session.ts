/**
 * Session - owns a driver, its configuration and the document root.
 *
 *   const session = new Session(new StaticDriver(html), { defaultMaxWaitTimeMs: 500 });
 *   session.onWarning(w => report(w.code));
 *   const input = await session.find('css', 'input[name=q]');
 *   await input.set('handles');
 */

import { AsyncLocalStorage } from 'node:async_hooks';

import { resolveSessionConfig, SessionConfig, SessionConfigInput } from './config';
import type { Driver, LookupOptions, SelectorKind } from './drivers/protocol';
import { DocumentNode } from './node/document';
import type { ElementHandle } from './node/element';
import { consoleLogger, Logger } from './utils/logger';

/**
 * Advisory, non-fatal condition noticed while acting on an element.
 */
export interface ElementWarning {
  code: 'disabled_option_selected' | 'unsupported_set_options';
  message: string;
}

export type WarningListener = (warning: ElementWarning) => void;

export interface SessionOptions extends SessionConfigInput {
  /** Default: console */
  logger?: Logger;
  /** Environment consulted for config overrides. Default: process.env */
  env?: NodeJS.ProcessEnv;
}

export class Session {
  readonly driver: Driver;
  readonly config: SessionConfig;
  readonly logger: Logger;
  readonly document: DocumentNode;

  private warningListeners = new Set<WarningListener>();
  private synchronizeScope = new AsyncLocalStorage<boolean>();

  constructor(driver: Driver, options: SessionOptions = {}) {
    const { logger, env, ...configOptions } = options;
    this.driver = driver;
    this.config = resolveSessionConfig(configOptions, env);
    this.logger = logger ?? consoleLogger;
    this.document = new DocumentNode(this);
  }

  /**
   * True inside a synchronize() call of the current async call chain.
   * Nested calls do not retry; concurrent calls on other handles do.
   */
  get synchronized(): boolean {
    return this.synchronizeScope.getStore() === true;
  }

  runSynchronized<T>(action: () => Promise<T>): Promise<T> {
    return this.synchronizeScope.run(true, action);
  }

  find(selector: SelectorKind, value: string, options?: LookupOptions): Promise<ElementHandle> {
    return this.document.find(selector, value, options);
  }

  first(
    selector: SelectorKind,
    value: string,
    options?: LookupOptions
  ): Promise<ElementHandle | null> {
    return this.document.first(selector, value, options);
  }

  /**
   * Subscribe to element warnings. Returns an unsubscribe function.
   */
  onWarning(listener: WarningListener): () => void {
    this.warningListeners.add(listener);
    return () => {
      this.warningListeners.delete(listener);
    };
  }

  warn(warning: ElementWarning): void {
    this.logger.warn(`[${warning.code}] ${warning.message}`);
    for (const listener of this.warningListeners) {
      listener(warning);
    }
  }
}
