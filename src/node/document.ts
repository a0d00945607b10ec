import type { DriverNode, Locator } from '../drivers/protocol';
import { NodeBase } from './base';
import { ElementHandle } from './element';

/**
 * Root scope: lookups run against the whole document.
 */
export class DocumentNode extends NodeBase {
  async reload(): Promise<this> {
    return this;
  }

  inspect(): string {
    return `#<DocumentNode driver="${this.session.driver.name}">`;
  }

  protected searchRoot(): undefined {
    return undefined;
  }

  protected boundNode(): undefined {
    return undefined;
  }

  protected wrap(node: DriverNode, locator: Locator): ElementHandle {
    return new ElementHandle(this.session, node, this, locator);
  }
}
