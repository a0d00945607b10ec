import type { DriverNode, ExtendedClickOptions, ExtendedOperation, KeyModifier } from '../drivers/protocol';
import { UnsupportedCapabilityError } from '../errors';

/**
 * Click arguments as callers pass them. An offset needs both coordinates.
 */
export interface ClickOptions {
  modifiers?: KeyModifier[];
  x?: number;
  y?: number;
}

/**
 * Whether `node` accepts the extended argument form of `operation`.
 */
export function supportsExtended(operation: ExtendedOperation, node: DriverNode): boolean {
  return node.capabilities()[operation] === true;
}

/**
 * @throws UnsupportedCapabilityError when `node` only takes the minimal form
 */
export function requireExtended(operation: ExtendedOperation, node: DriverNode): void {
  if (!supportsExtended(operation, node)) {
    throw new UnsupportedCapabilityError(
      `${operation}_options`,
      `The current driver does not support ${operation} options`
    );
  }
}

/**
 * Normalize caller click options to the driver's extended form, or null
 * when nothing beyond a plain click was asked for.
 *
 * @throws TypeError when only one offset coordinate is given
 */
export function toExtendedClick(options: ClickOptions = {}): ExtendedClickOptions | null {
  const modifiers = options.modifiers ?? [];
  const hasX = options.x !== undefined;
  const hasY = options.y !== undefined;
  if (hasX !== hasY) {
    throw new TypeError('A click offset requires both x and y');
  }
  if (options.x !== undefined && options.y !== undefined) {
    return { modifiers, offset: { x: options.x, y: options.y } };
  }
  return modifiers.length > 0 ? { modifiers } : null;
}
