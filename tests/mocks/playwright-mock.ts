/**
 * Jest-mocked stand-ins for playwright-core Page and ElementHandle.
 *
 * Only the members the driver calls are implemented; the fakes are handed
 * to the driver under Playwright's types, as the real ones would be.
 */

import type { ElementHandle, Page } from 'playwright-core';

export interface MockBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

export function createMockHandle() {
  return {
    getAttribute: jest.fn(async (_name: string): Promise<string | null> => null),
    textContent: jest.fn(async (): Promise<string | null> => ''),
    innerText: jest.fn(async (): Promise<string> => ''),
    evaluate: jest.fn(async (..._args: unknown[]): Promise<unknown> => undefined),
    fill: jest.fn(async (_value: string): Promise<void> => undefined),
    setChecked: jest.fn(async (_checked: boolean): Promise<void> => undefined),
    click: jest.fn(async (_options?: Record<string, unknown>): Promise<void> => undefined),
    dblclick: jest.fn(async (_options?: Record<string, unknown>): Promise<void> => undefined),
    hover: jest.fn(async (): Promise<void> => undefined),
    focus: jest.fn(async (): Promise<void> => undefined),
    dispatchEvent: jest.fn(async (_type: string): Promise<void> => undefined),
    boundingBox: jest.fn(async (): Promise<MockBox | null> => null),
    isVisible: jest.fn(async (): Promise<boolean> => true),
    isDisabled: jest.fn(async (): Promise<boolean> => false),
    dispose: jest.fn(async (): Promise<void> => undefined),
    $$: jest.fn(async (_selector: string): Promise<unknown[]> => []),
  };
}

export type MockHandle = ReturnType<typeof createMockHandle>;

export function createMockPage() {
  return {
    $$: jest.fn(async (_selector: string): Promise<unknown[]> => []),
    mouse: {
      move: jest.fn(async (_x: number, _y: number): Promise<void> => undefined),
      down: jest.fn(async (): Promise<void> => undefined),
      up: jest.fn(async (): Promise<void> => undefined),
    },
    keyboard: {
      type: jest.fn(async (_text: string): Promise<void> => undefined),
      press: jest.fn(async (_key: string): Promise<void> => undefined),
      down: jest.fn(async (_key: string): Promise<void> => undefined),
      up: jest.fn(async (_key: string): Promise<void> => undefined),
    },
  };
}

export type MockPage = ReturnType<typeof createMockPage>;

export function asPage(page: MockPage): Page {
  return page as unknown as Page;
}

export function asHandle(handle: MockHandle): ElementHandle<SVGElement | HTMLElement> {
  return handle as unknown as ElementHandle<SVGElement | HTMLElement>;
}
