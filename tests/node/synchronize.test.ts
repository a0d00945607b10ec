/**
 * Tests for the retry wrapper
 */

import {
  DriverError,
  NotSupportedByDriverError,
  ObsoleteElementError,
  SynchronizeTimeoutError,
} from '../../src/errors';
import { FakeDriver, FakeNode } from '../mocks/fake-driver';
import { createTestSession } from '../test-utils';

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected promise to reject');
}

describe('synchronize', () => {
  describe('on a waiting driver', () => {
    it('should retry transient failures until the action succeeds', async () => {
      const node = new FakeNode('a', { attributes: { id: 'target' } });
      node.failNext(
        'getAttribute',
        new DriverError('not_ready', 'busy'),
        new DriverError('not_ready', 'busy')
      );
      const driver = new FakeDriver().respond('#target', [node]);
      const { session, logger } = createTestSession(driver);
      const handle = await session.find('css', '#target');

      expect(await handle.getAttribute('id')).toBe('target');
      expect(node.callsTo('getAttribute')).toHaveLength(3);
      expect(logger.debug).toHaveBeenCalledWith(
        expect.stringMatching(/^Retrying after not_ready \(attempt 1, \d+ms elapsed\)$/)
      );
    });

    it('should raise once with the last transient error after the deadline', async () => {
      const node = new FakeNode('a');
      const failure = new DriverError('not_ready', 'still loading');
      node.failAlways('getAttribute', failure);
      const driver = new FakeDriver().respond('#target', [node]);
      const { session } = createTestSession(driver, { defaultMaxWaitTimeMs: 40 });
      const handle = await session.find('css', '#target');

      const startedAt = Date.now();
      const error = await captureError(handle.getAttribute('id'));
      const elapsedMs = Date.now() - startedAt;

      expect(error).toBeInstanceOf(SynchronizeTimeoutError);
      expect(error).not.toBeInstanceOf(ObsoleteElementError);
      expect(error).toHaveProperty('lastError', failure);
      expect(error).toHaveProperty('cause', failure);
      expect(error).toHaveProperty('waitMs', 40);
      expect(error).toHaveProperty('message', 'Gave up after 40ms: still loading');
      expect(node.callsTo('getAttribute').length).toBeGreaterThan(1);
      expect(elapsedMs).toBeLessThan(1000);
    });

    it('should report an obsolete element when the node stays invalid', async () => {
      const node = new FakeNode('a');
      node.failAlways('tagName', new DriverError('stale_reference', 'gone'));
      const driver = new FakeDriver().respond('#target', [node]);
      const { session } = createTestSession(driver, { defaultMaxWaitTimeMs: 30 });
      const handle = await session.find('css', '#target');

      const error = await captureError(handle.tagName());

      expect(error).toBeInstanceOf(ObsoleteElementError);
      expect(error).toBeInstanceOf(SynchronizeTimeoutError);
      expect(error).toHaveProperty('error', 'obsolete_element');
      expect(error).toHaveProperty('message', 'Element is obsolete: gone');
    });

    it('should honour a per-call wait budget', async () => {
      const { session } = createTestSession(new FakeDriver());
      const action = jest.fn(async () => {
        throw new DriverError('not_ready', 'busy');
      });

      const error = await captureError(session.document.synchronize(action, { waitMs: 0 }));

      expect(error).toHaveProperty('waitMs', 0);
      expect(action).toHaveBeenCalledTimes(1);
    });

    it('should only retry the given error kinds', async () => {
      const { session } = createTestSession(new FakeDriver());
      const failure = new DriverError('not_ready', 'busy');
      const action = jest.fn(async () => {
        throw failure;
      });

      await expect(
        session.document.synchronize(action, { errors: ['stale_reference'] })
      ).rejects.toBe(failure);
      expect(action).toHaveBeenCalledTimes(1);
    });

    it('should swap in a re-rendered node between retries', async () => {
      const stale = new FakeNode('old', { attributes: { id: 'old' } });
      stale.failAlways('getAttribute', new DriverError('stale_reference', 'detached from DOM'));
      const fresh = new FakeNode('new', { attributes: { id: 'new' } });
      const driver = new FakeDriver().respond('#target', [stale]);
      const { session } = createTestSession(driver);
      const handle = await session.find('css', '#target');

      driver.respond('#target', [fresh]);

      expect(await handle.getAttribute('id')).toBe('new');
      expect(await handle.getAttribute('id')).toBe('new');
      expect(stale.callsTo('getAttribute')).toHaveLength(1);
    });

    it('should not reload when automatic reload is off', async () => {
      const stale = new FakeNode('old');
      stale.failAlways('hover', new DriverError('stale_reference', 'gone'));
      const fresh = new FakeNode('new');
      const driver = new FakeDriver().respond('#target', [stale]);
      const { session } = createTestSession(driver, {
        automaticReload: false,
        defaultMaxWaitTimeMs: 20,
      });
      const handle = await session.find('css', '#target');
      driver.respond('#target', [fresh]);

      await expect(handle.hover()).rejects.toThrow(ObsoleteElementError);
      expect(fresh.callsTo('hover')).toEqual([]);
    });
  });

  describe('error propagation', () => {
    let node: FakeNode;
    let driver: FakeDriver;

    beforeEach(() => {
      node = new FakeNode('a');
      driver = new FakeDriver().respond('#target', [node]);
    });

    it('should propagate non-transient driver errors immediately', async () => {
      const failure = new DriverError('invalid_selector', 'bad');
      node.failNext('getAttribute', failure);
      const { session } = createTestSession(driver);
      const handle = await session.find('css', '#target');

      await expect(handle.getAttribute('id')).rejects.toBe(failure);
      expect(node.callsTo('getAttribute')).toHaveLength(1);
    });

    it('should propagate operations unsupported by the driver', async () => {
      const failure = new NotSupportedByDriverError('hover', 'fake');
      node.failNext('hover', failure);
      const { session } = createTestSession(driver);
      const handle = await session.find('css', '#target');

      await expect(handle.hover()).rejects.toBe(failure);
      expect(node.callsTo('hover')).toHaveLength(1);
    });

    it('should never catch programmer errors', async () => {
      node.failNext('trigger', new TypeError('event must be a string'));
      const { session } = createTestSession(driver);
      const handle = await session.find('css', '#target');

      await expect(handle.trigger('click')).rejects.toThrow(TypeError);
      expect(node.callsTo('trigger')).toHaveLength(1);
    });
  });

  describe('nesting', () => {
    it('should run nested calls once and let the outer call decide', async () => {
      const node = new FakeNode('a');
      const failure = new DriverError('not_ready', 'busy');
      node.failAlways('getAttribute', failure);
      const driver = new FakeDriver().respond('#target', [node]);
      const { session } = createTestSession(driver);
      const handle = await session.find('css', '#target');

      await expect(
        handle.synchronize(() => handle.getAttribute('id'), { errors: ['stale_reference'] })
      ).rejects.toBe(failure);
      expect(node.callsTo('getAttribute')).toHaveLength(1);
    });

    it('should keep retrying on one handle while another synchronizes', async () => {
      const a = new FakeNode('a');
      const b = new FakeNode('b', { attributes: { id: 'b' } });
      b.failNext('getAttribute', new DriverError('not_ready', 'busy'));
      const driver = new FakeDriver().respond('#a', [a]).respond('#b', [b]);
      const { session } = createTestSession(driver);
      const first = await session.find('css', '#a');
      const second = await session.find('css', '#b');

      const [, id] = await Promise.all([
        first.synchronize(() => new Promise<void>(resolve => setTimeout(resolve, 30))),
        second.getAttribute('id'),
      ]);

      expect(id).toBe('b');
      expect(b.callsTo('getAttribute')).toHaveLength(2);
    });

    it('should flag the session only while an action runs', async () => {
      const { session } = createTestSession(new FakeDriver());
      let inside = false;

      await session.document.synchronize(async () => {
        inside = session.synchronized;
      });

      expect(inside).toBe(true);
      expect(session.synchronized).toBe(false);
    });

    it('should clear the flag after a failure', async () => {
      const { session } = createTestSession(new FakeDriver());

      await expect(
        session.document.synchronize(async () => {
          throw new TypeError('boom');
        })
      ).rejects.toThrow('boom');
      expect(session.synchronized).toBe(false);
    });
  });

  describe('on a non-waiting driver', () => {
    it('should retry once a reload replaced the node', async () => {
      const stale = new FakeNode('old');
      stale.failNext('value', new DriverError('obsolete_node', 'replaced'));
      const fresh = new FakeNode('new', { value: 'fresh value' });
      const driver = new FakeDriver({ waits: false }).respond('#target', [stale]);
      const { session, logger } = createTestSession(driver);
      const handle = await session.find('css', '#target');
      driver.respond('#target', [fresh]);

      expect(await handle.value()).toBe('fresh value');
      expect(logger.debug).not.toHaveBeenCalledWith(expect.stringMatching(/^Retrying/));
    });

    it('should give up at once when the reload found the same node', async () => {
      const node = new FakeNode('a');
      node.failAlways('value', new DriverError('obsolete_node', 'replaced'));
      const driver = new FakeDriver({ waits: false }).respond('#target', [node]);
      const { session } = createTestSession(driver);
      const handle = await session.find('css', '#target');

      const error = await captureError(handle.value());

      expect(error).toBeInstanceOf(ObsoleteElementError);
      expect(error).toHaveProperty('waitMs', 0);
      expect(node.callsTo('value')).toHaveLength(1);
    });

    it('should give up when the reload found the same element under a new binding', async () => {
      const driver = new FakeDriver({ waits: false });
      driver.findAll.mockImplementation(async () => [
        new FakeNode('a').failAlways('value', new DriverError('not_ready', 'loading')),
      ]);
      const { session } = createTestSession(driver);
      const handle = await session.find('css', '#target');

      const error = await captureError(handle.value());

      expect(error).toBeInstanceOf(SynchronizeTimeoutError);
      expect(error).toHaveProperty('waitMs', 0);
      expect(driver.findAll).toHaveBeenCalledTimes(2);
    });

    it('should stop at the deadline even when every reload binds a new node', async () => {
      let rendered = 0;
      const driver = new FakeDriver({ waits: false });
      driver.findAll.mockImplementation(async () => [
        new FakeNode(`render-${rendered++}`).failAlways(
          'value',
          new DriverError('stale_reference', 'detached')
        ),
      ]);
      const { session } = createTestSession(driver, { defaultMaxWaitTimeMs: 20 });
      const handle = await session.find('css', '#target');

      const error = await captureError(handle.value());

      expect(error).toBeInstanceOf(ObsoleteElementError);
      expect(error).toHaveProperty('waitMs', 20);
    });

    it('should give up at once on transient errors that are not about the node', async () => {
      const node = new FakeNode('a');
      node.failAlways('value', new DriverError('not_ready', 'loading'));
      const driver = new FakeDriver({ waits: false }).respond('#target', [node]);
      const { session } = createTestSession(driver);
      const handle = await session.find('css', '#target');

      const error = await captureError(handle.value());

      expect(error).toBeInstanceOf(SynchronizeTimeoutError);
      expect(error).not.toBeInstanceOf(ObsoleteElementError);
      expect(node.callsTo('value')).toHaveLength(1);
    });
  });
});
