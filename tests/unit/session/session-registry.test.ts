/**
 * SessionRegistry Tests
 *
 * Admission, LRU eviction, close semantics and idle checks against a fake
 * driver and a hand-driven clock.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { SessionRegistry, type RegistryOptions } from '../../../src/session/session-registry.js';
import { IdleReaper } from '../../../src/session/idle-reaper.js';
import type { Page } from '../../../src/browser/automation-driver.js';
import { ErrorCode } from '../../../src/shared/errors/error-codes.js';
import { FakeDriver, createDeferred } from '../../mocks/driver.mock.js';
import { asPage, createMockPage } from '../../mocks/puppeteer.mock.js';
import { expectUuid } from '../../helpers/test-utils.js';

const LAUNCH = { headless: true, viewport: { width: 800, height: 600 } };

describe('SessionRegistry', () => {
  let driver: FakeDriver;
  let now: number;
  let maxSize: number;

  function createRegistry(overrides: Partial<RegistryOptions> = {}): SessionRegistry {
    const registry: SessionRegistry = new SessionRegistry(
      driver,
      {
        capacity: 2,
        idleTimeoutMs: 60_000,
        autoCreate: true,
        session: { launch: LAUNCH },
        ...overrides,
      },
      () => {
        maxSize = Math.max(maxSize, registry.size);
        return now;
      }
    );
    return registry;
  }

  function ids(registry: SessionRegistry): string[] {
    return registry.list().map((summary) => summary.session_id);
  }

  beforeEach(() => {
    driver = new FakeDriver();
    now = 1000;
    maxSize = 0;
  });

  it('rejects a capacity below one', () => {
    expect(() => createRegistry({ capacity: 0 })).toThrow(RangeError);
  });

  describe('eviction', () => {
    it('evicts the least recently active session to admit a new one', async () => {
      const registry = createRegistry();
      await registry.open('a');
      now = 2000;
      await registry.resolve('b');
      now = 3000;
      await registry.resolve('c');

      expect(ids(registry)).toEqual(['b', 'c']);
      expect(registry.has('a')).toBe(false);
      expect(driver.terminate).toHaveBeenCalledTimes(1);
    });

    it('spares a session that was used recently', async () => {
      const registry = createRegistry();
      await registry.resolve('a');
      now = 2000;
      await registry.resolve('b');
      now = 3000;
      await registry.resolve('a');
      now = 4000;
      await registry.resolve('c');

      expect(ids(registry)).toEqual(['a', 'c']);
    });

    it('breaks ties by evicting the earliest created', async () => {
      const registry = createRegistry();
      await registry.resolve('a');
      await registry.resolve('b');
      await registry.resolve('c');

      expect(ids(registry)).toEqual(['b', 'c']);
    });

    it('never holds more than capacity sessions under concurrent admissions', async () => {
      const registry = createRegistry();

      await Promise.all(['a', 'b', 'c', 'd', 'e'].map((id) => registry.resolve(id)));

      expect(maxSize).toBeLessThanOrEqual(2);
      expect(registry.size).toBe(2);
      expect(ids(registry).sort()).toEqual(['d', 'e']);
    });

    it('never launches a browser for a session evicted while a call was queued on it', async () => {
      const registry = createRegistry({ capacity: 1 });
      const evicted = await registry.resolve('a');
      await evicted.open();
      const pageGate = createDeferred<Page>();
      driver.newPage.mockImplementationOnce(() => pageGate.promise);

      const creating = evicted.createTab();
      const reopening = evicted.open();
      await vi.waitFor(() => expect(driver.newPage).toHaveBeenCalledTimes(2));
      await registry.resolve('b');
      const late = createMockPage();
      pageGate.resolve(asPage(late));

      await expect(creating).rejects.toMatchObject({ code: ErrorCode.SESSION_CLOSED });
      await expect(reopening).rejects.toMatchObject({ code: ErrorCode.SESSION_CLOSED });
      expect(late.close).toHaveBeenCalledTimes(1);
      expect(ids(registry)).toEqual(['b']);

      await registry.shutdown();
      expect(driver.launch).toHaveBeenCalledTimes(1);
      expect(driver.terminate).toHaveBeenCalledTimes(1);
    });

    it('creates a contended id once', async () => {
      const registry = createRegistry({ capacity: 1 });
      await registry.open('a');

      const [first, second] = await Promise.all([registry.resolve('y'), registry.resolve('y')]);

      expect(first).toBe(second);
      expect(ids(registry)).toEqual(['y']);
      expect(driver.terminate).toHaveBeenCalledTimes(1);
    });
  });

  describe('resolve', () => {
    it('returns the same session for the same id and records activity', async () => {
      const registry = createRegistry();
      const first = await registry.resolve('a');
      now = 5000;
      const second = await registry.resolve('a');

      expect(second).toBe(first);
      expect(second.lastActivityAt).toBe(5000);
    });

    it('waits for an in-flight teardown and then creates a fresh session', async () => {
      const registry = createRegistry();
      const original = await registry.resolve('a');
      await original.open();
      const releasing = createDeferred<void>();
      driver.closeBrowser.mockImplementationOnce(() => releasing.promise);

      const closing = registry.close('a');
      const resolving = registry.resolve('a');
      releasing.resolve();

      await expect(closing).resolves.toBe('closed');
      const fresh = await resolving;
      expect(fresh).not.toBe(original);
      expect(fresh.isOpen).toBe(false);
      expect(registry.size).toBe(1);
    });

    it('mints fresh ids', async () => {
      const registry = createRegistry();
      const id = await registry.createSessionId();

      expectUuid(id);
      expect(registry.has(id)).toBe(true);
    });
  });

  describe('acquire', () => {
    it('creates unknown ids when autoCreate is on', async () => {
      const registry = createRegistry();
      await registry.acquire('new');
      expect(registry.has('new')).toBe(true);
    });

    it('rejects unknown ids when autoCreate is off', async () => {
      const registry = createRegistry({ autoCreate: false });

      await expect(registry.acquire('nope')).rejects.toMatchObject({
        code: ErrorCode.SESSION_NOT_FOUND,
        details: { session_id: 'nope' },
      });

      await registry.resolve('known');
      await expect(registry.acquire('known')).resolves.toMatchObject({ id: 'known' });
    });
  });

  describe('open', () => {
    it('opens the session with per-call overrides', async () => {
      const registry = createRegistry();
      const result = await registry.open('a', { headless: false });

      expect(result.settings.headless).toBe(false);
      expect(registry.list()[0]).toMatchObject({ session_id: 'a', is_open: true, tab_count: 1 });
    });
  });

  describe('close', () => {
    it('reports already_closed on a second close', async () => {
      const registry = createRegistry();
      await registry.open('s');

      await expect(registry.close('s')).resolves.toBe('closed');
      await expect(registry.close('s')).resolves.toBe('already_closed');
      expect(registry.has('s')).toBe(false);
    });

    it('treats unknown and unopened sessions as already closed', async () => {
      const registry = createRegistry();
      await registry.resolve('idle');

      await expect(registry.close('never-seen')).resolves.toBe('already_closed');
      await expect(registry.close('idle')).resolves.toBe('already_closed');
      expect(registry.size).toBe(0);
    });

    it('shares one teardown between concurrent closes', async () => {
      const registry = createRegistry();
      await registry.open('s');

      const results = await Promise.all([registry.close('s'), registry.close('s')]);

      expect(results).toEqual(['closed', 'closed']);
      expect(driver.terminate).toHaveBeenCalledTimes(1);
    });

    it('hides a closing session from list and has', async () => {
      const registry = createRegistry();
      await registry.open('s');
      const releasing = createDeferred<void>();
      driver.closeBrowser.mockImplementationOnce(() => releasing.promise);

      const closing = registry.close('s');
      expect(registry.has('s')).toBe(false);
      expect(registry.list()).toEqual([]);
      expect(registry.size).toBe(1);

      releasing.resolve();
      await closing;
      expect(registry.size).toBe(0);
    });

    it('shuts every session down', async () => {
      const registry = createRegistry();
      await registry.open('a');
      await registry.open('b');

      await registry.shutdown();

      expect(registry.size).toBe(0);
      expect(driver.terminate).toHaveBeenCalledTimes(2);
    });
  });

  describe('idle handling', () => {
    it('closes only sessions idle for longer than the timeout', async () => {
      const registry = createRegistry();
      await registry.open('a');

      await expect(registry.closeIfIdle('a', 61_000)).resolves.toBe(false);
      await expect(registry.closeIfIdle('a', 61_001)).resolves.toBe(true);
      expect(registry.has('a')).toBe(false);
    });

    it('keeps a session touched since it went stale through the next sweep', async () => {
      const registry = createRegistry();
      await registry.open('a');
      now = 100_000;
      const reaper = new IdleReaper(registry, { clock: () => now });

      await registry.resolve('a');
      await expect(reaper.sweep()).resolves.toEqual([]);
      expect(registry.has('a')).toBe(true);

      now = 161_000;
      await expect(reaper.sweep()).resolves.toEqual(['a']);
      expect(registry.has('a')).toBe(false);
    });

    it('spares a session resolved between the activity snapshot and its teardown', async () => {
      const registry = createRegistry();
      await registry.open('a');
      now = 100_000;
      const reaper = new IdleReaper(registry, { clock: () => now });
      const closeIfIdle = registry.closeIfIdle.bind(registry);
      const gate = createDeferred<void>();
      const spy = vi.spyOn(registry, 'closeIfIdle').mockImplementationOnce(async (id, at) => {
        await gate.promise;
        return closeIfIdle(id, at);
      });

      const sweeping = reaper.sweep();
      expect(spy).toHaveBeenCalledWith('a', 100_000);
      now = 100_500;
      await registry.resolve('a');
      gate.resolve();

      await expect(sweeping).resolves.toEqual([]);
      expect(registry.has('a')).toBe(true);
      expect(registry.list()[0]).toMatchObject({ session_id: 'a', is_open: true });
      expect(driver.closeContext).not.toHaveBeenCalled();
      expect(driver.closeBrowser).not.toHaveBeenCalled();
      expect(driver.terminate).not.toHaveBeenCalled();
    });

    it('ignores unknown ids', async () => {
      const registry = createRegistry();
      await expect(registry.closeIfIdle('missing', 10_000_000)).resolves.toBe(false);
    });

    it('snapshots activity of resident sessions', async () => {
      const registry = createRegistry();
      await registry.resolve('a');
      now = 4000;
      await registry.resolve('b');

      expect(registry.snapshotActivity()).toEqual([
        { id: 'a', lastActivityAt: 1000 },
        { id: 'b', lastActivityAt: 4000 },
      ]);
    });
  });
});
