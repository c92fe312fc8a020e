/**
 * ServerConfig Tests
 *
 * Precedence of CLI flags over environment over defaults, validation, and
 * the registry singleton.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  DEFAULT_VIEWPORT,
  getServerConfig,
  getSessionRegistry,
  initServerConfig,
  resetServerState,
  resolveConfig,
} from '../../../src/server/server-config.js';
import { DEFAULT_CAPACITY, DEFAULT_IDLE_TIMEOUT_MS } from '../../../src/session/session-registry.js';
import { DEFAULT_REAP_INTERVAL_MS } from '../../../src/session/idle-reaper.js';
import { ErrorCode, ErrorSeverity } from '../../../src/shared/errors/error-codes.js';
import { McpError } from '../../../src/shared/errors/mcp-error.js';
import { FakeDriver } from '../../mocks/driver.mock.js';
import { captureError } from '../../helpers/test-utils.js';

describe('resolveConfig', () => {
  it('should fall back to defaults', () => {
    expect(resolveConfig({}, {})).toEqual({
      headless: true,
      capacity: DEFAULT_CAPACITY,
      idleTimeoutMs: DEFAULT_IDLE_TIMEOUT_MS,
      reapIntervalMs: DEFAULT_REAP_INTERVAL_MS,
      viewport: DEFAULT_VIEWPORT,
      autoCreate: true,
    });
  });

  it('should read environment overrides', () => {
    const config = resolveConfig(
      {},
      {
        HEADLESS: 'false',
        SESSION_CAPACITY: '4',
        SESSION_IDLE_TIMEOUT_MS: '90000',
        SESSION_REAP_INTERVAL_MS: '15000',
        CHROME_PATH: '/opt/chrome/chrome',
      }
    );

    expect(config).toMatchObject({
      headless: false,
      capacity: 4,
      idleTimeoutMs: 90000,
      reapIntervalMs: 15000,
      executablePath: '/opt/chrome/chrome',
    });
  });

  it('should prefer CLI flags over the environment', () => {
    const config = resolveConfig(
      { capacity: 2, headless: true, executablePath: '/usr/bin/chromium' },
      { SESSION_CAPACITY: '8', HEADLESS: '0', CHROME_PATH: '/opt/chrome/chrome' }
    );

    expect(config.capacity).toBe(2);
    expect(config.headless).toBe(true);
    expect(config.executablePath).toBe('/usr/bin/chromium');
  });

  it('should ignore empty and unrecognised environment values', () => {
    const config = resolveConfig({}, { SESSION_CAPACITY: '', HEADLESS: 'maybe', CHROME_PATH: '' });

    expect(config.capacity).toBe(DEFAULT_CAPACITY);
    expect(config.headless).toBe(true);
    expect(config.executablePath).toBeUndefined();
  });

  it('should reject invalid values with every problem listed', () => {
    const error = captureError(() =>
      resolveConfig({ capacity: 0, width: Number.NaN, channel: 'chromium' }, {})
    );

    expect(error).toBeInstanceOf(McpError);
    expect(error).toMatchObject({
      code: ErrorCode.INVALID_INPUT,
      severity: ErrorSeverity.CRITICAL,
      details: {
        issues: [
          'capacity: capacity must be positive',
          'viewport.width: width must be a number',
          expect.stringMatching(/^channel: /),
        ],
      },
    });
  });

  it('should reject a malformed numeric environment value', () => {
    expect(() => resolveConfig({}, { SESSION_IDLE_TIMEOUT_MS: 'soon' })).toThrow(
      'Invalid configuration: idleTimeoutMs: idleTimeoutMs must be a number'
    );
  });
});

describe('server state', () => {
  beforeEach(() => {
    resetServerState();
  });

  it('should throw before initialization', () => {
    expect(() => getServerConfig()).toThrow('Server config not initialized');
  });

  it('should initialize from argv and env', () => {
    initServerConfig(['--capacity', '3', '--no-autoCreate'], {});

    expect(getServerConfig()).toMatchObject({ capacity: 3, autoCreate: false });
  });

  it('should build one registry from the config', () => {
    initServerConfig(['--capacity=3', '--idleTimeoutMs=1000'], {});

    const registry = getSessionRegistry(new FakeDriver());

    expect(registry.capacity).toBe(3);
    expect(registry.idleTimeoutMs).toBe(1000);
    expect(registry.autoCreate).toBe(true);
    expect(getSessionRegistry()).toBe(registry);
  });
});
