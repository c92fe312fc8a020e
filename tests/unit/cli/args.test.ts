/**
 * CLI Argument Parsing Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { parseArgs } from '../../../src/cli/args.js';

describe('parseArgs', () => {
  beforeEach(() => {
    vi.mocked(console.warn).mockClear();
  });

  it('should leave everything undefined when no args provided', () => {
    expect(parseArgs([])).toEqual({});
  });

  it.each([
    ['--headless', true],
    ['--headless=true', true],
    ['--headless=1', true],
    ['--headless=false', false],
    ['--headless=0', false],
  ])('should parse %s', (flag, expected) => {
    expect(parseArgs([flag]).headless).toBe(expected);
  });

  it.each([
    ['--autoCreate', true],
    ['--autoCreate=true', true],
    ['--autoCreate=false', false],
    ['--no-autoCreate', false],
  ])('should parse %s', (flag, expected) => {
    expect(parseArgs([flag]).autoCreate).toBe(expected);
  });

  it('should parse numeric flags in both forms', () => {
    const args = parseArgs([
      '--capacity',
      '5',
      '--idleTimeoutMs=60000',
      '--reapIntervalMs',
      '1000',
      '--width=1280',
      '--height',
      '720',
    ]);

    expect(args).toEqual({
      capacity: 5,
      idleTimeoutMs: 60000,
      reapIntervalMs: 1000,
      width: 1280,
      height: 720,
    });
  });

  it('should keep malformed numbers as NaN for validation', () => {
    expect(parseArgs(['--capacity', 'lots']).capacity).toBeNaN();
  });

  it('should ignore a numeric flag with no value', () => {
    expect(parseArgs(['--capacity'])).toEqual({});
    expect(console.warn).not.toHaveBeenCalled();
  });

  it('should parse --channel and --executablePath', () => {
    expect(parseArgs(['--channel', 'chrome-canary'])).toEqual({ channel: 'chrome-canary' });
    expect(parseArgs(['--channel=chrome-beta'])).toEqual({ channel: 'chrome-beta' });
    expect(parseArgs(['--executablePath', '/usr/bin/chromium'])).toEqual({
      executablePath: '/usr/bin/chromium',
    });
  });

  it('should handle arguments in any order', () => {
    const args = parseArgs(['--capacity', '3', '--headless=false', '--channel', 'chrome']);

    expect(args).toEqual({ capacity: 3, headless: false, channel: 'chrome' });
  });

  it('should warn about and ignore unknown arguments', () => {
    const args = parseArgs(['--hedless', '--capacity', '2']);

    expect(args).toEqual({ capacity: 2 });
    expect(console.warn).toHaveBeenCalledWith('Warning: Unknown argument "--hedless" - ignored');
  });
});
