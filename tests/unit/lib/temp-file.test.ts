/**
 * Temp File Utility Tests
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';

// Mock fs/promises and crypto (hoisted)
vi.mock('fs/promises', () => ({
  writeFile: vi.fn().mockResolvedValue(undefined),
  unlink: vi.fn().mockResolvedValue(undefined),
}));

vi.mock('crypto', () => ({
  randomBytes: vi.fn().mockReturnValue({ toString: () => 'a1b2c3d4e5f6' }),
}));

import {
  writeTempFile,
  getTrackedTempFiles,
  cleanupTempFiles,
} from '../../../src/lib/temp-file.js';
import { writeFile, unlink } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

describe('writeTempFile', () => {
  beforeEach(async () => {
    await cleanupTempFiles();
    vi.clearAllMocks();
  });

  it('writes the bytes to a file in the OS temp directory', async () => {
    const data = new Uint8Array([1, 2, 3]);
    const filepath = await writeTempFile(data, 'png');

    expect(filepath).toBe(join(tmpdir(), 'screenshot-a1b2c3d4e5f6.png'));
    expect(writeFile).toHaveBeenCalledWith(filepath, data);
  });

  it('uses the given extension and prefix', async () => {
    const filepath = await writeTempFile(new Uint8Array([1]), 'jpeg', 'capture');
    expect(filepath).toBe(join(tmpdir(), 'capture-a1b2c3d4e5f6.jpeg'));
  });

  it('tracks written files until cleanup', async () => {
    const filepath = await writeTempFile(new Uint8Array([1]), 'png');
    expect(getTrackedTempFiles()).toEqual([filepath]);
  });
});

describe('cleanupTempFiles', () => {
  beforeEach(async () => {
    await cleanupTempFiles();
    vi.clearAllMocks();
  });

  it('unlinks every tracked file and forgets them', async () => {
    const first = await writeTempFile(new Uint8Array([1]), 'png', 'one');
    const second = await writeTempFile(new Uint8Array([2]), 'png', 'two');

    await cleanupTempFiles();

    expect(unlink).toHaveBeenCalledWith(first);
    expect(unlink).toHaveBeenCalledWith(second);
    expect(getTrackedTempFiles()).toEqual([]);
  });

  it('ignores files that are already gone', async () => {
    await writeTempFile(new Uint8Array([1]), 'png');
    const missing = Object.assign(new Error('no such file'), { code: 'ENOENT' });
    vi.mocked(unlink).mockRejectedValueOnce(missing);

    await expect(cleanupTempFiles()).resolves.toBeUndefined();
    expect(getTrackedTempFiles()).toEqual([]);
  });

  it('does not throw when a delete fails for another reason', async () => {
    await writeTempFile(new Uint8Array([1]), 'png');
    const denied = Object.assign(new Error('permission denied'), { code: 'EACCES' });
    vi.mocked(unlink).mockRejectedValueOnce(denied);

    await expect(cleanupTempFiles()).resolves.toBeUndefined();
  });
});
