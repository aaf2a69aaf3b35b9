/**
 * Tests for savePdf
 *
 * node:fs/promises is mocked; nothing touches the disk.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('node:fs/promises', () => ({
  mkdir: vi.fn(),
  writeFile: vi.fn(),
}));

import { mkdir, writeFile } from 'node:fs/promises';

import { ChecklistRenderError, savePdf } from '../pdf-renderer.js';

describe('savePdf', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('creates the parent directory and writes the bytes', async () => {
    const bytes = new Uint8Array([0x25, 0x50, 0x44, 0x46]);

    await savePdf('out/lists/trip.pdf', bytes);

    expect(mkdir).toHaveBeenCalledWith('out/lists', { recursive: true });
    expect(writeFile).toHaveBeenCalledWith('out/lists/trip.pdf', bytes);
  });

  it('wraps write failures in WRITE_FAILED', async () => {
    vi.mocked(writeFile).mockRejectedValueOnce(new Error('EACCES: permission denied'));

    const promise = savePdf('trip.pdf', new Uint8Array());

    await expect(promise).rejects.toBeInstanceOf(ChecklistRenderError);
    await expect(promise).rejects.toMatchObject({
      code: 'WRITE_FAILED',
      message: "Could not write 'trip.pdf': EACCES: permission denied",
    });
  });
});
