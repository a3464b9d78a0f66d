import fs from 'node:fs/promises';
import { readdir } from 'node:fs/promises';
import path from 'node:path';
import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';
import { DiscoveryError } from './errors.js';
import { discoverMusicFiles } from './scanner.js';
import { makeTempDir } from './test-helpers.js';

vi.mock('node:fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs/promises')>();
  return { ...actual, readdir: vi.fn(actual.readdir) };
});

function permissionDenied(dir: string): NodeJS.ErrnoException {
  const error: NodeJS.ErrnoException = new Error(`EACCES: permission denied, scandir '${dir}'`);
  error.code = 'EACCES';
  return error;
}

describe('discoverMusicFiles with unreadable folders', () => {
  let root: string;

  beforeAll(async () => {
    root = await makeTempDir('scanner-unreadable');

    for (const file of ['a.mp3', 'locked/hidden.mp3', 'open/b.mp3']) {
      const fullPath = path.join(root, file);
      await fs.mkdir(path.dirname(fullPath), { recursive: true });
      await fs.writeFile(fullPath, file);
    }
  });

  afterAll(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('skips a subfolder that cannot be listed', async () => {
    const actual = await vi.importActual<typeof import('node:fs/promises')>('node:fs/promises');

    // Listing order: root, then locked/, then open/.
    vi.mocked(readdir)
      .mockImplementationOnce(actual.readdir)
      .mockImplementationOnce(() => Promise.reject(permissionDenied(path.join(root, 'locked'))));

    expect(await discoverMusicFiles(root)).toEqual([path.join(root, 'a.mp3'), path.join(root, 'open', 'b.mp3')]);
  });

  it('still fails when the root cannot be listed', async () => {
    vi.mocked(readdir).mockImplementationOnce(() => Promise.reject(permissionDenied(root)));

    const error = await discoverMusicFiles(root).then(
      () => null,
      (reason: unknown) => reason
    );

    expect(error).toBeInstanceOf(DiscoveryError);

    if (error instanceof DiscoveryError) {
      expect(error.message).toBe(`Could not scan ${root}: EACCES: permission denied, scandir '${root}'`);
    }
  });
});
