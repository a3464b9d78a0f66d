import fs from 'node:fs/promises';
import path from 'node:path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { DiscoveryError } from './errors.js';
import { discoverMusicFiles, findMusicFiles } from './scanner.js';
import { makeTempDir } from './test-helpers.js';

describe('scanner', () => {
  let root: string;

  beforeAll(async () => {
    root = await makeTempDir('scanner');

    const files = [
      'b.mp3',
      'a.flac',
      'LOUD.MP3',
      'cover.jpg',
      'notes.txt',
      'nested/c.ogg',
      'nested/deep/d.wma',
      'folder.mp3/e.m4a',
    ];

    for (const file of files) {
      const fullPath = path.join(root, file);
      await fs.mkdir(path.dirname(fullPath), { recursive: true });
      await fs.writeFile(fullPath, file);
    }
  });

  afterAll(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('finds music files recursively in name order', async () => {
    const found = await findMusicFiles(root);

    expect(found).toEqual([
      path.join(root, 'a.flac'),
      path.join(root, 'b.mp3'),
      path.join(root, 'folder.mp3', 'e.m4a'),
      path.join(root, 'nested', 'c.ogg'),
      path.join(root, 'nested', 'deep', 'd.wma'),
    ]);
  });

  it('matches extensions case-sensitively', async () => {
    const found = await findMusicFiles(root);
    expect(found).not.toContain(path.join(root, 'LOUD.MP3'));
  });

  it('returns the same order on every call', async () => {
    expect(await findMusicFiles(root)).toEqual(await findMusicFiles(root));
  });

  it('honours a custom extension set', async () => {
    const found = await findMusicFiles(root, new Set(['.ogg']));
    expect(found).toEqual([path.join(root, 'nested', 'c.ogg')]);
  });

  it('fails with DiscoveryError when the root cannot be read', async () => {
    const missing = path.join(root, 'does-not-exist');
    await expect(discoverMusicFiles(missing)).rejects.toBeInstanceOf(DiscoveryError);
  });
});

describe('scanner with links', () => {
  let root: string;
  let outside: string;

  beforeAll(async () => {
    root = await makeTempDir('scanner-links');
    outside = await makeTempDir('scanner-target');

    await fs.writeFile(path.join(outside, 'real.mp3'), 'real');
    await fs.mkdir(path.join(outside, 'album'));
    await fs.writeFile(path.join(outside, 'album', 'inner.flac'), 'inner');

    await fs.writeFile(path.join(root, 'b.mp3'), 'b');
    await fs.symlink(path.join(outside, 'real.mp3'), path.join(root, 'link.mp3'));
    await fs.symlink(path.join(outside, 'album'), path.join(root, 'linked-album'));
    await fs.symlink(path.join(outside, 'gone.mp3'), path.join(root, 'dangling.mp3'));
  });

  afterAll(async () => {
    await fs.rm(root, { recursive: true, force: true });
    await fs.rm(outside, { recursive: true, force: true });
  });

  it('includes linked files but not linked folders or dangling links', async () => {
    expect(await findMusicFiles(root)).toEqual([path.join(root, 'b.mp3'), path.join(root, 'link.mp3')]);
  });
});
