import type { Dirent } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import { join, extname } from 'node:path';
import { DiscoveryError } from './errors.js';

export const MUSIC_EXTENSIONS: ReadonlySet<string> = new Set([
  '.aif', '.aiff', '.ape', '.flac', '.m4a', '.m4b', '.m4r', '.mp2',
  '.mp3', '.mp4', '.mpc', '.ogg', '.opus', '.wav', '.wma',
]);

function compareNames(a: string, b: string): number {
  if (a < b) {
    return -1;
  }

  return a > b ? 1 : 0;
}

/**
 * Depth-first walk, entries sorted by name at every level. Extensions are
 * matched case-sensitively, so `SONG.MP3` is not picked up.
 */
export async function findMusicFiles(
  dir: string,
  extensions: ReadonlySet<string> = MUSIC_EXTENSIONS
): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return collectMusicFiles(dir, entries, extensions);
}

async function collectMusicFiles(
  dir: string,
  entries: Dirent[],
  extensions: ReadonlySet<string>
): Promise<string[]> {
  const musicFiles: string[] = [];

  entries.sort((a, b) => compareNames(a.name, b.name));

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);

    if (entry.isDirectory()) {
      const nestedEntries = await readNestedDirectory(fullPath);
      const nestedFiles = await collectMusicFiles(fullPath, nestedEntries, extensions);
      musicFiles.push(...nestedFiles);
      continue;
    }

    if (!extensions.has(extname(entry.name))) {
      continue;
    }

    // Linked files count; linked folders are not followed.
    if (entry.isFile() || (entry.isSymbolicLink() && (await isLinkToFile(fullPath)))) {
      musicFiles.push(fullPath);
    }
  }

  return musicFiles;
}

// Only the root has to be readable; an unreadable subfolder contributes nothing.
async function readNestedDirectory(dir: string): Promise<Dirent[]> {
  try {
    return await readdir(dir, { withFileTypes: true });
  } catch {
    return [];
  }
}

async function isLinkToFile(linkPath: string): Promise<boolean> {
  try {
    return (await stat(linkPath)).isFile();
  } catch {
    // dangling link
    return false;
  }
}

export async function discoverMusicFiles(root: string): Promise<string[]> {
  try {
    return await findMusicFiles(root);
  } catch (error) {
    throw new DiscoveryError(root, error);
  }
}
