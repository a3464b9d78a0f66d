import { constants } from 'node:fs';
import { access, stat } from 'node:fs/promises';
import { isAbsolute, relative, resolve, sep } from 'node:path';
import { InvalidFolderError } from './errors.js';

/**
 * Returns a description of what is wrong with the folder, or null when it
 * can be used.
 */
export async function checkFolder(path: string, mode: number = constants.R_OK): Promise<string | null> {
  if (path.trim() === '') {
    return 'No folder selected';
  }

  try {
    const stats = await stat(path);

    if (!stats.isDirectory()) {
      return `Not a folder: ${path}`;
    }
  } catch {
    return `Folder not found: ${path}`;
  }

  try {
    await access(path, mode);
  } catch {
    return `Folder is not accessible: ${path}`;
  }

  return null;
}

function isInside(parent: string, child: string): boolean {
  const rel = relative(parent, child);
  return rel !== '' && rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel);
}

export async function validateFolders(sourceDir: string, destinationDir: string): Promise<void> {
  const sourceProblem = await checkFolder(sourceDir);

  if (sourceProblem) {
    throw new InvalidFolderError(`Music folder: ${sourceProblem}`);
  }

  const destinationProblem = await checkFolder(destinationDir, constants.R_OK | constants.W_OK);

  if (destinationProblem) {
    throw new InvalidFolderError(`Destination folder: ${destinationProblem}`);
  }

  const source = resolve(sourceDir);
  const destination = resolve(destinationDir);

  if (source === destination) {
    throw new InvalidFolderError('Music and destination folders must be different');
  }

  if (isInside(source, destination)) {
    throw new InvalidFolderError('Destination folder cannot be inside the music folder');
  }
}
