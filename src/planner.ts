import { existsSync } from 'node:fs';
import { isAbsolute, join, relative, sep } from 'node:path';
import { OrganizeError } from './errors.js';
import type { DestinationPlan, PlacementDecision } from './types.js';

export const ALREADY_EXISTS_MESSAGE = 'File already exists in the destination folder';

const UNUSABLE_SEGMENTS = new Set(['', '.', '..']);

function staysInside(root: string, directory: string): boolean {
  const rel = relative(root, directory);
  return rel !== '' && rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel);
}

export function planDestination(
  destinationRoot: string,
  artist: string,
  album: string,
  fileName: string
): DestinationPlan {
  if (UNUSABLE_SEGMENTS.has(artist) || UNUSABLE_SEGMENTS.has(album)) {
    throw new OrganizeError('INVALID_DESTINATION', 'Artist or album is not a usable folder name');
  }

  const newDirectory = join(destinationRoot, artist, album);

  // Unsanitized tags can still carry separators, e.g. `../../escaped`.
  if (!staysInside(destinationRoot, newDirectory)) {
    throw new OrganizeError('INVALID_DESTINATION', 'Artist or album is not a usable folder name');
  }

  return {
    newDirectory,
    fileName,
    targetPath: join(newDirectory, fileName),
  };
}

export function planPlacement(
  destinationRoot: string,
  artist: string,
  album: string,
  fileName: string
): PlacementDecision {
  const plan = planDestination(destinationRoot, artist, album, fileName);

  if (existsSync(plan.targetPath)) {
    return { kind: 'collision', plan };
  }

  return { kind: 'proceed', plan };
}
