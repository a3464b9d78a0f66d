import { IdentityMissingError } from './errors.js';
import { coerceTagText } from './metadata.js';
import type { Identity, TagMap } from './types.js';

// Lower-cased keys: iTunes atoms, Vorbis/APE fields, ASF attributes, ID3v2.3/2.4
// frames, and the three-character ID3v2.2 frames that music-metadata leaves as-is.
export const ARTIST_ALIASES: ReadonlySet<string> = new Set(['©art', 'artist', 'author', 'tpe1', 'tp1']);
export const ALBUM_ALIASES: ReadonlySet<string> = new Set(['©alb', 'album', 'talb', 'tal', 'wm/albumtitle']);

function firstText(values: unknown[]): string | null {
  if (values.length === 0) {
    return null;
  }

  const text = coerceTagText(values[0]);

  if (text === undefined || text.trim() === '') {
    return null;
  }

  return text;
}

/**
 * First alias key with usable text wins within each class; later keys of
 * the same class never overwrite it.
 */
export function resolveIdentity(tagMap: TagMap): Identity {
  let artist: string | null = null;
  let album: string | null = null;

  for (const [key, values] of tagMap) {
    const lowercaseKey = key.toLowerCase();

    if (artist === null && ARTIST_ALIASES.has(lowercaseKey)) {
      artist = firstText(values);
    } else if (album === null && ALBUM_ALIASES.has(lowercaseKey)) {
      album = firstText(values);
    }
  }

  if (artist === null || album === null) {
    throw new IdentityMissingError(artist ?? '', album ?? '');
  }

  return { artist, album };
}
