import { describe, expect, it } from 'vitest';
import { IdentityMissingError } from './errors.js';
import { resolveIdentity } from './identity.js';
import type { TagMap } from './types.js';

function tags(entries: Array<[string, unknown[]]>): TagMap {
  return new Map(entries);
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }

  throw new Error('expected function to throw');
}

describe('resolveIdentity', () => {
  it('reads iTunes atoms', () => {
    const identity = resolveIdentity(tags([['©ART', ['Atom Artist']], ['©alb', ['Atom Album']]]));
    expect(identity).toEqual({ artist: 'Atom Artist', album: 'Atom Album' });
  });

  it('reads Vorbis comment fields', () => {
    const identity = resolveIdentity(tags([['TITLE', ['Song']], ['ARTIST', ['Field Artist']], ['ALBUM', ['Field Album']]]));
    expect(identity).toEqual({ artist: 'Field Artist', album: 'Field Album' });
  });

  it('reads ASF attributes', () => {
    const identity = resolveIdentity(tags([['Author', ['Wma Artist']], ['WM/AlbumTitle', ['Wma Album']]]));
    expect(identity).toEqual({ artist: 'Wma Artist', album: 'Wma Album' });
  });

  it('reads ID3v2.2 frames', () => {
    const identity = resolveIdentity(tags([['TT2', ['Song']], ['TP1', ['Old Artist']], ['TAL', ['Old Album']]]));
    expect(identity).toEqual({ artist: 'Old Artist', album: 'Old Album' });
  });

  it('uses the first value of a multi-value frame', () => {
    const identity = resolveIdentity(tags([['TPE1', ['First', 'Second']], ['TALB', ['Album']]]));
    expect(identity.artist).toBe('First');
  });

  it('keeps the first alias found in each class', () => {
    const identity = resolveIdentity(
      tags([
        ['TPE1', ['Frame Artist']],
        ['ARTIST', ['Field Artist']],
        ['ALBUM', ['Field Album']],
        ['TALB', ['Frame Album']],
      ])
    );

    expect(identity).toEqual({ artist: 'Frame Artist', album: 'Field Album' });
  });

  it('unwraps text payload objects', () => {
    const identity = resolveIdentity(
      tags([['TPE1', [{ description: '', text: 'Wrapped Artist' }]], ['TALB', ['Album']]])
    );

    expect(identity.artist).toBe('Wrapped Artist');
  });

  it('passes over blank and non-text values', () => {
    const identity = resolveIdentity(
      tags([
        ['ARTIST', ['   ']],
        ['AUTHOR', ['Real Artist']],
        ['ALBUM', [{ format: 'image/png' }]],
        ['TALB', ['Real Album']],
      ])
    );

    expect(identity).toEqual({ artist: 'Real Artist', album: 'Real Album' });
  });

  it('reports the partial identity when the album is missing', () => {
    const error = captureError(() => resolveIdentity(tags([['ARTIST', ['Solo Artist']]])));

    expect(error).toBeInstanceOf(IdentityMissingError);

    if (error instanceof IdentityMissingError) {
      expect(error.message).toBe('Artist or album data not found');
      expect(error.code).toBe('IDENTITY_MISSING');
      expect(error.artistFound).toBe('Solo Artist');
      expect(error.albumFound).toBe('');
    }
  });

  it('fails with empty partials when no alias is present', () => {
    const error = captureError(() => resolveIdentity(tags([['TITLE', ['Only A Title']]])));

    expect(error).toBeInstanceOf(IdentityMissingError);

    if (error instanceof IdentityMissingError) {
      expect(error.artistFound).toBe('');
      expect(error.albumFound).toBe('');
    }
  });
});
