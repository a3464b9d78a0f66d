import { parseFile } from 'music-metadata';
import type { IAudioMetadata } from 'music-metadata';
import { TagReadError } from './errors.js';
import type { TagMap } from './types.js';

/**
 * Flattens every native tag block the parser found (ID3v2, ID3v1, Vorbis,
 * iTunes atoms, ASF, APEv2...) into one map keyed by the raw tag id.
 */
export async function readTagMap(filePath: string): Promise<TagMap> {
  let metadata: IAudioMetadata;

  try {
    metadata = await parseFile(filePath, { skipCovers: true });
  } catch (error) {
    throw new TagReadError(error);
  }

  const tagMap: TagMap = new Map();

  for (const tags of Object.values(metadata.native)) {
    for (const { id, value } of tags) {
      const values = tagMap.get(id);

      if (values) {
        values.push(value);
      } else {
        tagMap.set(id, [value]);
      }
    }
  }

  return tagMap;
}

function hasTextPayload(value: unknown): value is { text: string } {
  return (
    typeof value === 'object' &&
    value !== null &&
    'text' in value &&
    typeof value.text === 'string'
  );
}

/**
 * Backends hand back either plain strings or small wrapper objects (ID3
 * comment and user-text frames carry `{ description, text }`). Returns
 * undefined for values with no text form, such as pictures.
 */
export function coerceTagText(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }

  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }

  if (hasTextPayload(value)) {
    return value.text;
  }

  return undefined;
}

function describeTagValue(value: unknown): string {
  const text = coerceTagText(value);

  if (text !== undefined) {
    return text;
  }

  if (value instanceof Uint8Array) {
    return `<binary ${value.length} bytes>`;
  }

  return value === null ? '<null>' : `<${typeof value}>`;
}

export function describeTagMap(tagMap: TagMap): Record<string, string[]> {
  const described: Record<string, string[]> = {};

  for (const [key, values] of tagMap) {
    described[key] = values.map(describeTagValue);
  }

  return described;
}
