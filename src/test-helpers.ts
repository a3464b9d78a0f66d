import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import NodeID3 from 'node-id3';
import type { TagMap } from './types.js';

export async function makeTempDir(label: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `music-organizer-${label}-`));
}

/**
 * Writes a stand-in song whose body is the JSON of its tags, read back by
 * `jsonTagReader`. Keeps engine tests independent of real audio parsing.
 */
export async function writeSong(filePath: string, tags: Record<string, string | string[]>): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(tags));
}

export async function jsonTagReader(filePath: string): Promise<TagMap> {
  const raw: unknown = JSON.parse(await fs.readFile(filePath, 'utf-8'));
  const tagMap: TagMap = new Map();

  if (typeof raw !== 'object' || raw === null) {
    return tagMap;
  }

  for (const [key, value] of Object.entries(raw)) {
    tagMap.set(key, Array.isArray(value) ? [...value] : [value]);
  }

  return tagMap;
}

// ID3v2 tag plus zero padding; no MPEG frames follow.
export async function writeTaggedMp3(
  filePath: string,
  tags: { artist?: string; album?: string; title?: string }
): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tagBuffer = NodeID3.create(tags);
  await fs.writeFile(filePath, Buffer.concat([tagBuffer, Buffer.alloc(512)]));
}

function syncsafe(size: number): Buffer {
  return Buffer.from([(size >> 21) & 0x7f, (size >> 14) & 0x7f, (size >> 7) & 0x7f, size & 0x7f]);
}

/**
 * Hand-built ID3v2.2 tag (three-character frame ids, latin1 text frames),
 * the layout older iTunes rips carry. node-id3 only writes v2.3/v2.4.
 */
export async function writeId3v22Mp3(filePath: string, frames: Record<string, string>): Promise<void> {
  const frameBuffers = Object.entries(frames).map(([id, text]) => {
    const data = Buffer.concat([Buffer.from([0x00]), Buffer.from(text, 'latin1')]);
    const size = Buffer.from([(data.length >> 16) & 0xff, (data.length >> 8) & 0xff, data.length & 0xff]);
    return Buffer.concat([Buffer.from(id, 'latin1'), size, data]);
  });
  const body = Buffer.concat([...frameBuffers, Buffer.alloc(64)]);
  const header = Buffer.concat([Buffer.from('ID3', 'latin1'), Buffer.from([0x02, 0x00, 0x00]), syncsafe(body.length)]);

  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, Buffer.concat([header, body, Buffer.alloc(512)]));
}
