import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { homedir } from 'node:os';
import type { OrganizerConfig } from './types.js';

export const CONFIG_FILE = join(process.cwd(), 'config.json');

export const DEFAULT_CONFIG: OrganizerConfig = {
  remove_illegal_chars: true,
  music_folder_path: '',
  destination_folder_path: '',
  report_dir: 'data',
};

export function expandPath(path: string): string {
  if (path === '~' || path.startsWith('~/')) {
    return path.replace('~', homedir());
  }

  return path;
}

function pickBoolean(values: Map<string, unknown>, key: keyof OrganizerConfig, fallback: boolean): boolean {
  const value = values.get(key);
  return typeof value === 'boolean' ? value : fallback;
}

function pickString(values: Map<string, unknown>, key: keyof OrganizerConfig, fallback: string): string {
  const value = values.get(key);
  return typeof value === 'string' ? value : fallback;
}

export function parseConfig(raw: unknown): OrganizerConfig {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return { ...DEFAULT_CONFIG };
  }

  const values = new Map<string, unknown>(Object.entries(raw));

  return {
    remove_illegal_chars: pickBoolean(values, 'remove_illegal_chars', DEFAULT_CONFIG.remove_illegal_chars),
    music_folder_path: expandPath(pickString(values, 'music_folder_path', DEFAULT_CONFIG.music_folder_path)),
    destination_folder_path: expandPath(
      pickString(values, 'destination_folder_path', DEFAULT_CONFIG.destination_folder_path)
    ),
    report_dir: pickString(values, 'report_dir', DEFAULT_CONFIG.report_dir),
  };
}

export async function loadConfig(configFile: string = CONFIG_FILE): Promise<OrganizerConfig> {
  let data: string;

  try {
    data = await readFile(configFile, 'utf-8');
  } catch {
    return { ...DEFAULT_CONFIG };
  }

  try {
    const raw: unknown = JSON.parse(data);
    return parseConfig(raw);
  } catch {
    return { ...DEFAULT_CONFIG };
  }
}

export async function saveConfig(config: OrganizerConfig, configFile: string = CONFIG_FILE): Promise<void> {
  await writeFile(configFile, JSON.stringify(config, null, 2) + '\n');
}
