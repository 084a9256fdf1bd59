import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { homedir } from 'node:os';
import { z } from 'zod';
import { ConfigError, errorMessage } from './errors.js';
import { DEFAULT_MUSIC_EXTENSIONS } from './target-path.js';
import type { Config } from './types.js';

export const CONFIG_FILE = join(process.cwd(), 'config.json');

export const DEFAULT_CONFIG: Config = {
  libraryPath: '~/Music/iTunes/iTunes Music Library.xml',
  percent: 33,
  minFreeMB: 100,
  maxSizeMB: null,
  playlist: null,
  musicExtensions: [...DEFAULT_MUSIC_EXTENSIONS],
  deleteMethod: 'permanent',
  initialFill: 0,
  historySize: 500,
  dataDir: 'data',
};

const configFileSchema = z
  .object({
    libraryPath: z.string().min(1),
    percent: z.number().min(0).max(100),
    minFreeMB: z.number().min(0),
    maxSizeMB: z.number().positive().nullable(),
    playlist: z.string().min(1).nullable(),
    musicExtensions: z
      .array(z.string().regex(/^\.[^./\\]+$/, 'extensions look like ".mp3"'))
      .min(1),
    deleteMethod: z.enum(['trash', 'permanent']),
    initialFill: z.number().int().min(0),
    historySize: z.number().int().min(0),
    dataDir: z.string().min(1),
  })
  .partial();

export function expandPath(path: string): string {
  if (path === '~' || path.startsWith('~/')) {
    return path.replace('~', homedir());
  }

  return path;
}

export function parseConfig(raw: unknown): Config {
  const result = configFileSchema.safeParse(raw);

  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join('.') : 'config';
    throw new ConfigError(`${where}: ${issue.message}`);
  }

  const merged: Config = { ...DEFAULT_CONFIG, ...result.data };

  return {
    ...merged,
    libraryPath: expandPath(merged.libraryPath),
    dataDir: expandPath(merged.dataDir),
    musicExtensions: merged.musicExtensions.map((ext) => ext.toLowerCase()),
  };
}

export async function loadConfig(configFile: string = CONFIG_FILE): Promise<Config> {
  let data: string;

  try {
    data = await readFile(configFile, 'utf-8');
  } catch {
    return parseConfig({});
  }

  let raw: unknown;

  try {
    raw = JSON.parse(data);
  } catch (error) {
    throw new ConfigError(`${configFile} is not valid JSON (${errorMessage(error)})`, error);
  }

  return parseConfig(raw);
}

/**
 * Apply command-line overrides on top of a loaded config. Undefined values
 * leave the config untouched; the result is validated like config.json.
 */
export function resolveConfig(base: Config, overrides: Partial<Config>): Config {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );

  return parseConfig({ ...base, ...defined });
}
