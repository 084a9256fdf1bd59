import { readdir, stat } from 'node:fs/promises';
import { basename, join, relative, resolve } from 'node:path';
import { parseFile } from 'music-metadata';
import levenshtein from 'fast-levenshtein';
import { NotMountedError, errorCode, errorMessage } from './errors.js';
import { DEFAULT_MUSIC_EXTENSIONS, isMusicFile, targetPath } from './target-path.js';
import type { Catalog, DeviceInventory, DeviceTrack, EmbeddedTags, MatchKind, Track } from './types.js';

export type TagReader = (path: string) => Promise<EmbeddedTags | null>;

export interface InventoryOptions {
  extensions?: readonly string[];
  /** Fall back to embedded tags for files not matched by path or name. */
  matchTags?: boolean;
  readTags?: TagReader;
}

const TITLE_SIMILARITY = 0.9;

export async function assertMounted(mountPath: string): Promise<string> {
  const absolute = resolve(mountPath);

  try {
    const stats = await stat(absolute);

    if (!stats.isDirectory()) {
      throw new NotMountedError(absolute, 'not a directory');
    }
  } catch (error) {
    if (error instanceof NotMountedError) {
      throw error;
    }

    if (errorCode(error) === 'ENOENT') {
      throw new NotMountedError(absolute, 'path does not exist');
    }

    throw new NotMountedError(absolute, errorMessage(error));
  }

  return absolute;
}

export async function findMusicFiles(
  dir: string,
  extensions: readonly string[] = DEFAULT_MUSIC_EXTENSIONS
): Promise<string[]> {
  const musicFiles: string[] = [];
  const entries = await readdir(dir, { withFileTypes: true });

  entries.sort((a, b) => a.name.localeCompare(b.name));

  for (const entry of entries) {
    if (entry.name.startsWith('.')) {
      continue;
    }

    const fullPath = join(dir, entry.name);

    if (entry.isDirectory()) {
      const nestedFiles = await findMusicFiles(fullPath, extensions);
      musicFiles.push(...nestedFiles);
      continue;
    }

    if (entry.isFile() && isMusicFile(entry.name, extensions)) {
      musicFiles.push(fullPath);
    }
  }

  return musicFiles;
}

export async function readEmbeddedTags(path: string): Promise<EmbeddedTags | null> {
  try {
    const metadata = await parseFile(path, { skipCovers: true });

    return {
      artist: metadata.common.artist ?? metadata.common.artists?.[0] ?? null,
      title: metadata.common.title ?? null,
      album: metadata.common.album ?? null,
    };
  } catch {
    return null;
  }
}

export function normalizeString(str: string): string {
  return str
    .toLowerCase()
    .replace(/[^\w\s]/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

function titleSimilarity(a: string, b: string): number {
  const maxLen = Math.max(a.length, b.length);

  if (maxLen === 0) {
    return 0;
  }

  return 1 - levenshtein.get(a, b) / maxLen;
}

interface CatalogIndex {
  byTargetPath: Map<string, number>;
  byFilename: Map<string, number[]>;
  byArtist: Map<string, Track[]>;
}

function indexCatalog(catalog: Catalog, mountPath: string): CatalogIndex {
  const byTargetPath = new Map<string, number>();
  const byFilename = new Map<string, number[]>();
  const byArtist = new Map<string, Track[]>();

  for (const track of catalog.tracks.values()) {
    byTargetPath.set(targetPath(track, mountPath), track.id);

    const filename = basename(track.location).toLowerCase();
    byFilename.set(filename, [...(byFilename.get(filename) ?? []), track.id]);

    for (const artist of new Set([track.artist, track.albumArtist])) {
      if (!artist || !track.title) {
        continue;
      }

      const key = normalizeString(artist);
      byArtist.set(key, [...(byArtist.get(key) ?? []), track]);
    }
  }

  return { byTargetPath, byFilename, byArtist };
}

export function matchByTags(tags: EmbeddedTags, byArtist: Map<string, Track[]>): number | null {
  if (!tags.artist || !tags.title) {
    return null;
  }

  const candidates = byArtist.get(normalizeString(tags.artist)) ?? [];
  const title = normalizeString(tags.title);
  let best: Track | null = null;
  let bestScore = TITLE_SIMILARITY;

  for (const track of candidates) {
    const score = titleSimilarity(title, normalizeString(track.title ?? ''));

    if (score < bestScore || (score === bestScore && best !== null)) {
      continue;
    }

    best = track;
    bestScore = score;
  }

  return best?.id ?? null;
}

/**
 * List the music files on a mounted device and tie each one back to a
 * library track where possible.
 */
export async function readDeviceInventory(
  mountPath: string,
  catalog: Catalog,
  options: InventoryOptions = {}
): Promise<DeviceInventory> {
  const root = await assertMounted(mountPath);
  const extensions = options.extensions ?? DEFAULT_MUSIC_EXTENSIONS;
  const matchTags = options.matchTags ?? true;
  const readTags = options.readTags ?? readEmbeddedTags;
  const index = indexCatalog(catalog, root);

  const files = await findMusicFiles(root, extensions);
  const tracks: DeviceTrack[] = [];
  let totalBytes = 0;

  for (const path of files) {
    const { size } = await stat(path);
    let trackId: number | null = null;
    let match: MatchKind | null = null;

    const byPath = index.byTargetPath.get(path);
    const byName = index.byFilename.get(basename(path).toLowerCase()) ?? [];

    if (byPath !== undefined) {
      trackId = byPath;
      match = 'path';
    } else if (byName.length === 1) {
      trackId = byName[0];
      match = 'filename';
    } else if (matchTags) {
      const tags = await readTags(path);
      trackId = tags ? matchByTags(tags, index.byArtist) : null;
      match = trackId === null ? null : 'tags';
    }

    tracks.push({
      path,
      relativePath: relative(root, path),
      size,
      trackId,
      match,
    });
    totalBytes += size;
  }

  return { mountPath: root, tracks, totalBytes };
}
