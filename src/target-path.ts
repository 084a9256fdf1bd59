import { basename, extname, join, resolve } from 'node:path';
import type { Track } from './types.js';

export const DEFAULT_MUSIC_EXTENSIONS = ['.mp3', '.aiff', '.m4a', '.aac', '.wav', '.ogg'];

const BAD_CHARACTERS = /[/~\\"':;<>\x7f\n*]/g;

export function isMusicFile(
  filename: string,
  extensions: readonly string[] = DEFAULT_MUSIC_EXTENSIONS
): boolean {
  const name = basename(filename);

  if (name.startsWith('.')) {
    return false;
  }

  return extensions.includes(extname(name).toLowerCase());
}

/**
 * Replace characters that FAT-formatted devices reject in folder names.
 */
export function sanitize(name: string): string {
  return name.replace(BAD_CHARACTERS, '_');
}

export function artistFolder(track: Track): string {
  if (track.compilation) {
    return 'Compilations';
  }

  return sanitize(track.artist ?? 'Unknown Artist');
}

export function albumFolder(track: Track): string {
  return sanitize(track.album ?? 'Unknown Album');
}

/**
 * Where a track lands on the device: <mount>/<Artist>/<Album>/<file name>.
 */
export function targetPath(track: Track, mountPath: string): string {
  return resolve(join(mountPath, artistFolder(track), albumFolder(track), basename(track.location)));
}

export function roundUpTo(bytes: number, blockSize: number): number {
  if (blockSize <= 0) {
    return bytes;
  }

  return Math.ceil(bytes / blockSize) * blockSize;
}
