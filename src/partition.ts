import { getPlaylistTracks } from './library.js';
import { roundUpTo } from './target-path.js';
import type { Catalog, Chunk, Track } from './types.js';

/** Sector size of a DVD-ROM. */
export const DVD_BLOCK_SIZE = 2048;

export type ChunkLimit = { maxBytes: number } | { maxTracks: number };

export interface PartitionOptions {
  blockSize?: number;
}

function checkLimit(limit: ChunkLimit): void {
  const value = 'maxBytes' in limit ? limit.maxBytes : limit.maxTracks;

  if (!Number.isInteger(value) || value <= 0) {
    throw new RangeError(`Chunk limit must be a positive integer, got ${value}`);
  }
}

/**
 * Split tracks into consecutive chunks that stay within the limit. Order is
 * kept and no track is split; a track bigger than `maxBytes` gets a chunk of
 * its own.
 */
export function* partitionTracks(
  tracks: Iterable<Track>,
  limit: ChunkLimit,
  options: PartitionOptions = {}
): Generator<Chunk, void, undefined> {
  checkLimit(limit);

  const blockSize = options.blockSize ?? DVD_BLOCK_SIZE;
  let current: Track[] = [];
  let bytes = 0;

  for (const track of tracks) {
    const size = roundUpTo(track.size, blockSize);
    const full = 'maxBytes' in limit
      ? bytes + size > limit.maxBytes
      : current.length >= limit.maxTracks;

    if (current.length > 0 && full) {
      yield { tracks: current, bytes };
      current = [];
      bytes = 0;
    }

    current.push(track);
    bytes += size;
  }

  if (current.length > 0) {
    yield { tracks: current, bytes };
  }
}

export function partitionPlaylist(
  catalog: Catalog,
  playlist: string,
  limit: ChunkLimit,
  options: PartitionOptions = {}
): Generator<Chunk, void, undefined> {
  return partitionTracks(getPlaylistTracks(catalog, playlist), limit, options);
}
