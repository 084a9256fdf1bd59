import { candidateTracks } from './library.js';
import { DEFAULT_MUSIC_EXTENSIONS, isMusicFile, roundUpTo, targetPath } from './target-path.js';
import type { Capacity, Catalog, DeviceInventory, DeviceTrack, PlanMode, ReplacementPlan, Track } from './types.js';

export type RandomSource = () => number;

export interface PoolOptions {
  /** Draw additions from this playlist only. */
  playlist?: string | null;
  extensions?: readonly string[];
  /** Track ids that must not be added, e.g. ones removed on recent runs. */
  exclude?: ReadonlySet<number>;
  canAdd?: (track: Track) => boolean;
  capacity?: Capacity | null;
}

export interface FreshenOptions extends PoolOptions {
  ratio: number;
  canRemove?: (track: DeviceTrack) => boolean;
  /** How many tracks to add when the device holds no music yet. */
  initialFill?: number;
  random?: RandomSource;
}

/**
 * Partial Fisher-Yates: a uniform sample of `count` items, no repeats.
 */
export function sampleWithoutReplacement<T>(
  items: readonly T[],
  count: number,
  random: RandomSource = Math.random
): T[] {
  const pool = [...items];
  const n = Math.min(Math.max(0, Math.floor(count)), pool.length);

  for (let i = 0; i < n; i++) {
    const j = Math.min(i + Math.floor(random() * (pool.length - i)), pool.length - 1);
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }

  return pool.slice(0, n);
}

export function shuffle<T>(items: readonly T[], random: RandomSource = Math.random): T[] {
  return sampleWithoutReplacement(items, items.length, random);
}

export function removalCount(ratio: number, deviceTrackCount: number): number {
  if (!Number.isFinite(ratio) || ratio < 0 || ratio > 1) {
    throw new RangeError(`Replacement ratio must be between 0 and 1, got ${ratio}`);
  }

  // 0.29 * 100 is 28.999999999999996 in binary floating point
  return Math.floor(Math.round(ratio * deviceTrackCount * 1e9) / 1e9);
}

export function copyBudget(capacity: Capacity, bytesToFree: number): number {
  if (capacity.maxSizeBytes !== null) {
    return capacity.maxSizeBytes - (capacity.currentBytes - bytesToFree);
  }

  return capacity.freeBytes + bytesToFree - capacity.minFreeBytes;
}

/**
 * Library tracks that could be copied: music files that are neither on the
 * device already nor excluded.
 */
export function additionPool(
  catalog: Catalog,
  inventory: DeviceInventory,
  options: PoolOptions = {}
): Track[] {
  const extensions = options.extensions ?? DEFAULT_MUSIC_EXTENSIONS;
  const onDevice = new Set<number>();
  const occupied = new Set(inventory.tracks.map((t) => t.path));

  for (const deviceTrack of inventory.tracks) {
    if (deviceTrack.trackId !== null) {
      onDevice.add(deviceTrack.trackId);
    }
  }

  return candidateTracks(catalog, options.playlist ?? null).filter((track) => {
    if (!isMusicFile(track.location, extensions)) {
      return false;
    }

    if (onDevice.has(track.id) || options.exclude?.has(track.id)) {
      return false;
    }

    if (occupied.has(targetPath(track, inventory.mountPath))) {
      return false;
    }

    return options.canAdd ? options.canAdd(track) : true;
  });
}

function blockSizeOf(capacity: Capacity | null | undefined): number {
  return capacity?.blockSize ?? 0;
}

function takeAdditions(
  ordered: readonly Track[],
  count: number,
  mountPath: string,
  capacity: Capacity | null | undefined,
  bytesToFree: number
): { additions: Track[]; bytesToCopy: number } {
  const blockSize = blockSizeOf(capacity);
  const budget = capacity ? copyBudget(capacity, bytesToFree) : Infinity;
  const additions: Track[] = [];
  const seen = new Set<number>();
  const claimed = new Set<string>();
  let bytesToCopy = 0;

  for (const track of ordered) {
    if (additions.length >= count) {
      break;
    }

    const destination = targetPath(track, mountPath);

    if (seen.has(track.id) || claimed.has(destination)) {
      continue;
    }

    const size = roundUpTo(track.size, blockSize);

    if (bytesToCopy + size > budget) {
      continue;
    }

    seen.add(track.id);
    claimed.add(destination);
    additions.push(track);
    bytesToCopy += size;
  }

  return { additions, bytesToCopy };
}

/**
 * Pick device tracks to retire and library tracks to replace them with.
 * Pure: works only on the two snapshots it is given.
 */
export function planFreshen(
  catalog: Catalog,
  inventory: DeviceInventory,
  options: FreshenOptions
): ReplacementPlan {
  const random = options.random ?? Math.random;
  const removable = options.canRemove
    ? inventory.tracks.filter(options.canRemove)
    : inventory.tracks;
  const k = removalCount(options.ratio, removable.length);

  const emptyDevice = inventory.tracks.length === 0;
  const mode: PlanMode = emptyDevice ? 'initial-fill' : 'freshen';
  const addCount = emptyDevice && options.ratio > 0 ? Math.max(0, Math.floor(options.initialFill ?? 0)) : k;

  const removals = sampleWithoutReplacement(removable, k, random);
  const blockSize = blockSizeOf(options.capacity);
  const bytesToFree = removals.reduce((sum, t) => sum + roundUpTo(t.size, blockSize), 0);

  if (addCount === 0) {
    return { mode, removals, additions: [], bytesToFree, bytesToCopy: 0 };
  }

  const pool = shuffle(additionPool(catalog, inventory, options), random);
  const { additions, bytesToCopy } = takeAdditions(pool, addCount, inventory.mountPath, options.capacity, bytesToFree);

  return { mode, removals, additions, bytesToFree, bytesToCopy };
}

/**
 * Copy a playlist (or the library) in order until the device is full.
 */
export function planCopy(
  catalog: Catalog,
  inventory: DeviceInventory,
  options: PoolOptions = {}
): ReplacementPlan {
  const pool = additionPool(catalog, inventory, options);
  const { additions, bytesToCopy } = takeAdditions(pool, Infinity, inventory.mountPath, options.capacity, 0);

  return { mode: 'copy', removals: [], additions, bytesToFree: 0, bytesToCopy };
}
