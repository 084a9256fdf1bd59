import { statfs } from 'node:fs/promises';
import type { Capacity } from './types.js';

export const MEGABYTE = 1024 * 1024;

export interface DiskStats {
  freeBytes: number;
  blockSize: number;
}

export async function getDiskStats(path: string): Promise<DiskStats> {
  const stats = await statfs(path);

  return {
    freeBytes: stats.bavail * stats.bsize,
    blockSize: stats.bsize,
  };
}

export interface CapacityLimits {
  minFreeMB: number;
  maxSizeMB: number | null;
}

export async function measureCapacity(
  mountPath: string,
  currentBytes: number,
  limits: CapacityLimits
): Promise<Capacity> {
  const { freeBytes, blockSize } = await getDiskStats(mountPath);

  return {
    freeBytes,
    blockSize,
    minFreeBytes: limits.minFreeMB * MEGABYTE,
    maxSizeBytes: limits.maxSizeMB === null ? null : limits.maxSizeMB * MEGABYTE,
    currentBytes,
  };
}
