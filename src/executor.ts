import { access, copyFile, mkdir, rm, rmdir, stat, unlink, utimes } from 'node:fs/promises';
import { constants } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { default as trash } from 'trash';
import { errorCode, errorMessage } from './errors.js';
import { targetPath } from './target-path.js';
import type {
  Catalog,
  CopyLogEntry,
  DeleteMethod,
  DeletionLogEntry,
  DeviceTrack,
  ExecutionLog,
  PerFileError,
  ProgressEvent,
  ReplacementPlan,
  Track,
} from './types.js';

export interface ExecuteOptions {
  deleteMethod?: DeleteMethod;
  signal?: AbortSignal;
  onProgress?: (event: ProgressEvent) => void;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Remove Artist/Album folders left empty by a deletion, never above the mount.
 */
async function pruneEmptyDirs(startDir: string, mountPath: string): Promise<void> {
  const root = resolve(mountPath);
  let dir = resolve(startDir);

  while (dir !== root && dir.startsWith(root)) {
    try {
      await rmdir(dir);
    } catch (error) {
      const code = errorCode(error);

      if (code === 'ENOTEMPTY' || code === 'EEXIST' || code === 'ENOENT') {
        return;
      }

      throw error;
    }

    dir = dirname(dir);
  }
}

async function deleteDeviceFile(
  track: DeviceTrack,
  mountPath: string,
  method: DeleteMethod
): Promise<DeletionLogEntry> {
  const base = { path: track.path, trackId: track.trackId };

  if (!(await exists(track.path))) {
    return {
      ...base,
      deletedAt: new Date().toISOString(),
      method,
      status: 'not-found',
      success: true,
    };
  }

  let usedMethod: DeleteMethod = 'permanent';

  try {
    if (method === 'trash') {
      try {
        await trash(track.path);
        usedMethod = 'trash';
      } catch {
        await unlink(track.path);
      }
    } else {
      await unlink(track.path);
    }
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return { ...base, deletedAt: new Date().toISOString(), method, status: 'not-found', success: true };
    }

    return {
      ...base,
      deletedAt: new Date().toISOString(),
      method: usedMethod,
      status: 'delete-failed',
      success: false,
      error: errorMessage(error),
      code: errorCode(error),
    };
  }

  try {
    await pruneEmptyDirs(dirname(track.path), mountPath);
  } catch (error) {
    return {
      ...base,
      deletedAt: new Date().toISOString(),
      method: usedMethod,
      status: 'ok',
      success: true,
      error: `deleted, but could not tidy folder: ${errorMessage(error)}`,
    };
  }

  return { ...base, deletedAt: new Date().toISOString(), method: usedMethod, status: 'ok', success: true };
}

async function copyTrackToDevice(track: Track, destination: string): Promise<CopyLogEntry> {
  const base = { trackId: track.id, source: track.location, destination };

  try {
    await mkdir(dirname(destination), { recursive: true });
    await copyFile(track.location, destination, constants.COPYFILE_EXCL);

    const sourceStats = await stat(track.location);
    await utimes(destination, sourceStats.atime, sourceStats.mtime);

    return { ...base, copiedAt: new Date().toISOString(), status: 'ok', success: true };
  } catch (error) {
    let message = errorMessage(error);
    const code = errorCode(error);

    if (code !== 'EEXIST') {
      try {
        await rm(destination, { force: true });
      } catch (cleanupError) {
        message += ` (partial copy left behind: ${errorMessage(cleanupError)})`;
      }
    }

    return {
      ...base,
      copiedAt: new Date().toISOString(),
      status: 'copy-failed',
      success: false,
      error: message,
      code,
    };
  }
}

function skippedDeletion(track: DeviceTrack, method: DeleteMethod): DeletionLogEntry {
  return {
    path: track.path,
    trackId: track.trackId,
    deletedAt: new Date().toISOString(),
    method,
    status: 'skipped',
    success: false,
  };
}

function skippedCopy(track: Track, destination: string): CopyLogEntry {
  return {
    trackId: track.id,
    source: track.location,
    destination,
    copiedAt: new Date().toISOString(),
    status: 'skipped',
    success: false,
  };
}

export function collectFailures(
  deletions: readonly DeletionLogEntry[],
  copies: readonly CopyLogEntry[]
): PerFileError[] {
  const failures: PerFileError[] = [];

  for (const entry of deletions) {
    if (entry.status === 'delete-failed') {
      failures.push({
        operation: 'delete',
        path: entry.path,
        message: entry.error ?? 'delete failed',
        code: entry.code,
      });
    }
  }

  for (const entry of copies) {
    if (entry.status === 'copy-failed') {
      failures.push({
        operation: 'copy',
        path: entry.destination,
        message: entry.error ?? 'copy failed',
        code: entry.code,
      });
    }
  }

  return failures;
}

/**
 * Carry out a plan: deletions first to free space, then copies. A failed
 * file is recorded and the batch moves on; nothing is rolled back.
 */
export async function executePlan(
  plan: ReplacementPlan,
  mountPath: string,
  catalog: Catalog,
  options: ExecuteOptions = {}
): Promise<ExecutionLog> {
  const method = options.deleteMethod ?? 'permanent';
  const deletions: DeletionLogEntry[] = [];
  const copies: CopyLogEntry[] = [];
  const total = { delete: plan.removals.length, copy: plan.additions.length };

  for (let i = 0; i < plan.removals.length; i++) {
    const track = plan.removals[i];
    const entry = options.signal?.aborted
      ? skippedDeletion(track, method)
      : await deleteDeviceFile(track, mountPath, method);

    deletions.push(entry);
    options.onProgress?.({ operation: 'delete', index: i + 1, total: total.delete, entry });
  }

  for (let i = 0; i < plan.additions.length; i++) {
    const addition = plan.additions[i];
    const track = catalog.tracks.get(addition.id);
    const destination = targetPath(track ?? addition, mountPath);
    let entry: CopyLogEntry;

    if (options.signal?.aborted) {
      entry = skippedCopy(addition, destination);
    } else if (!track) {
      entry = {
        trackId: addition.id,
        source: addition.location,
        destination,
        copiedAt: new Date().toISOString(),
        status: 'copy-failed',
        success: false,
        error: `Track ${addition.id} is not in the library`,
      };
    } else {
      entry = await copyTrackToDevice(track, destination);
    }

    copies.push(entry);
    options.onProgress?.({ operation: 'copy', index: i + 1, total: total.copy, entry });
  }

  return {
    executedAt: new Date().toISOString(),
    deletions,
    copies,
    failures: collectFailures(deletions, copies),
    canceled: options.signal?.aborted ?? false,
  };
}
