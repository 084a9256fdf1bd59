import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { z } from 'zod';
import type { DeletionLogEntry, History } from './types.js';

export const HISTORY_FILENAME = 'history.json';

const historySchema = z.object({
  removed: z.array(
    z.object({
      trackId: z.number().int(),
      removedAt: z.string(),
    })
  ),
});

export function historyPath(dataDir: string): string {
  return join(dataDir, HISTORY_FILENAME);
}

function createEmptyHistory(): History {
  return { removed: [] };
}

export async function loadHistory(file: string): Promise<History> {
  try {
    const data = await readFile(file, 'utf-8');
    const result = historySchema.safeParse(JSON.parse(data));
    return result.success ? result.data : createEmptyHistory();
  } catch {
    return createEmptyHistory();
  }
}

export async function saveHistory(file: string, history: History): Promise<void> {
  await mkdir(dirname(file), { recursive: true });
  await writeFile(file, JSON.stringify(history, null, 2));
}

export function recentlyRemovedIds(history: History): Set<number> {
  return new Set(history.removed.map((entry) => entry.trackId));
}

/**
 * Put successfully removed library tracks at the front of the history,
 * keeping at most `limit` entries.
 */
export function recordRemovals(
  history: History,
  deletions: readonly DeletionLogEntry[],
  limit: number
): History {
  const removed = [...history.removed];

  for (const entry of deletions) {
    if (entry.status !== 'ok' || entry.trackId === null) {
      continue;
    }

    const trackId = entry.trackId;
    const index = removed.findIndex((r) => r.trackId === trackId);

    if (index !== -1) {
      removed.splice(index, 1);
    }

    removed.unshift({ trackId, removedAt: entry.deletedAt });
  }

  return { removed: removed.slice(0, limit) };
}
