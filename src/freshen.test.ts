import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { existsSync } from 'node:fs';
import { readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { parseConfig } from './config.js';
import { NotMountedError, ParseError } from './errors.js';
import {
  applyRun,
  CANCELED_EXIT_CODE,
  planFreshenRun,
  runCopy,
  runFreshen,
  RUN_LOG_FILENAME,
  type RunOptions,
} from './freshen.js';
import { historyPath, loadHistory } from './history.js';
import { findMusicFiles } from './inventory.js';
import { buildLibraryXml, makeTempDir, writeFileWithDirs } from './test-helpers.js';
import type { Config } from './types.js';

const IDS = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10];

let root: string;
let mount: string;
let config: Config;

function devicePath(id: number): string {
  return join(mount, `Artist ${id}`, 'Album', `track-${id}.mp3`);
}

async function deviceIds(): Promise<number[]> {
  const files = await findMusicFiles(mount);

  return files
    .map((file) => Number(/track-(\d+)\.mp3$/.exec(file)?.[1]))
    .sort((a, b) => a - b);
}

function options(overrides: Partial<RunOptions> = {}): RunOptions {
  return { config, mountPath: mount, useHistory: true, inventory: { matchTags: false }, ...overrides };
}

beforeEach(async () => {
  root = await makeTempDir('freshen');
  mount = join(root, 'device');
  const library = join(root, 'library');

  for (const id of IDS) {
    await writeFileWithDirs(join(library, `track-${id}.mp3`), `track-${id}`);
  }

  const libraryFile = join(root, 'Library.xml');
  await writeFile(
    libraryFile,
    buildLibraryXml(
      IDS.map((id) => ({
        id,
        name: `Song ${id}`,
        artist: `Artist ${id}`,
        album: 'Album',
        size: `track-${id}`.length,
        path: join(library, `track-${id}.mp3`),
      })),
      [{ name: 'Favorites', id: 50, trackIds: [9, 10] }]
    )
  );

  for (const id of IDS.slice(0, 6)) {
    await writeFileWithDirs(devicePath(id), `track-${id}`);
  }

  config = parseConfig({ libraryPath: libraryFile, minFreeMB: 0, percent: 33, dataDir: join(root, 'data') });
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

describe('runFreshen', () => {
  it('replaces one of six tracks with a new one', async () => {
    const result = await runFreshen(options());

    expect(result.exitCode).toBe(0);
    expect(result.plan.removals).toHaveLength(1);
    expect(result.plan.additions).toHaveLength(1);
    expect(result.log?.failures).toEqual([]);

    const removed = result.plan.removals[0].trackId;
    const added = result.plan.additions[0].id;
    const expected = [...IDS.slice(0, 6).filter((id) => id !== removed), added].sort((a, b) => a - b);

    expect(await deviceIds()).toEqual(expected);
  });

  it('records the removed track and writes a run log', async () => {
    const result = await runFreshen(options());

    const history = await loadHistory(historyPath(config.dataDir));
    expect(history.removed.map((r) => r.trackId)).toEqual([result.plan.removals[0].trackId]);

    const log: unknown = JSON.parse(await readFile(join(config.dataDir, RUN_LOG_FILENAME), 'utf-8'));
    expect(log).toMatchObject({ mode: 'freshen', planned: { removals: 1, additions: 1 }, canceled: false });
  });

  it('does not bring back a track removed on the last run', async () => {
    const first = await runFreshen(options());
    const removed = first.plan.removals[0].trackId;

    const withHistory = await planFreshenRun(options({ config: { ...config, percent: 100 } }));
    const withoutHistory = await planFreshenRun(options({ config: { ...config, percent: 100 }, useHistory: false }));

    expect(withHistory.plan.additions.map((t) => t.id)).not.toContain(removed);
    expect(withHistory.plan.additions).toHaveLength(3);
    expect(withoutHistory.plan.additions).toHaveLength(4);
  });

  it('changes nothing on a dry run', async () => {
    const result = await runFreshen(options({ dryRun: true }));

    expect(result.log).toBeNull();
    expect(result.exitCode).toBe(0);
    expect(result.plan.removals).toHaveLength(1);
    expect(await deviceIds()).toEqual([1, 2, 3, 4, 5, 6]);
    expect(existsSync(config.dataDir)).toBe(false);
  });

  it('fails before touching anything when the device is missing', async () => {
    await expect(runFreshen(options({ mountPath: join(root, 'nowhere') }))).rejects.toBeInstanceOf(NotMountedError);
    expect(existsSync(config.dataDir)).toBe(false);
  });

  it('fails before touching the device when the library is unreadable', async () => {
    await writeFile(config.libraryPath, 'not a library');

    await expect(runFreshen(options({ config: { ...config, percent: 100 } }))).rejects.toBeInstanceOf(ParseError);
    expect(await deviceIds()).toEqual([1, 2, 3, 4, 5, 6]);
  });

  it('exits with 1 when a file fails', async () => {
    const planned = await planFreshenRun(options());
    await rm(planned.plan.additions[0].location);

    const result = await applyRun(options(), planned);

    expect(result.exitCode).toBe(1);
    expect(result.log?.failures).toHaveLength(1);
    expect(result.log?.deletions.map((d) => d.status)).toEqual(['ok']);
  });

  it('exits non-zero when canceled before the plan is done', async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await runFreshen(options({ signal: controller.signal }));

    expect(result.log?.canceled).toBe(true);
    expect(result.log?.failures).toEqual([]);
    expect(result.log?.deletions.map((d) => d.status)).toEqual(['skipped']);
    expect(result.exitCode).toBe(CANCELED_EXIT_CODE);
    expect(await deviceIds()).toEqual([1, 2, 3, 4, 5, 6]);
  });

  it('draws only from the configured playlist', async () => {
    const result = await runFreshen(options({ config: { ...config, percent: 50, playlist: 'Favorites' } }));

    expect(result.plan.removals).toHaveLength(3);
    expect(result.plan.additions.map((t) => t.id).sort((a, b) => a - b)).toEqual([9, 10]);
  });
});

describe('runCopy', () => {
  it('copies everything missing onto an empty device', async () => {
    const empty = join(root, 'empty');
    await writeFileWithDirs(join(empty, 'README.txt'), 'not music');

    const result = await runCopy(options({ mountPath: empty }));

    expect(result.plan.mode).toBe('copy');
    expect(result.exitCode).toBe(0);

    const files = await findMusicFiles(empty);
    expect(files).toHaveLength(10);
    expect(await readdir(join(empty, 'Artist 10', 'Album'))).toEqual(['track-10.mp3']);
  });
});
