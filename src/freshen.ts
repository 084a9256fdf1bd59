import { writeFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { measureCapacity } from './disk.js';
import { executePlan, type ExecuteOptions } from './executor.js';
import { historyPath, loadHistory, recentlyRemovedIds, recordRemovals, saveHistory } from './history.js';
import { readDeviceInventory, type InventoryOptions } from './inventory.js';
import { loadLibrary } from './library.js';
import { planCopy, planFreshen, type RandomSource } from './selector.js';
import type { Catalog, Config, DeviceInventory, ExecutionLog, ReplacementPlan } from './types.js';

export const RUN_LOG_FILENAME = 'freshen-log.json';

export type RunStage = 'library' | 'inventory' | 'planning' | 'executing';

export interface RunOptions extends Pick<ExecuteOptions, 'signal' | 'onProgress'> {
  config: Config;
  mountPath: string;
  dryRun?: boolean;
  /** Consult and update the list of recently removed tracks. */
  useHistory?: boolean;
  /** Skip scanning when the caller already holds the catalog. */
  catalog?: Catalog;
  inventory?: Pick<InventoryOptions, 'matchTags' | 'readTags'>;
  random?: RandomSource;
  onStage?: (stage: RunStage) => void;
}

/** Exit status of a run that was interrupted with Ctrl-C. */
export const CANCELED_EXIT_CODE = 130;

export interface RunResult {
  catalog: Catalog;
  inventory: DeviceInventory;
  plan: ReplacementPlan;
  log: ExecutionLog | null;
  exitCode: 0 | 1 | typeof CANCELED_EXIT_CODE;
}

interface Prepared {
  catalog: Catalog;
  inventory: DeviceInventory;
  exclude: Set<number>;
}

async function prepare(options: RunOptions): Promise<Prepared> {
  const { config } = options;

  options.onStage?.('library');
  const catalog = options.catalog ?? (await loadLibrary(config.libraryPath));

  options.onStage?.('inventory');
  const inventory = await readDeviceInventory(options.mountPath, catalog, {
    extensions: config.musicExtensions,
    ...options.inventory,
  });

  const exclude = options.useHistory
    ? recentlyRemovedIds(await loadHistory(historyPath(config.dataDir)))
    : new Set<number>();

  return { catalog, inventory, exclude };
}

export async function writeRunLog(dataDir: string, plan: ReplacementPlan, log: ExecutionLog): Promise<string> {
  const file = join(dataDir, RUN_LOG_FILENAME);

  await mkdir(dataDir, { recursive: true });
  await writeFile(
    file,
    JSON.stringify(
      {
        mode: plan.mode,
        planned: { removals: plan.removals.length, additions: plan.additions.length },
        ...log,
      },
      null,
      2
    )
  );

  return file;
}

export interface PlannedRun {
  catalog: Catalog;
  inventory: DeviceInventory;
  plan: ReplacementPlan;
}

/**
 * Carry out a plan made by `planFreshenRun` or `planCopyRun`, then update
 * the history and the run log. A dry run stops before touching anything.
 */
export async function applyRun(options: RunOptions, planned: PlannedRun): Promise<RunResult> {
  const { config } = options;
  const { catalog, inventory, plan } = planned;

  if (options.dryRun) {
    return { catalog, inventory, plan, log: null, exitCode: 0 };
  }

  options.onStage?.('executing');
  const log = await executePlan(plan, inventory.mountPath, catalog, {
    deleteMethod: config.deleteMethod,
    signal: options.signal,
    onProgress: options.onProgress,
  });

  if (options.useHistory && log.deletions.length > 0) {
    const file = historyPath(config.dataDir);
    const history = recordRemovals(await loadHistory(file), log.deletions, config.historySize);
    await saveHistory(file, history);
  }

  await writeRunLog(config.dataDir, plan, log);

  let exitCode: RunResult['exitCode'] = 0;

  if (log.failures.length > 0) {
    exitCode = 1;
  } else if (log.canceled) {
    exitCode = CANCELED_EXIT_CODE;
  }

  return { catalog, inventory, plan, log, exitCode };
}

/**
 * Scan the library, look at the device and choose `config.percent` of its
 * tracks to replace. Fatal problems (bad library, no device) throw here,
 * before anything on the device is touched.
 */
export async function planFreshenRun(options: RunOptions): Promise<PlannedRun> {
  const { config } = options;
  const { catalog, inventory, exclude } = await prepare(options);

  options.onStage?.('planning');
  const capacity = await measureCapacity(inventory.mountPath, inventory.totalBytes, config);
  const plan = planFreshen(catalog, inventory, {
    ratio: config.percent / 100,
    playlist: config.playlist,
    extensions: config.musicExtensions,
    exclude,
    initialFill: config.initialFill,
    capacity,
    random: options.random,
  });

  return { catalog, inventory, plan };
}

/**
 * Plan copying a playlist (or the whole library) onto the device until it
 * is full, removing nothing.
 */
export async function planCopyRun(options: RunOptions): Promise<PlannedRun> {
  const { config } = options;
  const { catalog, inventory, exclude } = await prepare(options);

  options.onStage?.('planning');
  const capacity = await measureCapacity(inventory.mountPath, inventory.totalBytes, config);
  const plan = planCopy(catalog, inventory, {
    playlist: config.playlist,
    extensions: config.musicExtensions,
    exclude,
    capacity,
  });

  return { catalog, inventory, plan };
}

export async function runFreshen(options: RunOptions): Promise<RunResult> {
  return applyRun(options, await planFreshenRun(options));
}

export async function runCopy(options: RunOptions): Promise<RunResult> {
  return applyRun(options, await planCopyRun(options));
}
