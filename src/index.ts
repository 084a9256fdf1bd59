#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import { CONFIG_FILE, loadConfig, resolveConfig } from './config.js';
import { getDiskStats, MEGABYTE } from './disk.js';
import { errorMessage } from './errors.js';
import {
  applyRun,
  CANCELED_EXIT_CODE,
  planCopyRun,
  planFreshenRun,
  type PlannedRun,
  type RunOptions,
  type RunStage,
} from './freshen.js';
import { listPlaylists, loadLibrary } from './library.js';
import { partitionPlaylist, DVD_BLOCK_SIZE, type ChunkLimit } from './partition.js';
import { promptProceed, promptRunParameters } from './prompts.js';
import {
  createProgressBar,
  displayCatalogSummary,
  displayChunk,
  displayPlan,
  displayPlaylists,
  printProgress,
  summarizeExecution,
} from './report.js';
import type { Config } from './types.js';

interface CommonFlags {
  config: string;
  library?: string;
  playlist?: string;
  minFree?: number;
  maxSize?: number;
  trash?: boolean;
  dryRun?: boolean;
  history: boolean;
  verbose?: boolean;
}

interface FreshenFlags extends CommonFlags {
  percent?: number;
  initialFill?: number;
}

interface PartitionFlags {
  config: string;
  library?: string;
  playlist?: string;
  maxSize?: number;
  maxTracks?: number;
  blockSize?: number;
  useDeviceBlockSize?: string;
  verbose?: boolean;
}

function parseInteger(value: string): number {
  const num = Number(value);

  if (!Number.isInteger(num) || num < 0) {
    throw new InvalidArgumentError('Expected a whole number.');
  }

  return num;
}

const STAGE_LABELS: Record<Exclude<RunStage, 'executing'>, string> = {
  library: 'Reading iTunes library...',
  inventory: 'Looking at the music on the device...',
  planning: 'Choosing tracks...',
};

function createStageSpinner(): { onStage: (stage: RunStage) => void; spinner: Ora } {
  const spinner = ora();

  return {
    spinner,
    onStage: (stage) => {
      if (spinner.isSpinning) {
        spinner.succeed();
      }

      if (stage !== 'executing') {
        spinner.start(STAGE_LABELS[stage]);
      }
    },
  };
}

function withCancel<T>(run: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();

  const onInterrupt = (): void => {
    if (controller.signal.aborted) {
      process.exit(CANCELED_EXIT_CODE);
    }

    console.log(chalk.yellow('\nCanceling after the current file... (Ctrl-C again to quit now)'));
    controller.abort();
  };

  process.on('SIGINT', onInterrupt);

  return run(controller.signal).finally(() => {
    process.off('SIGINT', onInterrupt);
  });
}

async function buildConfig(flags: CommonFlags & Partial<FreshenFlags>): Promise<Config> {
  const base = await loadConfig(flags.config);

  return resolveConfig(base, {
    libraryPath: flags.library,
    playlist: flags.playlist,
    percent: flags.percent,
    minFreeMB: flags.minFree,
    maxSizeMB: flags.maxSize,
    initialFill: flags.initialFill,
    deleteMethod: flags.trash ? 'trash' : undefined,
  });
}

async function runPlanned(
  options: RunOptions,
  planned: PlannedRun,
  verbose: boolean
): Promise<number> {
  if (options.dryRun) {
    console.log(chalk.yellow('\nDry run: nothing was changed.'));
    return 0;
  }

  const bar = verbose ? null : createProgressBar(planned.plan);
  const result = await withCancel((signal) =>
    applyRun({ ...options, signal, onProgress: bar ? bar.onProgress : printProgress }, planned)
  ).finally(() => bar?.stop());

  if (result.log) {
    summarizeExecution(result.log);
  }

  return result.exitCode;
}

async function freshenCommand(target: string, flags: FreshenFlags, mode: 'freshen' | 'copy'): Promise<void> {
  console.log(chalk.cyan(mode === 'freshen' ? '\n🔄 Freshen Device\n' : '\n📥 Copy To Device\n'));

  const config = await buildConfig(flags);
  const stages = createStageSpinner();
  const options: RunOptions = {
    config,
    mountPath: target,
    dryRun: flags.dryRun,
    useHistory: flags.history,
    onStage: stages.onStage,
  };

  let planned: PlannedRun;

  try {
    planned = mode === 'freshen' ? await planFreshenRun(options) : await planCopyRun(options);
    stages.spinner.succeed();
  } catch (error) {
    stages.spinner.fail();
    throw error;
  }

  displayCatalogSummary(planned.catalog);
  console.log(chalk.gray(`Device: ${planned.inventory.mountPath} (${planned.inventory.tracks.length} music files)`));
  displayPlan(planned.plan, planned.catalog, flags.verbose === true || flags.dryRun === true);

  process.exitCode = await runPlanned(options, planned, flags.verbose ?? false);
}

async function interactiveCommand(target: string | undefined, flags: CommonFlags): Promise<void> {
  const config = await buildConfig(flags);
  const spinner = ora('Reading iTunes library...').start();
  const catalog = await loadLibrary(config.libraryPath).catch((error: unknown) => {
    spinner.fail();
    throw error;
  });
  spinner.succeed(`Read ${catalog.tracks.size} tracks from ${catalog.source}`);

  const params = await promptRunParameters(catalog, config, target);
  const runConfig = resolveConfig(config, { playlist: params.playlist, percent: params.percent });
  const stages = createStageSpinner();
  const options: RunOptions = {
    config: runConfig,
    mountPath: params.mountPath,
    catalog,
    dryRun: flags.dryRun,
    useHistory: flags.history,
    onStage: stages.onStage,
  };

  const planned = params.mode === 'freshen' ? await planFreshenRun(options) : await planCopyRun(options);
  stages.spinner.succeed();

  displayPlan(planned.plan, catalog, true);

  if (!flags.dryRun) {
    const proceed = await promptProceed(planned.plan.removals.length + planned.plan.additions.length);

    if (!proceed) {
      return;
    }
  }

  process.exitCode = await runPlanned(options, planned, flags.verbose ?? false);
}

async function partitionCommand(flags: PartitionFlags): Promise<void> {
  const config = await loadConfig(flags.config);
  const playlist = flags.playlist ?? config.playlist ?? 'Music';
  const limit: ChunkLimit = flags.maxTracks !== undefined
    ? { maxTracks: flags.maxTracks }
    : { maxBytes: (flags.maxSize ?? 4300) * MEGABYTE };

  let blockSize = flags.blockSize ?? DVD_BLOCK_SIZE;

  if (flags.useDeviceBlockSize) {
    blockSize = (await getDiskStats(flags.useDeviceBlockSize)).blockSize;
  }

  const spinner = ora('Reading iTunes library...').start();
  const catalog = await loadLibrary(flags.library ?? config.libraryPath).catch((error: unknown) => {
    spinner.fail();
    throw error;
  });
  spinner.succeed();

  let index = 0;

  for (const chunk of partitionPlaylist(catalog, playlist, limit, { blockSize })) {
    index++;
    displayChunk(chunk, index, flags.verbose);
  }

  console.log(chalk.gray(`\n${index} chunks from playlist "${playlist}"`));
}

async function playlistsCommand(flags: { config: string; library?: string }): Promise<void> {
  const config = await loadConfig(flags.config);
  const catalog = await loadLibrary(flags.library ?? config.libraryPath);

  displayPlaylists(listPlaylists(catalog));
}

function fail(error: unknown): void {
  console.error(chalk.red(`\n✗ ${errorMessage(error)}`));
  process.exitCode = 1;
}

const program = new Command();

program
  .name('musicmover')
  .description('Copy music from iTunes to another device, and freshen it over time')
  .version('0.1.0');

function addCommonOptions(command: Command): Command {
  return command
    .option('-c, --config <file>', 'Config file', CONFIG_FILE)
    .option('-l, --library <file>', 'The iTunes library XML file to use')
    .option('-p, --playlist <name>', 'The iTunes playlist to copy from (default: whole library)')
    .option('-f, --min-free <mb>', 'Space (MB) to leave free on the device', parseInteger)
    .option('-m, --max-size <mb>', "Maximum size (MB) of the device's music folder", parseInteger)
    .option('--trash', 'Move removed files to the trash instead of deleting them')
    .option('--dry-run', 'Show what would change without touching the device')
    .option('--no-history', 'Do not avoid tracks removed on recent runs')
    .option('-v, --verbose', 'List every file instead of showing a progress bar');
}

addCommonOptions(
  program
    .command('freshen', { isDefault: true })
    .description('Replace a percentage of the music on the device with new tracks')
    .argument('<target>', 'The target music directory (e.g. /Volumes/PHONE/Music); must exist')
    .option('-t, --percent <n>', 'Percentage of the music on the device to replace', parseInteger)
    .option('--initial-fill <n>', 'Tracks to copy when the device has no music yet', parseInteger)
).action((target: string, flags: FreshenFlags) => freshenCommand(target, flags, 'freshen').catch(fail));

addCommonOptions(
  program
    .command('copy')
    .description('Copy tracks the device does not have yet until it is full')
    .argument('<target>', 'The target music directory; must exist')
).action((target: string, flags: CommonFlags) => freshenCommand(target, flags, 'copy').catch(fail));

addCommonOptions(
  program
    .command('interactive')
    .alias('i')
    .description('Choose the device, playlist and percentage with prompts')
    .argument('[target]', 'The target music directory')
).action((target: string | undefined, flags: CommonFlags) => interactiveCommand(target, flags).catch(fail));

program
  .command('partition')
  .description('Split a playlist into chunks that each fit on one disc')
  .option('-c, --config <file>', 'Config file', CONFIG_FILE)
  .option('-l, --library <file>', 'The iTunes library XML file to use')
  .option('-p, --playlist <name>', 'The playlist to split (default: Music)')
  .option('-m, --max-size <mb>', 'Maximum size (MB) of each chunk (default: 4300)', parseInteger)
  .option('-n, --max-tracks <n>', 'Maximum number of tracks in each chunk', parseInteger)
  .option('-b, --block-size <bytes>', 'Block size to round file sizes up to', parseInteger)
  .option('--use-device-block-size <path>', "Round to the block size of the filesystem at <path>")
  .option('-v, --verbose', 'List the files in each chunk')
  .action((flags: PartitionFlags) => partitionCommand(flags).catch(fail));

program
  .command('playlists')
  .description('List the playlists in the iTunes library')
  .option('-c, --config <file>', 'Config file', CONFIG_FILE)
  .option('-l, --library <file>', 'The iTunes library XML file to use')
  .action((flags: { config: string; library?: string }) => playlistsCommand(flags).catch(fail));

program.parseAsync().catch(fail);
