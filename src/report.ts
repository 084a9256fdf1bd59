import chalk from 'chalk';
import cliProgress from 'cli-progress';
import type { PlaylistSummary } from './library.js';
import type { Catalog, Chunk, ExecutionLog, ProgressEvent, ReplacementPlan } from './types.js';

export function formatFileSize(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }

  if (bytes < 1024 * 1024) {
    return `${(bytes / 1024).toFixed(1)} KB`;
  }

  if (bytes < 1024 * 1024 * 1024) {
    return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
  }

  return `${(bytes / (1024 * 1024 * 1024)).toFixed(2)} GB`;
}

export function trackLabel(title: string | null, artist: string | null): string {
  return `${artist ?? 'Unknown Artist'} - ${title ?? 'Untitled'}`;
}

export function displayCatalogSummary(catalog: Catalog): void {
  console.log(chalk.gray(`Library: ${catalog.source}`));
  console.log(chalk.gray(`  Tracks: ${catalog.tracks.size}, playlists: ${catalog.playlists.size}`));

  if (catalog.missing.length === 0) {
    return;
  }

  console.log(chalk.yellow(`  ${catalog.missing.length} tracks have no usable file and will be ignored:`));

  for (const missing of catalog.missing.slice(0, 10)) {
    console.log(chalk.yellow(`    - ${missing.title ?? `#${missing.id}`} (${missing.reason})`));
  }

  if (catalog.missing.length > 10) {
    console.log(chalk.yellow(`    ... and ${catalog.missing.length - 10} more`));
  }
}

export function displayPlan(plan: ReplacementPlan, catalog: Catalog, verbose = false): void {
  console.log(chalk.cyan('\n' + '═'.repeat(60)));
  console.log(chalk.cyan(`  PLAN (${plan.mode})`));
  console.log(chalk.cyan('═'.repeat(60)));

  console.log(`\n  Files to remove: ${chalk.yellow(plan.removals.length.toString())}`);
  console.log(`  Space to free: ${chalk.green(formatFileSize(plan.bytesToFree))}`);
  console.log(`  Tracks to copy: ${chalk.yellow(plan.additions.length.toString())}`);
  console.log(`  Space to fill: ${chalk.green(formatFileSize(plan.bytesToCopy))}`);

  if (verbose) {
    if (plan.removals.length > 0) {
      console.log(chalk.gray('\n  Remove:'));

      for (const removal of plan.removals) {
        console.log(chalk.red(`    - ${removal.relativePath}`));
      }
    }

    if (plan.additions.length > 0) {
      console.log(chalk.gray('\n  Copy:'));

      for (const addition of plan.additions) {
        const track = catalog.tracks.get(addition.id) ?? addition;
        console.log(chalk.green(`    + ${trackLabel(track.title, track.artist)}`));
      }
    }
  }

  console.log(chalk.cyan('\n' + '─'.repeat(60)));
}

export function printProgress(event: ProgressEvent): void {
  const progress = `[${event.index}/${event.total}]`;

  if (event.operation === 'delete') {
    const { entry } = event;

    if (entry.status === 'ok') {
      console.log(chalk.gray(`${progress} `) + chalk.green(`✓ Removed ${entry.path}`));
    } else if (entry.status === 'not-found') {
      console.log(chalk.gray(`${progress} ○ Already gone: ${entry.path}`));
    } else if (entry.status === 'skipped') {
      console.log(chalk.gray(`${progress} ○ Skipped: ${entry.path}`));
    } else {
      console.log(chalk.gray(`${progress} `) + chalk.red(`✗ ${entry.path}: ${entry.error}`));
    }

    return;
  }

  const { entry } = event;

  if (entry.status === 'ok') {
    console.log(chalk.gray(`${progress} `) + chalk.green(`✓ Copied ${entry.destination}`));
  } else if (entry.status === 'skipped') {
    console.log(chalk.gray(`${progress} ○ Skipped: ${entry.destination}`));
  } else {
    console.log(chalk.gray(`${progress} `) + chalk.red(`✗ ${entry.destination}: ${entry.error}`));
  }
}

export interface ProgressBarReporter {
  onProgress: (event: ProgressEvent) => void;
  stop: () => void;
}

export function createProgressBar(plan: ReplacementPlan): ProgressBarReporter {
  const bar = new cliProgress.SingleBar({
    format: '{operation} |{bar}| {value}/{total} files | {file}',
    barCompleteChar: '█',
    barIncompleteChar: '░',
  });
  const total = plan.removals.length + plan.additions.length;
  let done = 0;

  bar.start(total, 0, { operation: 'Starting', file: '' });

  return {
    onProgress: (event) => {
      done++;
      const file = event.operation === 'delete' ? event.entry.path : event.entry.destination;
      bar.update(done, { operation: event.operation === 'delete' ? 'Removing' : 'Copying ', file });
    },
    stop: () => bar.stop(),
  };
}

export function summarizeExecution(log: ExecutionLog): void {
  console.log(chalk.cyan('\nExecution Summary'));
  console.log(chalk.gray('─'.repeat(40)));

  const removed = log.deletions.filter((e) => e.status === 'ok').length;
  const alreadyGone = log.deletions.filter((e) => e.status === 'not-found').length;
  const copied = log.copies.filter((e) => e.status === 'ok').length;
  const skipped = [...log.deletions, ...log.copies].filter((e) => e.status === 'skipped').length;

  console.log(`Removed: ${removed}${alreadyGone > 0 ? chalk.gray(` (${alreadyGone} already gone)`) : ''}`);
  console.log(`Copied: ${copied}`);

  if (log.canceled) {
    console.log(chalk.yellow(`Canceled: ${skipped} operations not attempted`));
  }

  if (log.failures.length === 0) {
    console.log(chalk.green('No failures'));
    return;
  }

  console.log(chalk.red(`Failed: ${log.failures.length}`));

  for (const failure of log.failures) {
    console.log(chalk.red(`  - ${failure.operation} ${failure.path}: ${failure.message}`));
  }
}

export function displayPlaylists(playlists: PlaylistSummary[]): void {
  for (const playlist of playlists) {
    console.log(`${playlist.name} ${chalk.gray(`(${playlist.trackCount} tracks)`)}`);
  }
}

export function displayChunk(chunk: Chunk, index: number, verbose = false): void {
  console.log(
    chalk.cyan(`Chunk ${index}: `) +
      `${chunk.tracks.length} tracks, ${formatFileSize(chunk.bytes)}`
  );

  if (!verbose) {
    return;
  }

  for (const track of chunk.tracks) {
    console.log(chalk.gray(`  ${track.location}`));
  }
}
