import { confirm, input, select } from '@inquirer/prompts';
import chalk from 'chalk';
import { errorMessage } from './errors.js';
import { assertMounted } from './inventory.js';
import { listPlaylists } from './library.js';
import type { Catalog, Config } from './types.js';

export type RunMode = 'freshen' | 'copy';

export interface RunParameters {
  mountPath: string;
  mode: RunMode;
  playlist: string | null;
  percent: number;
}

export interface PlaylistChoice {
  name: string;
  /** null stands for the whole library. */
  value: string | null;
}

export function playlistChoices(catalog: Catalog): PlaylistChoice[] {
  return [
    { name: chalk.green('The whole library'), value: null },
    ...listPlaylists(catalog).map((p) => ({ name: `${p.name} (${p.trackCount} tracks)`, value: p.name })),
  ];
}

function validatePercent(value: string): string | true {
  const num = parseInt(value, 10);

  if (isNaN(num) || num < 0 || num > 100) {
    return 'Please enter a number between 0 and 100';
  }

  return true;
}

export async function promptRunParameters(
  catalog: Catalog,
  config: Config,
  mountPath?: string
): Promise<RunParameters> {
  console.log(chalk.cyan('\n🎵 Music Mover\n'));

  const device = mountPath ?? await input({
    message: 'Device music folder (e.g. /Volumes/PHONE/Music):',
    validate: async (value) => {
      try {
        await assertMounted(value.trim());
        return true;
      } catch (error) {
        return errorMessage(error);
      }
    },
  });

  const mode = await select<RunMode>({
    message: 'What would you like to do?',
    choices: [
      { name: 'Freshen: replace some of the music on the device', value: 'freshen' },
      { name: 'Copy: fill the device with music it does not have yet', value: 'copy' },
    ],
  });

  const playlist = await select<string | null>({
    message: 'Copy music from:',
    choices: playlistChoices(catalog),
    default: config.playlist,
    pageSize: 15,
  });

  let percent = config.percent;

  if (mode === 'freshen') {
    const percentInput = await input({
      message: 'Percentage of the device to replace (0-100):',
      default: String(config.percent),
      validate: validatePercent,
    });

    percent = parseInt(percentInput, 10);
  }

  return {
    mountPath: device.trim(),
    mode,
    playlist,
    percent,
  };
}

export async function promptProceed(changeCount: number): Promise<boolean> {
  if (changeCount === 0) {
    console.log(chalk.yellow('\nNothing to do.'));
    return false;
  }

  return confirm({
    message: `Apply ${changeCount} changes to the device?`,
    default: true,
  });
}
