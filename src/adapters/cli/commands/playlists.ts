import { Command } from 'commander';
import { runCommand, type CommonOptions } from '../context.js';
import { formatPlaylistLine } from '../format.js';

interface PlaylistsOptions extends CommonOptions {
  all?: boolean;
}

export function createPlaylistsCommand(): Command {
  return new Command('playlists')
    .description('List the playlists you own')
    .option('-a, --all', 'Follow pagination past the first 50 playlists')
    .option('--verbose', 'Verbose output')
    .action(async (options: PlaylistsOptions) => {
      await runCommand(options, async ({ pruner }) => {
        const playlists = await pruner.listPlaylists({ all: options.all });
        if (playlists.length === 0) {
          console.log('📭 No playlists found.');
          return;
        }
        playlists.forEach((playlist, index) => console.log(formatPlaylistLine(playlist, index)));
      });
    });
}
