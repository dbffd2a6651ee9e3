import { Command } from 'commander';
import {
  ReauthorizationRequiredError,
  YouTubeApiError,
  filterItems,
  type PlaylistPruner,
} from '../../../core/index.js';
import { runCommand, type CommonOptions } from '../context.js';
import { formatPlaylistLine } from '../format.js';
import { Prompt } from '../prompt.js';
import { login, parseTimeoutSeconds } from './auth.js';
import { selectAndRemove } from './remove.js';
import type { Playlist } from '../../../types/index.js';

interface InteractiveOptions extends CommonOptions {
  server: boolean;
  timeout: string;
}

function needsSignIn(error: unknown): error is Error {
  return (
    error instanceof ReauthorizationRequiredError ||
    (error instanceof YouTubeApiError && error.isAuthFailure)
  );
}

/**
 * Lists playlists, signing in again once when the stored credential turns out
 * to be unusable (refresh rejected, token revoked).
 */
export async function listPlaylistsSignedIn(
  pruner: PlaylistPruner,
  signIn: () => Promise<void>
): Promise<Playlist[]> {
  try {
    return await pruner.listPlaylists();
  } catch (error) {
    if (!needsSignIn(error)) throw error;
    console.warn(`⚠️  ${error.message}`);
    await signIn();
    return pruner.listPlaylists();
  }
}

export function createInteractiveCommand(): Command {
  return new Command('interactive')
    .description('Guided session: sign in, pick a playlist, search, select and remove')
    .option('--no-server', 'Paste the redirected URL instead of running a local callback server')
    .option('-t, --timeout <seconds>', 'How long to wait for the browser redirect', '300')
    .option('--verbose', 'Verbose output')
    .action(async (options: InteractiveOptions) => {
      await runCommand(options, async ({ pruner, config }) => {
        const prompt = new Prompt();
        try {
          const settings = { useServer: options.server, timeoutMs: parseTimeoutSeconds(options.timeout) };
          const signIn = async () => {
            await login(pruner, config, settings, prompt);
            console.log('✅ Signed in.\n');
          };

          const status = await pruner.session.status();
          if (status.kind === 'unauthenticated') {
            await signIn();
          }

          for (;;) {
            const playlists = await listPlaylistsSignedIn(pruner, signIn);
            if (playlists.length === 0) {
              console.log('📭 No playlists found.');
              return;
            }
            playlists.forEach((playlist, index) => console.log(formatPlaylistLine(playlist, index)));

            const choice = await prompt.ask('\nPlaylist number (blank to quit): ');
            if (!choice) return;
            const playlist = playlists[Number(choice) - 1];
            if (!/^\d+$/.test(choice) || !playlist) {
              console.log(`❌ Choose a number between 1 and ${playlists.length}.`);
              continue;
            }

            const items = await pruner.listPlaylistItems(playlist.id);
            const search = items.length > 0 ? await prompt.ask('Search (blank for all items): ') : '';
            const candidates = filterItems(items, search);
            console.log(`\n📂 ${playlist.title}: ${candidates.length} of ${items.length} items\n`);
            await selectAndRemove(pruner, playlist, candidates, {}, prompt);

            if (!(await prompt.confirm('\nWork on another playlist?'))) return;
          }
        } finally {
          prompt.close();
        }
      });
    });
}
