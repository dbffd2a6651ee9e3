import { Command } from 'commander';
import { filterItems, parseSelection, type PlaylistPruner } from '../../../core/index.js';
import { runCommand, type CommonOptions } from '../context.js';
import { formatItemLine, formatRemovalSummary } from '../format.js';
import { Prompt } from '../prompt.js';
import type { Playlist, PlaylistItem, RemovalResult } from '../../../types/index.js';

interface RemoveOptions extends CommonOptions {
  search?: string;
  items?: string;
  yes?: boolean;
}

export interface SelectionSettings {
  selection?: string;
  assumeYes?: boolean;
}

/**
 * Shows the numbered candidates, asks which to remove and for confirmation,
 * then runs the batch. Returns null when nothing was removed on purpose.
 */
export async function selectAndRemove(
  pruner: PlaylistPruner,
  playlist: Playlist,
  candidates: PlaylistItem[],
  settings: SelectionSettings,
  prompt: Prompt
): Promise<RemovalResult | null> {
  if (candidates.length === 0) {
    console.log('📭 No removable items.');
    return null;
  }

  candidates.forEach((item, index) => console.log(formatItemLine(item, index)));
  console.log('');

  const answer =
    settings.selection ?? (await prompt.ask('Items to remove (e.g. 1,3,5-7 or "all"; blank to cancel): '));
  if (!answer) {
    console.log('Cancelled.');
    return null;
  }
  const selected = parseSelection(answer, candidates.length).map((index) => candidates[index]);

  if (!settings.assumeYes) {
    const confirmed = await prompt.confirm(
      `Remove ${selected.length} item(s) from "${playlist.title}"? This cannot be undone.`
    );
    if (!confirmed) {
      console.log('Cancelled.');
      return null;
    }
  }

  const result = await pruner.removeItems(playlist, selected, {
    onItemStart: (item, index, total) => console.log(`🗑️  [${index}/${total}] ${item.title}`),
    onItemError: (item, error) => console.error(`❌ Failed (${item.title}): ${error.message}`),
  });

  console.log(`\n✅ ${formatRemovalSummary(result)}`);
  return result;
}

export function createRemoveCommand(): Command {
  return new Command('remove')
    .description('Remove selected items from a playlist, recording each one in the audit log')
    .argument('<playlist>', 'Playlist id or URL')
    .option('-s, --search <text>', 'Narrow the candidates to items matching the text')
    .option('-i, --items <selection>', 'Items to remove by number, e.g. 1,3,5-7 or all')
    .option('-y, --yes', 'Skip the confirmation prompt')
    .option('--verbose', 'Verbose output')
    .action(async (playlistArg: string, options: RemoveOptions) => {
      await runCommand(options, async ({ pruner }) => {
        const prompt = new Prompt();
        try {
          const playlist = await pruner.resolvePlaylist(playlistArg);
          const items = await pruner.listPlaylistItems(playlist.id);
          const candidates = filterItems(items, options.search);
          console.log(`\n📂 ${playlist.title}: ${candidates.length} of ${items.length} items\n`);
          await selectAndRemove(
            pruner,
            playlist,
            candidates,
            { selection: options.items, assumeYes: options.yes },
            prompt
          );
        } finally {
          prompt.close();
        }
      });
    });
}
