import { Command } from 'commander';
import { filterItems, parsePlaylistId } from '../../../core/index.js';
import { runCommand, type CommonOptions } from '../context.js';
import { formatItemLine } from '../format.js';

interface ItemsOptions extends CommonOptions {
  search?: string;
}

export function createItemsCommand(): Command {
  return new Command('items')
    .description('List every item of a playlist')
    .argument('<playlist>', 'Playlist id or URL')
    .option('-s, --search <text>', 'Only show items whose title or channel contains the text')
    .option('--verbose', 'Verbose output')
    .action(async (playlist: string, options: ItemsOptions) => {
      await runCommand(options, async ({ pruner }) => {
        const items = await pruner.listPlaylistItems(parsePlaylistId(playlist));
        const shown = filterItems(items, options.search);
        if (shown.length === 0) {
          console.log(items.length === 0 ? '📭 The playlist is empty.' : '📭 No items match the search.');
          return;
        }
        shown.forEach((item, index) => console.log(formatItemLine(item, index)));
        console.log(`\n${shown.length} of ${items.length} items`);
      });
    });
}
