import { Command } from 'commander';
import { createAuthCommand } from './commands/auth.js';
import { createPlaylistsCommand } from './commands/playlists.js';
import { createItemsCommand } from './commands/items.js';
import { createRemoveCommand } from './commands/remove.js';
import { createAuditCommand } from './commands/audit.js';
import { createInteractiveCommand } from './commands/interactive.js';

export function createCLI(): Command {
  const program = new Command()
    .name('yt-pruner')
    .description('Bulk-remove YouTube playlist items, keeping an audit log of every removal')
    .version('0.1.0');

  program.addCommand(createInteractiveCommand(), { isDefault: true });
  program.addCommand(createAuthCommand());
  program.addCommand(createPlaylistsCommand());
  program.addCommand(createItemsCommand());
  program.addCommand(createRemoveCommand());
  program.addCommand(createAuditCommand());

  return program;
}
