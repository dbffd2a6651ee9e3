import { Command } from 'commander';
import { buildAuditFilter, exportAuditCsv, parsePlaylistId } from '../../../core/index.js';
import { runCommand, type CommonOptions } from '../context.js';
import { formatAuditLine } from '../format.js';

interface AuditOptions extends CommonOptions {
  since?: string;
  until?: string;
  playlist?: string;
  export?: string;
}

export function createAuditCommand(): Command {
  return new Command('audit')
    .description('Show the log of removed items, optionally exporting it as CSV')
    .option('--since <date>', 'Only removals on or after this day (YYYY-MM-DD, UTC)')
    .option('--until <date>', 'Only removals up to and including this day (YYYY-MM-DD, UTC)')
    .option('-p, --playlist <playlist>', 'Only removals from this playlist id or URL')
    .option('-e, --export <file>', 'Write the matching records to a CSV file')
    .option('--verbose', 'Verbose output')
    .action(async (options: AuditOptions) => {
      await runCommand(options, async ({ pruner }) => {
        const filter = buildAuditFilter({
          since: options.since,
          until: options.until,
          playlistId: options.playlist ? parsePlaylistId(options.playlist) : undefined,
        });
        const records = pruner.auditRecords(filter);

        if (options.export) {
          await exportAuditCsv(records, options.export);
          console.log(`💾 Exported ${records.length} record(s) to ${options.export}`);
          return;
        }

        if (records.length === 0) {
          console.log('📭 No removals recorded for this filter.');
          return;
        }
        records.forEach((record) => console.log(formatAuditLine(record)));
        console.log(`\n${records.length} record(s)`);
      });
    });
}
