import { writeFile, mkdir } from 'fs/promises';
import { dirname } from 'path';
import { parse } from 'json2csv';
import { AUDIT_COLUMNS } from './log.js';
import type { AuditRecord } from '../../types/index.js';

const FIELD_FOR_COLUMN: Record<(typeof AUDIT_COLUMNS)[number], keyof AuditRecord> = {
  video_id: 'videoId',
  title: 'title',
  link: 'link',
  channel: 'channel',
  playlist_id: 'playlistId',
  playlist_name: 'playlistName',
  removed_at: 'removedAt',
};

export function formatAuditCsv(records: AuditRecord[]): string {
  return parse(records, {
    fields: AUDIT_COLUMNS.map((column) => ({ label: column, value: FIELD_FOR_COLUMN[column] })),
    eol: '\n',
  });
}

export async function exportAuditCsv(records: AuditRecord[], outputFile: string): Promise<void> {
  await mkdir(dirname(outputFile), { recursive: true });
  await writeFile(outputFile, `${formatAuditCsv(records)}\n`, 'utf8');
}
