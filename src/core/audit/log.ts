import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import type { AuditFilter, AuditRecord, NewAuditRecord } from '../../types/index.js';

/** Stored columns, in table order. The CSV export uses the same list. */
export const AUDIT_COLUMNS = [
  'video_id',
  'title',
  'link',
  'channel',
  'playlist_id',
  'playlist_name',
  'removed_at',
] as const;

interface AuditRow {
  video_id: string;
  title: string;
  link: string;
  channel: string;
  playlist_id: string;
  playlist_name: string;
  removed_at: string;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS removed_videos (
    video_id TEXT NOT NULL,
    title TEXT NOT NULL,
    link TEXT NOT NULL,
    channel TEXT NOT NULL,
    playlist_id TEXT NOT NULL,
    playlist_name TEXT NOT NULL,
    removed_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS removed_videos_removed_at ON removed_videos (removed_at);
`;

function fromRow(row: AuditRow): AuditRecord {
  return {
    videoId: row.video_id,
    title: row.title,
    link: row.link,
    channel: row.channel,
    playlistId: row.playlist_id,
    playlistName: row.playlist_name,
    removedAt: row.removed_at,
  };
}

function whereClause(filter: AuditFilter): { sql: string; values: string[] } {
  const conditions: string[] = [];
  const values: string[] = [];

  if (filter.since) {
    conditions.push('removed_at >= ?');
    values.push(filter.since.toISOString());
  }
  if (filter.before) {
    conditions.push('removed_at < ?');
    values.push(filter.before.toISOString());
  }
  if (filter.playlistId) {
    conditions.push('playlist_id = ?');
    values.push(filter.playlistId);
  }

  return {
    sql: conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '',
    values,
  };
}

/**
 * Append-only log of removed playlist items. There is no update or delete;
 * rows are only ever inserted and read back.
 */
export class AuditLog {
  private db: Database.Database;
  private insert: Database.Statement<[AuditRow]>;

  constructor(filename: string, private readonly now: () => Date = () => new Date()) {
    if (filename !== ':memory:') {
      mkdirSync(dirname(filename), { recursive: true });
    }
    this.db = new Database(filename);
    this.db.exec(SCHEMA);
    this.insert = this.db.prepare<[AuditRow]>(
      `INSERT INTO removed_videos (${AUDIT_COLUMNS.join(', ')})
       VALUES (@video_id, @title, @link, @channel, @playlist_id, @playlist_name, @removed_at)`
    );
  }

  record(entry: NewAuditRecord): AuditRecord {
    const row: AuditRow = {
      video_id: entry.videoId,
      title: entry.title,
      link: entry.link,
      channel: entry.channel,
      playlist_id: entry.playlistId,
      playlist_name: entry.playlistName,
      removed_at: entry.removedAt ?? this.now().toISOString(),
    };
    this.insert.run(row);
    return fromRow(row);
  }

  list(filter: AuditFilter = {}): AuditRecord[] {
    const where = whereClause(filter);
    const statement = this.db.prepare<string[], AuditRow>(
      `SELECT ${AUDIT_COLUMNS.join(', ')} FROM removed_videos ${where.sql} ORDER BY removed_at, rowid`
    );
    return statement.all(...where.values).map(fromRow);
  }

  count(filter: AuditFilter = {}): number {
    const where = whereClause(filter);
    const statement = this.db.prepare<string[], { total: number }>(
      `SELECT COUNT(*) AS total FROM removed_videos ${where.sql}`
    );
    return statement.get(...where.values)?.total ?? 0;
  }

  close(): void {
    this.db.close();
  }
}
