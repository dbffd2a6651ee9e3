export interface AuditRecord {
  videoId: string;
  title: string;
  link: string;
  channel: string;
  playlistId: string;
  playlistName: string;
  removedAt: string; // ISO-8601, UTC
}

export type NewAuditRecord = Omit<AuditRecord, 'removedAt'> & { removedAt?: string };

export interface AuditFilter {
  since?: Date; // inclusive
  before?: Date; // exclusive
  playlistId?: string;
}
