import { InvalidDateError } from '../errors.js';
import type { AuditFilter } from '../../types/index.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const DAY_ONLY = /^\d{4}-\d{2}-\d{2}$/;

export interface AuditFilterInput {
  since?: string;
  until?: string;
  playlistId?: string;
}

/**
 * A bare day (YYYY-MM-DD) is read in UTC. As an `until` bound it covers the
 * whole day, so the exclusive upper bound becomes the next midnight.
 */
export function parseDateBoundary(value: string, edge: 'start' | 'end'): Date {
  const trimmed = value.trim();
  const dayOnly = DAY_ONLY.test(trimmed);
  const date = new Date(dayOnly ? `${trimmed}T00:00:00.000Z` : trimmed);
  if (Number.isNaN(date.getTime())) {
    throw new InvalidDateError(value);
  }
  // Date rolls 2026-02-30 over into March
  if (dayOnly && date.toISOString().slice(0, 10) !== trimmed) {
    throw new InvalidDateError(value);
  }
  return dayOnly && edge === 'end' ? new Date(date.getTime() + DAY_MS) : date;
}

export function buildAuditFilter(input: AuditFilterInput): AuditFilter {
  const filter: AuditFilter = {};
  if (input.since) filter.since = parseDateBoundary(input.since, 'start');
  if (input.until) filter.before = parseDateBoundary(input.until, 'end');
  if (input.playlistId) filter.playlistId = input.playlistId;
  return filter;
}
