export { AuditLog, AUDIT_COLUMNS } from './log.js';
export { formatAuditCsv, exportAuditCsv } from './csv.js';
export { buildAuditFilter, parseDateBoundary } from './filter.js';
