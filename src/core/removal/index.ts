export { BatchRemover, uniqueById, type RemovalCallbacks, type AuditSink } from './remover.js';
export { parseSelection } from './selection.js';
