/**
 * Storage module exports.
 *
 * @packageDocumentation
 */

export { AuditStore, getDefaultDbPath } from './store.js';
export type { AuditQuery, AuditSink } from './store.js';
export { BatchWriter } from './batch-writer.js';
export type { BatchWriterOptions, WriterStats } from './batch-writer.js';
export { SCHEMA_SQL, SCHEMA_VERSION } from './schema.js';
