/**
 * Storage module exports.
 *
 * @packageDocumentation
 */

export { UsageStore, IN_MEMORY, type UsageSummaryRow, type SummaryOptions } from './store.js';
export { SCHEMA_SQL } from './schema.js';
