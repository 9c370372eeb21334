export { createDatabase, type FlowpilotDatabase } from './connection.js';
export { migrateDatabase } from './migrate.js';
export { createSqliteRunStore, type ListRunsFilter, type SqliteRunStore } from './runStore.js';
export * from './schema.js';
