/**
 * Database module exports
 */

// Connection
export { closeDatabase, type DB, openDatabase } from "./connection";
// Mappers
export { parseRecordRow, type RecordParams, toRecordParams } from "./mappers";
// Migrations
export {
  getAllMigrations,
  getCurrentVersion,
  getLatestVersion,
  getPendingMigrations,
  initializeDatabase,
  runMigrations,
} from "./migrations";
// Record store
export { SqliteRecordStore, type SqliteRecordStoreOptions } from "./record-repository";
