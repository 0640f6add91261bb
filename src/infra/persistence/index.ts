/**
 * Persistence Module Index
 *
 * SQLite storage for the execution core:
 * - openDatabase: connection with the schema applied
 * - OrderRepository: orders, written together with their transitions
 * - PositionRepository: positions, written together with their updates
 *
 * Usage:
 *   const db = openDatabase(config.databasePath, logger);
 *   const audit = new AuditTrail(db);
 *   const orders = new OrderRepository(db, audit);
 */

export type { HealthStatus, HealthCheckable } from "./types";
export {
  DatabaseHealth,
  IN_MEMORY,
  isUniqueViolation,
  oneOf,
  openDatabase,
  parseMetadata,
  type SqliteDatabase,
} from "./database";
export { OrderRepository, type OrderPatch, type TransitionRequest } from "./order-repository";
export { PositionRepository, validatePosition } from "./position-repository";
