/**
 * Whale Copy Engine
 *
 * Library entry point. `start.ts` is the runnable process; everything it
 * wires together is exported here for embedding and tests.
 */

export * from "./config";
export * from "./core";
export * from "./errors/app.errors";
export * from "./models";
export * from "./services";
export {
  DatabaseHealth,
  IN_MEMORY,
  OrderRepository,
  PositionRepository,
  openDatabase,
  type SqliteDatabase,
} from "./infra/persistence";
export { ConsoleLogger, createNullLogger, withPrefix, type Logger } from "./infra/logging";
export { createClobClient, type AuthenticatedClobClient } from "./infrastructure/clob-client.factory";
export { startRuntime, type Runtime } from "./start";
