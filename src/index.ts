/**
 * postgis-lab - PostGIS lessons
 *
 * Lesson catalogue, provisioning, verification and dashboards for a
 * hands-on PostGIS course.
 *
 * @module postgis-lab
 */

// Export types
export * from "./types/index.js";

// Export lessons
export * from "./lessons/index.js";

// Export docker, provisioning and verification
export * from "./docker/index.js";
export * from "./provisioning/index.js";
export * from "./verification/index.js";

// Export dashboards
export * from "./dashboard/index.js";

// Export utilities
export { ConnectionPool } from "./pool/ConnectionPool.js";
export type { ConnectionPoolConfig } from "./pool/ConnectionPool.js";
export { buildExplainSql, parseExecutionTime, planText } from "./utils/explain.js";
export type { ExplainOptions } from "./utils/explain.js";
export { consoleOutput } from "./utils/output.js";
export type { Output } from "./utils/output.js";
export { logger } from "./utils/logger.js";
