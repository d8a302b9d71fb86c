/**
 * troupe - Core
 *
 * Shared infrastructure for the lifecycle packages:
 *
 * - Telemetry (correlation IDs, async context, structured logging)
 * - Configuration loaded from the environment
 *
 * @module @troupe/core
 */

export * from './telemetry/index.js';
export * from './config/index.js';
