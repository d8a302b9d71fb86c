/**
 * Configuration
 *
 * Environment-driven settings shared by every stage in the process.
 *
 * | Variable               | Field          | Default      |
 * |------------------------|----------------|--------------|
 * | `TROUPE_SERVICE_NAME`  | `serviceName`  | `troupe`     |
 * | `LOG_LEVEL`            | `logLevel`     | `INFO`       |
 * | `TROUPE_PRETTY_LOGS`   | `prettyLogs`   | dev only     |
 * | `TROUPE_ROLLBACK_MODE` | `rollbackMode` | `sequential` |
 *
 * @module @troupe/core/config
 */

import { z } from 'zod';
import { Logger, parseSeverity } from '../telemetry/logger.js';

// =============================================================================
// Schema
// =============================================================================

/**
 * How a stage releases the players it already set up when a sibling's
 * setup fails.
 */
export const RollbackModeSchema = z.enum(['sequential', 'concurrent']);
export type RollbackMode = z.infer<typeof RollbackModeSchema>;

export const TroupeConfigSchema = z.object({
  serviceName: z.string().min(1).default('troupe'),
  logLevel: z.enum(['DEBUG', 'INFO', 'NOTICE', 'WARNING', 'ERROR', 'CRITICAL']).default('INFO'),
  prettyLogs: z.boolean().default(false),
  rollbackMode: RollbackModeSchema.default('sequential'),
});

export type TroupeConfig = z.infer<typeof TroupeConfigSchema>;

const ENV_VARIABLES: Record<keyof TroupeConfig, string> = {
  serviceName: 'TROUPE_SERVICE_NAME',
  logLevel: 'LOG_LEVEL',
  prettyLogs: 'TROUPE_PRETTY_LOGS',
  rollbackMode: 'TROUPE_ROLLBACK_MODE',
};

// =============================================================================
// Errors
// =============================================================================

export interface ConfigIssue {
  /** Environment variable that holds the bad value */
  variable: string;
  message: string;
}

/**
 * Error thrown when the environment holds an invalid setting
 */
export class ConfigError extends Error {
  readonly name = 'ConfigError';
  readonly isConfigError = true;

  constructor(public readonly issues: ConfigIssue[]) {
    super(`Invalid configuration: ${issues.map((i) => `${i.variable}: ${i.message}`).join('; ')}`);
  }
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Load configuration from environment variables
 *
 * @throws ConfigError if any variable holds an invalid value
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): TroupeConfig {
  const raw = {
    serviceName: env.TROUPE_SERVICE_NAME || undefined,
    logLevel: env.LOG_LEVEL ? (parseSeverity(env.LOG_LEVEL) ?? env.LOG_LEVEL) : undefined,
    prettyLogs: coerceBoolean(env.TROUPE_PRETTY_LOGS) ?? env.NODE_ENV === 'development',
    rollbackMode: env.TROUPE_ROLLBACK_MODE?.trim().toLowerCase() || undefined,
  };

  const result = TroupeConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => ({
        variable: variableFor(issue.path[0]),
        message: issue.message,
      }))
    );
  }
  return result.data;
}

/**
 * Read only the rollback mode, so a stage does not depend on unrelated
 * settings being valid
 *
 * @throws ConfigError if TROUPE_ROLLBACK_MODE holds an unknown mode
 */
export function loadRollbackMode(env: NodeJS.ProcessEnv = process.env): RollbackMode {
  const value = env.TROUPE_ROLLBACK_MODE?.trim().toLowerCase() || undefined;
  const result = RollbackModeSchema.default('sequential').safeParse(value);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => ({
        variable: ENV_VARIABLES.rollbackMode,
        message: issue.message,
      }))
    );
  }
  return result.data;
}

/**
 * Build a logger honoring the configured service name, level and format
 */
export function createConfiguredLogger(config: TroupeConfig): Logger {
  return new Logger({
    serviceName: config.serviceName,
    minSeverity: config.logLevel,
    prettyPrint: config.prettyLogs,
  });
}

// =============================================================================
// Shared Logger
// =============================================================================

let defaultLogger: Logger | null = null;

/**
 * Get the shared logger, built from {@link loadConfig} on first use
 *
 * @throws ConfigError if the environment holds an invalid setting
 */
export function getLogger(): Logger {
  if (!defaultLogger) {
    defaultLogger = createConfiguredLogger(loadConfig());
  }
  return defaultLogger;
}

/**
 * Replace the shared logger (pass null to rebuild it from the environment)
 */
export function setLogger(logger: Logger | null): void {
  defaultLogger = logger;
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Interpret common boolean spellings; anything else is passed through so the
 * schema reports it.
 */
function coerceBoolean(value: string | undefined): boolean | string | undefined {
  if (value === undefined || value === '') return undefined;
  switch (value.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      return value;
  }
}

function variableFor(field: string | number | undefined): string {
  if (typeof field === 'string' && isConfigKey(field)) {
    return ENV_VARIABLES[field];
  }
  return String(field ?? 'unknown');
}

function isConfigKey(field: string): field is keyof TroupeConfig {
  return Object.prototype.hasOwnProperty.call(ENV_VARIABLES, field);
}
