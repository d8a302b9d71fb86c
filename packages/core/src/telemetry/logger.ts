/**
 * Structured Logger
 *
 * One JSON object per line, with:
 * - Automatic telemetry context injection (trace, stage, player)
 * - Secret/token redaction
 * - Cloud Logging compatible severity names
 *
 * @module @troupe/core/telemetry/logger
 */

import { getCurrentContext, type TelemetryContext, type Severity } from './context.js';

// =============================================================================
// Configuration
// =============================================================================

export interface LoggerConfig {
  /** Service name for identification */
  serviceName: string;
  /** Minimum severity to log */
  minSeverity?: Severity;
  /** Whether to pretty print (for development) */
  prettyPrint?: boolean;
  /** Additional default fields */
  defaultFields?: Record<string, unknown>;
  /** Custom redaction patterns */
  redactionPatterns?: RegExp[];
}

const DEFAULT_REDACTION_PATTERNS: RegExp[] = [
  /sk-[a-zA-Z0-9-_]{20,}/g,
  /Bearer\s+[a-zA-Z0-9\-._~+/]+=*/gi,
  /Authorization:\s*[^\s,;]+/gi,
  /password['":\s]*[=:]\s*['"]?[^'"\s,}{]+['"]?/gi,
  /secret['":\s]*[=:]\s*['"]?[^'"\s,}{]+['"]?/gi,
  /api[_-]?key['":\s]*[=:]\s*['"]?[^'"\s,}{]+['"]?/gi,
  /-----BEGIN[A-Z ]*PRIVATE KEY-----[\s\S]*?-----END[A-Z ]*PRIVATE KEY-----/g,
];

/**
 * Severity level ordering (higher = more severe)
 */
export const SEVERITY_ORDER: Record<Severity, number> = {
  DEBUG: 0,
  INFO: 1,
  NOTICE: 2,
  WARNING: 3,
  ERROR: 4,
  CRITICAL: 5,
};

// =============================================================================
// Log Entry
// =============================================================================

export interface LogEntry {
  severity: Severity;
  message: string;
  timestamp: string;
  service: string;

  // Trace correlation
  traceId?: string;
  spanId?: string;
  parentSpanId?: string;

  // Lifecycle correlation
  source?: string;
  stage?: string;
  player?: string;
  phase?: string;
  eventName?: string;

  error?: {
    name: string;
    message: string;
    stack?: string;
    code?: string;
    cause?: string;
  };

  [key: string]: unknown;
}

// =============================================================================
// Logger
// =============================================================================

export class Logger {
  private readonly config: Required<LoggerConfig>;
  private readonly redactionPatterns: RegExp[];

  constructor(config: LoggerConfig) {
    this.config = {
      serviceName: config.serviceName,
      minSeverity: config.minSeverity ?? 'DEBUG',
      prettyPrint: config.prettyPrint ?? (process.env.NODE_ENV === 'development'),
      defaultFields: config.defaultFields ?? {},
      redactionPatterns: config.redactionPatterns ?? [],
    };
    this.redactionPatterns = [...DEFAULT_REDACTION_PATTERNS, ...this.config.redactionPatterns];
  }

  get serviceName(): string {
    return this.config.serviceName;
  }

  // ===========================================================================
  // Log Methods
  // ===========================================================================

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('DEBUG', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('INFO', message, data);
  }

  notice(message: string, data?: Record<string, unknown>): void {
    this.log('NOTICE', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('WARNING', message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log('ERROR', message, { ...data, ...this.formatError(error) });
  }

  critical(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log('CRITICAL', message, { ...data, ...this.formatError(error) });
  }

  // ===========================================================================
  // Lifecycle Logging
  // ===========================================================================

  /**
   * Log the start of a lifecycle phase
   */
  phaseStart(phase: 'setup' | 'play' | 'clean', data?: Record<string, unknown>): void {
    this.debug(`Stage ${phase} started`, {
      eventName: `stage.${phase}.start`,
      phase,
      ...data,
    });
  }

  /**
   * Log the end of a lifecycle phase
   */
  phaseEnd(
    phase: 'setup' | 'play' | 'clean',
    success: boolean,
    durationMs: number,
    data?: Record<string, unknown>
  ): void {
    const severity: Severity = success ? 'INFO' : 'ERROR';
    this.log(severity, `Stage ${phase} ${success ? 'completed' : 'failed'}`, {
      eventName: `stage.${phase}.${success ? 'success' : 'failure'}`,
      phase,
      durationMs,
      ...data,
    });
  }

  // ===========================================================================
  // Core Logging
  // ===========================================================================

  isEnabled(severity: Severity): boolean {
    return SEVERITY_ORDER[severity] >= SEVERITY_ORDER[this.config.minSeverity];
  }

  private log(severity: Severity, message: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled(severity)) {
      return;
    }

    const entry = this.buildLogEntry(severity, message, getCurrentContext(), data);
    this.output(severity, this.redact(this.serialize(entry)));
  }

  private buildLogEntry(
    severity: Severity,
    message: string,
    ctx: TelemetryContext | undefined,
    data?: Record<string, unknown>
  ): LogEntry {
    const entry: LogEntry = {
      severity,
      message,
      timestamp: new Date().toISOString(),
      service: this.config.serviceName,
      ...this.config.defaultFields,
    };

    if (ctx) {
      entry.traceId = ctx.traceId;
      entry.spanId = ctx.spanId;
      if (ctx.parentSpanId) entry.parentSpanId = ctx.parentSpanId;
      entry.source = ctx.source;
      if (ctx.stage) entry.stage = ctx.stage;
      if (ctx.player) entry.player = ctx.player;
      if (ctx.phase) entry.phase = ctx.phase;
    }

    if (data) {
      Object.assign(entry, data);
    }

    return entry;
  }

  private formatError(error: unknown): Pick<LogEntry, 'error'> {
    if (error === undefined || error === null) return {};

    if (error instanceof Error) {
      const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
      const cause = error.cause instanceof Error ? error.cause.message : undefined;
      return {
        error: {
          name: error.name,
          message: error.message,
          stack: error.stack,
          code,
          cause,
        },
      };
    }

    return {
      error: {
        name: 'NonError',
        message: String(error),
      },
    };
  }

  private serialize(entry: LogEntry): string {
    return this.config.prettyPrint
      ? JSON.stringify(entry, null, 2)
      : JSON.stringify(entry);
  }

  private redact(output: string): string {
    let redacted = output;
    for (const pattern of this.redactionPatterns) {
      redacted = redacted.replace(pattern, '[REDACTED]');
    }
    return redacted;
  }

  private output(severity: Severity, line: string): void {
    switch (severity) {
      case 'ERROR':
      case 'CRITICAL':
        console.error(line);
        break;
      case 'WARNING':
        console.warn(line);
        break;
      default:
        console.log(line);
    }
  }

  // ===========================================================================
  // Child Logger
  // ===========================================================================

  /**
   * Create a child logger with additional default fields
   */
  child(additionalFields: Record<string, unknown>): Logger {
    return new Logger({
      ...this.config,
      defaultFields: {
        ...this.config.defaultFields,
        ...additionalFields,
      },
    });
  }
}

export function createLogger(serviceName: string, config?: Partial<LoggerConfig>): Logger {
  return new Logger({
    ...config,
    serviceName,
  });
}

/**
 * Parse a severity name, accepting the common lowercase aliases
 */
export function parseSeverity(value: string | undefined): Severity | undefined {
  if (!value) return undefined;
  const upper = value.trim().toUpperCase();
  if (upper === 'WARN') return 'WARNING';
  return isSeverity(upper) ? upper : undefined;
}

function isSeverity(value: string): value is Severity {
  return Object.prototype.hasOwnProperty.call(SEVERITY_ORDER, value);
}
