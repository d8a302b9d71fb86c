/**
 * Telemetry Module
 *
 * - W3C Trace Context compatible correlation IDs
 * - AsyncLocalStorage-based context propagation
 * - Structured JSON logging with secret redaction
 *
 * @module @troupe/core/telemetry
 */

export {
  type TraceId,
  type SpanId,
  generateTraceId,
  generateSpanId,
  isValidTraceId,
  isValidSpanId,
} from './ids.js';

export {
  type TelemetrySource,
  type Severity,
  type TelemetryContext,
  type PartialTelemetryContext,
  getCurrentContext,
  runWithContext,
  runWithContextAsync,
  createContext,
  createChildContext,
  deriveContext,
} from './context.js';

export {
  type LoggerConfig,
  type LogEntry,
  SEVERITY_ORDER,
  Logger,
  createLogger,
  parseSeverity,
} from './logger.js';
