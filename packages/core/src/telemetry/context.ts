/**
 * Telemetry Context
 *
 * The correlation context that flows through a stage run. Every player's
 * `play` executes inside a child context carrying the stage and player
 * names, so log lines emitted from worker code can be attributed without
 * the worker knowing where it was registered.
 *
 * @module @troupe/core/telemetry/context
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { generateTraceId, generateSpanId, type TraceId, type SpanId } from './ids.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Which side of the lifecycle emitted the telemetry
 */
export type TelemetrySource = 'stage' | 'player';

/**
 * Severity levels (Cloud Logging names)
 */
export type Severity = 'DEBUG' | 'INFO' | 'NOTICE' | 'WARNING' | 'ERROR' | 'CRITICAL';

export interface TelemetryContext {
  // === Tracing ===
  traceId: TraceId;
  spanId: SpanId;
  parentSpanId?: SpanId;

  // === Lifecycle ===
  /** Name of the stage driving the current phase */
  stage?: string;
  /** Name the current player was registered under */
  player?: string;
  /** Lifecycle phase being executed */
  phase?: 'setup' | 'play' | 'clean';

  // === Source ===
  source: TelemetrySource;
}

export type PartialTelemetryContext = Partial<TelemetryContext>;

// =============================================================================
// Async Local Storage
// =============================================================================

const telemetryStorage = new AsyncLocalStorage<TelemetryContext>();

/**
 * Get the current telemetry context from async local storage
 */
export function getCurrentContext(): TelemetryContext | undefined {
  return telemetryStorage.getStore();
}

export function runWithContext<T>(ctx: TelemetryContext, fn: () => T): T {
  return telemetryStorage.run(ctx, fn);
}

export async function runWithContextAsync<T>(ctx: TelemetryContext, fn: () => Promise<T>): Promise<T> {
  return telemetryStorage.run(ctx, fn);
}

// =============================================================================
// Context Creation
// =============================================================================

/**
 * Create a new root telemetry context (new trace)
 */
export function createContext(
  source: TelemetrySource,
  overrides?: PartialTelemetryContext
): TelemetryContext {
  return {
    traceId: generateTraceId(),
    spanId: generateSpanId(),
    source,
    ...overrides,
  };
}

/**
 * Create a child context (new span under same trace)
 */
export function createChildContext(
  parent: TelemetryContext,
  overrides?: PartialTelemetryContext
): TelemetryContext {
  return {
    ...parent,
    spanId: generateSpanId(),
    parentSpanId: parent.spanId,
    ...overrides,
  };
}

/**
 * Derive a context for a nested unit of work: a child of the current context
 * when one exists, otherwise a fresh root.
 */
export function deriveContext(
  source: TelemetrySource,
  overrides?: PartialTelemetryContext
): TelemetryContext {
  const current = getCurrentContext();
  return current
    ? createChildContext(current, { source, ...overrides })
    : createContext(source, overrides);
}
