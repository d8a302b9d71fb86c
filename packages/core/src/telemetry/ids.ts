/**
 * Telemetry ID Generation
 *
 * W3C Trace Context compatible identifiers:
 * - Trace ID: 32 hex characters (128-bit), one per stage run
 * - Span ID: 16 hex characters (64-bit), one per stage or player
 *
 * @module @troupe/core/telemetry/ids
 */

import { randomBytes } from 'node:crypto';

// =============================================================================
// Branded Types
// =============================================================================

/**
 * W3C Trace Context trace ID (32 hex characters)
 */
export type TraceId = string & { readonly __brand: 'TraceId' };

/**
 * W3C Trace Context span ID (16 hex characters)
 */
export type SpanId = string & { readonly __brand: 'SpanId' };

// =============================================================================
// Validation
// =============================================================================

export function isValidTraceId(id: string): id is TraceId {
  return /^[0-9a-f]{32}$/.test(id);
}

export function isValidSpanId(id: string): id is SpanId {
  return /^[0-9a-f]{16}$/.test(id);
}

// =============================================================================
// Generation
// =============================================================================

/**
 * Generate a trace ID (128-bit, 32 lowercase hex chars)
 */
export function generateTraceId(): TraceId {
  const id = randomBytes(16).toString('hex');
  if (!isValidTraceId(id)) {
    throw new Error(`Generated malformed trace ID: ${id}`);
  }
  return id;
}

/**
 * Generate a span ID (64-bit, 16 lowercase hex chars)
 */
export function generateSpanId(): SpanId {
  const id = randomBytes(8).toString('hex');
  if (!isValidSpanId(id)) {
    throw new Error(`Generated malformed span ID: ${id}`);
  }
  return id;
}
