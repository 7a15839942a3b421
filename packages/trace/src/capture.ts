/**
 * Data capture
 *
 * Every value recorded on a span passes through: sanitize (non-JSON values
 * become tagged strings) -> redact -> truncate (top-level strings only).
 */

import { inspect } from 'util';
import type { JsonObject, JsonValue } from '@tracegraph/protocol';
import type { TracerConfig } from './config.js';
import { createRedactionEngine, type RedactionEngine } from './redaction.js';

export const NON_SERIALIZABLE_TAG = '[NON-SERIALIZABLE]';

export type CaptureTarget = 'input' | 'output' | 'metadata';

/**
 * Convert a value to JSON, or fall back to its inspected text tagged
 * `[NON-SERIALIZABLE]`. Representable values are copied, never aliased.
 */
export function safeValue(value: unknown): JsonValue {
  const converted = toJsonValue(value, new Set());
  if (converted !== undefined) {
    return converted;
  }
  return `${inspect(value, { depth: 2, breakLength: Infinity })} ${NON_SERIALIZABLE_TAG}`;
}

/**
 * Truncate strings longer than `limit`, recording the original length
 */
export function truncateIfNeeded(value: JsonValue, limit: number | null): JsonValue {
  if (limit === null || limit <= 0 || typeof value !== 'string' || value.length <= limit) {
    return value;
  }
  return `${value.slice(0, limit)}... [TRUNCATED: original_size=${value.length}]`;
}

function toJsonValue(value: unknown, seen: Set<object>): JsonValue | undefined {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value !== 'object') {
    // undefined, bigint, symbol, function
    return undefined;
  }
  if (seen.has(value)) {
    return undefined;
  }

  seen.add(value);
  try {
    if (Array.isArray(value)) {
      const items: JsonValue[] = [];
      for (const item of value) {
        const converted = toJsonValue(item, seen);
        if (converted === undefined) return undefined;
        items.push(converted);
      }
      return items;
    }

    const prototype: unknown = Object.getPrototypeOf(value);
    if (prototype !== Object.prototype && prototype !== null) {
      return undefined;
    }

    const result: JsonObject = {};
    for (const [key, entry] of Object.entries(value)) {
      const converted = toJsonValue(entry, seen);
      if (converted === undefined) return undefined;
      result[key] = converted;
    }
    return result;
  } finally {
    seen.delete(value);
  }
}

/**
 * Applies a tracer configuration to captured values
 */
export class DataCapture {
  private readonly redaction: RedactionEngine;

  constructor(private readonly config: TracerConfig) {
    this.redaction = createRedactionEngine(config.redactPatterns, config.redactFields);
  }

  /** Whether error stack traces are recorded */
  get recordsTraceback(): boolean {
    return this.config.captureLevel === 'full';
  }

  /**
   * Process values for one of the node maps. Returns an empty record when
   * the capture level records no values.
   */
  capture(target: CaptureTarget, values: Record<string, unknown>): JsonObject {
    if (this.config.captureLevel === 'minimal') {
      return {};
    }

    const limit =
      target === 'input'
        ? this.config.maxInputSize
        : target === 'output'
          ? this.config.maxOutputSize
          : null;
    const redacting = this.redaction.isActive();

    const result: JsonObject = {};
    for (const [key, value] of Object.entries(values)) {
      let captured = safeValue(value);
      if (redacting) {
        captured = this.redaction.redactValue(captured, key);
      }
      result[key] = truncateIfNeeded(captured, limit);
    }
    return result;
  }

  /**
   * Annotations go through redaction only
   */
  annotation(message: string): string {
    return this.redaction.isActive() ? this.redaction.redactString(message) : message;
  }
}
