/**
 * Process-wide default tracer
 *
 * Convenience layer for programs that want one tracer without wiring it
 * through their code.
 */

import type { JsonObject } from '@tracegraph/protocol';
import { createStorage, type StorageSpec } from '@tracegraph/storage';
import type { TracerConfigInput } from './config.js';
import type { TracerHook } from './hooks.js';
import { Tracer, type TraceScope } from './tracer.js';

export interface ConfigureOptions extends TracerConfigInput {
  /** A store, 'memory', 'file://<dir>' or 'sqlite://<path>' */
  storage?: StorageSpec | string;
  hooks?: TracerHook[];
}

let defaultTracer: Tracer | null = null;

/**
 * Replace the default tracer
 *
 * @throws ConfigurationError on invalid settings or an unusable storage target
 */
export function configure(options: ConfigureOptions = {}): Tracer {
  const { storage, hooks, ...config } = options;
  defaultTracer = new Tracer({ ...config, storage: createStorage(storage), hooks });
  return defaultTracer;
}

/**
 * The default tracer, created with default settings on first use
 */
export function getDefaultTracer(): Tracer {
  if (!defaultTracer) {
    defaultTracer = new Tracer();
  }
  return defaultTracer;
}

export function resetDefaultTracer(): void {
  defaultTracer = null;
}

/**
 * Open a trace on the default tracer
 */
export function trace(name: string, metadata: JsonObject = {}): TraceScope {
  return getDefaultTracer().trace(name, metadata);
}
