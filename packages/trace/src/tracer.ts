/**
 * Tracer
 *
 * Owns a frozen configuration, a storage collaborator and the hooks. Each
 * `trace()` call opens a TraceScope whose root span parents everything
 * created inside it.
 *
 * Tracing never interrupts host code: storage, hook and bookkeeping
 * failures are emitted as 'diagnostic' events. Configuration errors are
 * thrown at construction.
 */

import { EventEmitter } from 'events';
import { TraceGraph, getTimestamp, type JsonObject } from '@tracegraph/protocol';
import { MemoryStore, type TraceStorage } from '@tracegraph/storage';
import { runWithContext } from './context.js';
import { resolveConfig, type TracerConfig, type TracerConfigInput } from './config.js';
import { consoleDiagnosticSink, type Diagnostic } from './diagnostics.js';
import type { TracerHook } from './hooks.js';
import { isAsyncFunction, traced, tracedAsync } from './instrument.js';
import { TraceRuntime } from './runtime.js';
import { Span } from './span.js';

export interface TracerOptions extends TracerConfigInput {
  /** Where finished traces are saved (default: a new MemoryStore) */
  storage?: TraceStorage;
  hooks?: TracerHook[];
}

export class Tracer extends EventEmitter {
  readonly config: TracerConfig;
  readonly storage: TraceStorage;
  private readonly runtime: TraceRuntime;

  constructor(options: TracerOptions = {}) {
    super();
    this.config = resolveConfig(options);
    this.storage = options.storage ?? new MemoryStore();
    this.runtime = new TraceRuntime(this.config, options.hooks ?? [], diagnostic =>
      this.report(diagnostic)
    );
  }

  /**
   * Open a new trace. Nothing is recorded until `scope.run(fn)`.
   */
  trace(name: string, metadata: JsonObject = {}): TraceScope {
    return new TraceScope(name, metadata, this.runtime, this.storage);
  }

  /**
   * Wrap the methods of `target` named in `autoInstrument` so that each
   * call inside a trace becomes a span. Mutates and returns `target`.
   */
  instrument<T extends object>(target: T): T {
    for (const name of this.config.autoInstrument) {
      const method: unknown = Reflect.get(target, name);
      if (typeof method !== 'function') continue;

      const wrapped = isAsyncFunction(method)
        ? tracedAsync(
            function (this: unknown, ...args: unknown[]): Promise<unknown> {
              return Promise.resolve(Reflect.apply(method, this, args));
            },
            { name }
          )
        : traced(
            function (this: unknown, ...args: unknown[]): unknown {
              return Reflect.apply(method, this, args);
            },
            { name }
          );
      Reflect.set(target, name, wrapped);
    }
    return target;
  }

  private report(diagnostic: Diagnostic): void {
    if (this.listenerCount('diagnostic') === 0) {
      consoleDiagnosticSink(diagnostic);
      return;
    }
    try {
      this.emit('diagnostic', diagnostic);
    } catch (error) {
      console.error('[tracegraph] diagnostic listener failed:', error);
    }
  }
}

/**
 * One trace: its graph, root span and finalization
 */
export class TraceScope {
  readonly graph: TraceGraph;
  readonly root: Span;
  private readonly runtime: TraceRuntime;
  private readonly storage: TraceStorage;

  private finalized = false;

  constructor(name: string, metadata: JsonObject, runtime: TraceRuntime, storage: TraceStorage) {
    this.runtime = runtime;
    this.storage = storage;
    this.graph = new TraceGraph({ name, metadata: { ...metadata }, start_time: getTimestamp() });
    this.root = new Span({ trace: this.graph, name, nodeType: 'trace', parent: null, runtime });
  }

  get traceId(): string {
    return this.graph.trace_id;
  }

  /**
   * Run `fn` inside the trace with the root span as the ambient node. The
   * trace is finalized before the returned promise settles; an error from
   * `fn` is recorded on the root node and re-thrown after finalization.
   */
  async run<T>(fn: (root: Span) => T | Promise<T>): Promise<T> {
    let result: T;
    try {
      result = await runWithContext({ trace: this.graph, node: null, runtime: this.runtime }, () =>
        this.root.runAsync(async root => fn(root))
      );
    } catch (error) {
      await this.finalize();
      throw error;
    }
    await this.finalize();
    return result;
  }

  private async finalize(): Promise<void> {
    if (this.finalized) return;
    this.finalized = true;

    this.graph.end_time = getTimestamp();
    try {
      await this.storage.save(this.graph);
    } catch (error) {
      this.runtime.report({
        code: 'storage_save_failed',
        message: `Failed to save trace ${this.graph.trace_id}; it remains available in memory`,
        traceId: this.graph.trace_id,
        error,
      });
    }
    this.runtime.hooks.dispatchTrace(this.graph);
  }
}
