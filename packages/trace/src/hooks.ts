/**
 * Hook Dispatcher
 *
 * Fires span and trace lifecycle events to observers. A failing observer is
 * reported as a `hook_failed` diagnostic and never stops dispatch to the
 * others.
 */

import type { Node, TraceGraph } from '@tracegraph/protocol';
import type { DiagnosticSink } from './diagnostics.js';

type HookResult = void | Promise<void>;

/**
 * Lifecycle observer. Every callback is optional.
 */
export interface TracerHook {
  onNodeStarted?(node: Node, traceId: string): HookResult;
  onNodeCompleted?(node: Node, traceId: string): HookResult;
  onNodeFailed?(node: Node, traceId: string): HookResult;
  onTraceCompleted?(trace: TraceGraph): HookResult;
}

export type NodeEvent = 'onNodeStarted' | 'onNodeCompleted' | 'onNodeFailed';

/**
 * Hook that observes nothing
 */
export class NullHook implements TracerHook {
  onNodeStarted(): void {}
  onNodeCompleted(): void {}
  onNodeFailed(): void {}
  onTraceCompleted(): void {}
}

export class HookDispatcher {
  private readonly hooks: readonly TracerHook[];
  private readonly report: DiagnosticSink;

  constructor(hooks: readonly TracerHook[], report: DiagnosticSink) {
    this.hooks = [...hooks];
    this.report = report;
  }

  get size(): number {
    return this.hooks.length;
  }

  dispatchNode(event: NodeEvent, node: Node, traceId: string): void {
    for (const hook of this.hooks) {
      const callback = hook[event];
      if (!callback) continue;
      this.invoke(`${event} hook failed for node '${node.name}'`, traceId, () =>
        callback.call(hook, node, traceId)
      );
    }
  }

  dispatchTrace(trace: TraceGraph): void {
    for (const hook of this.hooks) {
      const callback = hook.onTraceCompleted;
      if (!callback) continue;
      this.invoke(`onTraceCompleted hook failed for trace '${trace.name}'`, trace.trace_id, () =>
        callback.call(hook, trace)
      );
    }
  }

  private invoke(message: string, traceId: string, call: () => HookResult): void {
    let result: HookResult;
    try {
      result = call();
    } catch (error) {
      this.report({ code: 'hook_failed', message, traceId, error });
      return;
    }

    if (result instanceof Promise) {
      result.catch((error: unknown) => {
        this.report({ code: 'hook_failed', message, traceId, error });
      });
    }
  }
}
