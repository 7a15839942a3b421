/**
 * Span
 *
 * Active handle for one node. Drives the node through its lifecycle:
 *
 *   pending -> running -> completed | failed
 *   pending | running -> cancelled   (explicit setStatus)
 *
 * A span is scoped by a callback: `run(fn)` for synchronous work,
 * `runAsync(fn)` for work that awaits. The node is the ambient current node
 * for everything the callback starts, including async work, and for nothing
 * outside it, so concurrent children launched inside it each see their own
 * parent. A span runs once: running it again reports a diagnostic and only
 * invokes the callback.
 */

import type { Edge, EdgeType, JsonObject, Node, NodeStatus, NodeType, TraceGraph } from '@tracegraph/protocol';
import { createEdge, createNode, getTimestamp, isTerminalStatus } from '@tracegraph/protocol';
import { getContextFrame, runWithContext, type ContextFrame } from './context.js';
import { getStandaloneRuntime, type TraceRuntime } from './runtime.js';

export interface SpanOptions {
  trace: TraceGraph;
  name: string;
  /** Defaults to 'custom' */
  nodeType?: NodeType;
  /**
   * Parent node. When omitted the ambient node is used, provided it belongs
   * to the same trace; `null` makes a root node.
   */
  parent?: Node | null;
  runtime?: TraceRuntime;
}

export interface LinkOptions {
  label?: string;
  metadata?: JsonObject;
}

const ALLOWED_TRANSITIONS: Record<NodeStatus, readonly NodeStatus[]> = {
  pending: ['running', 'cancelled'],
  running: ['completed', 'failed', 'cancelled'],
  completed: [],
  failed: [],
  cancelled: [],
};

export class Span {
  readonly trace: TraceGraph;
  private readonly record: Node;
  private readonly runtime: TraceRuntime;

  private entered = false;

  constructor(options: SpanOptions) {
    const frame = getContextFrame();
    const sameTrace = frame.trace === options.trace;

    let parent: Node | null;
    if (options.parent === undefined) {
      parent = sameTrace && frame.node && options.trace.nodes.has(frame.node.id) ? frame.node : null;
    } else {
      parent = options.parent;
    }

    this.trace = options.trace;
    this.runtime =
      options.runtime ?? (sameTrace ? frame.runtime : null) ?? getStandaloneRuntime();
    this.record = createNode({
      sequence_number: options.trace.nextSequenceNumber(),
      name: options.name,
      node_type: options.nodeType,
      parent_id: parent ? parent.id : null,
      depth: parent ? parent.depth + 1 : 0,
    });
  }

  /**
   * The node this span records into
   */
  getNode(): Node {
    return this.record;
  }

  get id(): string {
    return this.record.id;
  }

  get name(): string {
    return this.record.name;
  }

  get status(): NodeStatus {
    return this.record.status;
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Run a synchronous callback inside the span
   */
  run<T>(fn: (span: this) => T): T {
    if (!this.begin()) {
      return runWithContext(this.frame(), () => fn(this));
    }
    let result: T;
    try {
      result = runWithContext(this.frame(), () => fn(this));
    } catch (error) {
      this.finish(true, error);
      throw error;
    }
    this.finish(false, undefined);
    return result;
  }

  /**
   * Run an asynchronous callback inside the span. Awaits inside the callback
   * keep the span as the ambient node; the caller's context is untouched.
   */
  async runAsync<T>(fn: (span: this) => Promise<T>): Promise<T> {
    if (!this.begin()) {
      return runWithContext(this.frame(), () => fn(this));
    }
    let result: T;
    try {
      result = await runWithContext(this.frame(), () => fn(this));
    } catch (error) {
      this.finish(true, error);
      throw error;
    }
    this.finish(false, undefined);
    return result;
  }

  private frame(): ContextFrame {
    return { trace: this.trace, node: this.record, runtime: this.runtime };
  }

  /**
   * Enter the node into the graph. Returns false if the span already ran.
   */
  private begin(): boolean {
    if (this.entered) {
      this.runtime.report({
        code: 'bookkeeping_failed',
        message: `Span '${this.record.name}' was already started`,
        traceId: this.trace.trace_id,
      });
      return false;
    }
    this.entered = true;

    if (this.record.status === 'pending') {
      this.record.status = 'running';
    }
    this.record.start_time = getTimestamp();
    this.trace.addNode(this.record);

    if (this.record.parent_id !== null) {
      try {
        this.trace.addEdge(createEdge({ source_id: this.record.parent_id, target_id: this.record.id }));
      } catch (error) {
        this.runtime.report({
          code: 'bookkeeping_failed',
          message: `Could not link node '${this.record.name}' to its parent`,
          traceId: this.trace.trace_id,
          error,
        });
      }
    }

    this.runtime.hooks.dispatchNode('onNodeStarted', this.record, this.trace.trace_id);
    return true;
  }

  private finish(hasError: boolean, error: unknown): void {
    if (hasError) {
      this.markFailed(error);
    } else if (this.record.status === 'running') {
      this.record.status = 'completed';
    }
    this.record.end_time = getTimestamp();

    const event = this.record.status === 'failed' ? 'onNodeFailed' : 'onNodeCompleted';
    this.runtime.hooks.dispatchNode(event, this.record, this.trace.trace_id);
  }

  private markFailed(error: unknown): void {
    if (!isTerminalStatus(this.record.status)) {
      this.record.status = 'failed';
    }
    if (this.record.status !== 'failed') return;

    if (error instanceof Error) {
      this.record.error = error.message;
      this.record.error_type = error.constructor.name;
      this.record.error_traceback =
        this.runtime.capture.recordsTraceback && error.stack !== undefined ? error.stack : null;
    } else {
      this.record.error = String(error);
      this.record.error_type = typeof error;
      this.record.error_traceback = null;
    }
  }

  // ===========================================================================
  // Status
  // ===========================================================================

  /**
   * Request a status change. Transitions outside the lifecycle are rejected
   * with a diagnostic and leave the status unchanged.
   */
  setStatus(status: NodeStatus): this {
    const current = this.record.status;
    if (current === status) return this;

    if (ALLOWED_TRANSITIONS[current].includes(status)) {
      this.record.status = status;
    } else {
      this.runtime.report({
        code: 'status_transition_rejected',
        message: `Rejected status change ${current} -> ${status} for node '${this.record.name}'`,
        traceId: this.trace.trace_id,
      });
    }
    return this;
  }

  /**
   * Mark the span failed and capture `error` without throwing
   */
  recordError(error: unknown): this {
    this.markFailed(error);
    return this;
  }

  // ===========================================================================
  // Data
  // ===========================================================================

  input(values: Record<string, unknown>): this {
    Object.assign(this.record.input_data, this.runtime.capture.capture('input', values));
    return this;
  }

  output(values: Record<string, unknown>): this {
    Object.assign(this.record.output_data, this.runtime.capture.capture('output', values));
    return this;
  }

  metadata(values: Record<string, unknown>): this {
    Object.assign(this.record.metadata, this.runtime.capture.capture('metadata', values));
    return this;
  }

  annotate(message: string): this {
    this.record.annotations.push(this.runtime.capture.annotation(message));
    return this;
  }

  // ===========================================================================
  // Edges and children
  // ===========================================================================

  /**
   * Add an explicit edge from this span's node to `target`. Both nodes must
   * already be entered.
   *
   * @throws GraphIntegrityError if either node is not in the graph
   */
  link(target: Span | Node, edgeType: EdgeType = 'caused_by', options: LinkOptions = {}): Edge {
    const edge = createEdge({
      source_id: this.record.id,
      target_id: target.id,
      edge_type: edgeType,
      label: options.label,
      metadata: options.metadata,
    });
    this.trace.addEdge(edge);
    return edge;
  }

  /**
   * Construct a child span parented to this one
   */
  node(name: string, nodeType: NodeType = 'custom'): Span {
    return new Span({ trace: this.trace, name, nodeType, parent: this.record, runtime: this.runtime });
  }
}
