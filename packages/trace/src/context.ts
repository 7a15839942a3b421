/**
 * Ambient Context
 *
 * Tracks the current trace and node for the running async execution, using
 * AsyncLocalStorage over immutable frames. A frame is never mutated: every
 * push installs a new one, so a snapshot taken for a concurrent branch is an
 * independent copy.
 *
 * Push and reset change the frame of the current synchronous execution.
 * A reset must run in the frame its push installed, so pairs nest strictly
 * and cannot straddle an `await`; use `runWithContext` for scopes that
 * suspend.
 */

import { AsyncLocalStorage, executionAsyncId } from 'async_hooks';
import { ContextTokenError } from '@tracegraph/protocol';
import type { Node, TraceGraph } from '@tracegraph/protocol';
import type { TraceRuntime } from './runtime.js';

export interface ContextFrame {
  readonly trace: TraceGraph | null;
  readonly node: Node | null;
  /** Config, hooks and diagnostics of the tracer that owns `trace` */
  readonly runtime: TraceRuntime | null;
}

/**
 * Opaque restore token returned by the push functions
 */
export interface ContextToken {
  readonly kind: 'trace' | 'node';
  readonly previous: ContextFrame;
  /** Frame installed by the push */
  readonly installed: ContextFrame;
  /** Execution the push ran in */
  readonly executionId: number;
  used: boolean;
}

const EMPTY_FRAME: ContextFrame = Object.freeze({ trace: null, node: null, runtime: null });

const storage = new AsyncLocalStorage<ContextFrame>();

function currentFrame(): ContextFrame {
  return storage.getStore() ?? EMPTY_FRAME;
}

export function getCurrentTrace(): TraceGraph | null {
  return currentFrame().trace;
}

export function getCurrentNode(): Node | null {
  return currentFrame().node;
}

export function getCurrentRuntime(): TraceRuntime | null {
  return currentFrame().runtime;
}

export function getContextFrame(): ContextFrame {
  return currentFrame();
}

/**
 * Install `trace` as the current trace for the rest of this synchronous
 * execution. Pair with exactly one `resetCurrentTrace(token)`.
 */
export function pushCurrentTrace(trace: TraceGraph, runtime: TraceRuntime | null = null): ContextToken {
  const previous = currentFrame();
  const installed = Object.freeze({ ...previous, trace, runtime });
  storage.enterWith(installed);
  return { kind: 'trace', previous, installed, executionId: executionAsyncId(), used: false };
}

/**
 * Install `node` as the current node for the rest of this synchronous
 * execution. Pair with exactly one `resetCurrentNode(token)`.
 */
export function pushCurrentNode(node: Node | null): ContextToken {
  const previous = currentFrame();
  const installed = Object.freeze({ ...previous, node });
  storage.enterWith(installed);
  return { kind: 'node', previous, installed, executionId: executionAsyncId(), used: false };
}

/**
 * @throws ContextTokenError for a reused or mismatched token, or a reset
 *   outside the frame the push installed
 */
export function resetCurrentTrace(token: ContextToken): void {
  restore(token, 'trace');
}

export function resetCurrentNode(token: ContextToken): void {
  restore(token, 'node');
}

function restore(token: ContextToken, kind: ContextToken['kind']): void {
  if (token.kind !== kind) {
    throw new ContextTokenError(`Expected a ${kind} token, got a ${token.kind} token`);
  }
  if (token.used) {
    throw new ContextTokenError(`Context ${kind} token has already been used`);
  }
  if (executionAsyncId() !== token.executionId) {
    throw new ContextTokenError(
      `Context ${kind} token reset in a different execution than its push; push and reset must not straddle an await`
    );
  }
  if (currentFrame() !== token.installed) {
    throw new ContextTokenError(`Context ${kind} token reset out of order`);
  }
  token.used = true;
  storage.enterWith(token.previous);
}

/**
 * Run `fn` with `overrides` applied to the current frame. The frame is
 * visible to everything `fn` starts, including async work, and to nothing
 * outside it.
 */
export function runWithContext<T>(overrides: Partial<ContextFrame>, fn: () => T): T {
  return storage.run(Object.freeze({ ...currentFrame(), ...overrides }), fn);
}

/**
 * Bind `fn` to a copy of the current frame. Later pushes on either side do
 * not leak across.
 */
export function forkContext<A extends unknown[], R>(fn: (...args: A) => R): (...args: A) => R {
  const snapshot = currentFrame();
  return (...args: A) => storage.run(snapshot, () => fn(...args));
}

/**
 * Drop the current trace and node for the rest of this execution
 */
export function clearContext(): void {
  storage.enterWith(EMPTY_FRAME);
}
