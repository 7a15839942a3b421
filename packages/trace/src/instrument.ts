/**
 * Instrumentation wrappers
 *
 * Wrap a function so that each call becomes a child span of the ambient
 * node. Outside a trace the wrapped function runs untouched.
 */

import type { NodeType } from '@tracegraph/protocol';
import { getCurrentRuntime, getCurrentTrace } from './context.js';
import { Span } from './span.js';

export interface TracedOptions {
  /** Span name (defaults to the function's name) */
  name?: string;
  /** Defaults to 'custom' */
  nodeType?: NodeType;
  /** Record the call arguments as input */
  captureArgs?: boolean;
  /** Input keys for positional arguments (defaults to arg0, arg1, ...) */
  argNames?: string[];
  /** Record the return value as output */
  captureReturn?: boolean;
}

export function traced<This, A extends unknown[], R>(
  fn: (this: This, ...args: A) => R,
  options: TracedOptions = {}
): (this: This, ...args: A) => R {
  const label = spanName(fn, options);

  return function (this: This, ...args: A): R {
    const span = openSpan(label, options);
    if (!span) {
      return fn.apply(this, args);
    }
    return span.run(() => {
      recordArgs(span, args, options);
      const result = fn.apply(this, args);
      recordReturn(span, result, options);
      return result;
    });
  };
}

export function tracedAsync<This, A extends unknown[], R>(
  fn: (this: This, ...args: A) => Promise<R>,
  options: TracedOptions = {}
): (this: This, ...args: A) => Promise<R> {
  const label = spanName(fn, options);

  return function (this: This, ...args: A): Promise<R> {
    const span = openSpan(label, options);
    if (!span) {
      return fn.apply(this, args);
    }
    return span.runAsync(async () => {
      recordArgs(span, args, options);
      const result = await fn.apply(this, args);
      recordReturn(span, result, options);
      return result;
    });
  };
}

/**
 * Whether `fn` was declared with `async`
 */
export function isAsyncFunction(fn: Function): boolean {
  return fn.constructor.name === 'AsyncFunction';
}

function spanName(fn: Function, options: TracedOptions): string {
  return options.name ?? (fn.name || 'anonymous');
}

function openSpan(name: string, options: TracedOptions): Span | null {
  const trace = getCurrentTrace();
  if (!trace) return null;
  return new Span({
    trace,
    name,
    nodeType: options.nodeType,
    runtime: getCurrentRuntime() ?? undefined,
  });
}

function recordArgs(span: Span, args: unknown[], options: TracedOptions): void {
  if (!options.captureArgs) return;
  const names = options.argNames ?? [];
  const values: Record<string, unknown> = {};
  args.forEach((arg, index) => {
    values[names[index] ?? `arg${index}`] = arg;
  });
  span.input(values);
}

function recordReturn(span: Span, result: unknown, options: TracedOptions): void {
  if (!options.captureReturn) return;
  span.output(isPlainObject(result) ? result : { return_value: result });
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}
