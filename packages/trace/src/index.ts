/**
 * tracegraph Trace Package
 *
 * Span lifecycle engine: ambient context, spans, tracers, hooks and
 * instrumentation.
 */

// Tracer
export { Tracer, TraceScope, type TracerOptions } from './tracer.js';
export { Span, type SpanOptions, type LinkOptions } from './span.js';

// Default tracer
export {
  configure,
  trace,
  getDefaultTracer,
  resetDefaultTracer,
  type ConfigureOptions,
} from './default.js';

// Ambient context
export {
  getCurrentTrace,
  getCurrentNode,
  getCurrentRuntime,
  pushCurrentTrace,
  pushCurrentNode,
  resetCurrentTrace,
  resetCurrentNode,
  runWithContext,
  forkContext,
  clearContext,
  type ContextFrame,
  type ContextToken,
} from './context.js';

// Hooks
export { HookDispatcher, NullHook, type TracerHook, type NodeEvent } from './hooks.js';

// Instrumentation
export { traced, tracedAsync, isAsyncFunction, type TracedOptions } from './instrument.js';

// Configuration and capture
export {
  resolveConfig,
  CAPTURE_LEVELS,
  type CaptureLevel,
  type TracerConfig,
  type TracerConfigInput,
} from './config.js';
export { DataCapture, safeValue, truncateIfNeeded, NON_SERIALIZABLE_TAG } from './capture.js';
export {
  RedactionEngine,
  createRedactionEngine,
  redact,
  BUILT_IN_PATTERN_NAMES,
  type RedactionConfig,
  type RedactionPattern,
  type BuiltInPatternName,
} from './redaction.js';

// Diagnostics
export {
  consoleDiagnosticSink,
  type Diagnostic,
  type DiagnosticCode,
  type DiagnosticSink,
} from './diagnostics.js';
export { TraceRuntime } from './runtime.js';

// Replay
export { replayGraph, collectEvents, type ReplayEvent, type ReplayOptions } from './replay.js';
