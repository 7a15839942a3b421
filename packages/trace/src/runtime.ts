/**
 * Per-tracer runtime shared by every span of its traces
 */

import { DataCapture } from './capture.js';
import { resolveConfig, type TracerConfig } from './config.js';
import { consoleDiagnosticSink, type DiagnosticSink } from './diagnostics.js';
import { HookDispatcher, type TracerHook } from './hooks.js';

export class TraceRuntime {
  readonly capture: DataCapture;
  readonly hooks: HookDispatcher;

  constructor(
    readonly config: TracerConfig,
    hooks: readonly TracerHook[],
    readonly report: DiagnosticSink
  ) {
    this.capture = new DataCapture(config);
    this.hooks = new HookDispatcher(hooks, report);
  }
}

let standaloneRuntime: TraceRuntime | null = null;

/**
 * Runtime for spans created outside any tracer: default config, no hooks,
 * diagnostics to the console
 */
export function getStandaloneRuntime(): TraceRuntime {
  if (!standaloneRuntime) {
    standaloneRuntime = new TraceRuntime(resolveConfig(), [], consoleDiagnosticSink);
  }
  return standaloneRuntime;
}
