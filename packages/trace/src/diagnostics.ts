/**
 * Diagnostics
 *
 * Tracing-infrastructure failures never reach host code. They are reported
 * as diagnostics instead.
 */

export type DiagnosticCode =
  | 'storage_save_failed'
  | 'hook_failed'
  | 'bookkeeping_failed'
  | 'status_transition_rejected';

export interface Diagnostic {
  code: DiagnosticCode;
  message: string;
  /** Trace the diagnostic belongs to, if any */
  traceId?: string;
  /** Underlying error */
  error?: unknown;
}

export type DiagnosticSink = (diagnostic: Diagnostic) => void;

/**
 * Default sink: write to stderr
 */
export const consoleDiagnosticSink: DiagnosticSink = diagnostic => {
  const detail = diagnostic.error instanceof Error ? `: ${diagnostic.error.message}` : '';
  console.warn(`[tracegraph] ${diagnostic.message}${detail}`);
};
