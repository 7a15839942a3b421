/**
 * Error taxonomy
 *
 * Configuration errors are fatal at construction time. Load errors come from
 * the serializer. Storage errors are raised by stores and downgraded to
 * diagnostics by the tracer.
 */

export abstract class TraceGraphError extends Error {
  /** Stable error code for programmatic handling */
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = this.constructor.name;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Message including the cause chain
   */
  getFullMessage(): string {
    const messages = [this.message];
    let current: unknown = this.cause;

    while (current instanceof Error) {
      messages.push(`  Caused by: ${current.message}`);
      current = current.cause;
    }

    return messages.join('\n');
  }
}

/**
 * Invalid tracer settings or an unusable storage target
 */
export class ConfigurationError extends TraceGraphError {
  readonly code = 'CONFIGURATION_ERROR';
}

/**
 * An edge names a node that is not in the graph
 */
export class GraphIntegrityError extends TraceGraphError {
  readonly code = 'GRAPH_INTEGRITY_ERROR';
}

/**
 * Malformed or structurally invalid serialized trace
 */
export class TraceLoadError extends TraceGraphError {
  readonly code = 'TRACE_LOAD_ERROR';
}

export class StorageError extends TraceGraphError {
  readonly code = 'STORAGE_ERROR';

  constructor(
    message: string,
    readonly traceId?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * An ambient-context restore token was used twice
 */
export class ContextTokenError extends TraceGraphError {
  readonly code = 'CONTEXT_TOKEN_ERROR';
}
