/**
 * Trace Graph - Core Type Definitions
 *
 * The causal graph recorded for one agent run: nodes (execution steps)
 * joined by typed edges. Field names follow the wire format.
 */

// =============================================================================
// JSON Values
// =============================================================================

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = Record<string, JsonValue>;

// =============================================================================
// Enumerations
// =============================================================================

export const NODE_STATUSES = ['pending', 'running', 'completed', 'failed', 'cancelled'] as const;

export type NodeStatus = (typeof NODE_STATUSES)[number];

export const TERMINAL_STATUSES: ReadonlySet<NodeStatus> = new Set<NodeStatus>([
  'completed',
  'failed',
  'cancelled',
]);

export const EDGE_TYPES = [
  'caused_by',
  'data_flow',
  'branched_from',
  'retry_of',
  'fallback_of',
] as const;

export type EdgeType = (typeof EDGE_TYPES)[number];

/**
 * Well-known node types. `node_type` stays free-form; these are the labels
 * the renderers and examples use.
 */
export type KnownNodeType =
  | 'trace'
  | 'llm_call'
  | 'tool_call'
  | 'decision'
  | 'retrieval'
  | 'transformation'
  | 'validation'
  | 'human_input'
  | 'sub_agent'
  | 'custom';

/**
 * A known node type or any other label
 */
export type NodeType = KnownNodeType | (string & {});

// =============================================================================
// Node
// =============================================================================

export interface Node {
  /** Unique node ID (UUIDv7) */
  id: string;
  /** Construction order within the trace */
  sequence_number: number;
  name: string;
  node_type: string;
  status: NodeStatus;
  /** Back-reference to the parent node in the same trace */
  parent_id: string | null;
  depth: number;
  /** ISO 8601 */
  start_time: string | null;
  /** ISO 8601 */
  end_time: string | null;
  input_data: JsonObject;
  output_data: JsonObject;
  /** Append-only */
  annotations: string[];
  metadata: JsonObject;
  error: string | null;
  error_type: string | null;
  error_traceback: string | null;
}

export interface NodeInit {
  id?: string;
  sequence_number: number;
  name: string;
  node_type?: string;
  status?: NodeStatus;
  parent_id?: string | null;
  depth?: number;
  start_time?: string | null;
  end_time?: string | null;
  input_data?: JsonObject;
  output_data?: JsonObject;
  annotations?: string[];
  metadata?: JsonObject;
  error?: string | null;
  error_type?: string | null;
  error_traceback?: string | null;
}

// =============================================================================
// Edge
// =============================================================================

export interface Edge {
  source_id: string;
  target_id: string;
  edge_type: EdgeType;
  label: string;
  metadata: JsonObject;
}

export interface EdgeInit {
  source_id: string;
  target_id: string;
  edge_type?: EdgeType;
  label?: string;
  metadata?: JsonObject;
}

// =============================================================================
// Wire Format
// =============================================================================

export interface NodeWire extends Node {
  duration_ms: number | null;
}

export interface TraceGraphWire {
  schema_version: string;
  trace_id: string;
  name: string;
  nodes: Record<string, NodeWire>;
  edges: Edge[];
  start_time: string | null;
  end_time: string | null;
  metadata: JsonObject;
  duration_ms: number | null;
}
