/**
 * JSON serialization for trace graphs
 *
 * Parsing is tolerant: unknown fields are ignored and missing optional
 * fields take their defaults. Wrongly typed or missing required fields and
 * dangling edges fail with a TraceLoadError.
 */

import { TraceLoadError } from '../errors.js';
import { CURRENT_SCHEMA_VERSION, TraceGraph } from './graph.js';
import type {
  Edge,
  JsonObject,
  JsonValue,
  Node,
  NodeWire,
  TraceGraphWire,
} from './types.js';
import { createEdge, createNode, isEdgeType, isNodeStatus, nodeDurationMs } from './utils.js';

export interface SerializeOptions {
  /** Indentation; 0 for compact output */
  indent?: number;
}

export interface DeserializeOptions {
  /** Reject payloads whose schema_version differs from the current one */
  strictVersion?: boolean;
  /** Receives non-fatal load warnings (defaults to console.warn) */
  onWarning?: (message: string) => void;
}

// =============================================================================
// Serialize
// =============================================================================

export function toWire(graph: TraceGraph): TraceGraphWire {
  const nodes: Record<string, NodeWire> = {};
  for (const [id, node] of graph.nodes) {
    nodes[id] = { ...node, duration_ms: nodeDurationMs(node) };
  }

  return {
    schema_version: graph.schema_version,
    trace_id: graph.trace_id,
    name: graph.name,
    nodes,
    edges: graph.edges.map(edge => ({ ...edge })),
    start_time: graph.start_time,
    end_time: graph.end_time,
    metadata: graph.metadata,
    duration_ms: graph.duration_ms,
  };
}

export function traceToJson(graph: TraceGraph, options: SerializeOptions = {}): string {
  const indent = options.indent ?? 2;
  return JSON.stringify(toWire(graph), null, indent > 0 ? indent : undefined);
}

// =============================================================================
// Deserialize
// =============================================================================

export function traceFromJson(payload: string, options: DeserializeOptions = {}): TraceGraph {
  let raw: unknown;
  try {
    raw = JSON.parse(payload);
  } catch (error) {
    throw new TraceLoadError(`Failed to parse trace JSON: ${String(error)}`, { cause: error });
  }

  const graph = fromWire(raw);

  if (graph.schema_version !== CURRENT_SCHEMA_VERSION) {
    const message =
      `Trace schema version '${graph.schema_version}' differs from current ` +
      `'${CURRENT_SCHEMA_VERSION}'. Some fields may be missing or ignored.`;
    if (options.strictVersion) {
      throw new TraceLoadError(`Failed to parse trace JSON: ${message}`);
    }
    const warn = options.onWarning ?? ((warning: string) => console.warn(`[tracegraph] ${warning}`));
    warn(message);
  }

  return graph;
}

/**
 * Rebuild a graph from an already-parsed wire object
 */
export function fromWire(raw: unknown): TraceGraph {
  try {
    const data = expectObject(raw, 'trace');
    const nodes = Object.entries(optionalObject(data.nodes, 'nodes') ?? {}).map(([key, value]) =>
      parseNode(value, key)
    );
    const edges = (optionalArray(data.edges, 'edges') ?? []).map((value, index) =>
      parseEdge(value, index)
    );

    return new TraceGraph({
      schema_version: optionalString(data.schema_version, 'schema_version'),
      trace_id: optionalString(data.trace_id, 'trace_id'),
      name: optionalString(data.name, 'name'),
      nodes,
      edges,
      start_time: optionalString(data.start_time, 'start_time') ?? null,
      end_time: optionalString(data.end_time, 'end_time') ?? null,
      metadata: optionalJsonObject(data.metadata, 'metadata'),
    });
  } catch (error) {
    if (error instanceof TraceLoadError) {
      throw error;
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new TraceLoadError(`Failed to parse trace JSON: ${reason}`, { cause: error });
  }
}

function parseNode(value: unknown, key: string): Node {
  const path = `nodes.${key}`;
  const data = expectObject(value, path);

  const sequenceNumber = data.sequence_number;
  if (typeof sequenceNumber !== 'number' || !Number.isInteger(sequenceNumber)) {
    throw invalid(`${path}.sequence_number`, 'an integer');
  }
  if (typeof data.name !== 'string') {
    throw invalid(`${path}.name`, 'a string');
  }
  if (typeof data.node_type !== 'string') {
    throw invalid(`${path}.node_type`, 'a string');
  }
  if (data.status !== undefined && !isNodeStatus(data.status)) {
    throw invalid(`${path}.status`, 'a node status');
  }
  if (data.depth !== undefined && (typeof data.depth !== 'number' || !Number.isInteger(data.depth))) {
    throw invalid(`${path}.depth`, 'an integer');
  }

  const annotations = optionalArray(data.annotations, `${path}.annotations`) ?? [];
  for (const annotation of annotations) {
    if (typeof annotation !== 'string') {
      throw invalid(`${path}.annotations`, 'a list of strings');
    }
  }

  return createNode({
    id: optionalString(data.id, `${path}.id`) ?? key,
    sequence_number: sequenceNumber,
    name: data.name,
    node_type: data.node_type,
    status: isNodeStatus(data.status) ? data.status : undefined,
    parent_id: optionalString(data.parent_id, `${path}.parent_id`) ?? null,
    depth: typeof data.depth === 'number' ? data.depth : undefined,
    start_time: optionalString(data.start_time, `${path}.start_time`) ?? null,
    end_time: optionalString(data.end_time, `${path}.end_time`) ?? null,
    input_data: optionalJsonObject(data.input_data, `${path}.input_data`),
    output_data: optionalJsonObject(data.output_data, `${path}.output_data`),
    annotations: annotations.filter((annotation): annotation is string => typeof annotation === 'string'),
    metadata: optionalJsonObject(data.metadata, `${path}.metadata`),
    error: optionalString(data.error, `${path}.error`) ?? null,
    error_type: optionalString(data.error_type, `${path}.error_type`) ?? null,
    error_traceback: optionalString(data.error_traceback, `${path}.error_traceback`) ?? null,
  });
}

function parseEdge(value: unknown, index: number): Edge {
  const path = `edges[${index}]`;
  const data = expectObject(value, path);

  if (typeof data.source_id !== 'string') {
    throw invalid(`${path}.source_id`, 'a string');
  }
  if (typeof data.target_id !== 'string') {
    throw invalid(`${path}.target_id`, 'a string');
  }
  if (data.edge_type !== undefined && !isEdgeType(data.edge_type)) {
    throw invalid(`${path}.edge_type`, 'an edge type');
  }

  return createEdge({
    source_id: data.source_id,
    target_id: data.target_id,
    edge_type: isEdgeType(data.edge_type) ? data.edge_type : undefined,
    label: optionalString(data.label, `${path}.label`),
    metadata: optionalJsonObject(data.metadata, `${path}.metadata`),
  });
}

// =============================================================================
// Field readers
// =============================================================================

function invalid(path: string, expected: string): TraceLoadError {
  return new TraceLoadError(`Failed to parse trace JSON: ${path} must be ${expected}`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectObject(value: unknown, path: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw invalid(path, 'an object');
  }
  return value;
}

function optionalObject(value: unknown, path: string): Record<string, unknown> | undefined {
  if (value === undefined || value === null) return undefined;
  return expectObject(value, path);
}

function optionalArray(value: unknown, path: string): unknown[] | undefined {
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value)) {
    throw invalid(path, 'a list');
  }
  return value;
}

function optionalString(value: unknown, path: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw invalid(path, 'a string');
  }
  return value;
}

function optionalJsonObject(value: unknown, path: string): JsonObject | undefined {
  const record = optionalObject(value, path);
  if (record === undefined) return undefined;

  const result: JsonObject = {};
  for (const [key, entry] of Object.entries(record)) {
    result[key] = asJsonValue(entry);
  }
  return result;
}

function asJsonValue(value: unknown): JsonValue {
  if (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  ) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(asJsonValue);
  }
  if (isRecord(value)) {
    const result: JsonObject = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = asJsonValue(entry);
    }
    return result;
  }
  // JSON.parse output holds nothing else
  return null;
}
