/**
 * Graph utilities
 */

import { v7 as uuidv7 } from 'uuid';
import type { Edge, EdgeInit, EdgeType, Node, NodeInit, NodeStatus } from './types.js';
import { EDGE_TYPES, NODE_STATUSES, TERMINAL_STATUSES } from './types.js';

/**
 * Generate a UUIDv7 (time-ordered)
 */
export function generateId(): string {
  return uuidv7();
}

/**
 * Get current ISO 8601 timestamp
 */
export function getTimestamp(): string {
  return new Date().toISOString();
}

/**
 * Milliseconds between two ISO timestamps, or null if either is missing
 */
export function durationBetween(start: string | null, end: string | null): number | null {
  if (start === null || end === null) {
    return null;
  }
  return new Date(end).getTime() - new Date(start).getTime();
}

export function createNode(init: NodeInit): Node {
  return {
    id: init.id ?? generateId(),
    sequence_number: init.sequence_number,
    name: init.name,
    node_type: init.node_type ?? 'custom',
    status: init.status ?? 'pending',
    parent_id: init.parent_id ?? null,
    depth: init.depth ?? 0,
    start_time: init.start_time ?? null,
    end_time: init.end_time ?? null,
    input_data: init.input_data ?? {},
    output_data: init.output_data ?? {},
    annotations: init.annotations ?? [],
    metadata: init.metadata ?? {},
    error: init.error ?? null,
    error_type: init.error_type ?? null,
    error_traceback: init.error_traceback ?? null,
  };
}

export function createEdge(init: EdgeInit): Edge {
  return {
    source_id: init.source_id,
    target_id: init.target_id,
    edge_type: init.edge_type ?? 'caused_by',
    label: init.label ?? '',
    metadata: init.metadata ?? {},
  };
}

export function nodeDurationMs(node: Node): number | null {
  return durationBetween(node.start_time, node.end_time);
}

export function isNodeStatus(value: unknown): value is NodeStatus {
  return typeof value === 'string' && NODE_STATUSES.some(status => status === value);
}

export function isEdgeType(value: unknown): value is EdgeType {
  return typeof value === 'string' && EDGE_TYPES.some(edgeType => edgeType === value);
}

export function isTerminalStatus(status: NodeStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}
