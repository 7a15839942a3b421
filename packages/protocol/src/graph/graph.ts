/**
 * TraceGraph
 *
 * Owning container for one trace. Nodes are keyed by id and referenced
 * elsewhere only by id; edges are append-only.
 */

import { GraphIntegrityError } from '../errors.js';
import type { Edge, JsonObject, Node } from './types.js';
import { durationBetween, generateId } from './utils.js';

/** Current wire schema version */
export const CURRENT_SCHEMA_VERSION = '0.1.0';

export interface TraceGraphInit {
  schema_version?: string;
  trace_id?: string;
  name?: string;
  nodes?: Iterable<Node>;
  edges?: Iterable<Edge>;
  start_time?: string | null;
  end_time?: string | null;
  metadata?: JsonObject;
}

export class TraceGraph {
  schema_version: string;
  readonly trace_id: string;
  name: string;
  readonly nodes: Map<string, Node> = new Map();
  readonly edges: Edge[] = [];
  start_time: string | null;
  end_time: string | null;
  metadata: JsonObject;

  private sequenceCounter = 0;

  constructor(init: TraceGraphInit = {}) {
    this.schema_version = init.schema_version ?? CURRENT_SCHEMA_VERSION;
    this.trace_id = init.trace_id ?? generateId();
    this.name = init.name ?? '';
    this.start_time = init.start_time ?? null;
    this.end_time = init.end_time ?? null;
    this.metadata = init.metadata ?? {};

    for (const node of init.nodes ?? []) {
      this.addNode(node);
    }
    for (const edge of init.edges ?? []) {
      this.addEdge(edge);
    }
  }

  get duration_ms(): number | null {
    return durationBetween(this.start_time, this.end_time);
  }

  /**
   * Nodes without a parent
   */
  get rootNodes(): Node[] {
    return [...this.nodes.values()].filter(node => node.parent_id === null);
  }

  get failedNodes(): Node[] {
    return [...this.nodes.values()].filter(node => node.status === 'failed');
  }

  /**
   * Draw the next sequence number. Called once per span construction.
   */
  nextSequenceNumber(): number {
    return this.sequenceCounter++;
  }

  addNode(node: Node): void {
    this.nodes.set(node.id, node);
    // Graphs rebuilt from stored nodes keep numbering after the highest one
    if (node.sequence_number >= this.sequenceCounter) {
      this.sequenceCounter = node.sequence_number + 1;
    }
  }

  addEdge(edge: Edge): void {
    if (!this.nodes.has(edge.source_id)) {
      throw new GraphIntegrityError(`Unknown edge source node id: ${edge.source_id}`);
    }
    if (!this.nodes.has(edge.target_id)) {
      throw new GraphIntegrityError(`Unknown edge target node id: ${edge.target_id}`);
    }
    this.edges.push(edge);
  }

  getNode(nodeId: string): Node | undefined {
    return this.nodes.get(nodeId);
  }

  /**
   * Direct children of a node, in sequence order
   */
  children(nodeId: string): Node[] {
    return [...this.nodes.values()]
      .filter(node => node.parent_id === nodeId)
      .sort((a, b) => a.sequence_number - b.sequence_number);
  }
}
