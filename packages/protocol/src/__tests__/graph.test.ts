/**
 * Graph Model Tests
 */

import { describe, it, expect } from 'vitest';
import {
  TraceGraph,
  CURRENT_SCHEMA_VERSION,
  createNode,
  createEdge,
  nodeDurationMs,
  isTerminalStatus,
  GraphIntegrityError,
} from '../index.js';

describe('TraceGraph', () => {
  describe('Construction', () => {
    it('should apply defaults', () => {
      const graph = new TraceGraph({ name: 'run' });

      expect(graph.schema_version).toBe(CURRENT_SCHEMA_VERSION);
      expect(graph.trace_id).toMatch(/^[0-9a-f-]{36}$/);
      expect(graph.name).toBe('run');
      expect(graph.nodes.size).toBe(0);
      expect(graph.edges).toEqual([]);
      expect(graph.duration_ms).toBeNull();
    });

    it('should reject edges with unknown endpoints', () => {
      const node = createNode({ id: 'a', sequence_number: 0, name: 'a' });

      expect(
        () =>
          new TraceGraph({
            nodes: [node],
            edges: [createEdge({ source_id: 'a', target_id: 'missing' })],
          })
      ).toThrow(GraphIntegrityError);
    });

    it('should derive duration from timestamps', () => {
      const graph = new TraceGraph({
        start_time: '2026-01-01T00:00:00.000Z',
        end_time: '2026-01-01T00:00:01.250Z',
      });

      expect(graph.duration_ms).toBe(1250);
    });
  });

  describe('Sequence Numbers', () => {
    it('should hand out increasing numbers starting at zero', () => {
      const graph = new TraceGraph();

      expect(graph.nextSequenceNumber()).toBe(0);
      expect(graph.nextSequenceNumber()).toBe(1);
      expect(graph.nextSequenceNumber()).toBe(2);
    });

    it('should continue after the highest stored node', () => {
      const graph = new TraceGraph({
        nodes: [
          createNode({ id: 'a', sequence_number: 0, name: 'a' }),
          createNode({ id: 'b', sequence_number: 4, name: 'b' }),
        ],
      });

      expect(graph.nextSequenceNumber()).toBe(5);
    });
  });

  describe('Edges', () => {
    it('should append edges between known nodes', () => {
      const graph = new TraceGraph();
      graph.addNode(createNode({ id: 'a', sequence_number: 0, name: 'a' }));
      graph.addNode(createNode({ id: 'b', sequence_number: 1, name: 'b' }));

      graph.addEdge(createEdge({ source_id: 'a', target_id: 'b', edge_type: 'retry_of' }));

      expect(graph.edges).toEqual([
        { source_id: 'a', target_id: 'b', edge_type: 'retry_of', label: '', metadata: {} },
      ]);
    });

    it('should reject an unknown source', () => {
      const graph = new TraceGraph();
      graph.addNode(createNode({ id: 'b', sequence_number: 0, name: 'b' }));

      expect(() => graph.addEdge(createEdge({ source_id: 'x', target_id: 'b' }))).toThrow(
        'Unknown edge source node id: x'
      );
    });

    it('should reject an unknown target', () => {
      const graph = new TraceGraph();
      graph.addNode(createNode({ id: 'a', sequence_number: 0, name: 'a' }));

      expect(() => graph.addEdge(createEdge({ source_id: 'a', target_id: 'y' }))).toThrow(
        'Unknown edge target node id: y'
      );
      expect(graph.edges).toHaveLength(0);
    });

    it('should default to caused_by', () => {
      expect(createEdge({ source_id: 'a', target_id: 'b' }).edge_type).toBe('caused_by');
    });
  });

  describe('Queries', () => {
    it('should list roots, failures and ordered children', () => {
      const graph = new TraceGraph({
        nodes: [
          createNode({ id: 'root', sequence_number: 0, name: 'root' }),
          createNode({ id: 'c2', sequence_number: 2, name: 'c2', parent_id: 'root', depth: 1 }),
          createNode({
            id: 'c1',
            sequence_number: 1,
            name: 'c1',
            parent_id: 'root',
            depth: 1,
            status: 'failed',
          }),
        ],
      });

      expect(graph.rootNodes.map(node => node.id)).toEqual(['root']);
      expect(graph.failedNodes.map(node => node.id)).toEqual(['c1']);
      expect(graph.children('root').map(node => node.id)).toEqual(['c1', 'c2']);
    });
  });
});

describe('Node helpers', () => {
  it('should create pending nodes with empty data', () => {
    const node = createNode({ sequence_number: 3, name: 'step' });

    expect(node.status).toBe('pending');
    expect(node.node_type).toBe('custom');
    expect(node.depth).toBe(0);
    expect(node.parent_id).toBeNull();
    expect(node.input_data).toEqual({});
    expect(node.annotations).toEqual([]);
  });

  it('should report null duration until both timestamps exist', () => {
    const node = createNode({
      sequence_number: 0,
      name: 'step',
      start_time: '2026-01-01T00:00:00.000Z',
    });
    expect(nodeDurationMs(node)).toBeNull();

    node.end_time = '2026-01-01T00:00:00.040Z';
    expect(nodeDurationMs(node)).toBe(40);
  });

  it('should classify terminal statuses', () => {
    expect(isTerminalStatus('completed')).toBe(true);
    expect(isTerminalStatus('failed')).toBe(true);
    expect(isTerminalStatus('cancelled')).toBe(true);
    expect(isTerminalStatus('running')).toBe(false);
    expect(isTerminalStatus('pending')).toBe(false);
  });
});
