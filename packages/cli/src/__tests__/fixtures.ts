/**
 * Shared test traces
 */

import { TraceGraph, createEdge, createNode } from '@tracegraph/protocol';

export function buildAgentTrace(traceId = 'trace-1'): TraceGraph {
  const root = createNode({
    id: `${traceId}-root`,
    sequence_number: 0,
    name: 'agent_run',
    node_type: 'trace',
    status: 'completed',
    start_time: '2026-01-01T00:00:00.000Z',
    end_time: '2026-01-01T00:00:00.500Z',
  });
  const search = createNode({
    id: `${traceId}-search`,
    sequence_number: 1,
    name: 'search',
    node_type: 'tool_call',
    status: 'failed',
    parent_id: root.id,
    depth: 1,
    start_time: '2026-01-01T00:00:00.100Z',
    end_time: '2026-01-01T00:00:00.200Z',
    input_data: { query: 'weather' },
    annotations: ['retrying'],
    error: 'timeout',
    error_type: 'TimeoutError',
  });
  const answer = createNode({
    id: `${traceId}-answer`,
    sequence_number: 2,
    name: 'answer',
    node_type: 'llm_call',
    status: 'completed',
    parent_id: root.id,
    depth: 1,
    start_time: '2026-01-01T00:00:00.250Z',
    end_time: '2026-01-01T00:00:00.450Z',
    output_data: { text: 'sunny' },
  });
  const late = createNode({
    id: `${traceId}-late`,
    sequence_number: 3,
    name: 'late',
    status: 'running',
    parent_id: root.id,
    depth: 1,
    start_time: '2026-01-01T00:00:00.460Z',
  });

  return new TraceGraph({
    trace_id: traceId,
    name: 'agent_run',
    start_time: '2026-01-01T00:00:00.000Z',
    end_time: '2026-01-01T00:00:00.500Z',
    // Out of sequence order on purpose
    nodes: [root, answer, late, search],
    edges: [
      createEdge({ source_id: root.id, target_id: search.id }),
      createEdge({ source_id: root.id, target_id: answer.id }),
      createEdge({ source_id: root.id, target_id: late.id }),
    ],
  });
}
