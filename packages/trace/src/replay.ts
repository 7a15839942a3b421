/**
 * Replay a finished trace as a timed stream of node events
 */

import type { Node, TraceGraph } from '@tracegraph/protocol';

export type ReplayEventKind = 'start' | 'end';

export interface ReplayEvent {
  kind: ReplayEventKind;
  node: Node;
  timestamp: string;
  /** 1-based position in the event stream */
  position: number;
  total: number;
  /** Wait applied before this event */
  delay_ms: number;
}

export interface ReplayOptions {
  /** Playback speed multiplier; 0 yields without waiting (default 1) */
  speed?: number;
}

export interface TimedEvent {
  kind: ReplayEventKind;
  node: Node;
  timestamp: string;
  time: number;
}

/**
 * Node start and end events in chronological order. Events at the same
 * instant keep nesting order: starts before ends, starts by ascending
 * sequence number, ends children-first (deeper nodes, then by sequence
 * number).
 */
export function collectEvents(graph: TraceGraph): TimedEvent[] {
  const events: TimedEvent[] = [];
  for (const node of graph.nodes.values()) {
    if (node.start_time !== null) {
      events.push({ kind: 'start', node, timestamp: node.start_time, time: Date.parse(node.start_time) });
    }
    if (node.end_time !== null) {
      events.push({ kind: 'end', node, timestamp: node.end_time, time: Date.parse(node.end_time) });
    }
  }

  return events.sort((a, b) => a.time - b.time || compareSameInstant(a, b));
}

function compareSameInstant(a: TimedEvent, b: TimedEvent): number {
  if (a.kind !== b.kind) {
    return a.kind === 'start' ? -1 : 1;
  }
  if (a.kind === 'end' && a.node.depth !== b.node.depth) {
    return b.node.depth - a.node.depth;
  }
  return a.node.sequence_number - b.node.sequence_number;
}

export async function* replayGraph(
  graph: TraceGraph,
  options: ReplayOptions = {}
): AsyncIterable<ReplayEvent> {
  const speed = options.speed ?? 1.0;
  const events = collectEvents(graph);
  let lastTime: number | null = null;

  for (let i = 0; i < events.length; i++) {
    const event = events[i];

    let delay_ms = 0;
    if (lastTime !== null && speed > 0) {
      delay_ms = Math.max(0, (event.time - lastTime) / speed);
    }
    if (delay_ms > 0) {
      await new Promise(resolve => setTimeout(resolve, delay_ms));
    }
    lastTime = event.time;

    yield {
      kind: event.kind,
      node: event.node,
      timestamp: event.timestamp,
      position: i + 1,
      total: events.length,
      delay_ms,
    };
  }
}
