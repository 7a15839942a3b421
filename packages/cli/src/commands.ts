/**
 * CLI command implementations
 *
 * Each command writes through an injectable CommandIO and resolves to its
 * process exit code.
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  NODE_STATUSES,
  TraceGraphError,
  TraceLoadError,
  nodeDurationMs,
  type TraceGraph,
} from '@tracegraph/protocol';
import { FileStore, loadTraceFile } from '@tracegraph/storage';
import { replayGraph } from '@tracegraph/trace';
import { renderTrace, statusIcon, type Verbosity } from './render.js';

export interface CommandIO {
  stdout(line: string): void;
  stderr(line: string): void;
}

export const consoleIO: CommandIO = {
  stdout: line => console.log(line),
  stderr: line => console.error(line),
};

export interface InspectOptions {
  verbosity?: Verbosity;
  json?: boolean;
  /** Write the JSON summary here instead of stdout */
  output?: string;
  color?: boolean;
}

export interface ReplayCommandOptions {
  speed?: number;
}

export interface TraceSummary {
  duration_ms: number | null;
  edge_count: number;
  name: string;
  node_count: number;
  node_type_counts: Record<string, number>;
  schema_version: string;
  status_counts: Record<string, number>;
  trace_id: string;
}

// =============================================================================
// inspect
// =============================================================================

export async function runInspect(
  file: string,
  options: InspectOptions = {},
  io: CommandIO = consoleIO
): Promise<number> {
  if (options.output !== undefined && !options.json) {
    io.stderr('Error: --output is only supported when --json is provided');
    return 2;
  }

  const graph = await loadForCommand(file, io);
  if (!graph) return 1;

  const summary = buildSummary(graph);

  if (options.json) {
    const payload = JSON.stringify(summary);
    if (options.output !== undefined) {
      await fs.promises.mkdir(path.dirname(options.output), { recursive: true });
      await fs.promises.writeFile(options.output, `${payload}\n`, 'utf-8');
    } else {
      io.stdout(payload);
    }
    return 0;
  }

  io.stdout(`Trace ID: ${summary.trace_id}`);
  io.stdout(`Name: ${summary.name || '<unnamed>'}`);
  io.stdout(`Schema: ${summary.schema_version}`);
  io.stdout(`Duration: ${summary.duration_ms !== null ? `${Math.round(summary.duration_ms)}ms` : 'unknown'}`);
  io.stdout(`Nodes: ${summary.node_count}`);
  io.stdout(`Edges: ${summary.edge_count}`);
  io.stdout('Status counts:');
  for (const [status, count] of Object.entries(summary.status_counts)) {
    if (count > 0) io.stdout(`  - ${status}: ${count}`);
  }
  io.stdout('Node type counts:');
  for (const [nodeType, count] of Object.entries(summary.node_type_counts)) {
    io.stdout(`  - ${nodeType}: ${count}`);
  }
  io.stdout('');
  io.stdout(renderTrace(graph, { verbosity: options.verbosity, color: options.color }));
  return 0;
}

/**
 * Machine-readable summary. Keys are emitted in sorted order at every
 * level, and every status appears in `status_counts`.
 */
export function buildSummary(graph: TraceGraph): TraceSummary {
  const statusCounts: Record<string, number> = {};
  for (const status of [...NODE_STATUSES].sort()) {
    statusCounts[status] = 0;
  }
  const typeCounts: Record<string, number> = {};

  for (const node of graph.nodes.values()) {
    statusCounts[node.status] += 1;
    typeCounts[node.node_type] = (typeCounts[node.node_type] ?? 0) + 1;
  }

  const nodeTypeCounts: Record<string, number> = {};
  for (const key of Object.keys(typeCounts).sort()) {
    nodeTypeCounts[key] = typeCounts[key];
  }

  return {
    duration_ms: graph.duration_ms,
    edge_count: graph.edges.length,
    name: graph.name,
    node_count: graph.nodes.size,
    node_type_counts: nodeTypeCounts,
    schema_version: graph.schema_version,
    status_counts: statusCounts,
    trace_id: graph.trace_id,
  };
}

// =============================================================================
// list
// =============================================================================

export async function runList(directory: string, io: CommandIO = consoleIO): Promise<number> {
  if (!fs.existsSync(directory) || !fs.statSync(directory).isDirectory()) {
    io.stderr(`Error: directory not found: ${directory}`);
    return 1;
  }

  const store = new FileStore(directory, { load: { onWarning: message => io.stderr(`Warning: ${message}`) } });
  const traceIds = await store.listTraces();
  if (traceIds.length === 0) {
    io.stdout(`No traces found in ${directory}`);
    return 0;
  }

  let exitCode = 0;
  for (const traceId of traceIds) {
    try {
      const graph = await store.load(traceId);
      if (!graph) continue;
      io.stdout(
        `${graph.trace_id}  ${graph.name || '<unnamed>'}  ` +
          `${graph.nodes.size} nodes  ${graph.failedNodes.length} failed`
      );
    } catch (error) {
      io.stderr(`Error: ${traceId}: ${errorMessage(error)}`);
      exitCode = 1;
    }
  }
  return exitCode;
}

// =============================================================================
// replay
// =============================================================================

export async function runReplay(
  file: string,
  options: ReplayCommandOptions = {},
  io: CommandIO = consoleIO
): Promise<number> {
  const speed = options.speed ?? 1;
  if (!Number.isFinite(speed) || speed < 0) {
    io.stderr('Error: --speed must be a non-negative number');
    return 2;
  }

  const graph = await loadForCommand(file, io);
  if (!graph) return 1;

  io.stdout(`Replaying ${graph.name || graph.trace_id}`);
  for await (const event of replayGraph(graph, { speed })) {
    const { node } = event;
    const position = `[${event.position}/${event.total}]`;
    if (event.kind === 'start') {
      io.stdout(`${position} start [${node.node_type}] ${node.name}`);
    } else {
      const duration = nodeDurationMs(node);
      io.stdout(
        `${position} end   [${node.node_type}] ${node.name} ${statusIcon(node.status)}` +
          (duration !== null ? ` (${Math.round(duration)}ms)` : '')
      );
    }
  }
  return 0;
}

// =============================================================================
// Helpers
// =============================================================================

async function loadForCommand(file: string, io: CommandIO): Promise<TraceGraph | null> {
  try {
    return await loadTraceFile(file, { onWarning: message => io.stderr(`Warning: ${message}`) });
  } catch (error) {
    if (isNotFound(error)) {
      io.stderr(`Error: file not found: ${file}`);
    } else if (error instanceof TraceLoadError) {
      io.stderr(`Error: ${error.getFullMessage()}`);
    } else {
      io.stderr(`Error reading file: ${errorMessage(error)}`);
    }
    return null;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function errorMessage(error: unknown): string {
  if (error instanceof TraceGraphError) return error.getFullMessage();
  return error instanceof Error ? error.message : String(error);
}
