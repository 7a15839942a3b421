/**
 * Tree rendering for finished traces
 */

import { Chalk, type ChalkInstance } from 'chalk';
import { nodeDurationMs, type Node, type NodeStatus, type TraceGraph } from '@tracegraph/protocol';

export const VERBOSITY_LEVELS = ['minimal', 'standard', 'full'] as const;

export type Verbosity = (typeof VERBOSITY_LEVELS)[number];

export interface RenderOptions {
  /** 'full' adds data, annotation and error lines (default 'standard') */
  verbosity?: Verbosity;
  /** ANSI colors (default false) */
  color?: boolean;
}

interface TreeItem {
  label: string;
  children: TreeItem[];
}

const STATUS_ICONS: Record<NodeStatus, string> = {
  completed: '✓',
  failed: '✗',
  cancelled: '⊘',
  running: '…',
  pending: '·',
};

/**
 * Render a trace as a box-drawn tree. Siblings appear in sequence order.
 */
export function renderTrace(graph: TraceGraph, options: RenderOptions = {}): string {
  const verbosity = options.verbosity ?? 'standard';
  const paint = new Chalk({ level: options.color ? 1 : 0 });

  const childrenByParent = new Map<string | null, Node[]>();
  for (const node of graph.nodes.values()) {
    // Nodes whose parent is missing are shown as roots
    const parentId = node.parent_id !== null && graph.nodes.has(node.parent_id) ? node.parent_id : null;
    const siblings = childrenByParent.get(parentId) ?? [];
    siblings.push(node);
    childrenByParent.set(parentId, siblings);
  }
  for (const siblings of childrenByParent.values()) {
    siblings.sort((a, b) => a.sequence_number - b.sequence_number);
  }

  const build = (node: Node): TreeItem => ({
    label: nodeLabel(node, paint),
    children: [
      ...(verbosity === 'full' ? detailItems(node, paint) : []),
      ...(childrenByParent.get(node.id) ?? []).map(build),
    ],
  });

  const duration = graph.duration_ms !== null ? `${Math.round(graph.duration_ms)}ms` : 'ongoing';
  const root: TreeItem = {
    label: paint.bold(`Trace: ${graph.name || graph.trace_id} (${duration})`),
    children: (childrenByParent.get(null) ?? []).map(build),
  };

  const lines = [root.label];
  appendChildren(root, '', lines);
  return lines.join('\n');
}

export function statusIcon(status: NodeStatus): string {
  return STATUS_ICONS[status];
}

function nodeLabel(node: Node, paint: ChalkInstance): string {
  const duration = nodeDurationMs(node);
  const timing = duration !== null ? `${Math.round(duration)}ms` : 'running';
  return `${paint.cyan(`[${node.node_type}]`)} ${node.name} (${timing}) ${colorIcon(node.status, paint)}`;
}

function colorIcon(status: NodeStatus, paint: ChalkInstance): string {
  const icon = STATUS_ICONS[status];
  switch (status) {
    case 'completed':
      return paint.green(icon);
    case 'failed':
      return paint.red(icon);
    case 'cancelled':
      return paint.yellow(icon);
    case 'running':
      return paint.blue(icon);
    case 'pending':
      return paint.gray(icon);
  }
}

function detailItems(node: Node, paint: ChalkInstance): TreeItem[] {
  const lines: string[] = [];
  if (Object.keys(node.input_data).length > 0) {
    lines.push(`input: ${JSON.stringify(node.input_data)}`);
  }
  if (Object.keys(node.output_data).length > 0) {
    lines.push(`output: ${JSON.stringify(node.output_data)}`);
  }
  if (Object.keys(node.metadata).length > 0) {
    lines.push(`metadata: ${JSON.stringify(node.metadata)}`);
  }
  for (const annotation of node.annotations) {
    lines.push(`annotation: "${annotation}"`);
  }

  const items: TreeItem[] = lines.map(label => ({ label: paint.gray(label), children: [] }));
  if (node.error !== null) {
    items.push({ label: paint.red(`error: ${node.error_type ?? 'Error'}: ${node.error}`), children: [] });
  }
  return items;
}

function appendChildren(item: TreeItem, prefix: string, lines: string[]): void {
  item.children.forEach((child, index) => {
    const last = index === item.children.length - 1;
    lines.push(`${prefix}${last ? '└── ' : '├── '}${child.label}`);
    appendChildren(child, `${prefix}${last ? '    ' : '│   '}`, lines);
  });
}
