/**
 * Trace file helpers
 */

import * as fs from 'fs';
import * as path from 'path';
import { traceFromJson, traceToJson } from '@tracegraph/protocol';
import type { DeserializeOptions, TraceGraph } from '@tracegraph/protocol';

/**
 * Write a trace as JSON, creating parent directories as needed
 */
export async function saveTraceFile(
  trace: TraceGraph,
  filePath: string,
  options: { indent?: number } = {}
): Promise<string> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  await fs.promises.writeFile(filePath, traceToJson(trace, options), 'utf-8');
  return filePath;
}

/**
 * Load a trace from a JSON file.
 *
 * Rejects with a TraceLoadError on invalid content, or with the underlying
 * fs error (ENOENT, EACCES) when the file cannot be read.
 */
export async function loadTraceFile(
  filePath: string,
  options: DeserializeOptions = {}
): Promise<TraceGraph> {
  const payload = await fs.promises.readFile(filePath, 'utf-8');
  return traceFromJson(payload, options);
}
