/**
 * tracegraph Protocol Package
 *
 * Graph model, wire format and error types shared by every other package.
 */

export * from './graph/types.js';

export { TraceGraph, CURRENT_SCHEMA_VERSION, type TraceGraphInit } from './graph/graph.js';

export {
  generateId,
  getTimestamp,
  durationBetween,
  createNode,
  createEdge,
  nodeDurationMs,
  isNodeStatus,
  isEdgeType,
  isTerminalStatus,
} from './graph/utils.js';

export {
  traceToJson,
  traceFromJson,
  toWire,
  fromWire,
  type SerializeOptions,
  type DeserializeOptions,
} from './graph/serialize.js';

export {
  TraceGraphError,
  ConfigurationError,
  GraphIntegrityError,
  TraceLoadError,
  StorageError,
  ContextTokenError,
} from './errors.js';
