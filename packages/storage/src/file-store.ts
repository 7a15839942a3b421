/**
 * File Store
 *
 * Writes each trace as `<trace_id>.json` in a directory.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ConfigurationError, StorageError } from '@tracegraph/protocol';
import type { DeserializeOptions, TraceGraph } from '@tracegraph/protocol';
import { loadTraceFile, saveTraceFile } from './trace-file.js';
import type { TraceStorage } from './types.js';

export interface FileStoreConfig {
  /** JSON indentation for written files */
  indent?: number;

  /** Options passed to the deserializer on load */
  load?: DeserializeOptions;
}

const SAFE_ID = /^[A-Za-z0-9._-]+$/;

export class FileStore implements TraceStorage {
  readonly directory: string;
  private readonly config: FileStoreConfig;

  /**
   * @throws ConfigurationError when the directory cannot be created or written
   */
  constructor(directory: string, config: FileStoreConfig = {}) {
    this.directory = path.resolve(directory);
    this.config = config;

    try {
      fs.mkdirSync(this.directory, { recursive: true });
      fs.accessSync(this.directory, fs.constants.W_OK);
    } catch (error) {
      throw new ConfigurationError(`Storage directory is not writable: ${this.directory}`, {
        cause: error,
      });
    }
  }

  async save(trace: TraceGraph): Promise<void> {
    const filePath = this.pathFor(trace.trace_id);
    try {
      await saveTraceFile(trace, filePath, { indent: this.config.indent });
    } catch (error) {
      throw new StorageError(`Failed to write trace file ${filePath}`, trace.trace_id, {
        cause: error,
      });
    }
  }

  /**
   * Ids that could never have been saved here load as null
   */
  async load(traceId: string): Promise<TraceGraph | null> {
    if (!SAFE_ID.test(traceId)) {
      return null;
    }
    const filePath = this.pathFor(traceId);
    if (!fs.existsSync(filePath)) {
      return null;
    }
    return loadTraceFile(filePath, this.config.load);
  }

  async listTraces(): Promise<string[]> {
    const entries = await fs.promises.readdir(this.directory);
    return entries
      .filter(entry => entry.endsWith('.json'))
      .map(entry => entry.slice(0, -'.json'.length))
      .sort();
  }

  private pathFor(traceId: string): string {
    if (!SAFE_ID.test(traceId)) {
      throw new StorageError(`Invalid trace id for file storage: ${traceId}`, traceId);
    }
    return path.join(this.directory, `${traceId}.json`);
  }
}
