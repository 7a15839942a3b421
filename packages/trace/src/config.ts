/**
 * Tracer configuration
 *
 * Validated once and frozen at tracer construction.
 */

import { ConfigurationError } from '@tracegraph/protocol';
import { BUILT_IN_PATTERN_NAMES, type BuiltInPatternName } from './redaction.js';

export const CAPTURE_LEVELS = ['minimal', 'standard', 'full'] as const;

/**
 * - `minimal`: input, output and metadata values are not recorded
 * - `standard`: values recorded, error stack traces omitted
 * - `full`: everything recorded
 */
export type CaptureLevel = (typeof CAPTURE_LEVELS)[number];

export interface TracerConfigInput {
  /** How much data spans record (default 'full') */
  captureLevel?: CaptureLevel;
  /** Method names wrapped by `Tracer.instrument()` */
  autoInstrument?: string[];
  /** Built-in pattern names or regular expression sources */
  redactPatterns?: string[];
  /** Field names whose values are always redacted */
  redactFields?: string[];
  /** Max string length for input values (0 or unset = unlimited) */
  maxInputSize?: number | null;
  /** Max string length for output values (0 or unset = unlimited) */
  maxOutputSize?: number | null;
}

export interface TracerConfig {
  readonly captureLevel: CaptureLevel;
  readonly autoInstrument: readonly string[];
  readonly redactPatterns: readonly string[];
  readonly redactFields: readonly string[];
  readonly maxInputSize: number | null;
  readonly maxOutputSize: number | null;
}

/**
 * Resolve defaults and validate.
 *
 * @throws ConfigurationError on invalid settings
 */
export function resolveConfig(input: TracerConfigInput = {}): TracerConfig {
  const captureLevel = input.captureLevel ?? 'full';
  if (!CAPTURE_LEVELS.some(level => level === captureLevel)) {
    throw new ConfigurationError(
      `Invalid captureLevel '${captureLevel}'. Expected one of: ${CAPTURE_LEVELS.join(', ')}`
    );
  }

  const config: TracerConfig = {
    captureLevel,
    autoInstrument: Object.freeze(stringList(input.autoInstrument, 'autoInstrument')),
    redactPatterns: Object.freeze(stringList(input.redactPatterns, 'redactPatterns')),
    redactFields: Object.freeze(stringList(input.redactFields, 'redactFields')),
    maxInputSize: sizeLimit(input.maxInputSize, 'maxInputSize'),
    maxOutputSize: sizeLimit(input.maxOutputSize, 'maxOutputSize'),
  };

  for (const pattern of config.redactPatterns) {
    if (isBuiltInPattern(pattern)) continue;
    try {
      new RegExp(pattern);
    } catch (error) {
      throw new ConfigurationError(`Invalid redact pattern '${pattern}'`, { cause: error });
    }
  }

  return Object.freeze(config);
}

export function isBuiltInPattern(value: string): value is BuiltInPatternName {
  return BUILT_IN_PATTERN_NAMES.some(name => name === value);
}

function stringList(value: string[] | undefined, field: string): string[] {
  if (value === undefined) return [];
  if (!Array.isArray(value) || value.some(entry => typeof entry !== 'string')) {
    throw new ConfigurationError(`${field} must be a list of strings`);
  }
  return [...value];
}

function sizeLimit(value: number | null | undefined, field: string): number | null {
  if (value === undefined || value === null || value === 0) return null;
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(`${field} must be a non-negative integer, got ${value}`);
  }
  return value;
}
