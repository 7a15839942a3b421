/**
 * Redaction
 *
 * Applied to every captured value before truncation. Two kinds of rule:
 * regex patterns rewrite matching substrings, field names replace the whole
 * value stored under that key (case-insensitive, at any depth).
 */

import type { JsonObject, JsonValue } from '@tracegraph/protocol';

export interface RedactionPattern {
  name: string;
  /** Must carry the `g` flag */
  pattern: RegExp;
  /** May reference capture groups ($1, $2, ...) */
  replacement: string;
}

export const BUILT_IN_PATTERN_NAMES = [
  'email',
  'phone',
  'api_key',
  'jwt',
  'credit_card',
  'ip_address',
  'password',
] as const;

export type BuiltInPatternName = (typeof BUILT_IN_PATTERN_NAMES)[number];

export interface RedactionConfig {
  /** Default: true */
  enabled?: boolean;
  builtInPatterns?: readonly BuiltInPatternName[];
  customPatterns?: readonly RedactionPattern[];
  sensitiveFields?: readonly string[];
  /** Replacement for sensitive fields and custom regex sources (default: [REDACTED]) */
  marker?: string;
}

const DEFAULT_MARKER = '[REDACTED]';

const BUILT_IN_RULES: Record<BuiltInPatternName, [RegExp, string]> = {
  email: [/\b[\w.%+-]+@[\w-]+(?:\.[\w-]+)*\.[A-Za-z]{2,}\b/g, '[EMAIL_REDACTED]'],
  phone: [/\b(?:\+?1[-.]?)?\(?\d{3}\)?[-.]?\d{3}[-.]?\d{4}\b/g, '[PHONE_REDACTED]'],
  api_key: [/\b(?:sk|pk|api[-_]?key)[-_][A-Za-z0-9]{20,}\b/gi, '[API_KEY_REDACTED]'],
  jwt: [/\beyJ[\w-]+=*\.eyJ[\w-]+=*\.[\w.+/=-]+/g, '[JWT_REDACTED]'],
  credit_card: [/\b(?:\d{4}[-\s]?){3}\d{4}\b/g, '[CARD_REDACTED]'],
  ip_address: [/\b(?:\d{1,3}\.){3}\d{1,3}\b/g, '[IP_REDACTED]'],
  password: [/\b(password|passwd|pwd|secret)["']?\s*[:=]\s*["']?[^"'\s,}]+/gi, '$1=[REDACTED]'],
};

export class RedactionEngine {
  private readonly enabled: boolean;
  private readonly marker: string;
  private readonly rules: readonly RedactionPattern[];
  private readonly fields: ReadonlySet<string>;

  constructor(config: RedactionConfig = {}) {
    this.enabled = config.enabled ?? true;
    this.marker = config.marker ?? DEFAULT_MARKER;
    this.rules = [
      ...(config.builtInPatterns ?? []).map(name => {
        const [pattern, replacement] = BUILT_IN_RULES[name];
        return { name, pattern, replacement };
      }),
      ...(config.customPatterns ?? []),
    ];
    this.fields = new Set((config.sensitiveFields ?? []).map(field => field.toLowerCase()));
  }

  isActive(): boolean {
    return this.enabled && (this.rules.length > 0 || this.fields.size > 0);
  }

  redactObject(values: JsonObject): JsonObject {
    if (!this.enabled) return values;
    const redacted: JsonObject = {};
    for (const key of Object.keys(values)) {
      redacted[key] = this.redactValue(values[key], key);
    }
    return redacted;
  }

  /**
   * Redact `value` as stored under `key`. Array items inherit no key name.
   */
  redactValue(value: JsonValue, key: string): JsonValue {
    if (!this.enabled) return value;
    if (this.fields.has(key.toLowerCase())) return this.marker;

    if (typeof value === 'string') return this.redactString(value);
    if (Array.isArray(value)) return value.map(item => this.redactValue(item, ''));
    if (value !== null && typeof value === 'object') return this.redactObject(value);
    return value;
  }

  redactString(text: string): string {
    if (!this.enabled) return text;
    return this.rules.reduce((current, rule) => current.replace(rule.pattern, rule.replacement), text);
  }

  hasSensitiveData(text: string): boolean {
    return this.rules.some(rule => text.search(rule.pattern) !== -1);
  }
}

/**
 * Build an engine from tracer settings. Each pattern entry is a built-in
 * name or a regular expression source replaced by the marker.
 */
export function createRedactionEngine(
  patterns: readonly string[],
  sensitiveFields: readonly string[] = []
): RedactionEngine {
  const builtInPatterns: BuiltInPatternName[] = [];
  const customPatterns: RedactionPattern[] = [];

  for (const entry of patterns) {
    const builtIn = BUILT_IN_PATTERN_NAMES.find(name => name === entry);
    if (builtIn) {
      builtInPatterns.push(builtIn);
    } else {
      customPatterns.push({ name: entry, pattern: new RegExp(entry, 'g'), replacement: DEFAULT_MARKER });
    }
  }

  return new RedactionEngine({ builtInPatterns, customPatterns, sensitiveFields });
}

/**
 * One-off redaction of a string
 */
export function redact(
  text: string,
  patterns: readonly BuiltInPatternName[] = ['email', 'phone', 'api_key']
): string {
  return new RedactionEngine({ builtInPatterns: patterns }).redactString(text);
}
