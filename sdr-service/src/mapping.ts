import { readFileSync } from 'fs';
import { SensorMapError, errorMessage } from './errors.js';
import { KEY_DELIMITER, splitKey, type KeyOrder } from './identity.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import { isFamilyTag, type FieldValue } from './packets/index.js';

export interface SensorMapEntry {
  /** Output field; a `*` is replaced by the observation name. */
  field: string;
  pattern: string;
  exact: boolean;
  matchers: readonly [RegExp, RegExp, RegExp];
}

export interface SensorMap {
  entries: readonly SensorMapEntry[];
  keyOrder: KeyOrder;
  /** Delta field -> cumulative output field it is computed from. */
  deltas: Readonly<Record<string, string>>;
  warnings: readonly string[];
}

export interface MappedValue {
  field: string;
  value: FieldValue;
}

export const DEFAULT_DELTAS: Readonly<Record<string, string>> = { rain: 'rain_total' };

const GLOB_CHARS = /[*?[]/;
const FIELD_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** fnmatch-style glob for a single key component. */
export function globToRegExp(glob: string): RegExp {
  let re = '';
  for (let i = 0; i < glob.length; i++) {
    const c = glob.charAt(i);
    if (c === '*') re += '.*';
    else if (c === '?') re += '.';
    else if (c === '[') {
      const close = glob.indexOf(']', i + 2);
      if (close === -1) {
        re += '\\[';
        continue;
      }
      let body = glob.slice(i + 1, close);
      if (body.startsWith('!')) body = `^${body.slice(1)}`;
      re += `[${body.replace(/\\/g, '\\\\')}]`;
      i = close;
    } else re += c.replace(/[.+^${}()|\\\]]/g, '\\$&');
  }
  return new RegExp(`^${re}$`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function compileEntry(field: string, pattern: unknown, order: KeyOrder, warnings: string[]): SensorMapEntry {
  const label = `${field} = ${String(pattern)}`;
  const device = field.includes('*');
  if (device ? !FIELD_RE.test(field.replace('*', 'x')) || field.split('*').length > 2 : !FIELD_RE.test(field)) {
    throw new SensorMapError('invalid output field name', label);
  }
  if (typeof pattern !== 'string' || pattern.trim() === '') {
    throw new SensorMapError('pattern must be a non-empty string', label);
  }
  const parts = pattern.trim().split(KEY_DELIMITER);
  if (parts.length !== 3 || parts.some((p) => p === '')) {
    throw new SensorMapError('pattern must have three parts: observation.device.family', label);
  }
  const family = order === 'observation-first' ? parts[2] : parts[0];
  if (family != null && !GLOB_CHARS.test(family) && !isFamilyTag(family)) {
    warnings.push(`${label}: unknown packet family '${family}'`);
  }
  const [a = '', b = '', c = ''] = parts;
  return {
    field,
    pattern: pattern.trim(),
    exact: !GLOB_CHARS.test(pattern),
    matchers: [globToRegExp(a), globToRegExp(b), globToRegExp(c)],
  };
}

/**
 * Validate the sensor map document. Anything malformed throws
 * SensorMapError; an empty map is malformed too.
 */
export function parseSensorMapConfig(doc: unknown): SensorMap {
  if (!isRecord(doc)) throw new SensorMapError('sensor map document must be a JSON object');

  const keyOrder = doc.keyOrder ?? 'observation-first';
  if (keyOrder !== 'observation-first' && keyOrder !== 'family-first') {
    throw new SensorMapError(`keyOrder must be 'observation-first' or 'family-first'`, String(keyOrder));
  }

  const raw = doc.sensorMap;
  if (!isRecord(raw)) throw new SensorMapError('sensorMap must be an object of outputField: pattern');
  const fields = Object.keys(raw);
  if (fields.length === 0) throw new SensorMapError('sensorMap is empty; no sensor would be recorded');

  const warnings: string[] = [];
  const entries = fields.map((field) => compileEntry(field, raw[field], keyOrder, warnings));

  let deltas: Record<string, string> = { ...DEFAULT_DELTAS };
  if (doc.deltas != null) {
    if (!isRecord(doc.deltas)) throw new SensorMapError('deltas must be an object of deltaField: totalField');
    deltas = {};
    for (const [name, source] of Object.entries(doc.deltas)) {
      if (!FIELD_RE.test(name) || typeof source !== 'string' || !FIELD_RE.test(source)) {
        throw new SensorMapError('invalid delta', `${name} = ${String(source)}`);
      }
      deltas[name] = source;
    }
  }

  return { entries, keyOrder, deltas, warnings };
}

export function loadSensorMapFile(file: string): SensorMap {
  let text: string;
  try {
    text = readFileSync(file, 'utf8');
  } catch (err) {
    throw new SensorMapError(`cannot read sensor map '${file}': ${errorMessage(err)}`, undefined, { cause: err });
  }
  let doc: unknown;
  try {
    doc = JSON.parse(text);
  } catch (err) {
    throw new SensorMapError(`sensor map '${file}' is not valid JSON: ${errorMessage(err)}`, undefined, { cause: err });
  }
  return parseSensorMapConfig(doc);
}

export interface MappingEngineOptions {
  logUnmapped?: boolean;
  logger?: Logger;
  /** Called once per newly seen unmapped key when `logUnmapped` is set. */
  onUnmapped?: (key: string, value: FieldValue) => void;
  /** Resolved keys kept in memory before the cache is reset. */
  cacheLimit?: number;
}

/**
 * Translates identity keys into output fields. Exact patterns are a hash
 * lookup; glob patterns are tried in file order. Resolutions are cached per
 * key since the map does not change during a run.
 */
export class MappingEngine {
  private readonly exact = new Map<string, SensorMapEntry[]>();
  private readonly cache = new Map<string, readonly string[]>();
  private readonly reported = new Set<string>();
  private readonly logUnmapped: boolean;
  private readonly log: Logger;
  private readonly cacheLimit: number;
  private readonly onUnmapped?: (key: string, value: FieldValue) => void;

  constructor(readonly sensorMap: SensorMap, opts: MappingEngineOptions = {}) {
    this.logUnmapped = opts.logUnmapped ?? false;
    this.log = opts.logger ?? silentLogger;
    this.cacheLimit = opts.cacheLimit ?? 10_000;
    this.onUnmapped = opts.onUnmapped;
    for (const entry of sensorMap.entries) {
      if (!entry.exact) continue;
      const list = this.exact.get(entry.pattern) ?? [];
      list.push(entry);
      this.exact.set(entry.pattern, list);
    }
  }

  /** Output fields for a key, in sensor map order. */
  resolve(key: string): readonly string[] {
    const cached = this.cache.get(key);
    if (cached) return cached;

    const parts = splitKey(key, this.sensorMap.keyOrder);
    const fields: string[] = [];
    if (parts) {
      const components = this.sensorMap.keyOrder === 'observation-first'
        ? [parts.observation, parts.deviceId, parts.family]
        : [parts.family, parts.deviceId, parts.observation];
      for (const entry of this.sensorMap.entries) {
        const hit = entry.exact
          ? this.exact.get(key)?.includes(entry) ?? false
          : entry.matchers.every((re, i) => re.test(components[i] ?? ''));
        if (hit) fields.push(entry.field.replace('*', parts.observation));
      }
    }

    if (this.cache.size >= this.cacheLimit) this.cache.clear();
    this.cache.set(key, fields);
    return fields;
  }

  /** First mapping of the key, or undefined when the key is unmapped. */
  map(key: string, value: FieldValue): MappedValue | undefined {
    return this.mapAll(key, value)[0];
  }

  mapAll(key: string, value: FieldValue): MappedValue[] {
    const fields = this.resolve(key);
    if (fields.length === 0) {
      this.reportUnmapped(key, value);
      return [];
    }
    return fields.map((field) => ({ field, value }));
  }

  get unmappedKeys(): readonly string[] {
    return [...this.reported];
  }

  private reportUnmapped(key: string, value: FieldValue): void {
    if (this.reported.has(key)) return;
    this.reported.add(key);
    if (!this.logUnmapped) return;
    this.log.info(`unmapped sensor: ${key} = ${value}`);
    this.onUnmapped?.(key, value);
  }
}
