import type { FieldValue, Fields, JsonObject } from './types.js';

const NUMBER_RE = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

export const KMH_PER_MS = 3.6;
export const KMH_PER_MPH = 1.609344;
export const MM_PER_INCH = 25.4;

/** Strict numeric parse; anything that is not a plain number is undefined. */
export function parseNumber(text: unknown): number | undefined {
  if (typeof text === 'number') return Number.isFinite(text) ? text : undefined;
  if (typeof text !== 'string') return undefined;
  const t = text.trim();
  if (!NUMBER_RE.test(t)) return undefined;
  const n = Number(t);
  return Number.isFinite(n) ? n : undefined;
}

export function fahrenheitToCelsius(f: number): number {
  return (f - 32) * 5 / 9;
}

/** 0 when the sensor reports a good battery, 1 otherwise. */
export function batteryStatus(value: unknown): number | undefined {
  if (typeof value === 'string') {
    const v = value.trim().toUpperCase();
    if (v === '') return undefined;
    return v === 'OK' ? 0 : 1;
  }
  if (typeof value === 'number' && Number.isFinite(value)) return value === 0 ? 1 : 0;
  return undefined;
}

export function hexId(value: unknown): string | undefined {
  if (typeof value === 'number' && Number.isInteger(value) && value >= 0) {
    return value.toString(16).toUpperCase().padStart(4, '0');
  }
  if (typeof value === 'string' && value.trim() !== '') {
    return value.trim().replace(/^0x/i, '').toUpperCase();
  }
  return undefined;
}

export function plainId(value: unknown, fallback = '0'): string {
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (typeof value === 'string' && value.trim() !== '') return value.trim();
  return fallback;
}

// ---- text "Name: value" lines ----

export interface LineRule {
  name: string;
  /** First capture group is the value; a miss drops the field. */
  pattern?: RegExp;
  convert: (raw: string) => FieldValue | undefined;
}

export const num = (raw: string) => parseNumber(raw);
export const scaled = (factor: number) => (raw: string) => {
  const n = parseNumber(raw);
  return n == null ? undefined : n * factor;
};
export const int = (raw: string) => {
  const n = parseNumber(raw);
  return n == null ? undefined : Math.trunc(n);
};
export const text = (raw: string) => (raw.trim() === '' ? undefined : raw.trim());
export const battery = (raw: string) => batteryStatus(raw);

export const CELSIUS = /(-?[\d.]+) C/;
export const PERCENT = /([\d.]+) %/;

/**
 * Parse continuation lines of a text packet. Only lines with exactly one
 * colon are considered; unknown names and malformed values are skipped and
 * reported through `onSkip`.
 */
export function parseLines(
  lines: readonly string[],
  rules: Readonly<Record<string, LineRule>>,
  onSkip?: (line: string, reason: string) => void
): Fields {
  const out: Fields = {};
  for (const line of lines) {
    if (line.split(':').length !== 2) {
      onSkip?.(line, 'not a name:value line');
      continue;
    }
    const [rawName = '', rawValue = ''] = line.split(':');
    const name = rawName.trim();
    const rule = rules[name];
    if (!rule) {
      onSkip?.(line, 'unknown name');
      continue;
    }
    let value = rawValue.trim();
    if (rule.pattern) {
      const m = rule.pattern.exec(value);
      if (!m || m[1] == null) {
        onSkip?.(line, 'pattern mismatch');
        continue;
      }
      value = m[1];
    }
    const converted = rule.convert(value);
    if (converted == null) {
      onSkip?.(line, 'malformed value');
      continue;
    }
    out[rule.name] = converted;
  }
  return out;
}

// ---- JSON objects ----

interface JsonRule {
  keys: readonly string[];
  convert: (value: unknown) => number | undefined;
}

const asNumber = (v: unknown) => parseNumber(v);
const times = (factor: number) => (v: unknown) => {
  const n = parseNumber(v);
  return n == null ? undefined : n * factor;
};

/**
 * Canonical field -> candidate JSON keys in preference order. The first key
 * present with a well-formed value wins.
 */
const JSON_RULES: Readonly<Record<string, readonly JsonRule[]>> = {
  temperature: [
    { keys: ['temperature_C', 'temperature_c'], convert: asNumber },
    { keys: ['temperature_F', 'temperature_f'], convert: (v) => { const n = parseNumber(v); return n == null ? undefined : fahrenheitToCelsius(n); } },
  ],
  humidity: [{ keys: ['humidity'], convert: asNumber }],
  wind_speed: [
    { keys: ['wind_avg_km_h', 'wind_speed_km_h', 'wind_speed_kph'], convert: asNumber },
    { keys: ['wind_avg_m_s', 'wind_speed_ms', 'wind_speed_m_s'], convert: times(KMH_PER_MS) },
    { keys: ['wind_avg_mi_h', 'wind_speed_mph'], convert: times(KMH_PER_MPH) },
  ],
  wind_gust: [
    { keys: ['wind_max_km_h', 'gust_speed_km_h'], convert: asNumber },
    { keys: ['wind_max_m_s', 'gust_speed_ms', 'gust_speed_m_s'], convert: times(KMH_PER_MS) },
    { keys: ['wind_max_mi_h', 'gust_speed_mph'], convert: times(KMH_PER_MPH) },
  ],
  wind_dir: [{ keys: ['wind_dir_deg', 'wind_direction', 'wind_dir', 'direction_deg'], convert: asNumber }],
  rain_total: [
    { keys: ['rain_mm', 'rainfall_mm', 'rain_total_mm'], convert: asNumber },
    { keys: ['rain_in', 'rain_inch', 'rainfall_inch'], convert: times(MM_PER_INCH) },
  ],
  rain_rate: [
    { keys: ['rain_rate_mm_h'], convert: asNumber },
    { keys: ['rain_rate_in_h'], convert: times(MM_PER_INCH) },
  ],
  battery: [
    { keys: ['battery_ok'], convert: batteryStatus },
    { keys: ['battery'], convert: batteryStatus },
  ],
};

export function normalizeJsonFields(obj: JsonObject): Fields {
  const out: Fields = {};
  for (const [name, rules] of Object.entries(JSON_RULES)) {
    for (const rule of rules) {
      const value = firstValue(obj, rule.keys, rule.convert);
      if (value != null) {
        out[name] = value;
        break;
      }
    }
  }
  return out;
}

function firstValue(obj: JsonObject, keys: readonly string[], convert: (v: unknown) => number | undefined): number | undefined {
  for (const key of keys) {
    if (!(key in obj)) continue;
    const v = convert(obj[key]);
    if (v != null) return v;
  }
  return undefined;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
