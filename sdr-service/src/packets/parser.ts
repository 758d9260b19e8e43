import { DECODERS } from './families.js';
import { isJsonObject, parseNumber } from './fields.js';
import type { FamilyDecoder, FamilyTag, JsonObject, ParsedRecord, TextPacket } from './types.js';

const HEADER_RE = /^(\d{4}-\d\d-\d\d \d\d:\d\d:\d\d)\s+:*(.*)$/;

const byModel = new Map<string, FamilyDecoder>();
for (const d of DECODERS) {
  for (const model of d.models) byModel.set(model, d);
}

/** Largest magnitude a Date can hold, epoch ms. */
const MAX_DATE_MS = 8.64e15;

function inDateRange(ms: number): number | undefined {
  return Number.isFinite(ms) && Math.abs(ms) <= MAX_DATE_MS ? ms : undefined;
}

/**
 * Decoder time stamps are UTC (the decoder runs with -U). Values a Date
 * cannot represent are undefined.
 */
export function parseTimestamp(value: unknown): number | undefined {
  if (typeof value === 'number') return inDateRange(Math.round(value * 1000));
  if (typeof value !== 'string') return undefined;
  const t = value.trim();
  const seconds = parseNumber(t);
  if (seconds != null) return inDateRange(Math.round(seconds * 1000));
  const m = /^(\d{4})-(\d\d)-(\d\d)[ T](\d\d):(\d\d):(\d\d)(\.\d+)?(Z|[+-]\d\d:?\d\d)?$/.exec(t);
  if (!m) return undefined;
  if (m[8]) {
    const ms = Date.parse(t.replace(' ', 'T'));
    return Number.isNaN(ms) ? undefined : ms;
  }
  const frac = m[7] ? Math.round(Number(m[7]) * 1000) : 0;
  return Date.UTC(Number(m[1]), Number(m[2]) - 1, Number(m[3]), Number(m[4]), Number(m[5]), Number(m[6])) + frac;
}

export function isHeaderLine(line: string): boolean {
  return HEADER_RE.test(line.trim());
}

export function isJsonLine(line: string): boolean {
  return line.trimStart().startsWith('{');
}

function parseJsonObject(line: string): JsonObject | undefined {
  try {
    const value: unknown = JSON.parse(line);
    return isJsonObject(value) ? value : undefined;
  } catch {
    return undefined;
  }
}

function splitHeader(line: string): { timestamp: number; header: string } | undefined {
  const m = HEADER_RE.exec(line.trim());
  if (!m) return undefined;
  const timestamp = parseTimestamp(m[1]);
  if (timestamp == null) return undefined;
  return { timestamp, header: (m[2] ?? '').trim() };
}

function decodeJson(line: string, receivedAt: number): ParsedRecord | undefined {
  const obj = parseJsonObject(line);
  if (!obj || typeof obj.model !== 'string') return undefined;
  const decoder = byModel.get(obj.model);
  if (!decoder) return undefined;
  const decoded = decoder.decodeJson(obj);
  if (!decoded) return undefined;
  return {
    family: decoder.family,
    deviceId: decoded.deviceId,
    ...(decoded.channel != null ? { channel: decoded.channel } : {}),
    fields: decoded.fields,
    timestamp: parseTimestamp(obj.time) ?? receivedAt,
  };
}

function decodeText(lines: readonly string[]): ParsedRecord | undefined {
  const [first, ...rest] = lines;
  if (first == null) return undefined;
  const head = splitHeader(first);
  if (!head || !head.header) return undefined;
  const decoder = DECODERS.find((d) => head.header.includes(d.identifier));
  if (!decoder) return undefined;
  const packet: TextPacket = { timestamp: head.timestamp, header: head.header, lines: rest.map((l) => l.trim()).filter(Boolean) };
  const decoded = decoder.decodeText(packet);
  if (!decoded) return undefined;
  return {
    family: decoder.family,
    deviceId: decoded.deviceId,
    ...(decoded.channel != null ? { channel: decoded.channel } : {}),
    fields: decoded.fields,
    timestamp: head.timestamp,
  };
}

/**
 * Parse one packet: a single JSON line, or a text header followed by its
 * continuation lines. Returns undefined for shapes no decoder recognizes.
 * `receivedAt` stands in for the capture time when the packet carries none.
 */
export function parsePacket(lines: readonly string[], receivedAt: number = Date.now()): ParsedRecord | undefined {
  const first = lines[0];
  if (first == null || first.trim() === '') return undefined;
  return isJsonLine(first) ? decodeJson(first.trim(), receivedAt) : decodeText(lines);
}

export function parseLine(line: string, receivedAt: number = Date.now()): ParsedRecord | undefined {
  return parsePacket([line], receivedAt);
}

function normalizeShape(text: string): string {
  return text
    .replace(/0x[0-9a-fA-F]+/g, '<hex>')
    .replace(/-?\d+(\.\d+)?/g, '<n>')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Signature of a packet's shape, with ids and readings blanked out. Used to
 * report each kind of unrecognized packet once.
 */
export function shapeSignature(lines: readonly string[]): string {
  const first = (lines[0] ?? '').trim();
  if (isJsonLine(first)) {
    const obj = parseJsonObject(first);
    if (!obj) return 'json:invalid';
    if (typeof obj.model === 'string') return `json:model=${obj.model}`;
    return `json:keys=${Object.keys(obj).sort().join(',')}`;
  }
  const head = splitHeader(first);
  if (head) return `text:${normalizeShape(head.header)}`;
  return `text:${normalizeShape(first)}`;
}

export interface FamilyInfo {
  family: FamilyTag;
  description: string;
  identifier: string;
  models: readonly string[];
}

export function listFamilies(): FamilyInfo[] {
  return DECODERS.map(({ family, description, identifier, models }) => ({ family, description, identifier, models }));
}
