/** Packet shapes the parser knows. The tag is also the last part of an identity key. */
export const FAMILIES = [
  'AcuriteTowerPacket',
  'Acurite5n1Packet',
  'Acurite986Packet',
  'FOWH1080Packet',
  'HidekiTS04Packet',
  'OSTHGR122NPacket',
  'OSTHGR810Packet',
  'OSTHR228NPacket',
  'OSPCR800Packet',
  'OSWGR800Packet',
  'LaCrossePacket',
  'CalibeurRF104Packet',
] as const;

export type FamilyTag = typeof FAMILIES[number];

export type FieldValue = number | string;

export type Fields = Record<string, FieldValue>;

export interface ParsedRecord {
  family: FamilyTag;
  /** Derived from payload bits; composite ids use ':' (channel:code). */
  deviceId: string;
  channel?: string;
  /**
   * Canonical vocabulary: temperature (degC), humidity (%), wind_speed and
   * wind_gust (km/h), wind_dir (deg), rain_total and rain_since_reset (mm),
   * rain_rate (mm/h), battery (0 ok, 1 low).
   */
  fields: Fields;
  /** Capture time, epoch milliseconds. */
  timestamp: number;
}

export type JsonObject = Record<string, unknown>;

/** A text packet: the timestamped header and its continuation lines. */
export interface TextPacket {
  timestamp: number;
  /** Header text after the timestamp, leading colons stripped. */
  header: string;
  lines: string[];
}

export interface Decoded {
  deviceId: string;
  channel?: string;
  fields: Fields;
}

export interface FamilyDecoder {
  family: FamilyTag;
  description: string;
  /** Substring of a text header that selects this family. */
  identifier: string;
  /** Values of the JSON `model` field that select this family. */
  models: readonly string[];
  decodeText(packet: TextPacket): Decoded | undefined;
  decodeJson(obj: JsonObject): Decoded | undefined;
}

export function isFamilyTag(value: string): value is FamilyTag {
  return FAMILIES.some((family) => family === value);
}
