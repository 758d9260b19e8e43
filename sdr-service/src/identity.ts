import type { FamilyTag, ParsedRecord } from './packets/index.js';

export const KEY_DELIMITER = '.';

/**
 * `observation-first` builds `temperature.0BFA.Acurite5n1Packet`;
 * `family-first` builds `Acurite5n1Packet.0BFA.temperature`.
 */
export type KeyOrder = 'observation-first' | 'family-first';

export interface KeyParts {
  observation: string;
  deviceId: string;
  family: string;
}

function clean(part: string): string {
  return part.split(KEY_DELIMITER).join('_');
}

export function buildKey(parts: KeyParts, order: KeyOrder = 'observation-first'): string {
  const observation = clean(parts.observation);
  const deviceId = clean(parts.deviceId);
  const family = clean(parts.family);
  return order === 'observation-first'
    ? [observation, deviceId, family].join(KEY_DELIMITER)
    : [family, deviceId, observation].join(KEY_DELIMITER);
}

/** Identity key of one field of a record. */
export function resolveKey(record: ParsedRecord, field: string, order: KeyOrder = 'observation-first'): string {
  return buildKey({ observation: field, deviceId: record.deviceId, family: record.family }, order);
}

export function splitKey(key: string, order: KeyOrder = 'observation-first'): KeyParts | undefined {
  const parts = key.split(KEY_DELIMITER);
  if (parts.length !== 3) return undefined;
  const [a = '', deviceId = '', c = ''] = parts;
  return order === 'observation-first'
    ? { observation: a, deviceId, family: c }
    : { observation: c, deviceId, family: a };
}

export interface KeyedValue {
  key: string;
  observation: string;
  value: number | string;
}

/** One key per field of the record, in field order. */
export function recordKeys(record: ParsedRecord, order: KeyOrder = 'observation-first'): KeyedValue[] {
  return Object.entries(record.fields).map(([observation, value]) => ({
    key: resolveKey(record, observation, order),
    observation,
    value,
  }));
}

/** `{deviceId}.{family}`: the identity of a physical sensor, without the field. */
export function sensorLabel(record: { deviceId: string; family: FamilyTag }): string {
  return `${clean(record.deviceId)}${KEY_DELIMITER}${record.family}`;
}
