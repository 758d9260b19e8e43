import { describe, test, expect } from 'vitest';
import { buildKey, recordKeys, resolveKey, sensorLabel, splitKey } from '../identity.js';
import type { ParsedRecord } from '../packets/index.js';

const record: ParsedRecord = {
    family: 'Acurite5n1Packet',
    deviceId: '0BFA',
    fields: { temperature: 21.5, humidity: 47 },
    timestamp: 0,
};

describe('identity keys', () => {
    test('observation-first is the default order', () => {
        expect(resolveKey(record, 'temperature')).toBe('temperature.0BFA.Acurite5n1Packet');
    });

    test('family-first reverses the components', () => {
        expect(resolveKey(record, 'temperature', 'family-first')).toBe('Acurite5n1Packet.0BFA.temperature');
    });

    test('the same inputs always give the same key', () => {
        expect(resolveKey({ ...record }, 'humidity')).toBe(resolveKey(record, 'humidity'));
    });

    test('delimiters inside a component are replaced', () => {
        expect(buildKey({ observation: 'temperature', deviceId: '1.2', family: 'LaCrossePacket' })).toBe('temperature.1_2.LaCrossePacket');
    });

    test('splitKey reverses buildKey', () => {
        expect(splitKey('Acurite5n1Packet.0BFA.humidity', 'family-first')).toEqual({
            observation: 'humidity',
            deviceId: '0BFA',
            family: 'Acurite5n1Packet',
        });
        expect(splitKey('only.two')).toBeUndefined();
    });

    test('recordKeys yields one key per field', () => {
        expect(recordKeys(record)).toEqual([
            { key: 'temperature.0BFA.Acurite5n1Packet', observation: 'temperature', value: 21.5 },
            { key: 'humidity.0BFA.Acurite5n1Packet', observation: 'humidity', value: 47 },
        ]);
    });

    test('sensorLabel names the device without a field', () => {
        expect(sensorLabel(record)).toBe('0BFA.Acurite5n1Packet');
    });
});
