import {
  CELSIUS,
  KMH_PER_MS,
  MM_PER_INCH,
  PERCENT,
  battery,
  hexId,
  int,
  normalizeJsonFields,
  num,
  parseLines,
  parseNumber,
  plainId,
  scaled,
  text,
  type LineRule,
} from './fields.js';
import type { Decoded, FamilyDecoder, FamilyTag, Fields, JsonObject, TextPacket } from './types.js';

function capture(re: RegExp, input: string): string | undefined {
  const m = re.exec(input);
  return m?.[1];
}

function setNumber(fields: Fields, name: string, raw: string | undefined, factor = 1): void {
  const n = parseNumber(raw);
  if (n != null) fields[name] = n * factor;
}

function channelOf(value: unknown): string | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (typeof value === 'string' && value.trim() !== '') return value.trim();
  return undefined;
}

/** JSON decoder for families addressed by a hex id. */
function hexAddressedJson(obj: JsonObject): Decoded | undefined {
  const deviceId = hexId(obj.id);
  if (!deviceId) return undefined;
  return { deviceId, channel: channelOf(obj.channel), fields: normalizeJsonFields(obj) };
}

/** JSON decoder for families addressed by channel plus a house/rolling code. */
function channelCodeJson(codeKeys: readonly string[]) {
  return (obj: JsonObject): Decoded => {
    const codeKey = codeKeys.find((k) => k in obj);
    const channel = plainId(obj.channel);
    const code = plainId(codeKey ? obj[codeKey] : undefined);
    return { deviceId: `${channel}:${code}`, channel, fields: normalizeJsonFields(obj) };
  };
}

/**
 * Text decoder for the multi-line "Name: value" families. Identity lines are
 * parsed like any other field and then removed from the record; a missing
 * identity part reads as '0'.
 */
function lineTable(rules: Record<string, LineRule>, identity: (fields: Fields) => Omit<Decoded, 'fields'>, identityNames: readonly string[]) {
  return (packet: TextPacket): Decoded => {
    const parsed = parseLines(packet.lines, rules);
    const id = identity(parsed);
    const fields: Fields = {};
    for (const [k, v] of Object.entries(parsed)) {
      if (!identityNames.includes(k)) fields[k] = v;
    }
    return { ...id, fields };
  };
}

function channelCode(fields: Fields, codeName: string): Omit<Decoded, 'fields'> {
  const channel = plainId(fields.channel);
  return { deviceId: `${channel}:${plainId(fields[codeName])}`, channel };
}

const HOUSE_CODE_RULES: Record<string, LineRule> = {
  'House Code': { name: 'house_code', convert: int },
  'Channel': { name: 'channel', convert: int },
  'Battery': { name: 'battery', convert: battery },
};

// 2016-08-30 23:57:20 Acurite tower sensor 0x37FC Ch A: 26.7 C 80.1 F 16 % RH
const acuriteTower: FamilyDecoder = {
  family: 'AcuriteTowerPacket',
  description: 'Acurite tower temperature/humidity sensor',
  identifier: 'Acurite tower sensor',
  models: ['Acurite tower sensor', 'Acurite-Tower', 'AcuriteTower'],
  decodeText({ header }) {
    const m = /0x([0-9a-fA-F]+) Ch ([A-C])/.exec(header);
    if (!m || !m[1]) return undefined;
    const fields: Fields = {};
    setNumber(fields, 'temperature', capture(/(-?[\d.]+) C\b/, header));
    setNumber(fields, 'humidity', capture(/([\d.]+) % RH/, header));
    return { deviceId: m[1].toUpperCase(), channel: m[2], fields };
  },
  decodeJson: hexAddressedJson,
};

// 2016-08-31 16:41:39 Acurite 5n1 sensor 0x0BFA Ch C, Msg 31, Wind 15 kmph / 9.3 mph 270.0^ W (3), rain gauge 0.00 in
// 2016-08-30 23:57:25 Acurite 5n1 sensor 0x0BFA Ch C, Msg 38, Wind 2 kmph / 1.2 mph, 21.3 C 70.3 F 70 % RH
// 2016-09-27 17:09:34 Acurite 5n1 sensor 0x062C Ch A, Total rain fall since last reset: 2.00
const acurite5n1: FamilyDecoder = {
  family: 'Acurite5n1Packet',
  description: 'Acurite 5-in-1 weather sensor',
  identifier: 'Acurite 5n1 sensor',
  models: ['Acurite 5n1 sensor', 'Acurite-5n1', 'Acurite5n1'],
  decodeText({ header }) {
    const m = /0x([0-9a-fA-F]+) Ch ([A-C]),\s*(.*)/.exec(header);
    if (!m || !m[1]) return undefined;
    const deviceId = m[1].toUpperCase();
    const rest = m[3] ?? '';
    const fields: Fields = {};

    const msg = /Msg (\d+), (.*)/.exec(rest);
    if (msg) {
      const body = msg[2] ?? '';
      if (msg[1] === '31') {
        setNumber(fields, 'wind_speed', capture(/Wind ([\d.]+) kmph/, body));
        setNumber(fields, 'wind_dir', capture(/([\d.]+)\^/, body));
        setNumber(fields, 'rain_total', capture(/rain gauge ([\d.]+) in/, body), MM_PER_INCH);
      } else if (msg[1] === '38') {
        setNumber(fields, 'wind_speed', capture(/Wind ([\d.]+) kmph/, body));
        setNumber(fields, 'temperature', capture(/(-?[\d.]+) C\b/, body));
        setNumber(fields, 'humidity', capture(/([\d.]+) % RH/, body));
      } else {
        return undefined;
      }
      return { deviceId, channel: m[2], fields };
    }

    const reset = capture(/Total rain fall since last reset: ([\d.]+)/, rest);
    if (reset == null) return undefined;
    setNumber(fields, 'rain_since_reset', reset, MM_PER_INCH);
    return { deviceId, channel: m[2], fields };
  },
  decodeJson: hexAddressedJson,
};

// 2016-10-28 02:28:20 Acurite 986 sensor 0x2c87 - 2F: 20.0 C 68 F
const acurite986: FamilyDecoder = {
  family: 'Acurite986Packet',
  description: 'Acurite 986 refrigerator/freezer thermometer',
  identifier: 'Acurite 986 sensor',
  models: ['Acurite 986 sensor', 'Acurite-986', 'Acurite986'],
  decodeText({ header }) {
    const m = /0x([0-9a-fA-F]+) - (1R|2F):/.exec(header);
    if (!m || !m[1]) return undefined;
    const fields: Fields = {};
    setNumber(fields, 'temperature', capture(/: (-?[\d.]+) C\b/, header));
    return { deviceId: m[1].toUpperCase(), channel: m[2], fields };
  },
  decodeJson: hexAddressedJson,
};

// 2016-09-02 22:26:05 :Fine Offset WH1080 weather station
// StationID: 0026 / Temperature: 19.9 C / Humidity: 78 % / Wind degrees: 90
// Wind avg speed: 0.00 / Wind gust: 1.22 / Total rainfall: 144.3 / Battery: OK
const foWH1080: FamilyDecoder = {
  family: 'FOWH1080Packet',
  description: 'Fine Offset WH1080 weather station',
  identifier: 'Fine Offset WH1080 weather station',
  models: ['Fine Offset WH1080 weather station', 'Fineoffset-WH1080', 'Fine Offset Electronics WH1080/WH3080 Weather Station'],
  decodeText: lineTable(
    {
      'StationID': { name: 'station_id', convert: text },
      'Temperature': { name: 'temperature', pattern: CELSIUS, convert: num },
      'Humidity': { name: 'humidity', pattern: PERCENT, convert: num },
      'Wind degrees': { name: 'wind_dir', convert: int },
      'Wind avg speed': { name: 'wind_speed', convert: scaled(KMH_PER_MS) },
      'Wind gust': { name: 'wind_gust', convert: scaled(KMH_PER_MS) },
      'Total rainfall': { name: 'rain_total', convert: num },
      'Battery': { name: 'battery', convert: battery },
    },
    (f) => ({ deviceId: stationId(f.station_id) }),
    ['station_id']
  ),
  decodeJson(obj) {
    return { deviceId: stationId(obj.station_id ?? obj.id), fields: normalizeJsonFields(obj) };
  },
};

function stationId(value: unknown): string {
  if (typeof value === 'number' && Number.isInteger(value)) return String(value).padStart(4, '0');
  return plainId(value, '0000');
}

// 2016-08-31 17:41:30 :   HIDEKI TS04 sensor
// Rolling Code: 9 / Channel: 1 / Battery: OK / Temperature: 27.30 C / Humidity: 60 %
const hidekiTS04: FamilyDecoder = {
  family: 'HidekiTS04Packet',
  description: 'Hideki TS04 temperature/humidity sensor',
  identifier: 'HIDEKI TS04 sensor',
  models: ['HIDEKI TS04 sensor', 'Hideki-TS04'],
  decodeText: lineTable(
    {
      'Rolling Code': { name: 'rolling_code', convert: int },
      'Channel': { name: 'channel', convert: int },
      'Battery': { name: 'battery', convert: battery },
      'Temperature': { name: 'temperature', pattern: CELSIUS, convert: num },
      'Humidity': { name: 'humidity', pattern: PERCENT, convert: num },
    },
    (f) => channelCode(f, 'rolling_code'),
    ['rolling_code', 'channel']
  ),
  decodeJson: channelCodeJson(['rolling_code', 'rc', 'id']),
};

function oregon(
  family: FamilyTag,
  description: string,
  identifier: string,
  models: readonly string[],
  rules: Record<string, LineRule>
): FamilyDecoder {
  return {
    family,
    description,
    identifier,
    models,
    decodeText: lineTable({ ...HOUSE_CODE_RULES, ...rules }, (f) => channelCode(f, 'house_code'), ['house_code', 'channel']),
    decodeJson: channelCodeJson(['house_code', 'house_id', 'id']),
  };
}

// 2016-09-12 21:44:55     :       OS :    THGR122N
const osTHGR122N = oregon('OSTHGR122NPacket', 'Oregon Scientific THGR122N', 'THGR122N', ['THGR122N', 'Oregon-THGR122N'], {
  'Temperature': { name: 'temperature', pattern: CELSIUS, convert: num },
  'Humidity': { name: 'humidity', pattern: PERCENT, convert: num },
});

// 2016-11-04 02:21:37 :OS :THGR810 (older decoders print "Weather Sensor THGR810")
const osTHGR810 = oregon('OSTHGR810Packet', 'Oregon Scientific THGR810', 'THGR810', ['THGR810', 'Weather Sensor THGR810', 'Oregon-THGR810'], {
  'Celcius': { name: 'temperature', pattern: CELSIUS, convert: num },
  'Humidity': { name: 'humidity', pattern: PERCENT, convert: num },
});

// 2016-09-09 11:59:10 :   Thermo Sensor THR228N
const osTHR228N = oregon('OSTHR228NPacket', 'Oregon Scientific THR228N', 'Thermo Sensor THR228N', ['Thermo Sensor THR228N', 'THR228N', 'Oregon-THR228N'], {
  'Temperature': { name: 'temperature', pattern: CELSIUS, convert: num },
});

// 2016-11-03 04:36:23 : OS : PCR800 / Rain Rate: 0.0 in/hr / Total Rain: 41.0 in
const osPCR800 = oregon('OSPCR800Packet', 'Oregon Scientific PCR800 rain gauge', 'PCR800', ['PCR800', 'Oregon-PCR800'], {
  'Rain Rate': { name: 'rain_rate', pattern: /([\d.]+) in/, convert: scaled(MM_PER_INCH) },
  'Total Rain': { name: 'rain_total', pattern: /([\d.]+) in/, convert: scaled(MM_PER_INCH) },
});

// 2016-11-03 04:36:34 : OS : WGR800 / Gust: 1.1 m/s / Average: 1.1 m/s / Direction: 22.5 degrees
const osWGR800 = oregon('OSWGR800Packet', 'Oregon Scientific WGR800 anemometer', 'WGR800', ['WGR800', 'Oregon-WGR800'], {
  'Gust': { name: 'wind_gust', pattern: /([\d.]+) m/, convert: scaled(KMH_PER_MS) },
  'Average': { name: 'wind_speed', pattern: /([\d.]+) m/, convert: scaled(KMH_PER_MS) },
  'Direction': { name: 'wind_dir', pattern: /([\d.]+) degrees/, convert: num },
});

// 2016-09-08 00:43:52 :LaCrosse WS :9 :202
// Temperature: 21.0 C | Humidity: 92 | Wind speed: 0.0 m/s + Direction: 67.500 | Rainfall: 850.04 mm
const laCrosse: FamilyDecoder = {
  family: 'LaCrossePacket',
  description: 'LaCrosse WS2310/WS3600 weather station',
  identifier: 'LaCrosse WS',
  models: ['LaCrosse WS', 'LaCrosse-WS', 'LaCrosse-WS2310', 'LaCrosse-WS3600'],
  decodeText(packet) {
    const fields = parseLines(packet.lines, {
      'Wind speed': { name: 'wind_speed', pattern: /([\d.]+) m\/s/, convert: scaled(KMH_PER_MS) },
      'Direction': { name: 'wind_dir', convert: num },
      'Temperature': { name: 'temperature', pattern: CELSIUS, convert: num },
      'Humidity': { name: 'humidity', convert: int },
      'Rainfall': { name: 'rain_total', pattern: /([\d.]+) mm/, convert: num },
    });
    const parts = packet.header.split(':').map((p) => p.trim());
    const deviceId = parts.length === 3 ? `${parts[1]}:${parts[2]}` : '';
    return { deviceId, fields };
  },
  decodeJson(obj) {
    return { deviceId: `${plainId(obj.ws_id)}:${plainId(obj.id)}`, fields: normalizeJsonFields(obj) };
  },
};

// 2016-11-01 01:25:28 :Calibeur RF-104 / ID: 1 / Temperature: 1.8 C / Humidity: 71 %
const calibeurRF104: FamilyDecoder = {
  family: 'CalibeurRF104Packet',
  description: 'Calibeur RF-104 temperature/humidity sensor',
  identifier: 'Calibeur RF-104',
  models: ['Calibeur RF-104', 'Calibeur-RF104'],
  decodeText: lineTable(
    {
      'ID': { name: 'id', convert: int },
      'Temperature': { name: 'temperature', pattern: CELSIUS, convert: num },
      'Humidity': { name: 'humidity', pattern: PERCENT, convert: num },
    },
    (f) => ({ deviceId: plainId(f.id) }),
    ['id']
  ),
  decodeJson(obj) {
    return { deviceId: plainId(obj.id), fields: normalizeJsonFields(obj) };
  },
};

/**
 * Registered decoders. Text headers are matched by substring in this order,
 * so an identifier contained in another must come after it.
 */
export const DECODERS: readonly FamilyDecoder[] = [
  foWH1080,
  acuriteTower,
  acurite5n1,
  acurite986,
  hidekiTS04,
  osTHGR122N,
  osTHGR810,
  osTHR228N,
  osPCR800,
  osWGR800,
  laCrosse,
  calibeurRF104,
];
