import path from 'path';
import dotenv from 'dotenv';

dotenv.config();

export const SERVICE = 'sdr-service';

const NODE_ENV = process.env.NODE_ENV || 'development';

function envBool(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (raw == null || raw === '') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase());
}

function envNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw == null || raw.trim() === '') return fallback;
  const n = Number(raw);
  return Number.isFinite(n) ? n : fallback;
}

// Decoder invocation. -q: suppress banner noise, -U: UTC timestamps, -F json: one JSON object per packet
export const SDR_CMD: string = process.env.SDR_CMD || 'rtl_433 -q -U -F json';
export const SDR_PATH: string | undefined = process.env.SDR_PATH || undefined; // prepended to PATH of the child
export const SDR_LD_LIBRARY_PATH: string | undefined = process.env.SDR_LD_LIBRARY_PATH || undefined;

// Sensor map (output field -> identity key pattern), deltas and key order
export const SENSOR_MAP_FILE: string = process.env.SENSOR_MAP_FILE || (
  NODE_ENV === 'production'
    ? '/etc/sdr-service/sensor-map.json'
    : path.resolve(process.cwd(), 'sensor-map.json')
);

export const LOG_UNKNOWN_SENSORS: boolean = envBool('LOG_UNKNOWN_SENSORS', false);
export const LOG_UNMAPPED_SENSORS: boolean = envBool('LOG_UNMAPPED_SENSORS', false);
export const DEBUG: boolean = envBool('DEBUG', false);

// Batch cadence and staleness (0 keeps last known values forever)
export const POLL_INTERVAL_MS: number = envNumber('POLL_INTERVAL_MS', 60_000);
export const STALE_AFTER_MS: number = envNumber('STALE_AFTER_MS', 0);

// Supervisor restart policy
export const RESTART_MIN_MS: number = envNumber('RESTART_MIN_MS', 1_000);
export const RESTART_MAX_MS: number = envNumber('RESTART_MAX_MS', 60_000);
export const RESTART_WINDOW_MS: number = envNumber('RESTART_WINDOW_MS', 10 * 60_000);
export const RESTART_MAX_IN_WINDOW: number = envNumber('RESTART_MAX_IN_WINDOW', 10);

// A multi-line text packet is complete once no continuation line arrived for this long
export const PACKET_IDLE_MS: number = envNumber('PACKET_IDLE_MS', 3_000);

// Which side consumes batches (and the deltas they carry): the MQTT poller or GET /api/batch
export type BatchConsumer = 'mqtt' | 'http';
export const BATCH_CONSUMER: string = process.env.BATCH_CONSUMER || 'mqtt';

export const PORT: number = envNumber('PORT', 8095);

// MQTT connection settings (mirrors other services)
export const MQTT_URL: string = process.env.MQTT_URL || 'mqtt://127.0.0.1:1883';
export const MQTT_USERNAME: string | undefined = process.env.MQTT_USERNAME || undefined;
export const MQTT_PASSWORD: string | undefined = process.env.MQTT_PASSWORD || undefined;
export const MQTT_TLS_CA: string | undefined = process.env.MQTT_TLS_CA || undefined; // e.g., ../config/certs/ca.crt
export const MQTT_TLS_CERT: string | undefined = process.env.MQTT_TLS_CERT || undefined;
export const MQTT_TLS_KEY: string | undefined = process.env.MQTT_TLS_KEY || undefined;
export const MQTT_TLS_REJECT_UNAUTHORIZED: boolean = (process.env.MQTT_TLS_REJECT_UNAUTHORIZED ?? 'true') !== 'false';
export const BATCH_TOPIC: string = process.env.BATCH_TOPIC || 'sdr/weather/loop';

/**
 * Build the child environment from the parent's, applying the PATH and
 * LD_LIBRARY_PATH overrides. Nothing here looks at the filesystem.
 */
export function buildChildEnv(
  base: NodeJS.ProcessEnv,
  opts: { path?: string; ldLibraryPath?: string }
): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [k, v] of Object.entries(base)) {
    if (v != null) env[k] = v;
  }
  if (opts.path) env.PATH = env.PATH ? `${opts.path}:${env.PATH}` : opts.path;
  if (opts.ldLibraryPath) env.LD_LIBRARY_PATH = opts.ldLibraryPath;
  return env;
}

export function parseBatchConsumer(raw: string): BatchConsumer {
  const v = raw.trim().toLowerCase();
  if (v === 'mqtt') return 'mqtt';
  if (v === 'http') return 'http';
  throw new Error(`BATCH_CONSUMER must be 'mqtt' or 'http', got '${raw}'`);
}

/** Split a command line on whitespace into executable and arguments. */
export function splitCommand(cmd: string): { command: string; args: string[] } {
  const parts = cmd.trim().split(/\s+/).filter(Boolean);
  const [command = '', ...args] = parts;
  return { command, args };
}
