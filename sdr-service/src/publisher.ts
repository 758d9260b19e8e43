import { connect, type IClientOptions, type MqttClient } from 'mqtt';
import { existsSync, readFileSync } from 'fs';
import type { EmittedBatch } from './accumulator.js';
import { errorMessage } from './errors.js';
import type { Logger } from './logger.js';
import type { FieldValue } from './packets/index.js';

export interface BatchPayload {
  timestamp: string;
  dateTime: number;
  fields: Record<string, FieldValue>;
  observedAt: Record<string, string>;
}

function isoTime(ms: number, fallback: number): string {
  const d = new Date(ms);
  return Number.isNaN(d.getTime()) ? new Date(fallback).toISOString() : d.toISOString();
}

/**
 * Wire form of a batch: values plus the capture time of each value. A time
 * outside the Date range is reported as the emission time.
 */
export function formatBatch(batch: EmittedBatch, now: number = Date.now()): BatchPayload {
  const timestamp = Number.isNaN(new Date(batch.timestamp).getTime()) ? now : batch.timestamp;
  const fields: Record<string, FieldValue> = {};
  const observedAt: Record<string, string> = {};
  for (const [name, entry] of Object.entries(batch.fields)) {
    fields[name] = entry.value;
    observedAt[name] = isoTime(entry.observedAt, timestamp);
  }
  return {
    timestamp: new Date(timestamp).toISOString(),
    dateTime: Math.floor(timestamp / 1000),
    fields,
    observedAt,
  };
}

export type BatchSink = (batch: EmittedBatch) => void;

/**
 * Flush `source` every `intervalMs` and hand the batch to `sink`. Empty
 * batches are not handed on. Returns a stop function.
 */
export function startPoller(source: { poll(now?: number): EmittedBatch }, intervalMs: number, sink: BatchSink, log: Logger): () => void {
  const timer = setInterval(() => {
    try {
      const batch = source.poll();
      if (Object.keys(batch.fields).length === 0) {
        log.debug('poll: no fields yet');
        return;
      }
      sink(batch);
    } catch (e) {
      log.error(`poll failed: ${errorMessage(e)}`);
    }
  }, intervalMs);
  timer.unref?.();
  return () => clearInterval(timer);
}

/** The part of an MQTT client the sink uses. */
export interface BatchPublisher {
  readonly connected: boolean;
  publish(topic: string, message: string, opts: { qos: 0 | 1 | 2; retain?: boolean }, callback?: (err?: Error) => void): unknown;
}

export function mqttSink(client: BatchPublisher, topic: string, log: Logger): BatchSink {
  return (batch) => {
    if (!client.connected) {
      log.warn(`MQTT not connected, dropping batch of ${Object.keys(batch.fields).length} fields`);
      return;
    }
    client.publish(topic, JSON.stringify(formatBatch(batch)), { qos: 1 }, (err) => {
      if (err) log.error(`publish to ${topic} failed: ${err.message}`);
    });
  };
}

export interface MqttSettings {
  url: string;
  username?: string;
  password?: string;
  tlsCa?: string;
  tlsCert?: string;
  tlsKey?: string;
  rejectUnauthorized: boolean;
}

export function connectMqtt(settings: MqttSettings, log: Logger): MqttClient {
  const usingTls = settings.url.startsWith('mqtts://');
  const readIf = (label: string, file: string | undefined) => {
    if (!usingTls || !file) return undefined;
    if (!existsSync(file)) {
      log.warn(`WARNING: ${label} path set but file not found: ${file}`);
      return undefined;
    }
    return readFileSync(file);
  };

  const options: IClientOptions = {
    username: settings.username,
    password: settings.password,
    reconnectPeriod: 2000,
    ca: readIf('MQTT_TLS_CA', settings.tlsCa),
    cert: readIf('MQTT_TLS_CERT', settings.tlsCert),
    key: readIf('MQTT_TLS_KEY', settings.tlsKey),
    rejectUnauthorized: settings.rejectUnauthorized,
  };

  log.info(`MQTT config: url=${settings.url} ca=${settings.tlsCa || 'unset'} cert=${settings.tlsCert || 'unset'} key=${settings.tlsKey || 'unset'} rejectUnauthorized=${settings.rejectUnauthorized}`);

  const client = connect(settings.url, options);
  client.on('connect', () => log.info('connected to MQTT'));
  client.on('error', (err) => log.error(`mqtt error: ${err.message}`));
  client.on('reconnect', () => log.info('mqtt reconnecting...'));
  client.on('close', () => log.warn('mqtt connection closed'));
  return client;
}
