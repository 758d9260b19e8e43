/**
 * SDR Service
 * ---------------------------------------------
 * Purpose
 * - Turn the packet stream of a radio decoder (rtl_433) into weather-station
 *   observations recorded on a fixed cadence.
 *
 * Responsibilities
 * - Run and supervise the decoder; restart it with backoff when it exits.
 * - Parse each packet into a sensor record (family, device id, canonical fields).
 * - Map `{observation}.{deviceId}.{family}` keys to output fields via the sensor map.
 * - Keep the latest value per output field; publish a batch every POLL_INTERVAL_MS
 *   on BATCH_TOPIC, or hand batches out over HTTP when BATCH_CONSUMER=http.
 *
 * Environment & Dependencies
 * - SDR_CMD, SDR_PATH, SDR_LD_LIBRARY_PATH: decoder invocation.
 * - SENSOR_MAP_FILE: JSON sensor map (fatal if missing or malformed).
 * - LOG_UNKNOWN_SENSORS, LOG_UNMAPPED_SENSORS: diagnostics for sensor discovery.
 * - MQTT_URL, MQTT_USERNAME, MQTT_PASSWORD, MQTT_TLS_*: broker connection.
 * - BATCH_CONSUMER: `mqtt` (default) or `http`; only the consumer flushes batches.
 * - PORT: HTTP poll API.
 *
 * Operational Notes
 * - The decoder's stderr is drained separately and only logged at debug level.
 * - A missing decoder executable, or more than RESTART_MAX_IN_WINDOW restarts
 *   within RESTART_WINDOW_MS, stops the service with exit code 1.
 * - SIGINT/SIGTERM stop the decoder before the process exits.
 */
import http from 'http';
import type { MqttClient } from 'mqtt';
import {
  SERVICE,
  SDR_CMD,
  SDR_PATH,
  SDR_LD_LIBRARY_PATH,
  SENSOR_MAP_FILE,
  LOG_UNKNOWN_SENSORS,
  LOG_UNMAPPED_SENSORS,
  DEBUG,
  POLL_INTERVAL_MS,
  STALE_AFTER_MS,
  RESTART_MIN_MS,
  RESTART_MAX_MS,
  RESTART_WINDOW_MS,
  RESTART_MAX_IN_WINDOW,
  PACKET_IDLE_MS,
  PORT,
  MQTT_URL,
  MQTT_USERNAME,
  MQTT_PASSWORD,
  MQTT_TLS_CA,
  MQTT_TLS_CERT,
  MQTT_TLS_KEY,
  MQTT_TLS_REJECT_UNAUTHORIZED,
  BATCH_TOPIC,
  BATCH_CONSUMER,
  buildChildEnv,
  parseBatchConsumer,
  splitCommand,
} from './config.js';
import { errorMessage } from './errors.js';
import { createApp } from './http.js';
import { createLogger } from './logger.js';
import { loadSensorMapFile } from './mapping.js';
import { IngestionPipeline } from './pipeline.js';
import { connectMqtt, mqttSink, startPoller } from './publisher.js';

const log = createLogger(SERVICE, { debug: DEBUG });

function registerShutdown(pipeline: IngestionPipeline, server: http.Server, mqttClient: MqttClient | null, stopPoller: () => void): void {
  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    log.info(`received ${signal}, shutting down...`);
    stopPoller();
    try {
      await pipeline.stop();
    } catch (error) {
      log.warn(`Error stopping decoder: ${errorMessage(error)}`);
    }
    server.close();
    mqttClient?.end();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

async function main() {
  log.info('starting...');

  const consumer = parseBatchConsumer(BATCH_CONSUMER);
  const sensorMap = loadSensorMapFile(SENSOR_MAP_FILE);
  log.info(`sensor map ${SENSOR_MAP_FILE}: ${sensorMap.entries.map((e) => `${e.field}=${e.pattern}`).join(', ')}`);
  log.info(`deltas: ${JSON.stringify(sensorMap.deltas)}`);

  const { command, args } = splitCommand(SDR_CMD);
  const pipeline = new IngestionPipeline({
    command,
    args,
    env: buildChildEnv(process.env, { path: SDR_PATH, ldLibraryPath: SDR_LD_LIBRARY_PATH }),
    sensorMap,
    logUnknown: LOG_UNKNOWN_SENSORS,
    logUnmapped: LOG_UNMAPPED_SENSORS,
    staleAfterMs: STALE_AFTER_MS,
    packetIdleMs: PACKET_IDLE_MS,
    supervisor: {
      minDelayMs: RESTART_MIN_MS,
      maxDelayMs: RESTART_MAX_MS,
      windowMs: RESTART_WINDOW_MS,
      maxRestartsInWindow: RESTART_MAX_IN_WINDOW,
    },
    logger: log,
  });

  await pipeline.start();

  let mqttClient: MqttClient | null = null;
  let stopPoller = () => {};
  if (consumer === 'mqtt') {
    const client = connectMqtt({
      url: MQTT_URL,
      username: MQTT_USERNAME,
      password: MQTT_PASSWORD,
      tlsCa: MQTT_TLS_CA,
      tlsCert: MQTT_TLS_CERT,
      tlsKey: MQTT_TLS_KEY,
      rejectUnauthorized: MQTT_TLS_REJECT_UNAUTHORIZED,
    }, log);
    stopPoller = startPoller(pipeline, POLL_INTERVAL_MS, mqttSink(client, BATCH_TOPIC, log), log);
    mqttClient = client;
  }

  const server = http.createServer(createApp(pipeline, { flushOnBatch: consumer === 'http' }));
  server.listen(PORT, () => {
    const mode = consumer === 'mqtt' ? `publishing to ${BATCH_TOPIC} every ${POLL_INTERVAL_MS}ms` : 'batches served on GET /api/batch';
    log.info(`listening on :${PORT}, ${mode}`);
  });

  registerShutdown(pipeline, server, mqttClient, stopPoller);

  try {
    await pipeline.done;
  } catch (error) {
    log.error(`decoder failed: ${errorMessage(error)}`);
    stopPoller();
    server.close();
    mqttClient?.end();
    process.exitCode = 1;
  }
}

main().catch((e) => {
  log.error(`startup failed: ${errorMessage(e)}`);
  process.exitCode = 1;
});
