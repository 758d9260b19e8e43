import { EventEmitter } from 'eventemitter3';
import { Accumulator, type EmittedBatch, type OutputSnapshot } from './accumulator.js';
import { DeltaCalculator } from './deltas.js';
import { errorMessage } from './errors.js';
import { recordKeys, sensorLabel } from './identity.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import { MappingEngine, type SensorMap } from './mapping.js';
import { PacketAssembler, parsePacket, shapeSignature, type FamilyTag, type FieldValue, type ParsedRecord } from './packets/index.js';
import { ProcessSupervisor, type LineStream, type SupervisorOptions } from './supervisor.js';

export interface PipelineOptions {
  command: string;
  args: string[];
  env: Record<string, string>;
  sensorMap: SensorMap;
  logUnknown?: boolean;
  logUnmapped?: boolean;
  staleAfterMs?: number;
  packetIdleMs?: number;
  supervisor?: SupervisorOptions;
  logger?: Logger;
  clock?: () => number;
}

export interface PipelineCounters {
  lines: number;
  packets: number;
  parsed: number;
  unknown: number;
  mappedValues: number;
  unmappedValues: number;
  restarts: number;
  stderrLines: number;
}

export interface DetectedSensor {
  label: string;
  family: FamilyTag;
  deviceId: string;
  channel?: string;
  packets: number;
  firstSeen: number;
  lastSeen: number;
  observations: string[];
}

export type Diagnostic =
  | { kind: 'unknown'; signature: string; lines: string[] }
  | { kind: 'unmapped'; key: string; value: FieldValue }
  | { kind: 'stderr'; line: string }
  | { kind: 'restarted'; attempt: number; delayMs: number };

export interface PipelineEvents {
  record: (record: ParsedRecord) => void;
  diagnostic: (d: Diagnostic) => void;
}

const DETECTED_LIMIT = 1_000;

/**
 * Decoder output -> parsed records -> identity keys -> output fields -> accumulator.
 *
 * One background task drains the supervisor's line stream; `poll()` only
 * touches the accumulator and never waits on the decoder.
 */
export class IngestionPipeline extends EventEmitter<PipelineEvents> {
  readonly supervisor: ProcessSupervisor;
  readonly mapping: MappingEngine;
  readonly accumulator: Accumulator;

  private readonly opts: PipelineOptions;
  private readonly log: Logger;
  private readonly clock: () => number;
  private readonly deltas: DeltaCalculator;
  private readonly assembler: PacketAssembler;
  private readonly unknownSignatures = new Set<string>();
  private readonly detected = new Map<string, DetectedSensor>();
  private abort: AbortController | null = null;
  private task: Promise<void> | null = null;

  readonly counters: PipelineCounters = {
    lines: 0,
    packets: 0,
    parsed: 0,
    unknown: 0,
    mappedValues: 0,
    unmappedValues: 0,
    restarts: 0,
    stderrLines: 0,
  };

  constructor(opts: PipelineOptions) {
    super();
    this.opts = opts;
    this.log = opts.logger ?? silentLogger;
    this.clock = opts.clock ?? Date.now;
    this.supervisor = new ProcessSupervisor({ logger: this.log, ...opts.supervisor });
    this.mapping = new MappingEngine(opts.sensorMap, {
      logUnmapped: opts.logUnmapped,
      logger: this.log,
      onUnmapped: (key, value) => this.emit('diagnostic', { kind: 'unmapped', key, value }),
    });
    this.accumulator = new Accumulator({ staleAfterMs: opts.staleAfterMs });
    this.deltas = new DeltaCalculator(opts.sensorMap.deltas, this.log);
    this.assembler = new PacketAssembler((lines) => this.ingest(lines), opts.packetIdleMs);

    this.supervisor.on('stderr', (line) => {
      this.counters.stderrLines++;
      this.log.debug(`decoder stderr: ${line}`);
      this.emit('diagnostic', { kind: 'stderr', line });
    });
    this.supervisor.on('restarted', ({ attempt, delayMs }) => {
      this.counters.restarts++;
      this.emit('diagnostic', { kind: 'restarted', attempt, delayMs });
    });
  }

  /**
   * Start the decoder and the ingestion task. Rejects with a SupervisorError
   * when the decoder cannot be started at all.
   */
  async start(): Promise<void> {
    if (this.task) throw new Error('pipeline already started');
    for (const w of this.opts.sensorMap.warnings) this.log.warn(`sensor map: ${w}`);
    this.abort = new AbortController();
    const stream = this.supervisor.start(this.opts.command, this.opts.args, this.opts.env);
    this.task = this.run(stream, this.abort.signal);
    // the rejection stays observable through `done`
    this.task.catch((err) => this.log.debug(`ingestion task ended: ${errorMessage(err)}`));
    await this.supervisor.waitUntilRunning();
  }

  /** Settles when the ingestion task ends; rejects on a fatal decoder failure. */
  get done(): Promise<void> {
    return this.task ?? Promise.resolve();
  }

  /** Stop ingesting; resolves after the decoder process has exited. */
  async stop(): Promise<void> {
    this.abort?.abort();
    await this.supervisor.stop();
    try {
      await this.task;
    } catch (err) {
      this.log.debug(`ingestion ended with: ${errorMessage(err)}`);
    }
  }

  /** Emit the current batch. */
  poll(now: number = this.clock()): EmittedBatch {
    return this.accumulator.flush(now);
  }

  snapshot(): OutputSnapshot {
    return this.accumulator.peek();
  }

  detectedSensors(): DetectedSensor[] {
    return [...this.detected.values()].sort((a, b) => b.lastSeen - a.lastSeen);
  }

  /** Process one packet (a JSON line, or a text header plus continuation lines). */
  ingest(lines: string[]): ParsedRecord | undefined {
    this.counters.packets++;
    const record = parsePacket(lines, this.clock());
    if (!record) {
      this.counters.unknown++;
      this.reportUnknown(lines);
      return undefined;
    }
    this.counters.parsed++;
    this.trackDetected(record);
    this.emit('record', record);

    for (const { key, value } of recordKeys(record, this.opts.sensorMap.keyOrder)) {
      const mapped = this.mapping.mapAll(key, value);
      if (mapped.length === 0) {
        this.counters.unmappedValues++;
        continue;
      }
      for (const m of mapped) {
        this.counters.mappedValues++;
        this.accumulator.update(m.field, m.value, record.timestamp);
        for (const d of this.deltas.observe(m.field, m.value)) {
          this.accumulator.add(d.field, d.delta, record.timestamp);
        }
      }
    }
    return record;
  }

  private async run(stream: LineStream, signal: AbortSignal): Promise<void> {
    try {
      for await (const line of stream) {
        if (signal.aborted) break;
        this.counters.lines++;
        this.assembler.push(line);
      }
    } finally {
      this.assembler.flush();
    }
    const failure = this.supervisor.failure;
    if (failure && !signal.aborted) throw failure;
  }

  private reportUnknown(lines: string[]): void {
    const signature = shapeSignature(lines);
    if (this.unknownSignatures.has(signature)) return;
    this.unknownSignatures.add(signature);
    if (!this.opts.logUnknown) return;
    this.log.info(`unknown sensor: ${lines.join(' | ')}`);
    this.emit('diagnostic', { kind: 'unknown', signature, lines: [...lines] });
  }

  private trackDetected(record: ParsedRecord): void {
    const label = sensorLabel(record);
    const now = record.timestamp;
    const existing = this.detected.get(label);
    if (existing) {
      existing.packets++;
      existing.lastSeen = Math.max(existing.lastSeen, now);
      for (const name of Object.keys(record.fields)) {
        if (!existing.observations.includes(name)) existing.observations.push(name);
      }
      return;
    }
    if (this.detected.size >= DETECTED_LIMIT) {
      const oldest = this.detectedSensors().pop();
      if (oldest) this.detected.delete(oldest.label);
    }
    this.detected.set(label, {
      label,
      family: record.family,
      deviceId: record.deviceId,
      ...(record.channel != null ? { channel: record.channel } : {}),
      packets: 1,
      firstSeen: now,
      lastSeen: now,
      observations: Object.keys(record.fields),
    });
  }
}

export type { EmittedBatch, OutputSnapshot } from './accumulator.js';
export type { ParsedRecord } from './packets/index.js';
