import type { FieldValue } from './packets/index.js';

export interface ObservedValue {
  value: FieldValue;
  /** Capture time of the packet that set the value, epoch ms. */
  observedAt: number;
}

export type OutputSnapshot = Record<string, ObservedValue>;

export interface EmittedBatch {
  /** Emission time, epoch ms. */
  timestamp: number;
  fields: OutputSnapshot;
}

export interface AccumulatorOptions {
  /** Drop values older than this at flush; 0 keeps them until overwritten. */
  staleAfterMs?: number;
}

/**
 * Latest value per output field. Gauge values survive flushes so a sensor
 * that reports every few minutes stays visible between reports; delta fields
 * are summed between flushes and cleared by each flush.
 *
 * All access happens on the event loop, so update and flush never interleave
 * within a field.
 */
export class Accumulator {
  private readonly snapshot = new Map<string, ObservedValue>();
  private readonly deltas = new Map<string, ObservedValue & { value: number }>();
  private readonly staleAfterMs: number;

  constructor(opts: AccumulatorOptions = {}) {
    this.staleAfterMs = Math.max(0, opts.staleAfterMs ?? 0);
  }

  update(field: string, value: FieldValue, observedAt: number): void {
    this.deltas.delete(field);
    this.snapshot.set(field, { value, observedAt });
  }

  add(field: string, delta: number, observedAt: number): void {
    const current = this.deltas.get(field);
    this.deltas.set(field, {
      value: (current?.value ?? 0) + delta,
      observedAt: Math.max(current?.observedAt ?? observedAt, observedAt),
    });
  }

  flush(now: number = Date.now()): EmittedBatch {
    if (this.staleAfterMs > 0) {
      for (const [field, entry] of this.snapshot) {
        if (now - entry.observedAt > this.staleAfterMs) this.snapshot.delete(field);
      }
    }
    const fields: OutputSnapshot = {};
    for (const [field, entry] of this.snapshot) fields[field] = { ...entry };
    for (const [field, entry] of this.deltas) fields[field] = { value: entry.value, observedAt: entry.observedAt };
    this.deltas.clear();
    return { timestamp: now, fields };
  }

  /** Current values without consuming deltas. */
  peek(): OutputSnapshot {
    const fields: OutputSnapshot = {};
    for (const [field, entry] of this.snapshot) fields[field] = { ...entry };
    for (const [field, entry] of this.deltas) fields[field] = { value: entry.value, observedAt: entry.observedAt };
    return fields;
  }

  get size(): number {
    return this.snapshot.size + this.deltas.size;
  }
}
