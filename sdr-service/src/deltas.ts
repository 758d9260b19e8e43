import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';

export interface DeltaValue {
  field: string;
  delta: number;
}

/**
 * Turns cumulative counters (rain gauges) into per-interval amounts. The
 * first total only primes the counter; a total lower than the previous one
 * (counter reset, battery swap) yields no delta.
 */
export class DeltaCalculator {
  private readonly bySource = new Map<string, string[]>();
  private readonly last = new Map<string, number>();

  constructor(deltas: Readonly<Record<string, string>>, private readonly log: Logger = silentLogger) {
    for (const [field, source] of Object.entries(deltas)) {
      const list = this.bySource.get(source) ?? [];
      list.push(field);
      this.bySource.set(source, list);
    }
  }

  /** Feed a mapped value; returns the deltas it produces. */
  observe(field: string, value: number | string): DeltaValue[] {
    const targets = this.bySource.get(field);
    if (!targets || typeof value !== 'number') return [];
    const previous = this.last.get(field);
    this.last.set(field, value);
    if (previous == null) return [];
    if (value < previous) {
      this.log.info(`${field} decrement ignored: new: ${value} old: ${previous}`);
      return [];
    }
    return targets.map((target) => ({ field: target, delta: value - previous }));
  }
}
