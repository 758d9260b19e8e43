import { describe, test, expect, vi } from 'vitest';
import { Accumulator } from '../accumulator.js';
import { DeltaCalculator } from '../deltas.js';

describe('Accumulator', () => {
    test('last write wins per field', () => {
        const acc = new Accumulator();
        acc.update('outTemp', 20, 1_000);
        acc.update('outTemp', 21.5, 2_000);
        expect(acc.flush(3_000)).toEqual({ timestamp: 3_000, fields: { outTemp: { value: 21.5, observedAt: 2_000 } } });
    });

    test('a second flush without updates repeats the values with a new timestamp', () => {
        const acc = new Accumulator();
        acc.update('outTemp', 21.5, 1_000);
        const first = acc.flush(5_000);
        const second = acc.flush(65_000);
        expect(second.fields).toEqual(first.fields);
        expect(second.timestamp).toBe(65_000);
        expect(first.timestamp).toBe(5_000);
    });

    test('emitted batches are copies', () => {
        const acc = new Accumulator();
        acc.update('outTemp', 21.5, 1_000);
        const batch = acc.flush(2_000);
        delete batch.fields.outTemp;
        expect(acc.peek()).toEqual({ outTemp: { value: 21.5, observedAt: 1_000 } });
    });

    test('stale values are dropped at flush', () => {
        const acc = new Accumulator({ staleAfterMs: 10_000 });
        acc.update('outTemp', 21.5, 1_000);
        acc.update('outHumidity', 47, 8_000);
        expect(acc.flush(15_000).fields).toEqual({ outHumidity: { value: 47, observedAt: 8_000 } });
        expect(acc.size).toBe(1);
    });

    test('deltas are summed between flushes and cleared by a flush', () => {
        const acc = new Accumulator();
        acc.add('rain', 0.5, 1_000);
        acc.add('rain', 0.25, 2_000);
        expect(acc.peek()).toEqual({ rain: { value: 0.75, observedAt: 2_000 } });
        expect(acc.flush(3_000).fields).toEqual({ rain: { value: 0.75, observedAt: 2_000 } });
        expect(acc.flush(4_000).fields).toEqual({});
    });

    test('an empty accumulator flushes an empty batch', () => {
        expect(new Accumulator().flush(1)).toEqual({ timestamp: 1, fields: {} });
    });
});

describe('DeltaCalculator', () => {
    test('the first total only primes the counter', () => {
        const calc = new DeltaCalculator({ rain: 'rain_total' });
        expect(calc.observe('rain_total', 10)).toEqual([]);
        expect(calc.observe('rain_total', 12.5)).toEqual([{ field: 'rain', delta: 2.5 }]);
        expect(calc.observe('rain_total', 12.5)).toEqual([{ field: 'rain', delta: 0 }]);
    });

    test('a decreasing total is logged and ignored', () => {
        const log = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
        const calc = new DeltaCalculator({ rain: 'rain_total' }, log);
        calc.observe('rain_total', 10);
        expect(calc.observe('rain_total', 2)).toEqual([]);
        expect(log.info).toHaveBeenCalledWith('rain_total decrement ignored: new: 2 old: 10');
        expect(calc.observe('rain_total', 3)).toEqual([{ field: 'rain', delta: 1 }]);
    });

    test('ignores fields that feed no delta and non-numeric values', () => {
        const calc = new DeltaCalculator({ rain: 'rain_total' });
        expect(calc.observe('outTemp', 21)).toEqual([]);
        expect(calc.observe('rain_total', 'n/a')).toEqual([]);
    });
});
