import { describe, test, expect } from 'vitest';
import { Channel } from '../channel.js';
import { LineBuffer } from '../lines.js';

describe('LineBuffer', () => {
    test('joins lines split across chunks', () => {
        const buf = new LineBuffer();
        expect(buf.push('{"model":"Acu')).toEqual([]);
        expect(buf.push('rite5n1"}\n{"a"')).toEqual(['{"model":"Acurite5n1"}']);
        expect(buf.push(':1}\n')).toEqual(['{"a":1}']);
        expect(buf.discard()).toBe('');
    });

    test('accepts CRLF and skips blank lines', () => {
        const buf = new LineBuffer();
        expect(buf.push(Buffer.from('one\r\n\r\n  \ntwo\n'))).toEqual(['one', 'two']);
    });

    test('keeps a UTF-8 character split across chunks intact', () => {
        const buf = new LineBuffer();
        const bytes = Buffer.from('21.5 °C\n', 'utf8');
        const cut = bytes.indexOf(0xb0);
        expect(buf.push(bytes.subarray(0, cut))).toEqual([]);
        expect(buf.push(bytes.subarray(cut))).toEqual(['21.5 °C']);
    });

    test('discard drops the torn tail', () => {
        const buf = new LineBuffer();
        buf.push('complete\npart');
        expect(buf.discard()).toBe('part');
        expect(buf.push('ial\n')).toEqual(['ial']);
    });
});

describe('Channel', () => {
    test('delivers pushed items in order, then ends on close', async () => {
        const ch = new Channel<number>();
        ch.push(1);
        ch.push(2);
        ch.close();
        const seen: number[] = [];
        for await (const n of ch) seen.push(n);
        expect(seen).toEqual([1, 2]);
        expect(ch.push(3)).toBe(false);
    });

    test('a waiting reader receives the next push', async () => {
        const ch = new Channel<string>();
        const pending = ch.next();
        ch.push('x');
        await expect(pending).resolves.toEqual({ value: 'x', done: false });
    });

    test('close wakes a waiting reader', async () => {
        const ch = new Channel<string>();
        const pending = ch.next();
        ch.close();
        await expect(pending).resolves.toEqual({ value: undefined, done: true });
    });

    test('breaking out of for-await closes the channel', async () => {
        const ch = new Channel<number>();
        ch.push(1);
        ch.push(2);
        for await (const n of ch) {
            expect(n).toBe(1);
            break;
        }
        expect(ch.push(3)).toBe(false);
    });
});
