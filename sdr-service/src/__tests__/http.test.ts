import { describe, test, expect, afterEach } from 'vitest';
import http from 'http';
import type { Express } from 'express';
import { createApp } from '../http.js';
import { parseSensorMapConfig } from '../mapping.js';
import { IngestionPipeline } from '../pipeline.js';
import { fakeSpawner } from './fakeChild.js';

const servers: http.Server[] = [];

async function serve(app: Express): Promise<string> {
    const server = http.createServer(app);
    servers.push(server);
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('server has no port');
    return `http://127.0.0.1:${address.port}`;
}

async function getJson(url: string): Promise<{ status: number; body: unknown }> {
    const res = await fetch(url);
    return { status: res.status, body: await res.json() };
}

function rainPipeline(opts: { spawnMissing?: boolean } = {}): IngestionPipeline {
    const { spawn } = fakeSpawner({ missing: opts.spawnMissing });
    return new IngestionPipeline({
        command: 'rtl_433',
        args: [],
        env: {},
        sensorMap: parseSensorMapConfig({ sensorMap: { rain_total: 'rain_total.0BFA.Acurite5n1Packet' } }),
        clock: () => 1_000,
        supervisor: { spawn },
    });
}

function rainFell(p: IngestionPipeline): void {
    p.ingest(['{"model":"Acurite5n1","id":"0BFA","rain_mm":1}']);
    p.ingest(['{"model":"Acurite5n1","id":"0BFA","rain_mm":3}']);
}

afterEach(async () => {
    await Promise.all(servers.splice(0).map((s) => new Promise<void>((resolve) => {
        s.close(() => resolve());
        s.closeAllConnections();
    })));
});

describe('HTTP poll API', () => {
    test('GET /api/batch leaves deltas to the MQTT poller by default', async () => {
        const p = rainPipeline();
        rainFell(p);
        const base = await serve(createApp(p, { accessLog: false }));

        const first = await getJson(`${base}/api/batch`);
        const second = await getJson(`${base}/api/batch`);
        expect(first.status).toBe(200);
        expect(first.body).toHaveProperty('fields', { rain_total: 3, rain: 2 });
        expect(second.body).toHaveProperty('fields', { rain_total: 3, rain: 2 });
        expect(p.poll(2_000).fields).toEqual({
            rain_total: { value: 3, observedAt: 1_000 },
            rain: { value: 2, observedAt: 1_000 },
        });
    });

    test('GET /api/batch consumes the batch when HTTP is the consumer', async () => {
        const p = rainPipeline();
        rainFell(p);
        const base = await serve(createApp(p, { accessLog: false, flushOnBatch: true }));

        expect((await getJson(`${base}/api/batch`)).body).toHaveProperty('fields', { rain_total: 3, rain: 2 });
        expect((await getJson(`${base}/api/batch`)).body).toHaveProperty('fields', { rain_total: 3 });
    });

    test('GET /api/health is 200 while the decoder has not failed', async () => {
        const p = rainPipeline();
        const base = await serve(createApp(p, { accessLog: false }));
        const res = await fetch(`${base}/api/health`);
        expect(res.status).toBe(200);
        expect(res.headers.get('cache-control')).toBe('no-store, no-cache, must-revalidate, proxy-revalidate');
        expect(await res.json()).toMatchObject({ ok: true, state: 'idle', restarts: 0, fields: 0 });
    });

    test('GET /api/health is 503 once the decoder failed', async () => {
        const p = rainPipeline({ spawnMissing: true });
        await expect(p.start()).rejects.toThrow("executable not found: 'rtl_433'");
        const base = await serve(createApp(p, { accessLog: false }));

        const { status, body } = await getJson(`${base}/api/health`);
        expect(status).toBe(503);
        expect(body).toMatchObject({ ok: false, state: 'failed', error: { code: 'ENOENT_EXECUTABLE' } });
    });

    test('GET /api/sensors lists detected sensors with their keys', async () => {
        const p = rainPipeline();
        rainFell(p);
        const base = await serve(createApp(p, { accessLog: false }));

        const { body } = await getJson(`${base}/api/sensors`);
        expect(body).toEqual([{
            label: '0BFA.Acurite5n1Packet',
            family: 'Acurite5n1Packet',
            deviceId: '0BFA',
            packets: 2,
            firstSeen: '1970-01-01T00:00:01.000Z',
            lastSeen: '1970-01-01T00:00:01.000Z',
            observations: ['rain_total'],
            keys: ['rain_total.0BFA.Acurite5n1Packet'],
        }]);
    });

    test('unknown paths answer 404 JSON', async () => {
        const base = await serve(createApp(rainPipeline(), { accessLog: false }));
        expect(await getJson(`${base}/nope`)).toEqual({ status: 404, body: { error: 'not found' } });
    });
});
