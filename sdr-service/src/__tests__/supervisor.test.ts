import { describe, test, expect } from 'vitest';
import { SupervisorError } from '../errors.js';
import { ProcessSupervisor, type SpawnFn } from '../supervisor.js';
import { fakeSpawner, until } from './fakeChild.js';

describe('ProcessSupervisor', () => {
    test('passes command, args and environment through unchanged', async () => {
        const { spawn, calls } = fakeSpawner();
        const sup = new ProcessSupervisor({ spawn });
        sup.start('rtl_433', ['-q', '-F', 'json'], { PATH: '/opt/sdr/bin:/usr/bin' });
        await sup.waitUntilRunning();
        expect(calls).toEqual([{ command: 'rtl_433', args: ['-q', '-F', 'json'], env: { PATH: '/opt/sdr/bin:/usr/bin' } }]);
        expect(sup.state).toBe('running');
        await sup.stop();
    });

    test('yields stdout as complete lines and stderr as events', async () => {
        const { spawn, children } = fakeSpawner();
        const sup = new ProcessSupervisor({ spawn });
        const errors: string[] = [];
        sup.on('stderr', (line) => errors.push(line));
        const it = sup.start('rtl_433', [], {})[Symbol.asyncIterator]();
        await sup.waitUntilRunning();

        const child = children[0];
        if (!child) throw new Error('no child');
        child.stderr.write('Found Rafael Micro R820T tuner\n');
        child.stdout.write('{"model":"A"}\n{"mo');
        child.stdout.write('del":"B"}\n');

        await expect(it.next()).resolves.toEqual({ value: '{"model":"A"}', done: false });
        await expect(it.next()).resolves.toEqual({ value: '{"model":"B"}', done: false });
        await until(() => errors.length === 1);
        expect(errors).toEqual(['Found Rafael Micro R820T tuner']);
        await sup.stop();
    });

    test('restarts after an unexpected exit and discards the torn line', async () => {
        const { spawn, children } = fakeSpawner();
        const sup = new ProcessSupervisor({ spawn, minDelayMs: 10, maxDelayMs: 40 });
        const restarted: number[] = [];
        sup.on('restarted', ({ delayMs }) => restarted.push(delayMs));
        const it = sup.start('rtl_433', [], {})[Symbol.asyncIterator]();
        await sup.waitUntilRunning();

        children[0]?.stdout.write('{"model":"torn');
        children[0]?.exit(1);
        await until(() => children.length === 2 && sup.state === 'running' && restarted.length === 1);

        children[1]?.stdout.write('{"model":"fresh"}\n');
        await expect(it.next()).resolves.toEqual({ value: '{"model":"fresh"}', done: false });
        expect(restarted).toEqual([10]);
        expect(sup.restarts).toBe(1);
        await sup.stop();
    });

    test('backs off exponentially up to the ceiling', async () => {
        const { spawn, children } = fakeSpawner();
        const sup = new ProcessSupervisor({ spawn, minDelayMs: 20, maxDelayMs: 80 });
        const restarted: number[] = [];
        sup.on('restarted', ({ delayMs }) => restarted.push(delayMs));
        sup.start('rtl_433', [], {});
        await sup.waitUntilRunning();

        for (let i = 0; i < 4; i++) {
            children[i]?.exit(1);
            await until(() => restarted.length === i + 1);
        }
        expect(restarted).toEqual([20, 40, 80, 80]);
        await sup.stop();
    });

    test('gives up when the restart budget is exhausted', async () => {
        const { spawn, children } = fakeSpawner();
        const sup = new ProcessSupervisor({ spawn, minDelayMs: 5, maxDelayMs: 5, maxRestartsInWindow: 2 });
        const fatal: SupervisorError[] = [];
        sup.on('fatal', (err) => fatal.push(err));
        const it = sup.start('rtl_433', [], {})[Symbol.asyncIterator]();
        await sup.waitUntilRunning();

        children[0]?.exit(1);
        await until(() => children.length === 2 && sup.state === 'running');
        children[1]?.exit(1);
        await until(() => children.length === 3 && sup.state === 'running');
        children[2]?.exit(1);
        await until(() => sup.state === 'failed');

        expect(fatal).toHaveLength(1);
        expect(sup.failure?.code).toBe('RESTART_BUDGET_EXHAUSTED');
        await expect(it.next()).resolves.toEqual({ value: undefined, done: true });
        expect(children).toHaveLength(3);
    });

    test('a missing executable is fatal without retries', async () => {
        const { spawn, calls } = fakeSpawner({ missing: true });
        const sup = new ProcessSupervisor({ spawn, minDelayMs: 5 });
        const stream = sup.start('no-such-decoder', [], {});

        const err = await sup.waitUntilRunning().then(() => undefined, (e: unknown) => e);
        expect(err).toBeInstanceOf(SupervisorError);
        expect(err instanceof SupervisorError ? err.code : undefined).toBe('ENOENT_EXECUTABLE');

        const lines: string[] = [];
        for await (const line of stream) lines.push(line);
        expect(lines).toEqual([]);
        expect(calls).toHaveLength(1);
        expect(sup.state).toBe('failed');
    });

    test('a spawn function that throws is fatal', async () => {
        const spawn: SpawnFn = () => {
            throw new Error('EACCES');
        };
        const sup = new ProcessSupervisor({ spawn });
        sup.start('rtl_433', [], {});
        await expect(sup.waitUntilRunning()).rejects.toThrow("failed to start 'rtl_433': EACCES");
        expect(sup.failure?.code).toBe('SPAWN_FAILED');
    });

    test('stop terminates the child and ends the stream', async () => {
        const { spawn, children } = fakeSpawner();
        const sup = new ProcessSupervisor({ spawn, minDelayMs: 5 });
        const stream = sup.start('rtl_433', [], {});
        await sup.waitUntilRunning();

        await sup.stop();
        expect(children[0]?.signals).toEqual(['SIGTERM']);
        expect(sup.state).toBe('stopped');
        const lines: string[] = [];
        for await (const line of stream) lines.push(line);
        expect(lines).toEqual([]);
        await new Promise((resolve) => setTimeout(resolve, 20));
        expect(children).toHaveLength(1);
    });

    test('stop escalates to SIGKILL when SIGTERM is ignored', async () => {
        const { spawn, children } = fakeSpawner({ ignoreTerm: true });
        const sup = new ProcessSupervisor({ spawn, killGraceMs: 10 });
        sup.start('rtl_433', [], {});
        await sup.waitUntilRunning();

        await sup.stop();
        expect(children[0]?.signals).toEqual(['SIGTERM', 'SIGKILL']);
        expect(sup.state).toBe('stopped');
    });

    test('start refuses to run twice', () => {
        const { spawn } = fakeSpawner();
        const sup = new ProcessSupervisor({ spawn });
        sup.start('rtl_433', [], {});
        expect(() => sup.start('rtl_433', [], {})).toThrow('supervisor already starting');
    });
});
