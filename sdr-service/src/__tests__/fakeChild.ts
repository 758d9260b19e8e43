import { EventEmitter } from 'events';
import { PassThrough } from 'stream';
import type { SpawnFn } from '../supervisor.js';

/** Child process stand-in driven by the test. */
export class FakeChild extends EventEmitter {
    readonly stdout = new PassThrough();
    readonly stderr = new PassThrough();
    readonly signals: NodeJS.Signals[] = [];

    constructor(readonly pid: number, private readonly ignoreTerm = false) {
        super();
    }

    kill(signal: NodeJS.Signals = 'SIGTERM'): boolean {
        this.signals.push(signal);
        if (signal === 'SIGTERM' && this.ignoreTerm) return true;
        this.exit(null, signal);
        return true;
    }

    exit(code: number | null, signal: NodeJS.Signals | null = null): void {
        this.stdout.end();
        this.stderr.end();
        setTimeout(() => this.emit('close', code, signal), 5);
    }
}

export interface SpawnCall {
    command: string;
    args: string[];
    env: Record<string, string>;
}

export function fakeSpawner(opts: { ignoreTerm?: boolean; missing?: boolean } = {}) {
    const children: FakeChild[] = [];
    const calls: SpawnCall[] = [];
    const spawn: SpawnFn = (command, args, options) => {
        calls.push({ command, args, env: options.env });
        const child = new FakeChild(100 + children.length, opts.ignoreTerm);
        children.push(child);
        setImmediate(() => {
            if (opts.missing) child.emit('error', Object.assign(new Error(`spawn ${command} ENOENT`), { code: 'ENOENT' }));
            else child.emit('spawn');
        });
        return child;
    };
    return { spawn, children, calls };
}

export async function until(cond: () => boolean, timeoutMs = 2_000): Promise<void> {
    const deadline = Date.now() + timeoutMs;
    while (!cond()) {
        if (Date.now() > deadline) throw new Error('condition not met in time');
        await new Promise((resolve) => setTimeout(resolve, 2));
    }
}
