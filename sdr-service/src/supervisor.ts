import { spawn as nodeSpawn } from 'child_process';
import { EventEmitter } from 'eventemitter3';
import { Channel } from './channel.js';
import { LineBuffer } from './lines.js';
import { SupervisorError, errorMessage } from './errors.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';

/** The parts of a ChildProcess the supervisor relies on. */
export interface ChildHandle {
  readonly pid?: number;
  readonly stdout: NodeJS.ReadableStream | null;
  readonly stderr: NodeJS.ReadableStream | null;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: 'spawn', listener: () => void): unknown;
  once(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
}

export type SpawnFn = (
  command: string,
  args: string[],
  options: { env: Record<string, string>; stdio: ['ignore', 'pipe', 'pipe'] }
) => ChildHandle;

export interface SupervisorOptions {
  /** Restart backoff floor and ceiling. */
  minDelayMs?: number;
  maxDelayMs?: number;
  /** More than `maxRestartsInWindow` restarts within `windowMs` is fatal. */
  windowMs?: number;
  maxRestartsInWindow?: number;
  /** Time between SIGTERM and SIGKILL on shutdown. */
  killGraceMs?: number;
  logger?: Logger;
  spawn?: SpawnFn;
}

export type SupervisorState = 'idle' | 'starting' | 'running' | 'backoff' | 'stopping' | 'stopped' | 'failed';

export interface SupervisorEvents {
  started: (info: { pid?: number; attempt: number }) => void;
  restarted: (info: { pid?: number; attempt: number; delayMs: number }) => void;
  exit: (info: { code: number | null; signal: NodeJS.Signals | null; uptimeMs: number }) => void;
  stderr: (line: string) => void;
  fatal: (err: SupervisorError) => void;
}

export type LineStream = AsyncIterable<string>;

export class ProcessSupervisor extends EventEmitter<SupervisorEvents> {
  private readonly minDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly windowMs: number;
  private readonly maxRestartsInWindow: number;
  private readonly killGraceMs: number;
  private readonly log: Logger;
  private readonly spawnFn: SpawnFn;

  private command = '';
  private args: string[] = [];
  private env: Record<string, string> = {};

  private child: ChildHandle | null = null;
  private childStartedAt = 0;
  private channel: Channel<string> | null = null;
  private restartTimer: NodeJS.Timeout | null = null;
  private restartTimes: number[] = [];
  private attempt = 0;
  private spawnCount = 0;
  private lastDelayMs = 0;
  private exited: Promise<void> = Promise.resolve();

  state: SupervisorState = 'idle';
  failure: SupervisorError | null = null;

  constructor(opts: SupervisorOptions = {}) {
    super();
    this.minDelayMs = opts.minDelayMs ?? 1_000;
    this.maxDelayMs = Math.max(this.minDelayMs, opts.maxDelayMs ?? 60_000);
    this.windowMs = opts.windowMs ?? 10 * 60_000;
    this.maxRestartsInWindow = opts.maxRestartsInWindow ?? 10;
    this.killGraceMs = opts.killGraceMs ?? 5_000;
    this.log = opts.logger ?? silentLogger;
    this.spawnFn = opts.spawn ?? nodeSpawn;
  }

  get restarts(): number {
    return Math.max(0, this.spawnCount - 1);
  }

  /**
   * Launch the decoder and return its stdout as a line stream. The stream
   * ends on `stop()` or on a fatal error; check `failure` afterwards.
   */
  start(command: string, args: string[], env: Record<string, string>): LineStream {
    if (this.state !== 'idle') throw new Error(`supervisor already ${this.state}`);
    this.command = command;
    this.args = [...args];
    this.env = { ...env };
    this.channel = new Channel<string>();
    this.spawnChild();
    return this.channel;
  }

  /** Resolves once the first process is up, rejects if startup is fatal. */
  waitUntilRunning(): Promise<void> {
    if (this.failure) return Promise.reject(this.failure);
    if (this.spawnCount > 0 && this.state === 'running') return Promise.resolve();
    return new Promise((resolve, reject) => {
      const onStarted = () => { this.off('fatal', onFatal); resolve(); };
      const onFatal = (err: SupervisorError) => { this.off('started', onStarted); reject(err); };
      this.once('started', onStarted);
      this.once('fatal', onFatal);
    });
  }

  /** Terminate the child (SIGTERM, then SIGKILL) and end the line stream. */
  async stop(): Promise<void> {
    if (this.state === 'stopped' || this.state === 'idle') {
      this.state = 'stopped';
      this.channel?.close();
      return;
    }
    const wasFailed = this.state === 'failed';
    if (!wasFailed) this.state = 'stopping';
    if (this.restartTimer) {
      clearTimeout(this.restartTimer);
      this.restartTimer = null;
    }
    const child = this.child;
    if (child) {
      this.log.info(`stopping '${this.command}' (pid ${child.pid ?? '?'})`);
      child.kill('SIGTERM');
      const killer = setTimeout(() => {
        this.log.warn(`'${this.command}' ignored SIGTERM, sending SIGKILL`);
        child.kill('SIGKILL');
      }, this.killGraceMs);
      try {
        await this.exited;
      } finally {
        clearTimeout(killer);
      }
    }
    this.channel?.close();
    if (!wasFailed) this.state = 'stopped';
  }

  private spawnChild(): void {
    const attempt = this.attempt;
    const lines = new LineBuffer();
    const errLines = new LineBuffer();
    let spawned = false;
    let child: ChildHandle;

    try {
      child = this.spawnFn(this.command, this.args, { env: this.env, stdio: ['ignore', 'pipe', 'pipe'] });
    } catch (err) {
      this.fail(new SupervisorError('SPAWN_FAILED', `failed to start '${this.command}': ${errorMessage(err)}`, { cause: err }));
      return;
    }

    this.child = child;
    this.spawnCount++;
    this.childStartedAt = Date.now();
    this.state = 'starting';
    let markExited: () => void = () => {};
    this.exited = new Promise<void>((resolve) => { markExited = resolve; });

    child.once('spawn', () => {
      spawned = true;
      if (this.state === 'starting') this.state = 'running';
      this.log.info(`started '${[this.command, ...this.args].join(' ')}' (pid ${child.pid ?? '?'})`);
      this.emit('started', { pid: child.pid, attempt });
      if (this.spawnCount > 1) {
        this.emit('restarted', { pid: child.pid, attempt, delayMs: this.lastDelayMs });
      }
    });

    child.on('error', (err: Error) => {
      if (spawned) {
        this.log.warn(`process error: ${err.message}`);
        return;
      }
      const code = 'code' in err ? err.code : undefined;
      const fatal = code === 'ENOENT'
        ? new SupervisorError('ENOENT_EXECUTABLE', `executable not found: '${this.command}'`, { cause: err })
        : new SupervisorError('SPAWN_FAILED', `failed to start '${this.command}': ${err.message}`, { cause: err });
      this.child = null;
      markExited();
      this.fail(fatal);
    });

    child.stdout?.on('data', (chunk: Buffer | string) => {
      for (const line of lines.push(chunk)) this.channel?.push(line);
    });
    child.stdout?.on('error', (err: Error) => this.log.warn(`stdout read error: ${err.message}`));
    child.stderr?.on('data', (chunk: Buffer | string) => {
      for (const line of errLines.push(chunk)) this.emit('stderr', line);
    });
    child.stderr?.on('error', (err: Error) => this.log.warn(`stderr read error: ${err.message}`));

    child.once('close', (code: number | null, signal: NodeJS.Signals | null) => {
      const tail = lines.discard();
      if (tail) this.log.debug(`discarded partial line from exited process: '${tail}'`);
      const errTail = errLines.discard();
      if (errTail) this.emit('stderr', errTail);
      if (this.child === child) this.child = null;
      markExited();
      if (!spawned) return;

      const uptimeMs = Date.now() - this.childStartedAt;
      this.emit('exit', { code, signal, uptimeMs });
      if (this.state === 'stopping' || this.state === 'stopped' || this.state === 'failed') return;

      this.log.warn(`'${this.command}' exited unexpectedly (code=${code ?? 'null'} signal=${signal ?? 'null'})`);
      this.scheduleRestart(uptimeMs);
    });
  }

  private scheduleRestart(uptimeMs: number): void {
    const now = Date.now();
    this.restartTimes = this.restartTimes.filter((t) => now - t < this.windowMs);
    this.restartTimes.push(now);
    if (this.restartTimes.length > this.maxRestartsInWindow) {
      this.fail(new SupervisorError(
        'RESTART_BUDGET_EXHAUSTED',
        `'${this.command}' restarted ${this.restartTimes.length} times within ${this.windowMs}ms`
      ));
      return;
    }

    // a run longer than the ceiling resets the backoff
    if (uptimeMs >= this.maxDelayMs) this.attempt = 0;
    const delayMs = this.delayFor(this.attempt);
    this.lastDelayMs = delayMs;
    this.attempt++;
    this.state = 'backoff';
    this.log.info(`restarting in ${delayMs}ms (attempt ${this.attempt})`);
    this.restartTimer = setTimeout(() => {
      this.restartTimer = null;
      if (this.state !== 'backoff') return;
      this.spawnChild();
    }, delayMs);
  }

  private delayFor(attempt: number): number {
    return Math.min(this.minDelayMs * 2 ** attempt, this.maxDelayMs);
  }

  private fail(err: SupervisorError): void {
    if (this.state === 'failed') return;
    this.state = 'failed';
    this.failure = err;
    if (this.restartTimer) {
      clearTimeout(this.restartTimer);
      this.restartTimer = null;
    }
    this.log.error(err.message);
    this.channel?.close();
    this.emit('fatal', err);
  }
}
