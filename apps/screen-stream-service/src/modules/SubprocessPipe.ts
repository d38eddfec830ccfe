/**
 * Subprocess Pipe Module
 * Owns the capture producer process: launch, stdout reads, stderr draining
 * and the two-phase (quit keystroke, then SIGKILL) shutdown
 */
import { EventEmitter } from 'events';
import { spawn, SpawnOptions } from 'child_process';
import { Readable, Writable } from 'stream';
import { ProducerCommand, ProducerState } from '../types/index.js';
import { LaunchError, ShutdownTimeoutError, describeError } from '../types/errors.js';
import { formatCommand } from '../utils/producer-command.js';
import { raceAbort, sleep } from '../utils/async.js';
import { getLogger } from '../utils/logger.js';

let logger: ReturnType<typeof getLogger> | null = null;
let producerLogger: ReturnType<typeof getLogger> | null = null;

/**
 * The parts of a ChildProcess the pipe relies on
 */
export interface ProducerProcess extends EventEmitter {
  readonly pid?: number | undefined;
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnFn = (command: string, args: readonly string[], options: SpawnOptions) => ProducerProcess;

const defaultSpawn: SpawnFn = (command, args, options) => spawn(command, args, options);

/**
 * SubprocessPipe configuration
 */
export interface SubprocessPipeConfig {
  /** Producer invocation */
  producer: ProducerCommand;
  /** Process factory (default: child_process.spawn) */
  spawnFn?: SpawnFn;
  /** How long to wait for the exit event after SIGKILL (default: 1000) */
  killWaitMs?: number;
  /** Producer stderr lines kept for exit diagnostics (default: 20) */
  stderrTailLines?: number;
}

/**
 * SubprocessPipe events
 */
export interface SubprocessPipeEvents {
  'exit': (code: number | null, signal: NodeJS.Signals | null) => void;
}

/** Keystroke that makes ffmpeg finish the current frame and exit */
const QUIT_KEYSTROKE = 'q';

/**
 * SubprocessPipe module
 */
export class SubprocessPipe extends EventEmitter {
  private config: SubprocessPipeConfig;
  private spawnFn: SpawnFn;
  private killWaitMs: number;
  private stderrTailLines: number;

  private child: ProducerProcess | null = null;
  private state: ProducerState = 'idle';
  private stdoutIterator: AsyncIterator<unknown> | null = null;
  private exitPromise: Promise<void> = Promise.resolve();
  private hasExited: boolean = false;
  private stopPromise: Promise<ProducerState> | null = null;
  private drainPromise: Promise<void> | null = null;

  private stderrTail: string[] = [];
  private stderrRemainder: string = '';
  private bytesRead: number = 0;

  constructor(config: SubprocessPipeConfig) {
    super();
    this.config = config;
    this.spawnFn = config.spawnFn ?? defaultSpawn;
    this.killWaitMs = config.killWaitMs ?? 1000;
    this.stderrTailLines = config.stderrTailLines ?? 20;

    // Lazy initialize logger
    if (!logger) {
      try {
        logger = getLogger().child({ context: 'SubprocessPipe' });
        producerLogger = getLogger().child({ context: 'producer' });
      } catch {
        logger = null;
      }
    }
  }

  private log(level: 'debug' | 'info' | 'warn' | 'error', message: string, ...args: unknown[]): void {
    if (logger) {
      logger[level](message, ...args);
    }
  }

  /**
   * Launch the producer
   * @throws LaunchError if the executable is missing or fails to start
   */
  async start(): Promise<void> {
    if (this.state !== 'idle') {
      throw new Error(`SubprocessPipe cannot start from state "${this.state}"`);
    }

    const { command, args } = this.config.producer;
    this.log('info', `Launching producer: ${formatCommand(this.config.producer)}`);

    let child: ProducerProcess;
    try {
      child = this.spawnFn(command, args, {
        stdio: ['pipe', 'pipe', 'pipe'],
        windowsHide: true,
      });
    } catch (error) {
      this.state = 'exited';
      throw new LaunchError(`Failed to launch producer "${command}": ${describeError(error)}`, command, { cause: error });
    }

    this.child = child;
    this.exitPromise = new Promise<void>((resolve) => {
      child.once('exit', (code: number | null, signal: NodeJS.Signals | null) => {
        this.handleExit(code, signal);
        resolve();
      });
    });

    try {
      await new Promise<void>((resolve, reject) => {
        const onSpawn = (): void => {
          child.off('error', onError);
          resolve();
        };
        const onError = (error: Error): void => {
          child.off('spawn', onSpawn);
          reject(error);
        };
        child.once('spawn', onSpawn);
        child.once('error', onError);
      });
    } catch (error) {
      this.state = 'exited';
      this.hasExited = true;
      throw new LaunchError(`Failed to launch producer "${command}": ${describeError(error)}`, command, { cause: error });
    }

    const { stdin, stdout, stderr } = child;
    if (!stdin || !stdout || !stderr) {
      child.kill('SIGKILL');
      this.state = 'exited';
      throw new LaunchError(`Producer "${command}" started without piped stdio`, command);
    }

    child.on('error', (error: Error) => {
      this.log('error', `Producer process error (PID: ${child.pid}):`, error);
    });

    // Writing the quit keystroke to a producer that already died raises EPIPE here
    stdin.on('error', (error: Error) => {
      this.log('debug', `Producer stdin closed: ${error.message}`);
    });

    this.attachStderr(stderr);
    this.stdoutIterator = stdout[Symbol.asyncIterator]();
    this.state = 'running';

    this.log('info', `Producer started with PID: ${child.pid}`);
  }

  /**
   * Read the next chunk of producer output.
   * Resolves null (end of stream) when stdout closes, a stop was requested,
   * or `signal` aborts while waiting.
   */
  async readChunk(signal?: AbortSignal): Promise<Buffer | null> {
    const iterator = this.stdoutIterator;
    if (!iterator || this.stopPromise || signal?.aborted) {
      return null;
    }

    const next = iterator.next();
    const result = signal ? await raceAbort(next, signal) : await next;

    if (result === null) {
      return null;
    }

    if (result.done) {
      this.stdoutIterator = null;
      return null;
    }

    const chunk = Buffer.isBuffer(result.value) ? result.value : Buffer.from(String(result.value));
    this.bytesRead += chunk.length;
    return chunk;
  }

  /**
   * Producer output as an async iterable of chunks
   */
  async *chunks(signal?: AbortSignal): AsyncGenerator<Buffer> {
    while (true) {
      const chunk = await this.readChunk(signal);
      if (chunk === null) {
        return;
      }
      yield chunk;
    }
  }

  /**
   * Two-phase shutdown: send the quit keystroke, wait up to `timeoutMs`,
   * then SIGKILL. Concurrent callers share the same shutdown.
   *
   * @returns 'exited' if the producer quit on its own, 'force-killed' otherwise
   */
  requestStop(timeoutMs: number = 2000): Promise<ProducerState> {
    if (!this.stopPromise) {
      this.stopPromise = this.doStop(timeoutMs);
    }
    return this.stopPromise;
  }

  private async doStop(timeoutMs: number): Promise<ProducerState> {
    const child = this.child;
    if (!child || this.hasExited) {
      if (this.state === 'idle') {
        this.state = 'exited';
      }
      return this.state;
    }

    this.state = 'stop-requested';
    this.log('info', `Requesting producer exit (PID: ${child.pid})`);

    // Keep stdout flowing so the producer can finish writing and read its stdin
    this.drainPromise = this.drainStdout();

    if (child.stdin && child.stdin.writable) {
      child.stdin.write(QUIT_KEYSTROKE, (error) => {
        if (error) {
          this.log('debug', `Quit keystroke not delivered: ${error.message}`);
        }
      });
      child.stdin.end();
    }

    if (await this.waitForExit(timeoutMs)) {
      this.log('info', `Producer exited gracefully (PID: ${child.pid})`);
      return this.state;
    }

    this.log('warn', 'Graceful shutdown timed out, force killing producer', new ShutdownTimeoutError(child.pid, timeoutMs));
    this.state = 'force-killed';
    child.kill('SIGKILL');

    if (!(await this.waitForExit(this.killWaitMs))) {
      this.log('error', `Producer (PID: ${child.pid}) still running ${this.killWaitMs}ms after SIGKILL`);
    }

    return this.state;
  }

  private async waitForExit(timeoutMs: number): Promise<boolean> {
    if (this.hasExited) {
      return true;
    }

    const timer = new AbortController();
    const exited = await Promise.race([
      this.exitPromise.then(() => true),
      sleep(timeoutMs, timer.signal).then(() => false),
    ]);
    timer.abort();
    return exited;
  }

  private async drainStdout(): Promise<void> {
    try {
      while (this.stdoutIterator) {
        const { done } = await this.stdoutIterator.next();
        if (done) {
          this.stdoutIterator = null;
        }
      }
    } catch (error) {
      this.log('debug', `Producer stdout closed while draining: ${describeError(error)}`);
      this.stdoutIterator = null;
    }
  }

  private attachStderr(stderr: Readable): void {
    stderr.setEncoding('utf8');

    stderr.on('data', (data: string) => {
      const text = this.stderrRemainder + data;
      const lines = text.split(/\r?\n/);
      this.stderrRemainder = lines.pop() ?? '';

      for (const line of lines) {
        this.recordStderrLine(line);
      }
    });

    stderr.on('end', () => {
      if (this.stderrRemainder) {
        this.recordStderrLine(this.stderrRemainder);
        this.stderrRemainder = '';
      }
    });

    stderr.on('error', (error: Error) => {
      this.log('debug', `Producer stderr closed: ${error.message}`);
    });
  }

  private recordStderrLine(line: string): void {
    const trimmed = line.trim();
    if (!trimmed) {
      return;
    }

    this.stderrTail.push(trimmed);
    if (this.stderrTail.length > this.stderrTailLines) {
      this.stderrTail.shift();
    }

    if (producerLogger) {
      const lower = trimmed.toLowerCase();
      if (lower.includes('error') || lower.includes('cannot') || lower.includes('failed')) {
        producerLogger.warn(trimmed);
      } else {
        producerLogger.debug(trimmed);
      }
    }
  }

  private handleExit(code: number | null, signal: NodeJS.Signals | null): void {
    this.hasExited = true;

    if (this.state === 'running') {
      this.log('warn', `Producer exited unexpectedly - code: ${code}, signal: ${signal}`);
      if (this.stderrTail.length > 0) {
        this.log('warn', `Producer stderr (last ${this.stderrTail.length} lines):\n${this.stderrTail.join('\n')}`);
      }
      this.state = 'exited';
    } else if (this.state === 'stop-requested') {
      this.state = 'exited';
    }

    this.log('debug', `Producer exit - code: ${code}, signal: ${signal}, state: ${this.state}`);
    this.emit('exit', code, signal);
  }

  /**
   * Current lifecycle state
   */
  getState(): ProducerState {
    return this.state;
  }

  /**
   * True while the producer process has not exited
   */
  isRunning(): boolean {
    return this.child !== null && !this.hasExited;
  }

  get pid(): number | null {
    return this.child?.pid ?? null;
  }

  /**
   * Total stdout bytes handed to readers
   */
  getBytesRead(): number {
    return this.bytesRead;
  }

  /**
   * Most recent producer diagnostic lines
   */
  getStderrTail(): string[] {
    return [...this.stderrTail];
  }

  /**
   * Resolves once any background stdout drain has finished
   */
  async settled(): Promise<void> {
    await this.drainPromise;
  }

  // Typed event emitter methods
  on<K extends keyof SubprocessPipeEvents>(
    event: K,
    listener: SubprocessPipeEvents[K]
  ): this {
    return super.on(event, listener);
  }

  emit<K extends keyof SubprocessPipeEvents>(
    event: K,
    ...args: Parameters<SubprocessPipeEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }
}
