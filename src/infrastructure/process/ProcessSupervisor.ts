import { spawn, type SpawnOptions } from 'child_process';
import { EventEmitter } from 'events';
import type { Readable } from 'stream';
import { SpawnError, systemErrorCode } from '../../core/errors/RenderErrors.js';
import { LogLineReader } from './LogLineReader.js';

export type ProcessState = 'not-started' | 'running' | 'interrupting' | 'killed' | 'exited';

/**
 * The part of a ChildProcess the supervisor relies on
 */
export interface ChildProcessLike extends EventEmitter {
  readonly pid?: number | undefined;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnFunction = (command: string, args: readonly string[], options: SpawnOptions) => ChildProcessLike;
export type SignalSender = (pid: number, signal: NodeJS.Signals) => void;

export interface ProcessExit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

/**
 * - signalled: graceful signal sent to the process
 * - fallback: terminate signal sent to the process group instead
 * - escalated: already interrupting, so the group was killed
 * - not-running: the process had already exited
 * - failed: no signal could be delivered
 */
export type InterruptOutcome = 'signalled' | 'fallback' | 'escalated' | 'not-running' | 'failed';

export interface ProcessSupervisorOptions {
  spawnProcess?: SpawnFunction;
  sendSignal?: SignalSender;
  /** SIGUSR1 does not exist on Windows */
  supportsGracefulSignal?: boolean;
  debugLog?: (message: string) => void;
}

const defaultSpawn: SpawnFunction = (command, args, options) => spawn(command, [...args], options);

const defaultSendSignal: SignalSender = (pid, signal) => {
  process.kill(pid, signal);
};

/**
 * One supervised render process
 */
export class ProcessHandle {
  readonly exited: Promise<ProcessExit>;
  private currentState: ProcessState = 'running';
  private exitInfo: ProcessExit | null = null;
  private gracefulSignalDelivered = false;

  constructor(
    readonly pid: number,
    readonly commandLine: string,
    readonly child: ChildProcessLike,
    readonly output: LogLineReader
  ) {
    this.exited = new Promise<ProcessExit>((resolve) => {
      const onExit = (code: number | null, signal: NodeJS.Signals | null) => {
        if (this.exitInfo) return;
        this.exitInfo = { code, signal };
        if (this.currentState !== 'killed') {
          this.currentState = 'exited';
        }
        resolve(this.exitInfo);
      };

      if (child.exitCode !== null || child.signalCode !== null) {
        onExit(child.exitCode, child.signalCode);
      } else {
        child.once('exit', onExit);
      }
    });
  }

  get state(): ProcessState {
    return this.currentState;
  }

  get exit(): ProcessExit | null {
    return this.exitInfo;
  }

  get interruptDelivered(): boolean {
    return this.gracefulSignalDelivered;
  }

  /** @internal */
  setState(state: ProcessState): void {
    this.currentState = state;
  }

  /** @internal */
  markInterruptDelivered(delivered: boolean): void {
    this.gracefulSignalDelivered = delivered;
  }
}

/**
 * Spawns the render backend into its own process group and delivers
 * interrupt and kill signals to it.
 */
export class ProcessSupervisor {
  private readonly spawnProcess: SpawnFunction;
  private readonly sendSignal: SignalSender;
  private readonly supportsGracefulSignal: boolean;
  private readonly debugLog: (message: string) => void;

  constructor(options: ProcessSupervisorOptions = {}) {
    this.spawnProcess = options.spawnProcess ?? defaultSpawn;
    this.sendSignal = options.sendSignal ?? defaultSendSignal;
    this.supportsGracefulSignal = options.supportsGracefulSignal ?? process.platform !== 'win32';
    this.debugLog = options.debugLog ?? (() => {});
  }

  /**
   * Rejects with SpawnError if the executable cannot be launched
   */
  async start(command: string, args: readonly string[], workingDirectory?: string): Promise<ProcessHandle> {
    let child: ChildProcessLike;
    try {
      child = this.spawnProcess(command, args, {
        cwd: workingDirectory,
        detached: true,
        stdio: ['ignore', 'pipe', 'pipe'],
        env: process.env,
      });
    } catch (error) {
      throw SpawnError.fromSystemError(command, error);
    }

    // Attach readers before the first await so no output is missed
    const streams = [child.stdout, child.stderr].filter((stream): stream is Readable => stream !== null);
    const output = new LogLineReader(streams);

    await new Promise<void>((resolve, reject) => {
      const onSpawn = () => {
        child.off('error', onError);
        resolve();
      };
      const onError = (error: Error) => {
        child.off('spawn', onSpawn);
        reject(SpawnError.fromSystemError(command, error));
      };
      child.once('spawn', onSpawn);
      child.once('error', onError);
    });

    const pid = child.pid;
    if (pid === undefined) {
      throw new SpawnError(`Failed to launch ${command}: no process id was assigned`, command);
    }

    child.on('error', (error: Error) => {
      console.error(`[ProcessSupervisor] Process ${pid} error: ${error.message}`);
    });

    const commandLine = [command, ...args].map(quoteArgument).join(' ');
    this.debugLog(`[ProcessSupervisor] Started pid ${pid}: ${commandLine}`);
    return new ProcessHandle(pid, commandLine, child, output);
  }

  /**
   * Ask the process to stop after its current frame. A second call escalates to kill().
   */
  async interrupt(handle: ProcessHandle): Promise<InterruptOutcome> {
    switch (handle.state) {
      case 'exited':
      case 'killed':
      case 'not-started':
        return 'not-running';
      case 'interrupting':
        await this.kill(handle);
        return 'escalated';
      case 'running':
        handle.setState('interrupting');
        return this.deliverInterrupt(handle);
    }
  }

  /**
   * Send the graceful signal again if the first attempt could not be delivered
   */
  redeliverInterrupt(handle: ProcessHandle): InterruptOutcome {
    if (handle.state !== 'interrupting') return 'not-running';
    if (handle.interruptDelivered) return 'signalled';
    return this.deliverInterrupt(handle);
  }

  /**
   * SIGKILL the whole process group and wait for the exit. No-op once exited.
   * Resolves false without waiting when no kill signal could be delivered.
   */
  async kill(handle: ProcessHandle): Promise<boolean> {
    if (handle.state === 'exited' || handle.exit !== null) return false;

    if (handle.state !== 'killed') {
      const previousState = handle.state;
      handle.setState('killed');
      if (!this.deliverKill(handle)) {
        handle.setState(previousState);
        console.error(`[ProcessSupervisor] Could not kill process ${handle.pid}, it may still be running`);
        return false;
      }
    }

    await handle.exited;
    this.debugLog(`[ProcessSupervisor] Process ${handle.pid} killed`);
    return true;
  }

  isRunning(handle: ProcessHandle): boolean {
    return handle.exit === null && (handle.state === 'running' || handle.state === 'interrupting');
  }

  pollExitCode(handle: ProcessHandle): number | null {
    return handle.exit?.code ?? null;
  }

  /**
   * Resolves true if the process exits within the timeout
   */
  async waitForExit(handle: ProcessHandle, timeoutMs: number): Promise<boolean> {
    if (handle.exit !== null) return true;

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });

    try {
      return await Promise.race([handle.exited.then(() => true), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private deliverKill(handle: ProcessHandle): boolean {
    try {
      this.sendSignal(-handle.pid, 'SIGKILL');
      return true;
    } catch (error) {
      if (isProcessLookupError(error)) return true;
      this.debugLog(`[ProcessSupervisor] Group kill failed for ${handle.pid}, killing process directly`);
      return killDirectly(handle, 'SIGKILL');
    }
  }

  private deliverInterrupt(handle: ProcessHandle): InterruptOutcome {
    if (this.supportsGracefulSignal) {
      try {
        this.sendSignal(handle.pid, 'SIGUSR1');
        handle.markInterruptDelivered(true);
        return 'signalled';
      } catch (error) {
        this.debugLog(`[ProcessSupervisor] SIGUSR1 to ${handle.pid} failed: ${describe(error)}`);
      }
    }

    try {
      this.sendSignal(-handle.pid, 'SIGTERM');
      handle.markInterruptDelivered(true);
      return 'fallback';
    } catch (error) {
      if (isProcessLookupError(error)) {
        handle.markInterruptDelivered(true);
        return 'not-running';
      }
      if (killDirectly(handle, 'SIGTERM')) {
        handle.markInterruptDelivered(true);
        return 'fallback';
      }
      console.error(`[ProcessSupervisor] Could not interrupt process ${handle.pid}: ${describe(error)}`);
      handle.markInterruptDelivered(false);
      return 'failed';
    }
  }
}

function killDirectly(handle: ProcessHandle, signal: NodeJS.Signals): boolean {
  try {
    return handle.child.kill(signal);
  } catch (error) {
    console.error(`[ProcessSupervisor] ${signal} to ${handle.pid} failed: ${describe(error)}`);
    return false;
  }
}

function isProcessLookupError(error: unknown): boolean {
  return systemErrorCode(error) === 'ESRCH';
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function quoteArgument(arg: string): string {
  return /[\s'"]/.test(arg) ? `'${arg.replace(/'/g, `'\\''`)}'` : arg;
}
