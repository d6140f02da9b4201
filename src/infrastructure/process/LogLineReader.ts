import type { Readable } from 'stream';

export type ReadResult = { kind: 'line'; bytes: Buffer } | { kind: 'timeout' } | { kind: 'closed' };

/**
 * Source of raw log lines with a bounded wait
 */
export interface LineSource {
  readLine(timeoutMs: number): Promise<ReadResult>;
}

const NEWLINE = 0x0a;

interface StreamState {
  partial: Buffer;
  open: boolean;
}

/**
 * Merges a process's stdout and stderr into one queue of complete lines.
 * Each stream keeps its own partial-line buffer, so chunks from the two
 * streams never splice into each other. A single consumer reads at a time.
 */
export class LogLineReader implements LineSource {
  private readonly lines: Buffer[] = [];
  private readonly states: StreamState[] = [];
  private wake: (() => void) | null = null;

  constructor(streams: readonly Readable[]) {
    for (const stream of streams) {
      const state: StreamState = { partial: Buffer.alloc(0), open: true };
      this.states.push(state);

      stream.on('data', (chunk: Buffer | string) => this.onData(state, chunk));
      stream.once('end', () => this.onEnd(state));
      stream.once('close', () => this.onEnd(state));
      stream.once('error', (error: Error) => {
        console.error(`[LogLineReader] Output stream error: ${error.message}`);
        this.onEnd(state);
      });
    }
  }

  get isClosed(): boolean {
    return this.lines.length === 0 && this.states.every((state) => !state.open);
  }

  readLine(timeoutMs: number): Promise<ReadResult> {
    const ready = this.take();
    if (ready) return Promise.resolve(ready);
    if (this.wake) {
      return Promise.reject(new Error('LogLineReader supports a single pending read'));
    }

    return new Promise<ReadResult>((resolve) => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve({ kind: 'timeout' });
      }, timeoutMs);

      this.wake = () => {
        const result = this.take();
        if (!result) return;
        clearTimeout(timer);
        this.wake = null;
        resolve(result);
      };
    });
  }

  private take(): ReadResult | null {
    const bytes = this.lines.shift();
    if (bytes) return { kind: 'line', bytes };
    if (this.states.every((state) => !state.open)) return { kind: 'closed' };
    return null;
  }

  private onData(state: StreamState, chunk: Buffer | string): void {
    let buffer = Buffer.concat([state.partial, typeof chunk === 'string' ? Buffer.from(chunk) : chunk]);
    let newline = buffer.indexOf(NEWLINE);
    while (newline !== -1) {
      this.lines.push(buffer.subarray(0, newline));
      buffer = buffer.subarray(newline + 1);
      newline = buffer.indexOf(NEWLINE);
    }
    state.partial = buffer;
    this.wake?.();
  }

  private onEnd(state: StreamState): void {
    if (!state.open) return;
    state.open = false;
    if (state.partial.length > 0) {
      this.lines.push(state.partial);
      state.partial = Buffer.alloc(0);
    }
    this.wake?.();
  }
}
