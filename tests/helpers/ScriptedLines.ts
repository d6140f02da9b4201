import type { LineSource, ReadResult } from '../../src/infrastructure/process/LogLineReader.js';

export type ScriptStep = string | 'timeout' | (() => void);

/**
 * Line source that replays a fixed log, then reports the stream closed.
 * Functions in the script run between reads; each returned line advances the clock.
 */
export class ScriptedLines implements LineSource {
  private index = 0;

  constructor(
    private readonly steps: ScriptStep[],
    private readonly advanceClock: (ms: number) => void = () => undefined,
    private readonly msPerLine = 1000
  ) {}

  async readLine(): Promise<ReadResult> {
    for (;;) {
      const step = this.steps[this.index++];
      if (step === undefined) return { kind: 'closed' };
      if (typeof step === 'function') {
        step();
        continue;
      }
      if (step === 'timeout') return { kind: 'timeout' };
      this.advanceClock(this.msPerLine);
      return { kind: 'line', bytes: Buffer.from(step, 'utf8') };
    }
  }
}

export class FakeClock {
  constructor(public nowMs: number) {}

  readonly now = (): number => this.nowMs;

  readonly advance = (ms: number): void => {
    this.nowMs += ms;
  };
}
