import type { EstimateConfidence, TimingSnapshot } from '../entities/TimingSnapshot.js';

export interface RemainingEstimate {
  remainingSeconds: number;
  confidence: EstimateConfidence;
}

export interface EstimateInput {
  framesDone: number; // completed + skipped
  totalFrames: number;
  elapsedSeconds: number;
  /** Block progress of the frame being rendered, used before any frame is done */
  currentFrame?: { percent: number; elapsedSeconds: number } | null;
}

export const DEFAULT_FLAT_GUESS_SECONDS_PER_FRAME = 0.5;

/**
 * Completed-frame duration history and the remaining-time policy built on it
 */
export class TimingEstimator {
  private readonly durations: number[] = [];

  constructor(private readonly flatGuessSecondsPerFrame: number = DEFAULT_FLAT_GUESS_SECONDS_PER_FRAME) {}

  record(durationSeconds: number): void {
    if (!Number.isFinite(durationSeconds) || durationSeconds < 0) return;
    this.durations.push(durationSeconds);
  }

  get sampleCount(): number {
    return this.durations.length;
  }

  get samples(): readonly number[] {
    return this.durations;
  }

  average(): number {
    if (this.durations.length === 0) return 0;
    return this.durations.reduce((sum, d) => sum + d, 0) / this.durations.length;
  }

  /**
   * Two-point extrapolation of the latest trend, `2 * last - secondLast`, never negative
   */
  recentEstimate(): number {
    const n = this.durations.length;
    if (n < 2) return this.average();
    return Math.max(0, 2 * this.durations[n - 1] - this.durations[n - 2]);
  }

  /**
   * Best guess for the next frame's duration, 0 when nothing is known
   */
  nextFrameEstimate(): number {
    return this.durations.length >= 2 ? this.recentEstimate() : this.average();
  }

  estimateRemaining(input: EstimateInput): RemainingEstimate {
    const total = input.totalFrames;
    const elapsed = Math.max(0, input.elapsedSeconds);
    if (total <= 0) {
      return { remainingSeconds: 0, confidence: 'none' };
    }

    const framesDone = Math.max(0, input.framesDone);
    const remainingFrames = Math.max(0, total - framesDone);

    if (this.durations.length > 0) {
      return { remainingSeconds: Math.max(0, remainingFrames * this.average()), confidence: 'measured' };
    }

    if (framesDone > 0) {
      const pace = elapsed / framesDone;
      return { remainingSeconds: Math.max(0, pace * total - elapsed), confidence: 'pace' };
    }

    const current = input.currentFrame;
    if (current && current.percent > 0 && current.elapsedSeconds > 0) {
      const secondsPerPercent = current.elapsedSeconds / current.percent;
      const currentFrameRemaining = secondsPerPercent * (100 - current.percent);
      const otherFrames = (total - 1) * secondsPerPercent * 100;
      return { remainingSeconds: Math.max(0, currentFrameRemaining + otherFrames), confidence: 'in-frame' };
    }

    const secondsPerFrame = Math.max(this.flatGuessSecondsPerFrame, elapsed / 10);
    return { remainingSeconds: Math.max(0, secondsPerFrame * total - elapsed), confidence: 'guess' };
  }

  snapshot(input: EstimateInput, now: Date): TimingSnapshot {
    const elapsedSeconds = Math.max(0, input.elapsedSeconds);
    const { remainingSeconds, confidence } = this.estimateRemaining(input);
    return {
      elapsedSeconds,
      averageSeconds: this.average(),
      estimatedTotalSeconds: elapsedSeconds + remainingSeconds,
      remainingSeconds,
      eta: new Date(now.getTime() + remainingSeconds * 1000),
      showEta: input.totalFrames > 0,
      confidence,
    };
  }

  /**
   * Snapshot for a finished job: nothing remains, total equals elapsed
   */
  finalSnapshot(elapsedSeconds: number, now: Date): TimingSnapshot {
    const elapsed = Math.max(0, elapsedSeconds);
    return {
      elapsedSeconds: elapsed,
      averageSeconds: this.average(),
      estimatedTotalSeconds: elapsed,
      remainingSeconds: 0,
      eta: now,
      showEta: false,
      confidence: this.durations.length > 0 ? 'measured' : 'none',
    };
  }
}
