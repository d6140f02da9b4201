/**
 * How much the remaining-time figure can be trusted
 * - measured: mean of completed frame durations
 * - pace: elapsed time over frames done, no timed sample yet
 * - in-frame: extrapolated from block progress of the first frame
 * - guess: flat seconds-per-frame floor
 * - none: frame total unknown
 */
export type EstimateConfidence = 'measured' | 'pace' | 'in-frame' | 'guess' | 'none';

export interface TimingSnapshot {
  elapsedSeconds: number;
  averageSeconds: number;
  estimatedTotalSeconds: number; // always elapsedSeconds + remainingSeconds
  remainingSeconds: number;
  eta: Date;
  showEta: boolean;
  confidence: EstimateConfidence;
}
