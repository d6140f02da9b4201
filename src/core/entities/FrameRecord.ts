/**
 * Per-frame state within the active render job
 */
export type FrameStatus = 'pending' | 'rendering' | 'completed' | 'skipped' | 'failed';

export interface FrameRecord {
  frameNumber: number;
  sequenceIndex: number;
  status: FrameStatus;
  progressPercent: number; // 0-100, meaningful while rendering
  durationSeconds: number | null; // set when completed, 0 when skipped
  startedAt: Date | null;
}

export type FrameTotalSource = 'unset' | 'explicit-args' | 'log-echo' | 'rop-metadata' | 'inference';

export interface FrameTotalDiscovery {
  totalFrames: number;
  source: FrameTotalSource;
}
