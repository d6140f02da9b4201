/**
 * Render job domain entity
 */
export interface FrameRange {
  start: number;
  end: number;
  step: number;
}

export const RENDER_JOB_STATUSES = ['running', 'completed', 'canceled', 'killed', 'failed'] as const;

export type RenderJobStatus = (typeof RENDER_JOB_STATUSES)[number];

export type FinishReason = Exclude<RenderJobStatus, 'running'>;

export function isRenderJobStatus(value: string): value is RenderJobStatus {
  return RENDER_JOB_STATUSES.some((status) => status === value);
}

export function isFinishReason(value: string): value is FinishReason {
  return value !== 'running' && isRenderJobStatus(value);
}

export interface RenderRequest {
  hipPath: string;
  outNode: string;
  frameRange?: FrameRange;
  skipExisting?: boolean;
}

export interface RenderJob {
  id: string;
  hipPath: string;
  outNode: string;
  frameRange: FrameRange | null; // null: the ROP decides
  skipExisting: boolean;
  status: RenderJobStatus;
  commandLine: string;
  createdAt: Date;
  finishedAt?: Date;
  finishReason?: FinishReason;
  exitCode?: number | null;
  error?: string;
}

/**
 * Aggregate figures kept alongside a job in the render history
 */
export interface RenderJobSummary {
  totalFrames: number;
  framesCompleted: number;
  framesSkipped: number;
  averageFrameSeconds: number;
  elapsedSeconds: number;
  lastImage: string | null;
}

export interface RenderJobRecord extends RenderJob, RenderJobSummary {}

/**
 * Number of frames in `range(start, end + 1, step)`
 */
export function countFrames(range: FrameRange): number {
  const step = Math.max(1, Math.trunc(range.step));
  if (range.end < range.start) return 0;
  return Math.floor((range.end - range.start) / step) + 1;
}

export function normalizeFrameRange(range: FrameRange): FrameRange {
  return {
    start: Math.trunc(range.start),
    end: Math.trunc(range.end),
    step: Math.max(1, Math.trunc(range.step)),
  };
}
