import type { FrameRecord, FrameStatus } from '../entities/FrameRecord.js';
import type { FinishReason, RenderJob, RenderJobRecord, RenderJobSummary } from '../entities/RenderJob.js';

export interface FrameUpdate {
  frameNumber: number;
  sequenceIndex?: number;
  status: FrameStatus;
  durationSeconds?: number | null;
  progressPercent?: number;
  startedAt?: Date;
  updatedAt: Date;
}

export interface JobFinish {
  finishReason: FinishReason;
  finishedAt: Date;
  error?: string;
}

/**
 * Interface for render history persistence
 */
export interface IRenderJobRepository {
  saveJob(job: RenderJob): void;

  updateJobSummary(jobId: string, summary: RenderJobSummary): void;

  finishJob(jobId: string, finish: JobFinish): void;

  upsertFrame(jobId: string, frame: FrameUpdate): void;

  getJob(jobId: string): RenderJobRecord | null;

  getAllJobs(limit?: number): RenderJobRecord[];

  getFrames(jobId: string): FrameRecord[];

  deleteJobsByAge(hoursOld: number): number;

  /**
   * Marks jobs left as running by a previous server process as failed
   */
  failUnfinishedJobs(error: string, finishedAt: Date): number;
}
