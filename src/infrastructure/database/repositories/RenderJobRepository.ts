import Database from 'better-sqlite3';
import type { FrameRecord, FrameStatus } from '../../../core/entities/FrameRecord.js';
import {
  isFinishReason,
  isRenderJobStatus,
  type RenderJob,
  type RenderJobRecord,
  type RenderJobSummary,
} from '../../../core/entities/RenderJob.js';
import type { FrameUpdate, IRenderJobRepository, JobFinish } from '../../../core/interfaces/IRenderJobRepository.js';

interface RenderJobRow {
  id: string;
  hip_path: string;
  out_node: string;
  range_start: number | null;
  range_end: number | null;
  range_step: number | null;
  skip_existing: number;
  status: string;
  command_line: string;
  created_at: string;
  finished_at: string | null;
  finish_reason: string | null;
  error: string | null;
  total_frames: number;
  frames_completed: number;
  frames_skipped: number;
  average_frame_seconds: number;
  elapsed_seconds: number;
  last_image: string | null;
}

interface RenderFrameRow {
  frame_number: number;
  sequence_index: number | null;
  status: string;
  duration_seconds: number | null;
  progress_percent: number | null;
  started_at: string | null;
}

const FRAME_STATUSES: readonly FrameStatus[] = ['pending', 'rendering', 'completed', 'skipped', 'failed'];

function toFrameStatus(value: string): FrameStatus {
  return FRAME_STATUSES.find((status) => status === value) ?? 'pending';
}

/**
 * SQLite implementation of the render history repository
 */
export class RenderJobRepository implements IRenderJobRepository {
  constructor(private db: Database.Database) {}

  saveJob(job: RenderJob): void {
    const stmt = this.db.prepare(`
      INSERT OR REPLACE INTO render_jobs
        (id, hip_path, out_node, range_start, range_end, range_step, skip_existing, status, command_line,
         created_at, finished_at, finish_reason, error)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    stmt.run(
      job.id,
      job.hipPath,
      job.outNode,
      job.frameRange?.start ?? null,
      job.frameRange?.end ?? null,
      job.frameRange?.step ?? null,
      job.skipExisting ? 1 : 0,
      job.status,
      job.commandLine,
      job.createdAt.toISOString(),
      job.finishedAt ? job.finishedAt.toISOString() : null,
      job.finishReason ?? null,
      job.error ?? null
    );
  }

  updateJobSummary(jobId: string, summary: RenderJobSummary): void {
    this.db
      .prepare(`
        UPDATE render_jobs
        SET total_frames = ?, frames_completed = ?, frames_skipped = ?,
            average_frame_seconds = ?, elapsed_seconds = ?, last_image = ?
        WHERE id = ?
      `)
      .run(
        summary.totalFrames,
        summary.framesCompleted,
        summary.framesSkipped,
        summary.averageFrameSeconds,
        summary.elapsedSeconds,
        summary.lastImage,
        jobId
      );
  }

  finishJob(jobId: string, finish: JobFinish): void {
    this.db
      .prepare(`
        UPDATE render_jobs
        SET status = ?, finish_reason = ?, finished_at = ?, error = ?
        WHERE id = ?
      `)
      .run(finish.finishReason, finish.finishReason, finish.finishedAt.toISOString(), finish.error ?? null, jobId);
  }

  upsertFrame(jobId: string, frame: FrameUpdate): void {
    this.db
      .prepare(`
        INSERT INTO render_frames
          (job_id, frame_number, sequence_index, status, duration_seconds, progress_percent, started_at, updated_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(job_id, frame_number) DO UPDATE SET
          sequence_index = COALESCE(excluded.sequence_index, render_frames.sequence_index),
          status = excluded.status,
          duration_seconds = COALESCE(excluded.duration_seconds, render_frames.duration_seconds),
          progress_percent = COALESCE(excluded.progress_percent, render_frames.progress_percent),
          started_at = COALESCE(render_frames.started_at, excluded.started_at),
          updated_at = excluded.updated_at
      `)
      .run(
        jobId,
        frame.frameNumber,
        frame.sequenceIndex ?? null,
        frame.status,
        frame.durationSeconds ?? null,
        frame.progressPercent ?? null,
        frame.startedAt ? frame.startedAt.toISOString() : null,
        frame.updatedAt.toISOString()
      );
  }

  getJob(jobId: string): RenderJobRecord | null {
    const row = this.db.prepare<[string], RenderJobRow>('SELECT * FROM render_jobs WHERE id = ?').get(jobId);
    return row ? this.mapRow(row) : null;
  }

  getAllJobs(limit: number = 50): RenderJobRecord[] {
    const rows = this.db
      .prepare<[number], RenderJobRow>('SELECT * FROM render_jobs ORDER BY created_at DESC, rowid DESC LIMIT ?')
      .all(limit);
    return rows.map((row) => this.mapRow(row));
  }

  getFrames(jobId: string): FrameRecord[] {
    const rows = this.db
      .prepare<[string], RenderFrameRow>(`
        SELECT frame_number, sequence_index, status, duration_seconds, progress_percent, started_at
        FROM render_frames
        WHERE job_id = ?
        ORDER BY sequence_index ASC, frame_number ASC
      `)
      .all(jobId);

    return rows.map((row) => ({
      frameNumber: row.frame_number,
      sequenceIndex: row.sequence_index ?? 0,
      status: toFrameStatus(row.status),
      progressPercent: row.progress_percent ?? 0,
      durationSeconds: row.duration_seconds,
      startedAt: row.started_at ? new Date(row.started_at) : null,
    }));
  }

  /**
   * Deletes finished jobs (and their frames) created more than `hoursOld` hours ago
   */
  deleteJobsByAge(hoursOld: number): number {
    const cutoff = new Date(Date.now() - hoursOld * 60 * 60 * 1000).toISOString();
    const result = this.db
      .prepare("DELETE FROM render_jobs WHERE status != 'running' AND created_at < ?")
      .run(cutoff);
    return result.changes;
  }

  failUnfinishedJobs(error: string, finishedAt: Date): number {
    const result = this.db
      .prepare(`
        UPDATE render_jobs
        SET status = 'failed', finish_reason = 'failed', finished_at = ?, error = ?
        WHERE status = 'running'
      `)
      .run(finishedAt.toISOString(), error);
    return result.changes;
  }

  private mapRow(row: RenderJobRow): RenderJobRecord {
    const frameRange =
      row.range_start !== null && row.range_end !== null
        ? { start: row.range_start, end: row.range_end, step: row.range_step ?? 1 }
        : null;

    return {
      id: row.id,
      hipPath: row.hip_path,
      outNode: row.out_node,
      frameRange,
      skipExisting: row.skip_existing === 1,
      status: isRenderJobStatus(row.status) ? row.status : 'failed',
      commandLine: row.command_line,
      createdAt: new Date(row.created_at),
      finishedAt: row.finished_at ? new Date(row.finished_at) : undefined,
      finishReason: row.finish_reason !== null && isFinishReason(row.finish_reason) ? row.finish_reason : undefined,
      error: row.error ?? undefined,
      totalFrames: row.total_frames,
      framesCompleted: row.frames_completed,
      framesSkipped: row.frames_skipped,
      averageFrameSeconds: row.average_frame_seconds,
      elapsedSeconds: row.elapsed_seconds,
      lastImage: row.last_image,
    };
  }
}
