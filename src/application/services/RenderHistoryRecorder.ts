import type { MonitorEvent } from '../../core/entities/MonitorEvent.js';
import type { RenderJobSummary } from '../../core/entities/RenderJob.js';
import type { IRenderJobRepository } from '../../core/interfaces/IRenderJobRepository.js';
import type { ChannelSubscription, MonitorChannel } from '../../infrastructure/queue/MonitorChannel.js';

export const DEFAULT_HISTORY_FLUSH_INTERVAL_MS = 250;

const emptySummary = (): RenderJobSummary => ({
  totalFrames: 0,
  framesCompleted: 0,
  framesSkipped: 0,
  averageFrameSeconds: 0,
  elapsedSeconds: 0,
  lastImage: null,
});

/**
 * Writes monitor events into the render history.
 * Drains its own channel subscription on a timer; write failures are logged.
 */
export class RenderHistoryRecorder {
  private subscription: ChannelSubscription<MonitorEvent> | null = null;
  private timer: NodeJS.Timeout | null = null;
  private readonly summaries = new Map<string, RenderJobSummary>();

  constructor(
    private readonly channel: MonitorChannel<MonitorEvent>,
    private readonly repository: IRenderJobRepository,
    private readonly flushIntervalMs: number = DEFAULT_HISTORY_FLUSH_INTERVAL_MS,
    private readonly debugLog: (message: string) => void = () => {}
  ) {}

  start(): void {
    if (this.subscription) return;
    this.subscription = this.channel.subscribe();
    this.timer = setInterval(() => this.flush(), this.flushIntervalMs);
    this.timer.unref();
  }

  /**
   * Applies every pending event, returns how many were processed
   */
  flush(): number {
    if (!this.subscription) return 0;

    const events = this.subscription.drain();
    const touched = new Set<string>();

    for (const event of events) {
      try {
        if (this.apply(event)) touched.add(event.jobId);
      } catch (error) {
        console.error(`[RenderHistory] Failed to record ${event.type} for job ${event.jobId}:`, error);
      }
    }

    for (const jobId of touched) {
      const summary = this.summaries.get(jobId);
      if (!summary) continue;
      try {
        this.repository.updateJobSummary(jobId, summary);
      } catch (error) {
        console.error(`[RenderHistory] Failed to update summary for job ${jobId}:`, error);
      }
    }

    for (const event of events) {
      if (event.type === 'finished') this.summaries.delete(event.jobId);
    }

    if (events.length > 0) {
      this.debugLog(`[RenderHistory] Recorded ${events.length} events for ${touched.size} job(s)`);
    }
    return events.length;
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.flush();
    this.subscription?.unsubscribe();
    this.subscription = null;
  }

  /**
   * Returns true when the job's summary changed
   */
  private apply(event: MonitorEvent): boolean {
    switch (event.type) {
      case 'job-started':
        this.summaries.set(event.jobId, emptySummary());
        this.repository.saveJob(event.job);
        return true;

      case 'progress':
        this.summary(event.jobId).totalFrames = event.total;
        return true;

      case 'frame-started':
        this.repository.upsertFrame(event.jobId, {
          frameNumber: event.frameNumber,
          sequenceIndex: event.sequenceIndex,
          status: 'rendering',
          progressPercent: 0,
          startedAt: event.timestamp,
          updatedAt: event.timestamp,
        });
        return false;

      case 'frame-progress':
        this.repository.upsertFrame(event.jobId, {
          frameNumber: event.frameNumber,
          status: 'rendering',
          progressPercent: event.percent,
          updatedAt: event.timestamp,
        });
        return false;

      case 'frame-completed':
        this.repository.upsertFrame(event.jobId, {
          frameNumber: event.frameNumber,
          sequenceIndex: event.sequenceIndex,
          status: 'completed',
          durationSeconds: event.durationSeconds,
          progressPercent: 100,
          updatedAt: event.timestamp,
        });
        this.summary(event.jobId).framesCompleted += 1;
        return true;

      case 'frame-skipped':
        this.repository.upsertFrame(event.jobId, {
          frameNumber: event.frameNumber,
          sequenceIndex: event.sequenceIndex,
          status: 'skipped',
          durationSeconds: 0,
          updatedAt: event.timestamp,
        });
        this.summary(event.jobId).framesSkipped += 1;
        return true;

      case 'image-produced':
        this.summary(event.jobId).lastImage = event.filePath;
        return true;

      case 'time-labels': {
        const summary = this.summary(event.jobId);
        summary.elapsedSeconds = event.elapsedSeconds;
        summary.averageFrameSeconds = event.averageSeconds;
        return true;
      }

      case 'finished':
        this.repository.finishJob(event.jobId, {
          finishReason: event.reason,
          finishedAt: event.timestamp,
          error: event.error,
        });
        return true;

      case 'output':
      case 'raw-line':
        return false;
    }
  }

  private summary(jobId: string): RenderJobSummary {
    let summary = this.summaries.get(jobId);
    if (!summary) {
      summary = emptySummary();
      this.summaries.set(jobId, summary);
    }
    return summary;
  }
}
