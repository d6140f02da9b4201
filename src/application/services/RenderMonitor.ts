import { OUTPUT_COLORS, type MonitorEventSink } from '../../core/entities/MonitorEvent.js';
import type { FinishReason } from '../../core/entities/RenderJob.js';
import type { TimingSnapshot } from '../../core/entities/TimingSnapshot.js';
import { MonitorLoopError } from '../../core/errors/RenderErrors.js';
import { extractEvents, type LogEvent } from '../../core/parsing/LogEventExtractor.js';
import { LogLineDecoder } from '../../core/parsing/LogLineDecoder.js';
import type { FrameLoadingResult, FrameTracker } from '../../core/tracking/FrameTracker.js';
import { formatSkipReport } from '../../core/tracking/frameRuns.js';
import type { LineSource } from '../../infrastructure/process/LogLineReader.js';
import { formatClockTime, formatDuration } from '../../utils/timeFormat.js';

/**
 * Cancellation flags set by the control side and read by the loop
 */
export interface StopSignals {
  readonly stopRequested: boolean;
  readonly killed: boolean;
  readonly interruptDelivered: boolean;
  redeliverInterrupt(): Promise<void> | void;
}

export type MonitorState =
  | 'starting'
  | 'monitoring'
  | 'graceful-stop-requested'
  | 'draining'
  | 'force-killed'
  | 'finished';

export interface RenderMonitorOptions {
  readTimeoutMs?: number;
  refreshIntervalMs?: number;
  decoder?: LogLineDecoder;
  /** Milliseconds since the epoch */
  clock?: () => number;
  debugLog?: (message: string) => void;
}

export interface MonitorResult {
  reason: FinishReason;
  error?: string;
  elapsedSeconds: number;
}

interface OutputStyle {
  color?: string;
  bold?: boolean;
  center?: boolean;
}

type DispatchOutcome = 'continue' | 'stop';

const FINISH_BANNERS: Record<FinishReason, { text: string; color: string }> = {
  completed: { text: '\n RENDER COMPLETED \n\n', color: OUTPUT_COLORS.banner },
  canceled: { text: '\n Render gracefully canceled. \n\n', color: OUTPUT_COLORS.warning },
  killed: { text: '\n Render Killed \n\n', color: OUTPUT_COLORS.warning },
  failed: { text: '\n Render monitoring failed \n\n', color: OUTPUT_COLORS.warning },
};

/**
 * Reads the render log line by line, feeds the frame tracker and publishes
 * monitor events until the process output closes, a graceful stop drains,
 * or the process is killed. Always ends with exactly one finished event.
 */
export class RenderMonitor {
  private readonly readTimeoutMs: number;
  private readonly refreshIntervalMs: number;
  private readonly decoder: LogLineDecoder;
  private readonly clock: () => number;
  private readonly debugLog: (message: string) => void;

  private monitorState: MonitorState = 'starting';
  private startMs = 0;
  private lastRefreshMs = 0;
  private latestTiming: TimingSnapshot | null = null;
  private latestImage: string | null = null;
  private interruptResent = false;

  constructor(
    private readonly jobId: string,
    private readonly lines: LineSource,
    private readonly tracker: FrameTracker,
    private readonly sink: MonitorEventSink,
    private readonly control: StopSignals,
    options: RenderMonitorOptions = {}
  ) {
    this.readTimeoutMs = options.readTimeoutMs ?? 100;
    this.refreshIntervalMs = options.refreshIntervalMs ?? 500;
    this.decoder = options.decoder ?? new LogLineDecoder();
    this.clock = options.clock ?? Date.now;
    this.debugLog = options.debugLog ?? (() => {});
  }

  get state(): MonitorState {
    return this.monitorState;
  }

  get timing(): TimingSnapshot | null {
    return this.latestTiming;
  }

  get lastImage(): string | null {
    return this.latestImage;
  }

  async run(): Promise<MonitorResult> {
    this.startMs = this.clock();
    this.lastRefreshMs = this.startMs;
    this.monitorState = 'monitoring';

    let reason: FinishReason;
    let error: string | undefined;

    try {
      this.publishProgress();
      this.publishTimeLabels(this.snapshot());
      reason = await this.loop();
    } catch (caught) {
      const failure = MonitorLoopError.fromUnknown(this.jobId, caught);
      console.error(`[RenderMonitor] Job ${this.jobId}: ${failure.message}`);
      reason = 'failed';
      error = failure.message;
    }

    try {
      this.finish(reason, error);
    } catch (caught) {
      console.error(`[RenderMonitor] Job ${this.jobId}: error while finishing`, caught);
      this.sink.publish({ type: 'finished', jobId: this.jobId, timestamp: this.now(), reason, error });
    }

    this.monitorState = 'finished';
    return { reason, error, elapsedSeconds: this.elapsedSeconds() };
  }

  private async loop(): Promise<FinishReason> {
    for (;;) {
      if (this.control.killed) return this.forceKilled();
      if (this.control.stopRequested && this.monitorState === 'monitoring') {
        this.monitorState = 'graceful-stop-requested';
      }

      if (this.clock() - this.lastRefreshMs >= this.refreshIntervalMs) {
        this.publishTimeLabels(this.snapshot());
      }

      const result = await this.lines.readLine(this.readTimeoutMs);
      if (this.control.killed) return this.forceKilled();

      if (result.kind === 'closed') {
        return this.control.stopRequested ? 'canceled' : 'completed';
      }

      if (result.kind === 'timeout') {
        if (await this.gracefulStopReached()) return 'canceled';
        continue;
      }

      const line = this.decoder.decode(result.bytes);
      this.sink.publish({ type: 'raw-line', jobId: this.jobId, timestamp: this.now(), line });

      for (const event of extractEvents(line)) {
        if (this.dispatch(event) === 'stop') return 'canceled';
      }
    }
  }

  /**
   * Idle check while stopping: done once no frame is mid-render. The interrupt
   * signal is re-sent at most once if it was never delivered.
   */
  private async gracefulStopReached(): Promise<boolean> {
    if (!this.control.stopRequested) return false;
    if (!this.tracker.isFrameInProgress) return true;

    this.monitorState = 'draining';
    if (!this.control.interruptDelivered && !this.interruptResent) {
      this.interruptResent = true;
      this.debugLog(`[RenderMonitor] Job ${this.jobId}: re-sending interrupt`);
      await this.control.redeliverInterrupt();
    }
    return false;
  }

  private forceKilled(): FinishReason {
    this.monitorState = 'force-killed';
    return 'killed';
  }

  private dispatch(event: LogEvent): DispatchOutcome {
    const now = this.now();

    switch (event.kind) {
      case 'saved-file':
      case 'output-file':
        this.publishImage(event.filePath);
        break;

      case 'frame-range':
        if (this.tracker.onFrameRangeAnnounced(event.range, event.source)) {
          this.debugLog(
            `[RenderMonitor] Frame total ${this.tracker.totalFrames} from ${event.source} (${event.range.start}-${event.range.end}x${event.range.step})`
          );
          this.publishProgress();
          this.publishTimeLabels(this.snapshot());
        }
        break;

      case 'frame-started': {
        const { totalChanged } = this.tracker.onFrameStarted(event.frameNumber, now);
        if (totalChanged) this.publishProgress();
        break;
      }

      case 'frame-skipped': {
        const skipped = this.tracker.onFrameSkipped();
        if (skipped) {
          this.sink.publish({
            type: 'frame-skipped',
            jobId: this.jobId,
            timestamp: now,
            frameNumber: skipped.record.frameNumber,
            sequenceIndex: skipped.record.sequenceIndex,
          });
          this.publishProgress();
          this.publishTimeLabels(this.snapshot());
        }
        break;
      }

      case 'frame-loading-options': {
        const loading = this.tracker.onFrameLoadingOptions(now);
        if (loading) this.announceFrame(loading, now);
        break;
      }

      case 'block-progress': {
        const progress = this.tracker.onBlockProgress(event.block, event.totalBlocks);
        if (progress) {
          this.sink.publish({
            type: 'frame-progress',
            jobId: this.jobId,
            timestamp: now,
            frameNumber: progress.frameNumber,
            percent: progress.percent,
          });
          this.publishTimeLabels(this.snapshot());
        }
        break;
      }

      case 'frame-ended':
        this.tracker.onFrameEnded();
        if (this.control.stopRequested) return 'stop';
        break;

      case 'frame-completed': {
        const completed = this.tracker.onFrameCompleted(event.durationSeconds, now);
        if (!completed) break;

        const { record } = completed;
        this.publishProgress();
        this.sink.publish({
          type: 'frame-completed',
          jobId: this.jobId,
          timestamp: now,
          frameNumber: record.frameNumber,
          sequenceIndex: record.sequenceIndex,
          durationSeconds: event.durationSeconds,
        });
        this.publishTimeLabels(this.snapshot());
        this.output(
          `   ${'Finished'.padEnd(8)} ${formatClockTime(now)} - ${formatDuration(event.durationSeconds)}\n\n`
        );
        if (completed.note) {
          this.debugLog(`[RenderMonitor] ${completed.note}`);
          this.output(`${completed.note}\n`, { color: OUTPUT_COLORS.muted });
        }
        break;
      }
    }

    return 'continue';
  }

  private announceFrame(loading: FrameLoadingResult, now: Date): void {
    if (loading.flushedSkips.length > 0) {
      this.output(`${formatSkipReport(loading.flushedSkips)}\n\n`);
    }

    const { record } = loading;
    const startedAt = record.startedAt ?? now;
    const estimate = this.tracker.timing.nextFrameEstimate();

    this.output(`\n Frame ${record.frameNumber}\n`, { color: OUTPUT_COLORS.frameHeader, bold: true });
    let info = `   ${'Started'.padEnd(8)} ${formatClockTime(startedAt)}\n`;
    if (estimate > 0) {
      const finishAt = new Date(startedAt.getTime() + estimate * 1000);
      info += `   ${'Estimate'.padEnd(8)} ${formatClockTime(finishAt)} - ${formatDuration(estimate)}\n`;
    }
    this.output(info);

    this.sink.publish({
      type: 'frame-started',
      jobId: this.jobId,
      timestamp: now,
      frameNumber: record.frameNumber,
      sequenceIndex: record.sequenceIndex,
      estimateSeconds: estimate,
    });
    this.publishProgress();
  }

  private finish(reason: FinishReason, error?: string): void {
    const flushed = this.tracker.flushSkipRun();
    if (flushed.length > 0) {
      this.output(`${formatSkipReport(flushed)}\n\n`);
    }

    this.publishTimeLabels(this.tracker.timing.finalSnapshot(this.elapsedSeconds(), this.now()));

    const banner = FINISH_BANNERS[reason];
    const text = reason === 'failed' && error ? `\n ${error} \n\n` : banner.text;
    this.output(text, { color: banner.color, bold: true, center: true });

    this.sink.publish({ type: 'finished', jobId: this.jobId, timestamp: this.now(), reason, error });
  }

  private snapshot(): TimingSnapshot {
    const nowMs = this.clock();
    const startedAt = this.tracker.currentFrameStartedAt;
    const currentFrame =
      this.tracker.isFrameInProgress && startedAt
        ? {
            percent: this.tracker.currentFrameProgress,
            elapsedSeconds: (nowMs - startedAt.getTime()) / 1000,
          }
        : null;

    return this.tracker.timing.snapshot(
      {
        framesDone: this.tracker.framesDone,
        totalFrames: this.tracker.totalFrames,
        elapsedSeconds: (nowMs - this.startMs) / 1000,
        currentFrame,
      },
      new Date(nowMs)
    );
  }

  private publishTimeLabels(snapshot: TimingSnapshot): void {
    this.latestTiming = snapshot;
    this.lastRefreshMs = this.clock();
    this.sink.publish({ type: 'time-labels', jobId: this.jobId, timestamp: this.now(), ...snapshot });
  }

  private publishProgress(): void {
    this.sink.publish({
      type: 'progress',
      jobId: this.jobId,
      timestamp: this.now(),
      current: this.tracker.framesSeenCount,
      total: this.tracker.totalFrames,
    });
  }

  private publishImage(filePath: string): void {
    // the saved-file line and the output marker usually name the same image
    if (filePath === this.latestImage) return;
    this.latestImage = filePath;
    this.sink.publish({ type: 'image-produced', jobId: this.jobId, timestamp: this.now(), filePath });
  }

  private output(text: string, style: OutputStyle = {}): void {
    this.sink.publish({
      type: 'output',
      jobId: this.jobId,
      timestamp: this.now(),
      text,
      color: style.color,
      bold: style.bold ?? false,
      center: style.center ?? false,
    });
  }

  private elapsedSeconds(): number {
    return Math.max(0, (this.clock() - this.startMs) / 1000);
  }

  private now(): Date {
    return new Date(this.clock());
  }
}
