import { randomUUID } from 'crypto';
import path from 'path';
import { z } from 'zod';
import type { FrameRecord, FrameTotalDiscovery } from '../../core/entities/FrameRecord.js';
import { OUTPUT_COLORS, type MonitorEvent } from '../../core/entities/MonitorEvent.js';
import { normalizeFrameRange, type FrameRange, type RenderJob, type RenderRequest } from '../../core/entities/RenderJob.js';
import type { TimingSnapshot } from '../../core/entities/TimingSnapshot.js';
import {
  InvalidRenderRequestError,
  NoActiveRenderError,
  RenderInProgressError,
} from '../../core/errors/RenderErrors.js';
import type { IRopMetadataProvider, RopSettings } from '../../core/interfaces/IRopMetadataProvider.js';
import { LogLineDecoder } from '../../core/parsing/LogLineDecoder.js';
import { FrameTracker } from '../../core/tracking/FrameTracker.js';
import { TimingEstimator } from '../../core/tracking/TimingEstimator.js';
import type { HythonCommandBuilder } from '../../infrastructure/houdini/HythonCommandBuilder.js';
import type {
  InterruptOutcome,
  ProcessHandle,
  ProcessSupervisor,
} from '../../infrastructure/process/ProcessSupervisor.js';
import { MonitorChannel } from '../../infrastructure/queue/MonitorChannel.js';
import { formatBannerTimestamp } from '../../utils/timeFormat.js';
import { RenderMonitor, type MonitorState, type StopSignals } from './RenderMonitor.js';

export const FrameRangeSchema = z
  .object({
    start: z.number().int(),
    end: z.number().int(),
    step: z.number().int().min(1, 'step must be at least 1').default(1),
  })
  .refine((range) => range.end >= range.start, { message: 'end frame must not be before start frame' });

export const RenderRequestSchema = z.object({
  hipPath: z.string().trim().min(1, 'hipPath must not be empty'),
  outNode: z.string().trim().min(1, 'outNode must not be empty'),
  frameRange: FrameRangeSchema.optional(),
  skipExisting: z.boolean().optional(),
});

export interface RenderServiceSettings {
  readTimeoutMs: number;
  refreshIntervalMs: number;
  inferredTotalMargin: number;
  flatGuessSecondsPerFrame: number;
  gracefulExitTimeoutMs: number;
  vendorLogPrefixes: string[];
}

export interface RenderStatus {
  rendering: boolean;
  job: RenderJob | null;
  monitorState: MonitorState | null;
  discovery: FrameTotalDiscovery;
  framesSeen: number;
  framesCompleted: number;
  framesSkipped: number;
  currentFrame: number | null;
  currentFrameProgress: number;
  timing: TimingSnapshot | null;
  lastImage: string | null;
  frames: FrameRecord[];
}

/**
 * Stop flags shared between the control methods and the monitor loop
 */
class RenderControl implements StopSignals {
  stopRequested = false;
  killed = false;
  interruptDelivered = false;

  constructor(
    private readonly supervisor: ProcessSupervisor,
    private readonly handle: ProcessHandle
  ) {}

  redeliverInterrupt(): void {
    const outcome = this.supervisor.redeliverInterrupt(this.handle);
    this.interruptDelivered = outcome !== 'failed';
  }
}

interface RenderRun {
  job: RenderJob;
  handle: ProcessHandle;
  tracker: FrameTracker;
  monitor: RenderMonitor;
  control: RenderControl;
}

/**
 * Starts one render at a time and exposes interrupt, kill and status for it.
 * Every job publishes into the same long-lived event channel.
 */
export class RenderService {
  readonly events = new MonitorChannel<MonitorEvent>();

  private current: RenderRun | null = null;
  private completion: Promise<RenderJob> | null = null;
  private starting = false;

  constructor(
    private readonly supervisor: ProcessSupervisor,
    private readonly commandBuilder: HythonCommandBuilder,
    private readonly metadataProvider: IRopMetadataProvider | null,
    private readonly settings: RenderServiceSettings,
    private readonly debugLog: (message: string) => void = () => {},
    private readonly clock: () => number = Date.now
  ) {}

  get isRendering(): boolean {
    return this.starting || this.current?.job.status === 'running';
  }

  /**
   * Spawns the render and returns once its monitor is running
   */
  async startRender(request: RenderRequest): Promise<RenderJob> {
    const parsed = RenderRequestSchema.safeParse(request);
    if (!parsed.success) {
      throw new InvalidRenderRequestError(
        parsed.error.errors.map((issue) => `${issue.path.join('.') || 'request'}: ${issue.message}`)
      );
    }

    if (this.current?.job.status === 'running') {
      throw new RenderInProgressError(this.current.job.id);
    }
    if (this.starting) {
      throw new RenderInProgressError('pending');
    }

    this.starting = true;
    try {
      return await this.launch(parsed.data);
    } finally {
      this.starting = false;
    }
  }

  /**
   * First call asks for a stop after the current frame, a second call kills
   */
  async interrupt(): Promise<InterruptOutcome> {
    const run = this.requireRunning();

    if (run.control.stopRequested) {
      this.debugLog(`[RenderService] Second interrupt for job ${run.job.id}, escalating to kill`);
      await this.kill();
      return 'escalated';
    }

    run.control.stopRequested = true;
    this.output(run.job.id, '\n Interrupt requested... Current frame will finish before stopping. \n\n', {
      color: OUTPUT_COLORS.warning,
      bold: true,
    });

    const outcome = await this.supervisor.interrupt(run.handle);
    run.control.interruptDelivered = run.handle.interruptDelivered;
    console.error(`[RenderService] Interrupt for job ${run.job.id}: ${outcome}`);
    return outcome;
  }

  /**
   * Kills the render's process group and resolves with the finished job
   */
  async kill(): Promise<RenderJob> {
    const run = this.requireRunning();

    if (!run.control.killed) {
      this.output(run.job.id, '\n Force kill requested... Stopping render immediately. \n\n', {
        color: OUTPUT_COLORS.warning,
        bold: true,
      });
      run.control.killed = true;
      await this.supervisor.kill(run.handle);
      console.error(`[RenderService] Job ${run.job.id} killed`);
    }

    return this.completion ?? run.job;
  }

  getStatus(): RenderStatus {
    const run = this.current;
    if (!run) {
      return {
        rendering: this.starting,
        job: null,
        monitorState: null,
        discovery: { totalFrames: 0, source: 'unset' },
        framesSeen: 0,
        framesCompleted: 0,
        framesSkipped: 0,
        currentFrame: null,
        currentFrameProgress: 0,
        timing: null,
        lastImage: null,
        frames: [],
      };
    }

    const { tracker, monitor } = run;
    return {
      rendering: run.job.status === 'running',
      job: { ...run.job },
      monitorState: monitor.state,
      discovery: tracker.getDiscovery(),
      framesSeen: tracker.framesSeenCount,
      framesCompleted: tracker.completedCount,
      framesSkipped: tracker.skippedCount,
      currentFrame: tracker.isFrameInProgress ? tracker.currentFrameNumber : null,
      currentFrameProgress: tracker.isFrameInProgress ? tracker.currentFrameProgress : 0,
      timing: monitor.timing,
      lastImage: monitor.lastImage,
      frames: tracker.getRecords(),
    };
  }

  /**
   * Resolves with the latest job once it has finished, null if none ever ran
   */
  async waitForCompletion(): Promise<RenderJob | null> {
    if (this.completion) return this.completion;
    return this.current ? this.current.job : null;
  }

  async shutdown(): Promise<void> {
    if (this.current?.job.status === 'running') {
      console.error(`[RenderService] Shutting down, killing job ${this.current.job.id}`);
      await this.kill();
    }
    this.events.close();
  }

  private async launch(request: z.infer<typeof RenderRequestSchema>): Promise<RenderJob> {
    const explicitRange = request.frameRange ? normalizeFrameRange(request.frameRange) : null;
    const rop = explicitRange ? null : await this.lookupRopSettings(request.hipPath, request.outNode);
    const ropRange: FrameRange | null = rop
      ? normalizeFrameRange({ start: rop.startFrame, end: rop.endFrame, step: rop.step })
      : null;
    const skipExisting = request.skipExisting ?? rop?.skipRendered ?? false;

    const invocation = this.commandBuilder.build({
      hipPath: request.hipPath,
      outNode: request.outNode,
      frameRange: explicitRange ?? ropRange ?? { start: 1, end: 1, step: 1 },
      useRange: explicitRange !== null,
      skipExisting,
    });

    const handle = await this.supervisor.start(invocation.command, invocation.args, path.dirname(request.hipPath));

    const job: RenderJob = {
      id: randomUUID(),
      hipPath: request.hipPath,
      outNode: request.outNode,
      frameRange: explicitRange,
      skipExisting,
      status: 'running',
      commandLine: handle.commandLine,
      createdAt: new Date(this.clock()),
    };

    const tracker = new FrameTracker(
      { explicitRange, inferredTotalMargin: this.settings.inferredTotalMargin },
      new TimingEstimator(this.settings.flatGuessSecondsPerFrame)
    );
    if (ropRange) {
      tracker.onFrameRangeAnnounced(ropRange, 'rop-metadata');
    }

    const control = new RenderControl(this.supervisor, handle);
    const monitor = new RenderMonitor(job.id, handle.output, tracker, this.events, control, {
      readTimeoutMs: this.settings.readTimeoutMs,
      refreshIntervalMs: this.settings.refreshIntervalMs,
      decoder: new LogLineDecoder(this.settings.vendorLogPrefixes),
      clock: this.clock,
      debugLog: this.debugLog,
    });

    const run: RenderRun = { job, handle, tracker, monitor, control };
    this.current = run;

    console.error(`[RenderService] Job ${job.id} started (pid ${handle.pid})`);
    this.events.publish({ type: 'job-started', jobId: job.id, timestamp: job.createdAt, job: { ...job } });
    this.output(job.id, `\n\n RENDER STARTED AT ${formatBannerTimestamp(job.createdAt)} \n\n`, {
      color: OUTPUT_COLORS.banner,
      bold: true,
      center: true,
    });
    this.output(job.id, `${job.commandLine}\n\n`, { color: OUTPUT_COLORS.command });
    this.output(job.id, 'Loading scene...\n', { color: OUTPUT_COLORS.muted });

    this.completion = this.runToCompletion(run);
    return { ...job };
  }

  private async lookupRopSettings(hipPath: string, outNode: string): Promise<RopSettings | null> {
    if (!this.metadataProvider) return null;
    try {
      const settings = await this.metadataProvider.getRopSettings(hipPath, outNode);
      this.debugLog(
        `[RenderService] ROP ${outNode}: frames ${settings.startFrame}-${settings.endFrame} step ${settings.step}, skip rendered ${settings.skipRendered}`
      );
      return settings;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[RenderService] Could not read ROP settings for ${outNode}: ${message}`);
      return null;
    }
  }

  private async runToCompletion(run: RenderRun): Promise<RenderJob> {
    const { job, handle, monitor } = run;

    try {
      const result = await monitor.run();

      if (this.supervisor.isRunning(handle)) {
        const exited = await this.supervisor.waitForExit(handle, this.settings.gracefulExitTimeoutMs);
        if (!exited) {
          console.error(`[RenderService] Process ${handle.pid} still running after the monitor finished, killing it`);
          await this.supervisor.kill(handle);
        }
      }

      job.status = result.reason;
      job.finishReason = result.reason;
      if (result.error) job.error = result.error;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[RenderService] Job ${job.id} failed: ${message}`);
      job.status = 'failed';
      job.finishReason = 'failed';
      job.error = message;
    } finally {
      job.exitCode = this.supervisor.pollExitCode(handle);
      job.finishedAt = new Date(this.clock());
    }

    console.error(`[RenderService] Job ${job.id} finished: ${job.status}`);
    return { ...job };
  }

  private requireRunning(): RenderRun {
    const run = this.current;
    if (!run || run.job.status !== 'running') {
      throw new NoActiveRenderError();
    }
    return run;
  }

  private output(jobId: string, text: string, style: { color?: string; bold?: boolean; center?: boolean }): void {
    this.events.publish({
      type: 'output',
      jobId,
      timestamp: new Date(this.clock()),
      text,
      color: style.color,
      bold: style.bold ?? false,
      center: style.center ?? false,
    });
  }
}
