import type { FrameRecord, FrameTotalDiscovery, FrameTotalSource } from '../entities/FrameRecord.js';
import { countFrames, normalizeFrameRange, type FrameRange } from '../entities/RenderJob.js';
import { TimingEstimator } from './TimingEstimator.js';

export const DEFAULT_INFERRED_TOTAL_MARGIN = 5;

export interface FrameTrackerOptions {
  explicitRange?: FrameRange | null;
  inferredTotalMargin?: number;
}

export interface FrameStartedResult {
  record: FrameRecord;
  totalChanged: boolean;
}

export interface FrameSkippedResult {
  record: FrameRecord;
  framesSeen: number;
}

export interface FrameLoadingResult {
  record: FrameRecord;
  framesSeen: number;
  /** Skip run flushed just before this frame's header, empty if none was pending */
  flushedSkips: number[];
}

export interface BlockProgressResult {
  frameNumber: number;
  percent: number;
}

export interface FrameCompletedResult {
  record: FrameRecord;
  framesSeen: number;
  /** Set when the completion arrived without the lines that normally precede it */
  note?: string;
}

const SOFT_SOURCES: ReadonlySet<FrameTotalSource> = new Set(['unset', 'inference']);

/**
 * Per-frame state machine and frame-total discovery for one render job.
 *
 * Frame totals: explicit args never change. While the total is unset or inferred,
 * the first log echo or ROP metadata range is accepted; after that, announcements
 * may only raise the total. No update drops it below the sequence positions
 * already observed, and a frame past the end of a non-explicit total raises it.
 */
export class FrameTracker {
  readonly timing: TimingEstimator;

  private readonly records = new Map<number, FrameRecord>();
  private readonly framesSeen = new Set<number>();
  private readonly completedBlocks = new Set<number>();
  private readonly inferredTotalMargin: number;

  private discovery: FrameTotalDiscovery = { totalFrames: 0, source: 'unset' };
  private range: FrameRange | null = null;
  private skipRun: number[] = [];

  private currentFrame: number | null = null;
  private currentStartedAt: Date | null = null;
  private frameInProgress = false;
  private completed = 0;
  private skipped = 0;

  constructor(options: FrameTrackerOptions = {}, timing: TimingEstimator = new TimingEstimator()) {
    this.timing = timing;
    this.inferredTotalMargin = options.inferredTotalMargin ?? DEFAULT_INFERRED_TOTAL_MARGIN;

    if (options.explicitRange) {
      const range = normalizeFrameRange(options.explicitRange);
      const total = countFrames(range);
      if (total > 0) {
        this.range = range;
        this.discovery = { totalFrames: total, source: 'explicit-args' };
      }
    }
  }

  get totalFrames(): number {
    return this.discovery.totalFrames;
  }

  get totalSource(): FrameTotalSource {
    return this.discovery.source;
  }

  getDiscovery(): FrameTotalDiscovery {
    return { ...this.discovery };
  }

  get framesSeenCount(): number {
    return this.framesSeen.size;
  }

  get completedCount(): number {
    return this.completed;
  }

  get skippedCount(): number {
    return this.skipped;
  }

  /** Completed plus skipped */
  get framesDone(): number {
    return this.completed + this.skipped;
  }

  get currentFrameNumber(): number | null {
    return this.currentFrame;
  }

  get currentFrameStartedAt(): Date | null {
    return this.currentStartedAt;
  }

  get isFrameInProgress(): boolean {
    return this.frameInProgress;
  }

  get currentFrameProgress(): number {
    if (this.currentFrame === null) return 0;
    return this.records.get(this.currentFrame)?.progressPercent ?? 0;
  }

  get pendingSkips(): readonly number[] {
    return this.skipRun;
  }

  getRecord(frameNumber: number): FrameRecord | undefined {
    const record = this.records.get(frameNumber);
    return record ? { ...record } : undefined;
  }

  getRecords(): FrameRecord[] {
    return Array.from(this.records.values())
      .map((record) => ({ ...record }))
      .sort((a, b) => a.sequenceIndex - b.sequenceIndex || a.frameNumber - b.frameNumber);
  }

  /**
   * Position of a frame within the job, `(N - start) / step` while a range is known.
   * Frames outside the range go after it, in sighting order.
   */
  sequenceIndexOf(frameNumber: number): number {
    const existing = this.records.get(frameNumber);
    if (existing) return existing.sequenceIndex;

    const range = this.range;
    if (!range) return this.records.size;
    return this.rangeIndex(frameNumber) ?? countFrames(range) + this.outOfRangeCount();
  }

  /**
   * Returns true when the total (or its source) changed
   */
  onFrameRangeAnnounced(announced: FrameRange, source: 'log-echo' | 'rop-metadata'): boolean {
    if (this.discovery.source === 'explicit-args') return false;

    const range = normalizeFrameRange(announced);
    const count = countFrames(range);
    if (count <= 0) return false;

    const soft = SOFT_SOURCES.has(this.discovery.source);
    if (!soft && count <= this.discovery.totalFrames) return false;

    this.range = range;
    this.remapSequenceIndices();
    this.discovery = {
      totalFrames: Math.max(count, this.observedPositions()),
      source,
    };
    return true;
  }

  onFrameStarted(frameNumber: number, at: Date): FrameStartedResult {
    this.currentFrame = frameNumber;
    this.currentStartedAt = at;
    this.completedBlocks.clear();

    const record = this.ensureRecord(frameNumber);
    if (record.status === 'pending') {
      record.startedAt = at;
    }

    return { record: { ...record }, totalChanged: this.raiseTotalFor(record) };
  }

  /**
   * Applies to the most recently started frame; null when there is none
   */
  onFrameSkipped(): FrameSkippedResult | null {
    const frameNumber = this.currentFrame;
    if (frameNumber === null) return null;

    const record = this.ensureRecord(frameNumber);
    if (record.status !== 'skipped') {
      if (record.status === 'completed') this.completed--;
      this.skipped++;
    }
    record.status = 'skipped';
    record.durationSeconds = 0;
    record.progressPercent = 0;

    this.framesSeen.add(frameNumber);
    if (!this.skipRun.includes(frameNumber)) {
      this.skipRun.push(frameNumber);
    }

    this.frameInProgress = false;
    this.currentFrame = null;
    this.currentStartedAt = null;
    this.completedBlocks.clear();

    return { record: { ...record }, framesSeen: this.framesSeen.size };
  }

  /**
   * The renderer is really rendering the current frame (it was not skipped)
   */
  onFrameLoadingOptions(at: Date): FrameLoadingResult | null {
    const frameNumber = this.currentFrame;
    if (frameNumber === null) return null;

    const record = this.ensureRecord(frameNumber);
    if (record.status === 'skipped') return null;

    record.status = 'rendering';
    record.startedAt = this.currentStartedAt ?? at;
    this.frameInProgress = true;
    this.framesSeen.add(frameNumber);

    return {
      record: { ...record },
      framesSeen: this.framesSeen.size,
      flushedSkips: this.flushSkipRun(),
    };
  }

  onBlockProgress(block: number, totalBlocks: number): BlockProgressResult | null {
    const frameNumber = this.currentFrame;
    if (frameNumber === null || totalBlocks <= 0) return null;

    this.completedBlocks.add(block);
    const percent = Math.min(100, Math.floor((100 * this.completedBlocks.size) / totalBlocks));

    const record = this.ensureRecord(frameNumber);
    record.progressPercent = percent;
    return { frameNumber, percent };
  }

  onFrameEnded(): void {
    this.frameInProgress = false;
  }

  /**
   * Record a frame completion. A completion with no started frame is attributed to
   * the next frame the job expects rather than dropped.
   */
  onFrameCompleted(durationSeconds: number, at: Date): FrameCompletedResult | null {
    let note: string | undefined;
    let frameNumber = this.currentFrame;

    if (frameNumber === null) {
      frameNumber = this.nextExpectedFrame();
      this.currentFrame = frameNumber;
      note = `Frame ${frameNumber} finished without a start line in the log`;
    }

    const record = this.ensureRecord(frameNumber);
    if (record.status === 'completed') return null;

    if (!note && record.status !== 'rendering') {
      note = `Frame ${frameNumber} finished without a loading line in the log`;
    }
    if (record.status === 'skipped') this.skipped--;

    record.status = 'completed';
    record.durationSeconds = durationSeconds;
    record.progressPercent = 100;
    record.startedAt = record.startedAt ?? new Date(at.getTime() - durationSeconds * 1000);

    this.completed++;
    this.framesSeen.add(frameNumber);
    this.frameInProgress = false;
    this.completedBlocks.clear();
    this.timing.record(durationSeconds);

    return { record: { ...record }, framesSeen: this.framesSeen.size, note };
  }

  /**
   * Hand over and clear the pending consecutive-skip run, sorted
   */
  flushSkipRun(): number[] {
    const run = [...this.skipRun].sort((a, b) => a - b);
    this.skipRun = [];
    return run;
  }

  private ensureRecord(frameNumber: number): FrameRecord {
    let record = this.records.get(frameNumber);
    if (!record) {
      record = {
        frameNumber,
        sequenceIndex: this.sequenceIndexOf(frameNumber),
        status: 'pending',
        progressPercent: 0,
        durationSeconds: null,
        startedAt: null,
      };
      this.records.set(frameNumber, record);
    }
    return record;
  }

  /**
   * Raise a non-explicit total that a started frame has reached: by sequence
   * position once a range is known, by frame number before that.
   */
  private raiseTotalFor(record: FrameRecord): boolean {
    if (this.discovery.source === 'explicit-args') return false;

    const reach = this.range ? record.sequenceIndex + 1 : record.frameNumber;
    const reached = this.range ? reach > this.discovery.totalFrames : reach >= this.discovery.totalFrames;
    if (!reached) return false;

    const inferred = Math.max(reach + this.inferredTotalMargin, this.observedPositions());
    if (inferred === this.discovery.totalFrames && this.discovery.source === 'inference') return false;

    this.discovery = { totalFrames: inferred, source: 'inference' };
    return true;
  }

  private outOfRangeCount(): number {
    let count = 0;
    for (const record of this.records.values()) {
      if (this.rangeIndex(record.frameNumber) === null) count++;
    }
    return count;
  }

  private rangeIndex(frameNumber: number): number | null {
    const range = this.range;
    if (!range) return null;
    const offset = frameNumber - range.start;
    if (offset < 0 || frameNumber > range.end || offset % range.step !== 0) return null;
    return offset / range.step;
  }

  private observedPositions(): number {
    let positions = this.framesSeen.size;
    for (const record of this.records.values()) {
      positions = Math.max(positions, record.sequenceIndex + 1);
    }
    return positions;
  }

  private remapSequenceIndices(): void {
    const unmapped: FrameRecord[] = [];
    for (const record of this.records.values()) {
      const index = this.rangeIndex(record.frameNumber);
      if (index === null) {
        unmapped.push(record);
      } else {
        record.sequenceIndex = index;
      }
    }
    // frames outside the announced range go after it, in sighting order
    const offset = this.range ? countFrames(this.range) : 0;
    unmapped.forEach((record, i) => {
      record.sequenceIndex = offset + i;
    });
  }

  private nextExpectedFrame(): number {
    const range = this.range;
    if (range) {
      for (let frame = range.start; frame <= range.end; frame += range.step) {
        const status = this.records.get(frame)?.status;
        if (status !== 'completed' && status !== 'skipped') return frame;
      }
    }
    let highest: number | null = null;
    for (const frameNumber of this.records.keys()) {
      highest = highest === null ? frameNumber : Math.max(highest, frameNumber);
    }
    return highest === null ? (range?.start ?? 1) : highest + 1;
  }
}
