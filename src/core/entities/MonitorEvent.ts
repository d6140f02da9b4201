import type { FinishReason, RenderJob } from './RenderJob.js';
import type { TimingSnapshot } from './TimingSnapshot.js';

/**
 * Colors used for formatted output lines
 */
export const OUTPUT_COLORS = {
  banner: '#22adf2',
  command: '#ff6b2b',
  muted: '#c0c0c0',
  frameHeader: '#50c878',
  warning: '#ff7a7a',
} as const;

interface MonitorEventBase {
  jobId: string;
  timestamp: Date;
}

export interface JobStartedEvent extends MonitorEventBase {
  type: 'job-started';
  job: RenderJob;
}

export interface OutputEvent extends MonitorEventBase {
  type: 'output';
  text: string;
  color?: string;
  bold: boolean;
  center: boolean;
}

export interface RawLineEvent extends MonitorEventBase {
  type: 'raw-line';
  line: string;
}

export interface ProgressEvent extends MonitorEventBase {
  type: 'progress';
  current: number;
  total: number;
}

export interface FrameStartedEvent extends MonitorEventBase {
  type: 'frame-started';
  frameNumber: number;
  sequenceIndex: number;
  estimateSeconds: number;
}

export interface FrameProgressEvent extends MonitorEventBase {
  type: 'frame-progress';
  frameNumber: number;
  percent: number;
}

export interface FrameCompletedEvent extends MonitorEventBase {
  type: 'frame-completed';
  frameNumber: number;
  sequenceIndex: number;
  durationSeconds: number;
}

export interface FrameSkippedEvent extends MonitorEventBase {
  type: 'frame-skipped';
  frameNumber: number;
  sequenceIndex: number;
}

export interface ImageProducedEvent extends MonitorEventBase {
  type: 'image-produced';
  filePath: string;
}

export interface TimeLabelsEvent extends MonitorEventBase, TimingSnapshot {
  type: 'time-labels';
}

export interface FinishedEvent extends MonitorEventBase {
  type: 'finished';
  reason: FinishReason;
  error?: string;
}

export type MonitorEvent =
  | JobStartedEvent
  | OutputEvent
  | RawLineEvent
  | ProgressEvent
  | FrameStartedEvent
  | FrameProgressEvent
  | FrameCompletedEvent
  | FrameSkippedEvent
  | ImageProducedEvent
  | TimeLabelsEvent
  | FinishedEvent;

export type MonitorEventType = MonitorEvent['type'];

/**
 * Anything that accepts monitor events in order
 */
export interface MonitorEventSink {
  publish(event: MonitorEvent): void;
}
