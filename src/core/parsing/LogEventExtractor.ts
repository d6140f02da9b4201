import type { FrameRange } from '../entities/RenderJob.js';

/**
 * Domain events recognized in a single render log line
 */
export type LogEvent =
  | { kind: 'saved-file'; filePath: string }
  | { kind: 'frame-range'; range: FrameRange; source: 'log-echo' | 'rop-metadata' }
  | { kind: 'frame-started'; nodeName: string; frameNumber: number }
  | { kind: 'frame-skipped' }
  | { kind: 'frame-loading-options' }
  | { kind: 'block-progress'; block: number; totalBlocks: number }
  | { kind: 'frame-ended' }
  | { kind: 'frame-completed'; durationSeconds: number }
  | { kind: 'output-file'; filePath: string };

export type LogEventKind = LogEvent['kind'];

/** Printed by scripts/render_rop.py after every frame */
export const OUTPUT_FILE_MARKER = 'render_monitor_outputfile:';

const IMAGE_EXTENSIONS = '(?:exr|png|jpe?g|tiff?)';
const SAVED_FILE_QUOTED = new RegExp(`Saved file ['"]([^'"]+\\.${IMAGE_EXTENSIONS})['"]`, 'i');
const SAVED_FILE_BARE = new RegExp(`Saved file (\\S+\\.${IMAGE_EXTENSIONS})(?=\\s|$)`, 'i');

const RANGE_STATEMENT = /Frame range: (\d+)-(\d+)/;
const HIP_ARGS_ECHO = /-s (\d+) -e (\d+)/;
const ROP_PARMS = /ROP.*f1:(\d+).*f2:(\d+)/;
const ROP_STEP = /f3:(\d+)/;
const FLAG_ECHO = /-s (\d+).*-e (\d+)/;
const STEP_FLAG = /-t (\d+)/;

const FRAME_STARTED = /'([^']+)' rendering frame (\d+)/;
const SKIP_PHRASES = ['Skip rendering enabled. File already rendered', 'Skipped - File already exists'];
const LOADING_OPTIONS = 'Loading RS rendering options';
const FRAME_ENDED = 'ROP node endRender';
const BLOCK_PROGRESS = /Block (\d+)\/(\d+)/;
const COMPLETION_MARKER = 'scene extraction time';
const TOTAL_TIME = /total time (\d+(?:\.\d+)?) sec/;

export function recognizeSavedFile(line: string): LogEvent | null {
  const match = SAVED_FILE_QUOTED.exec(line) ?? SAVED_FILE_BARE.exec(line);
  return match ? { kind: 'saved-file', filePath: match[1] } : null;
}

/**
 * Frame range in one of its known textual forms, tried in order:
 * "Frame range: A-B", "-s A -e B" on the hip file echo line,
 * ROP parameter dump with f1/f2, then any "-s A ... -e B" flag echo.
 */
export function recognizeFrameRange(line: string): LogEvent | null {
  const statement = RANGE_STATEMENT.exec(line);
  if (statement) {
    return rangeEvent(statement[1], statement[2], 1, 'log-echo');
  }

  if (line.toLowerCase().includes('hip file')) {
    const echo = HIP_ARGS_ECHO.exec(line);
    if (echo) {
      return rangeEvent(echo[1], echo[2], stepFrom(STEP_FLAG.exec(line)), 'log-echo');
    }
  }

  const rop = ROP_PARMS.exec(line);
  if (rop) {
    return rangeEvent(rop[1], rop[2], stepFrom(ROP_STEP.exec(line)), 'rop-metadata');
  }

  if (line.includes('-s') && line.includes('-e')) {
    const flags = FLAG_ECHO.exec(line);
    if (flags) {
      return rangeEvent(flags[1], flags[2], stepFrom(STEP_FLAG.exec(line)), 'log-echo');
    }
  }

  return null;
}

function rangeEvent(start: string, end: string, step: number, source: 'log-echo' | 'rop-metadata'): LogEvent {
  return {
    kind: 'frame-range',
    range: { start: parseInt(start, 10), end: parseInt(end, 10), step },
    source,
  };
}

function stepFrom(match: RegExpExecArray | null): number {
  if (!match) return 1;
  return Math.max(1, parseInt(match[1], 10));
}

export function recognizeFrameStarted(line: string): LogEvent | null {
  const match = FRAME_STARTED.exec(line);
  if (!match) return null;
  return { kind: 'frame-started', nodeName: match[1], frameNumber: parseInt(match[2], 10) };
}

export function recognizeFrameSkipped(line: string): LogEvent | null {
  return SKIP_PHRASES.some((phrase) => line.includes(phrase)) ? { kind: 'frame-skipped' } : null;
}

export function recognizeFrameLoadingOptions(line: string): LogEvent | null {
  return line.includes(LOADING_OPTIONS) ? { kind: 'frame-loading-options' } : null;
}

export function recognizeFrameEnded(line: string): LogEvent | null {
  return line.includes(FRAME_ENDED) ? { kind: 'frame-ended' } : null;
}

export function recognizeBlockProgress(line: string): LogEvent | null {
  const match = BLOCK_PROGRESS.exec(line);
  if (!match) return null;
  const totalBlocks = parseInt(match[2], 10);
  if (totalBlocks <= 0) return null;
  return { kind: 'block-progress', block: parseInt(match[1], 10), totalBlocks };
}

export function recognizeFrameCompleted(line: string): LogEvent | null {
  if (!line.includes(COMPLETION_MARKER)) return null;
  const match = TOTAL_TIME.exec(line);
  return match ? { kind: 'frame-completed', durationSeconds: parseFloat(match[1]) } : null;
}

export function recognizeOutputFile(line: string): LogEvent | null {
  if (!line.startsWith(OUTPUT_FILE_MARKER)) return null;
  const filePath = line.slice(OUTPUT_FILE_MARKER.length).trim();
  return filePath ? { kind: 'output-file', filePath } : null;
}

// Skip, loading, end-of-frame and completion lines never share a line; first match wins.
const LIFECYCLE_RECOGNIZERS = [
  recognizeFrameSkipped,
  recognizeFrameLoadingOptions,
  recognizeFrameEnded,
  recognizeFrameCompleted,
];

/**
 * Run every recognizer over a normalized log line. Most lines match nothing.
 */
export function extractEvents(line: string): LogEvent[] {
  const events: LogEvent[] = [];
  const push = (event: LogEvent | null) => {
    if (event) events.push(event);
  };

  push(recognizeSavedFile(line));
  push(recognizeFrameRange(line));
  push(recognizeFrameStarted(line));

  for (const recognize of LIFECYCLE_RECOGNIZERS) {
    const event = recognize(line);
    if (event) {
      events.push(event);
      break;
    }
  }

  push(recognizeBlockProgress(line));
  push(recognizeOutputFile(line));
  return events;
}
