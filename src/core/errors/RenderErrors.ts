/**
 * Error classes for render control and monitoring
 */

export class RenderError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * The render backend could not be launched. Fatal to the job, never retried.
 */
export class SpawnError extends RenderError {
  constructor(
    message: string,
    public readonly command: string,
    context?: Record<string, unknown>
  ) {
    super(message, 'SPAWN_ERROR', { ...context, command });
  }

  static fromSystemError(command: string, error: unknown): SpawnError {
    const message = error instanceof Error ? error.message : String(error);
    const systemCode = systemErrorCode(error);

    let hint = '';
    if (systemCode === 'ENOENT') {
      hint = '\nCheck that hython is installed and that HYTHON_PATH points at it.';
    } else if (systemCode === 'EACCES') {
      hint = '\nThe executable exists but is not executable by the current user.';
    }

    return new SpawnError(`Failed to launch ${command}: ${message}${hint}`, command, {
      originalError: message,
      systemCode,
    });
  }
}

export class RenderInProgressError extends RenderError {
  constructor(public readonly activeJobId: string) {
    super(
      `A render is already in progress (job ${activeJobId}). Interrupt or kill it before starting another.`,
      'RENDER_IN_PROGRESS',
      { activeJobId }
    );
  }
}

export class NoActiveRenderError extends RenderError {
  constructor() {
    super('No render is currently running', 'NO_ACTIVE_RENDER');
  }
}

export class InvalidRenderRequestError extends RenderError {
  constructor(public readonly issues: string[]) {
    super(`Invalid render request:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`, 'INVALID_REQUEST', {
      issues,
    });
  }
}

export class RopMetadataError extends RenderError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'ROP_METADATA_ERROR', context);
  }

  static fromInspectOutput(reason: string, output: string): RopMetadataError {
    return new RopMetadataError(`Could not read ROP settings: ${reason}`, {
      outputTail: output.slice(-500),
    });
  }
}

/**
 * Raised by strict decoding of a log line; always recovered by the decoder
 */
export class StreamDecodeError extends RenderError {
  constructor(byteLength: number, cause: unknown) {
    super(`Undecodable bytes in a ${byteLength}-byte log line`, 'STREAM_DECODE_ERROR', {
      byteLength,
      originalError: cause instanceof Error ? cause.message : String(cause),
    });
  }
}

/**
 * Unexpected failure inside the monitor loop, converted into a finished event
 */
export class MonitorLoopError extends RenderError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'MONITOR_LOOP_ERROR', context);
  }

  static fromUnknown(jobId: string, error: unknown): MonitorLoopError {
    if (error instanceof MonitorLoopError) return error;
    const message = error instanceof Error ? error.message : String(error);
    return new MonitorLoopError(`Render monitoring failed: ${message}`, { jobId, originalError: message });
  }
}

/**
 * `code` of a Node system error (ENOENT, ESRCH, ...) if present
 */
export function systemErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
