import type { FrameRange } from '../../core/entities/RenderJob.js';

export interface RenderInvocationParams {
  hipPath: string;
  outNode: string;
  frameRange: FrameRange;
  /** false: the ROP renders its own configured range */
  useRange: boolean;
  skipExisting: boolean;
}

export interface HythonInvocation {
  command: string;
  args: string[];
}

const pythonBool = (value: boolean): string => (value ? 'True' : 'False');

/**
 * Command line for scripts/render_rop.py running under hython
 */
export class HythonCommandBuilder {
  constructor(
    private readonly hythonPath: string,
    private readonly renderScriptPath: string
  ) {}

  build(params: RenderInvocationParams): HythonInvocation {
    const { start, end, step } = params.frameRange;
    return {
      command: this.hythonPath,
      args: [
        this.renderScriptPath,
        '-i', params.hipPath,
        '-o', params.outNode,
        '-s', String(start),
        '-e', String(end),
        '-u', pythonBool(params.useRange),
        '-r', pythonBool(params.skipExisting),
        '-t', String(Math.max(1, step)),
      ],
    };
  }
}
