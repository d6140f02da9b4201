import type { RenderStatus } from '../src/application/services/RenderService.js';
import type { RenderJob, RenderJobRecord } from '../src/core/entities/RenderJob.js';
import type { TimingSnapshot } from '../src/core/entities/TimingSnapshot.js';
import {
  InvalidRenderRequestError,
  NoActiveRenderError,
  RenderInProgressError,
  RopMetadataError,
  SpawnError,
} from '../src/core/errors/RenderErrors.js';
import { httpStatusFor } from '../src/infrastructure/web/WebServer.js';
import {
  formatInterruptOutcome,
  formatJobStarted,
  formatRenderStatus,
  toRenderRequest,
} from '../src/presentation/tools/RenderControlTools.js';
import { formatJobDetails, formatJobList } from '../src/presentation/tools/RenderHistoryTools.js';
import { formatRecentHipFiles, formatRopList } from '../src/presentation/tools/SceneTools.js';
import { formatClockTime } from '../src/utils/timeFormat.js';

const job: RenderJob = {
  id: 'job-s',
  hipPath: '/shots/sh030/comp.hip',
  outNode: '/out/Redshift_ROP1',
  frameRange: { start: 1, end: 10, step: 1 },
  skipExisting: false,
  status: 'running',
  commandLine: 'hython render_rop.py -i /shots/sh030/comp.hip',
  createdAt: new Date('2026-01-05T14:00:00.000Z'),
};

describe('toRenderRequest', () => {
  test('should build a range from start and end', () => {
    expect(
      toRenderRequest({ hip_path: '/a.hip', out_node: '/out/rop', start_frame: 1, end_frame: 9, step: 2, skip_existing: true })
    ).toEqual({ hipPath: '/a.hip', outNode: '/out/rop', skipExisting: true, frameRange: { start: 1, end: 9, step: 2 } });
  });

  test('should leave the range to the ROP when none is given', () => {
    const request = toRenderRequest({ hip_path: '/a.hip', out_node: '/out/rop' });
    expect(request.frameRange).toBeUndefined();
    expect(request.skipExisting).toBeUndefined();
  });

  test('should reject a half range', () => {
    expect(() => toRenderRequest({ hip_path: '/a.hip', out_node: '/out/rop', start_frame: 1 })).toThrow(
      'start_frame and end_frame must be given together'
    );
  });
});

describe('formatJobStarted', () => {
  test('should describe the range and the command', () => {
    const text = formatJobStarted({ ...job, frameRange: { start: 1, end: 10, step: 3 } });
    expect(text).toContain('- **Frames**: 1-10 step 3');
    expect(text).toContain('```\nhython render_rop.py -i /shots/sh030/comp.hip\n```');
  });

  test('should mention the ROP settings when no range was given', () => {
    expect(formatJobStarted({ ...job, frameRange: null })).toContain('- **Frames**: ROP settings');
  });
});

test('formatInterruptOutcome', () => {
  expect(formatInterruptOutcome('signalled')).toBe(
    'Interrupt requested. The current frame will finish before the render stops.'
  );
  expect(formatInterruptOutcome('escalated')).toBe('A stop was already requested, so the render was killed.');
});

describe('formatRenderStatus', () => {
  const eta = new Date(2026, 0, 5, 15, 30, 0);
  const timing: TimingSnapshot = {
    elapsedSeconds: 30,
    averageSeconds: 12,
    estimatedTotalSeconds: 126,
    remainingSeconds: 96,
    eta,
    showEta: true,
    confidence: 'measured',
  };
  const status: RenderStatus = {
    rendering: true,
    job,
    monitorState: 'monitoring',
    discovery: { totalFrames: 10, source: 'log-echo' },
    framesSeen: 3,
    framesCompleted: 2,
    framesSkipped: 0,
    currentFrame: 3,
    currentFrameProgress: 40,
    timing,
    lastImage: '/shots/out/comp.0002.exr',
    frames: [],
  };

  test('should report a render in progress', () => {
    expect(formatRenderStatus(status, false)).toBe(
      [
        '# Render In Progress: job-s',
        '',
        '- **Status**: running (monitoring)',
        '- **Scene**: /shots/sh030/comp.hip',
        '- **ROP**: /out/Redshift_ROP1',
        '- **Frames**: 3 / 10 (total from log-echo)',
        '- **Completed**: 2',
        '- **Skipped**: 0',
        '- **Current frame**: 3 (40%)',
        '',
        '## Timing',
        '- **Elapsed**: 30.0s',
        '- **Average per frame**: 12.0s',
        '- **Remaining**: 1m 36.0s (measured)',
        `- **ETA**: ${formatClockTime(eta)}`,
        '',
        '**Last image**: /shots/out/comp.0002.exr',
      ].join('\n')
    );
  });

  test('should report a failed render with its frames', () => {
    const frames = [
      { frameNumber: 1, sequenceIndex: 0, status: 'completed' as const, progressPercent: 100, durationSeconds: 4, startedAt: null },
    ];
    const text = formatRenderStatus(
      {
        ...status,
        rendering: false,
        job: { ...job, status: 'failed', error: 'Render monitoring failed: pipe broke' },
        monitorState: 'finished',
        currentFrame: null,
        timing: { ...timing, averageSeconds: 0, showEta: false, elapsedSeconds: 5 },
        lastImage: null,
        frames,
      },
      true
    );

    expect(text.split('\n').slice(0, 3)).toEqual(['# Render Finished: job-s', '', '- **Status**: failed (finished)']);
    expect(text).toContain('## Timing\n- **Elapsed**: 5.0s\n\n## Error');
    expect(text).toContain('## Error\n```\nRender monitoring failed: pipe broke\n```');
    expect(text.endsWith(`## Frames\n\`\`\`json\n${JSON.stringify(frames, null, 2)}\n\`\`\``)).toBe(true);
  });

  test('should say when nothing ran yet', () => {
    expect(formatRenderStatus({ ...status, job: null }, false)).toBe('No render has been started since the server came up.');
  });
});

describe('history formatting', () => {
  const record: RenderJobRecord = {
    ...job,
    status: 'completed',
    totalFrames: 5,
    framesCompleted: 3,
    framesSkipped: 1,
    averageFrameSeconds: 12.5,
    elapsedSeconds: 75,
    lastImage: null,
  };

  test('should list jobs as a table', () => {
    expect(formatJobList([record])).toBe(
      [
        '# Render History (1)',
        '',
        '| Job | Started | ROP | Status | Frames | Elapsed |',
        '| --- | --- | --- | --- | --- | --- |',
        '| job-s | 2026-01-05T14:00:00.000Z | /out/Redshift_ROP1 | completed | 4/5 | 1m15s |',
      ].join('\n')
    );
    expect(formatJobList([])).toBe('No renders recorded yet.');
  });

  test('should describe one job and its frames', () => {
    const text = formatJobDetails({ ...record, elapsedSeconds: 40 }, [
      { frameNumber: 1, sequenceIndex: 0, status: 'skipped', progressPercent: 0, durationSeconds: 0, startedAt: null },
      { frameNumber: 2, sequenceIndex: 1, status: 'completed', progressPercent: 100, durationSeconds: 12.5, startedAt: null },
      { frameNumber: 3, sequenceIndex: 2, status: 'rendering', progressPercent: 30, durationSeconds: null, startedAt: null },
    ]);

    expect(text).toContain('- **Finished**: not yet');
    expect(text).toContain('- **Frames**: 3 rendered, 1 skipped, 5 total');
    expect(text).toContain('- **Elapsed**: 40.0s\n- **Average per frame**: 12.5s');
    expect(text.endsWith('## Frames\n- Frame 1: skipped 0s\n- Frame 2: completed 12s\n- Frame 3: rendering')).toBe(true);
  });
});

describe('scene formatting', () => {
  test('should list render nodes as a table', () => {
    expect(
      formatRopList('/shots/a.hip', [
        { path: '/out/beauty', nodeType: 'Redshift_ROP', startFrame: 1001, endFrame: 1100, step: 1, skipRendered: true },
        { path: '/out/cache', nodeType: null, startFrame: 1, endFrame: 240, step: 2, skipRendered: false },
      ])
    ).toBe(
      [
        '# Render Nodes in /shots/a.hip (2)',
        '',
        '| ROP | Type | Frames | Skip rendered |',
        '| --- | --- | --- | --- |',
        '| /out/beauty | Redshift_ROP | 1001-1100 | yes |',
        '| /out/cache | unknown | 1-240 step 2 | no |',
      ].join('\n')
    );
    expect(formatRopList('/shots/empty.hip', [])).toBe('No render nodes found under /out in /shots/empty.hip.');
  });

  test('should mark recent scenes that are gone', () => {
    expect(
      formatRecentHipFiles([
        { path: '/shots/a.hip', exists: true },
        { path: '/shots/old.hip', exists: false },
      ])
    ).toBe(['# Recent Scenes (2)', '', '- /shots/a.hip', '- /shots/old.hip (missing)'].join('\n'));
    expect(formatRecentHipFiles([])).toBe('No recent scenes found in the Houdini file history.');
  });
});

describe('httpStatusFor', () => {
  test('should map render errors to HTTP statuses', () => {
    expect(httpStatusFor(new InvalidRenderRequestError(['hipPath: hipPath must not be empty']))).toBe(400);
    expect(httpStatusFor(new RenderInProgressError('job-s'))).toBe(409);
    expect(httpStatusFor(new NoActiveRenderError())).toBe(409);
    expect(httpStatusFor(RopMetadataError.fromInspectOutput('No valid JSON found in output', ''))).toBe(502);
    expect(httpStatusFor(new SpawnError('Failed to launch hython', 'hython'))).toBe(500);
    expect(httpStatusFor('unexpected')).toBe(500);
  });
});
