import {
  extractEvents,
  recognizeBlockProgress,
  recognizeFrameCompleted,
  recognizeFrameEnded,
  recognizeFrameLoadingOptions,
  recognizeFrameRange,
  recognizeFrameSkipped,
  recognizeFrameStarted,
  recognizeOutputFile,
  recognizeSavedFile,
} from '../src/core/parsing/LogEventExtractor.js';

describe('recognizeSavedFile', () => {
  test('matches a quoted image path', () => {
    expect(recognizeSavedFile("Saved file '/shots/sh010/render/beauty.0005.exr' in 1.2s")).toEqual({
      kind: 'saved-file',
      filePath: '/shots/sh010/render/beauty.0005.exr',
    });
  });

  test('matches a bare path at the end of the line', () => {
    expect(recognizeSavedFile('Saved file /tmp/out/preview.0001.PNG')).toEqual({
      kind: 'saved-file',
      filePath: '/tmp/out/preview.0001.PNG',
    });
  });

  test('ignores non-image files', () => {
    expect(recognizeSavedFile("Saved file '/tmp/cache/geo.bgeo.sc'")).toBeNull();
  });
});

describe('recognizeFrameRange', () => {
  test('reads a "Frame range" statement with step 1', () => {
    expect(recognizeFrameRange('Frame range: 1001-1100')).toEqual({
      kind: 'frame-range',
      range: { start: 1001, end: 1100, step: 1 },
      source: 'log-echo',
    });
  });

  test('reads the hip file echo line with a step flag', () => {
    expect(recognizeFrameRange('Loading hip file /shots/a.hip -s 1 -e 20 -t 2')).toEqual({
      kind: 'frame-range',
      range: { start: 1, end: 20, step: 2 },
      source: 'log-echo',
    });
  });

  test('reads a ROP parameter dump as ROP metadata', () => {
    expect(recognizeFrameRange('ROP /out/Redshift_ROP1 f1:12 f2:48 f3:3')).toEqual({
      kind: 'frame-range',
      range: { start: 12, end: 48, step: 3 },
      source: 'rop-metadata',
    });
  });

  test('falls back to any -s/-e flag echo', () => {
    expect(recognizeFrameRange('render args -s 10 -u True -e 19')).toEqual({
      kind: 'frame-range',
      range: { start: 10, end: 19, step: 1 },
      source: 'log-echo',
    });
  });

  test('returns null for unrelated lines', () => {
    expect(recognizeFrameRange('Redshift Version: 3.5.19')).toBeNull();
  });
});

describe('lifecycle recognizers', () => {
  test('frame started carries the node name and frame number', () => {
    expect(recognizeFrameStarted("'Redshift_ROP1' rendering frame 5")).toEqual({
      kind: 'frame-started',
      nodeName: 'Redshift_ROP1',
      frameNumber: 5,
    });
  });

  test('both skip phrasings are recognized', () => {
    expect(recognizeFrameSkipped('Skip rendering enabled. File already rendered')).toEqual({ kind: 'frame-skipped' });
    expect(recognizeFrameSkipped('Frame 12: Skipped - File already exists')).toEqual({ kind: 'frame-skipped' });
  });

  test('loading options and end of frame', () => {
    expect(recognizeFrameLoadingOptions('Loading RS rendering options')).toEqual({ kind: 'frame-loading-options' });
    expect(recognizeFrameEnded('ROP node endRender')).toEqual({ kind: 'frame-ended' });
  });

  test('block progress requires a positive total', () => {
    expect(recognizeBlockProgress('Block 3/16 rendered by GPU 0')).toEqual({
      kind: 'block-progress',
      block: 3,
      totalBlocks: 16,
    });
    expect(recognizeBlockProgress('Block 1/0')).toBeNull();
  });

  test('frame completion needs the extraction marker and a total time', () => {
    expect(
      recognizeFrameCompleted('Rendering time: 12.5s (1 GPU(s) used) scene extraction time 0.8 sec, total time 14.25 sec')
    ).toEqual({ kind: 'frame-completed', durationSeconds: 14.25 });
    expect(recognizeFrameCompleted('total time 14 sec')).toBeNull();
  });

  test('output file marker printed by the render script', () => {
    expect(recognizeOutputFile('render_monitor_outputfile: /shots/out/beauty.0007.exr')).toEqual({
      kind: 'output-file',
      filePath: '/shots/out/beauty.0007.exr',
    });
    expect(recognizeOutputFile('render_monitor_outputfile:   ')).toBeNull();
  });
});

describe('extractEvents', () => {
  test('most lines produce nothing', () => {
    expect(extractEvents('License acquired')).toEqual([]);
  });

  test('only the first lifecycle event of a line is kept', () => {
    const events = extractEvents('Loading RS rendering options ROP node endRender');
    expect(events).toEqual([{ kind: 'frame-loading-options' }]);
  });

  test('block progress is read even on a lifecycle line', () => {
    const events = extractEvents('ROP node endRender Block 4/4');
    expect(events).toEqual([{ kind: 'frame-ended' }, { kind: 'block-progress', block: 4, totalBlocks: 4 }]);
  });

  test('a frame start line can also carry a range echo', () => {
    const events = extractEvents("'Redshift_ROP1' rendering frame 3 Frame range: 1-5");
    expect(events.map((event) => event.kind)).toEqual(['frame-range', 'frame-started']);
  });
});
