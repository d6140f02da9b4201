import { FrameTracker } from '../src/core/tracking/FrameTracker.js';

const at = (seconds: number) => new Date(Date.UTC(2026, 0, 5, 14, 0, seconds));

describe('FrameTracker', () => {
  describe('skipped frames', () => {
    test('a skip right after the start line marks the frame skipped without a header', () => {
      const tracker = new FrameTracker();
      tracker.onFrameStarted(5, at(0));

      const skipped = tracker.onFrameSkipped();

      expect(skipped?.record.status).toBe('skipped');
      expect(skipped?.record.durationSeconds).toBe(0);
      expect(tracker.isFrameInProgress).toBe(false);
      expect(tracker.skippedCount).toBe(1);
      // a loading line after the skip does not start the frame
      expect(tracker.onFrameLoadingOptions(at(1))).toBeNull();
    });

    test('consecutive skips are flushed once, just before the next rendered frame', () => {
      const tracker = new FrameTracker();
      for (const frame of [5, 6, 7]) {
        tracker.onFrameStarted(frame, at(frame));
        tracker.onFrameSkipped();
      }
      expect(tracker.pendingSkips).toEqual([5, 6, 7]);

      tracker.onFrameStarted(8, at(8));
      const loading = tracker.onFrameLoadingOptions(at(8));

      expect(loading?.flushedSkips).toEqual([5, 6, 7]);
      expect(loading?.record.frameNumber).toBe(8);
      expect(tracker.pendingSkips).toEqual([]);
      expect(tracker.flushSkipRun()).toEqual([]);
    });

    test('a skip with no started frame is ignored', () => {
      const tracker = new FrameTracker();
      expect(tracker.onFrameSkipped()).toBeNull();
    });
  });

  describe('block progress', () => {
    test('counts distinct blocks so repeats never push progress early', () => {
      const tracker = new FrameTracker();
      tracker.onFrameStarted(1, at(0));
      tracker.onFrameLoadingOptions(at(0));

      const percents = [
        [1, 4],
        [2, 4],
        [1, 4],
        [3, 4],
      ].map(([block, total]) => tracker.onBlockProgress(block, total)?.percent);

      expect(percents).toEqual([25, 50, 50, 75]);
      expect(tracker.onBlockProgress(4, 4)?.percent).toBe(100);
    });

    test('out of order blocks use the distinct count', () => {
      const tracker = new FrameTracker();
      tracker.onFrameStarted(1, at(0));
      tracker.onBlockProgress(3, 10);
      tracker.onBlockProgress(3, 10);
      expect(tracker.onBlockProgress(2, 10)?.percent).toBe(20);
    });

    test('a new frame starts from zero', () => {
      const tracker = new FrameTracker();
      tracker.onFrameStarted(1, at(0));
      tracker.onBlockProgress(1, 2);
      tracker.onFrameStarted(2, at(5));
      expect(tracker.onBlockProgress(1, 4)?.percent).toBe(25);
    });
  });

  describe('frame total discovery', () => {
    test('a -s/-e echo without a step sets the total from the log', () => {
      const tracker = new FrameTracker();
      const changed = tracker.onFrameRangeAnnounced({ start: 10, end: 19, step: 1 }, 'log-echo');

      expect(changed).toBe(true);
      expect(tracker.getDiscovery()).toEqual({ totalFrames: 10, source: 'log-echo' });
    });

    test('an explicit range never changes', () => {
      const tracker = new FrameTracker({ explicitRange: { start: 1, end: 10, step: 1 } });

      expect(tracker.onFrameRangeAnnounced({ start: 1, end: 200, step: 1 }, 'log-echo')).toBe(false);
      expect(tracker.onFrameRangeAnnounced({ start: 1, end: 3, step: 1 }, 'rop-metadata')).toBe(false);
      tracker.onFrameStarted(50, at(0));

      expect(tracker.getDiscovery()).toEqual({ totalFrames: 10, source: 'explicit-args' });
    });

    test('later announcements may only raise the total', () => {
      const tracker = new FrameTracker();
      tracker.onFrameRangeAnnounced({ start: 1, end: 10, step: 1 }, 'rop-metadata');

      expect(tracker.onFrameRangeAnnounced({ start: 1, end: 5, step: 1 }, 'log-echo')).toBe(false);
      expect(tracker.totalFrames).toBe(10);
      expect(tracker.onFrameRangeAnnounced({ start: 1, end: 12, step: 1 }, 'log-echo')).toBe(true);
      expect(tracker.getDiscovery()).toEqual({ totalFrames: 12, source: 'log-echo' });
    });

    test('frames beyond an unknown total are inferred with a margin', () => {
      const tracker = new FrameTracker({ inferredTotalMargin: 5 });

      const first = tracker.onFrameStarted(3, at(0));
      expect(first.totalChanged).toBe(true);
      expect(tracker.getDiscovery()).toEqual({ totalFrames: 8, source: 'inference' });

      expect(tracker.onFrameStarted(4, at(1)).totalChanged).toBe(false);
      expect(tracker.onFrameStarted(8, at(2)).totalChanged).toBe(true);
      expect(tracker.totalFrames).toBe(13);
    });

    test('a frame past an announced total raises it', () => {
      const tracker = new FrameTracker({ inferredTotalMargin: 5 });
      tracker.onFrameRangeAnnounced({ start: 1, end: 1, step: 1 }, 'log-echo');
      tracker.onFrameStarted(1, at(0));

      const second = tracker.onFrameStarted(2, at(10));

      expect(second.totalChanged).toBe(true);
      expect(second.record.sequenceIndex).toBe(1);
      expect(tracker.getDiscovery()).toEqual({ totalFrames: 7, source: 'inference' });
      expect(tracker.onFrameStarted(3, at(20)).totalChanged).toBe(false);
      expect(tracker.sequenceIndexOf(3)).toBe(2);
    });

    test('a range announced after an out-of-range frame still covers it', () => {
      const tracker = new FrameTracker();
      tracker.onFrameStarted(40, at(0));
      tracker.onFrameLoadingOptions(at(0));
      tracker.onFrameCompleted(10, at(10));

      expect(tracker.onFrameRangeAnnounced({ start: 1, end: 10, step: 1 }, 'log-echo')).toBe(true);

      expect(tracker.sequenceIndexOf(40)).toBe(10);
      expect(tracker.getDiscovery()).toEqual({ totalFrames: 11, source: 'log-echo' });
    });

    test('an inferred total gives way to the first announced range', () => {
      const tracker = new FrameTracker();
      tracker.onFrameStarted(1, at(0));
      expect(tracker.totalSource).toBe('inference');

      expect(tracker.onFrameRangeAnnounced({ start: 1, end: 3, step: 1 }, 'log-echo')).toBe(true);
      expect(tracker.getDiscovery()).toEqual({ totalFrames: 3, source: 'log-echo' });
    });
  });

  describe('sequence indices', () => {
    test('stepped explicit ranges map frame N to (N - start) / step', () => {
      const tracker = new FrameTracker({ explicitRange: { start: 10, end: 30, step: 5 } });

      for (const frame of [10, 15, 20, 25, 30]) {
        tracker.onFrameStarted(frame, at(frame));
      }

      expect(tracker.getRecords().map((r) => [r.frameNumber, r.sequenceIndex])).toEqual([
        [10, 0],
        [15, 1],
        [20, 2],
        [25, 3],
        [30, 4],
      ]);
      expect(tracker.totalFrames).toBe(5);
    });

    test('frames outside a known range are placed after it without colliding', () => {
      const tracker = new FrameTracker({ explicitRange: { start: 1, end: 10, step: 1 } });
      tracker.onFrameStarted(50, at(0));
      tracker.onFrameStarted(1, at(1));
      tracker.onFrameStarted(60, at(2));

      expect(tracker.sequenceIndexOf(50)).toBe(10);
      expect(tracker.sequenceIndexOf(1)).toBe(0);
      expect(tracker.sequenceIndexOf(60)).toBe(11);
      expect(tracker.getDiscovery()).toEqual({ totalFrames: 10, source: 'explicit-args' });
    });

    test('frames seen before a range is known are remapped once it arrives', () => {
      const tracker = new FrameTracker();
      tracker.onFrameStarted(1003, at(0));
      tracker.onFrameStarted(1001, at(1));
      expect(tracker.sequenceIndexOf(1003)).toBe(0);

      tracker.onFrameRangeAnnounced({ start: 1001, end: 1010, step: 1 }, 'log-echo');

      expect(tracker.sequenceIndexOf(1003)).toBe(2);
      expect(tracker.sequenceIndexOf(1001)).toBe(0);
    });
  });

  describe('completion', () => {
    test('records duration, counts and timing', () => {
      const tracker = new FrameTracker({ explicitRange: { start: 1, end: 3, step: 1 } });
      tracker.onFrameStarted(1, at(0));
      tracker.onFrameLoadingOptions(at(0));
      tracker.onFrameEnded();

      const completed = tracker.onFrameCompleted(12.5, at(13));

      expect(completed?.record).toEqual({
        frameNumber: 1,
        sequenceIndex: 0,
        status: 'completed',
        progressPercent: 100,
        durationSeconds: 12.5,
        startedAt: at(0),
      });
      expect(completed?.note).toBeUndefined();
      expect(tracker.completedCount).toBe(1);
      expect(tracker.framesDone).toBe(1);
      expect(tracker.timing.samples).toEqual([12.5]);
    });

    test('a duplicate completion line is ignored', () => {
      const tracker = new FrameTracker();
      tracker.onFrameStarted(1, at(0));
      tracker.onFrameLoadingOptions(at(0));
      tracker.onFrameCompleted(4, at(4));

      expect(tracker.onFrameCompleted(4, at(5))).toBeNull();
      expect(tracker.completedCount).toBe(1);
    });

    test('a completion without a start line goes to the next expected frame', () => {
      const orphan = new FrameTracker({ explicitRange: { start: 1, end: 3, step: 1 } });
      const result = orphan.onFrameCompleted(6, at(6));

      expect(result?.record.frameNumber).toBe(1);
      expect(result?.note).toBe('Frame 1 finished without a start line in the log');
      expect(result?.record.startedAt).toEqual(at(0));
    });

    test('a completion without a loading line is noted', () => {
      const tracker = new FrameTracker();
      tracker.onFrameStarted(7, at(0));

      const result = tracker.onFrameCompleted(3, at(3));

      expect(result?.note).toBe('Frame 7 finished without a loading line in the log');
      expect(result?.record.status).toBe('completed');
    });
  });
});
