/**
 * Collapse frame numbers into consecutive runs: [5, 6, 7, 9] -> "5-7, 9"
 */
export function compressFrameRuns(frames: readonly number[]): string {
  const sorted = Array.from(new Set(frames)).sort((a, b) => a - b);
  if (sorted.length === 0) return '';

  const runs: string[] = [];
  let start = sorted[0];
  let end = sorted[0];

  for (const frame of sorted.slice(1)) {
    if (frame === end + 1) {
      end = frame;
      continue;
    }
    runs.push(start === end ? `${start}` : `${start}-${end}`);
    start = end = frame;
  }
  runs.push(start === end ? `${start}` : `${start}-${end}`);

  return runs.join(', ');
}

export function formatSkipReport(frames: readonly number[]): string {
  const unique = new Set(frames);
  if (unique.size === 1) {
    return `Frame ${compressFrameRuns(frames)} skipped - File already exists`;
  }
  return `Frames ${compressFrameRuns(frames)} skipped - Files already exist`;
}
