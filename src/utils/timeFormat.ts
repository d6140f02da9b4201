/**
 * Time formatting for render output and status text
 */

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

const pad2 = (value: number): string => String(value).padStart(2, '0');

/**
 * Compact duration: 65.4 -> "1m5s", 90061 -> "1d1h1m1s", 0 -> "0s"
 */
export function formatDuration(totalSeconds: number): string {
  let remaining = Math.max(0, Math.floor(totalSeconds));
  const days = Math.floor(remaining / 86400);
  remaining %= 86400;
  const hours = Math.floor(remaining / 3600);
  remaining %= 3600;
  const minutes = Math.floor(remaining / 60);
  const seconds = remaining % 60;

  const parts: string[] = [];
  if (days) parts.push(`${days}d`);
  if (hours) parts.push(`${hours}h`);
  if (minutes) parts.push(`${minutes}m`);
  if (seconds || parts.length === 0) parts.push(`${seconds}s`);
  return parts.join('');
}

/**
 * Duration with a decimal seconds part: "45.5s", "1m 30.0s", "2h 0m 5.0s"
 */
export function formatSeconds(totalSeconds: number): string {
  const value = Math.max(0, totalSeconds);
  if (value < 60) {
    return `${value.toFixed(1)}s`;
  }
  if (value < 3600) {
    const minutes = Math.floor(value / 60);
    return `${minutes}m ${(value % 60).toFixed(1)}s`;
  }
  const hours = Math.floor(value / 3600);
  const minutes = Math.floor((value % 3600) / 60);
  return `${hours}h ${minutes}m ${(value % 60).toFixed(1)}s`;
}

/**
 * Local wall-clock time as "02:03:09 PM"
 */
export function formatClockTime(date: Date): string {
  const hours = date.getHours();
  const hour12 = hours % 12 === 0 ? 12 : hours % 12;
  const suffix = hours < 12 ? 'AM' : 'PM';
  return `${pad2(hour12)}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())} ${suffix}`;
}

/**
 * Local date and time as "2:03PM on Jan 05, 2026"
 */
export function formatBannerTimestamp(date: Date): string {
  const hours = date.getHours();
  const hour12 = hours % 12 === 0 ? 12 : hours % 12;
  const suffix = hours < 12 ? 'AM' : 'PM';
  return `${hour12}:${pad2(date.getMinutes())}${suffix} on ${MONTHS[date.getMonth()]} ${pad2(date.getDate())}, ${date.getFullYear()}`;
}
