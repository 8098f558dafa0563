// src/utils/time.ts
// Human-friendly duration and rate formatting for progress lines.

/**
 * Formats seconds as e.g. "1d 2h 3m 4s". Returns "—" for negative or invalid input.
 */
export function formatDuration(totalSeconds: number): string {
  if (!isFinite(totalSeconds) || totalSeconds < 0) return '—';
  const s = Math.floor(totalSeconds);
  const days = Math.floor(s / 86400);
  const hours = Math.floor((s % 86400) / 3600);
  const mins = Math.floor((s % 3600) / 60);
  const secs = s % 60;
  const parts: string[] = [];
  if (days) parts.push(`${days}d`);
  if (hours || parts.length) parts.push(`${hours}h`);
  if (mins || parts.length) parts.push(`${mins}m`);
  parts.push(`${secs}s`);
  return parts.join(' ');
}

/**
 * Seconds left at the observed rate, or NaN when nothing has completed yet.
 */
export function estimateRemainingSeconds(done: number, total: number, elapsedSec: number): number {
  if (done <= 0 || elapsedSec <= 0) return NaN;
  return ((total - done) * elapsedSec) / done;
}
