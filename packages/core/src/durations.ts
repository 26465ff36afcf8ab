/** Duration strings used across config: "500ms", "30s", "5m", "1h". */

const DURATION_RE = /^(\d+)(ms|s|m|h)$/;

/** Parse a duration string to milliseconds. Returns null for invalid input. */
export function parseDuration(str: string): number | null {
  const match = str.trim().match(DURATION_RE);
  if (!match) return null;
  const value = parseInt(match[1], 10);
  switch (match[2]) {
    case "ms":
      return value;
    case "s":
      return value * 1000;
    case "m":
      return value * 60_000;
    case "h":
      return value * 3_600_000;
    default:
      return null;
  }
}

/**
 * Compact human-readable age: "45s", "5m", "20m 30s", "2h 5m".
 * Infinity renders as "never".
 */
export function formatDuration(ms: number): string {
  if (!Number.isFinite(ms)) return "never";
  const totalSeconds = Math.max(0, Math.floor(ms / 1000));
  if (totalSeconds < 60) return `${totalSeconds}s`;

  const totalMinutes = Math.floor(totalSeconds / 60);
  if (totalMinutes < 60) {
    const seconds = totalSeconds % 60;
    return seconds > 0 ? `${totalMinutes}m ${seconds}s` : `${totalMinutes}m`;
  }

  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;
  return minutes > 0 ? `${hours}h ${minutes}m` : `${hours}h`;
}
