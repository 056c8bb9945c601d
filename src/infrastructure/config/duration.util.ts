const DURATION_PATTERN = /^(\d+(?:\.\d+)?)(ms|s|m)?$/;

/**
 * Parses `1500ms`, `1.5s`, `2m` or a bare number of seconds into
 * milliseconds. Returns `null` for anything else.
 */
export function parseDuration(text: string): number | null {
  const match = DURATION_PATTERN.exec(text.trim());
  if (!match) {
    return null;
  }
  const unit = match[2] ?? 's';
  const factor = unit === 'ms' ? 1 : unit === 'm' ? 60_000 : 1_000;
  return Math.round(Number(match[1]) * factor);
}

export function durationOrDefault(text: string | undefined, fallbackMs: number): number {
  if (text === undefined || text.trim() === '') {
    return fallbackMs;
  }
  return parseDuration(text) ?? fallbackMs;
}
