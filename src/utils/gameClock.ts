/**
 * Convert a period clock string ("MM:SS", "M:SS.s") to seconds remaining.
 * Also accepts ISO-8601 durations ("PT05M12.00S") used by newer feeds.
 * Returns null when the clock is missing or unparseable.
 */
export function clockToSeconds(clock: string | null | undefined): number | null {
  if (!clock) return null;
  const value = clock.trim();

  const iso = /^PT(?:(\d+)M)?(?:(\d+(?:\.\d+)?)S)?$/i.exec(value);
  if (iso && (iso[1] !== undefined || iso[2] !== undefined)) {
    return Number(iso[1] ?? 0) * 60 + Number(iso[2] ?? 0);
  }

  const parts = value.split(':');
  if (parts.length !== 2) return null;

  const minutes = Number(parts[0]);
  const seconds = Number(parts[1]);
  if (!Number.isInteger(minutes) || isNaN(seconds) || parts[0] === '' || parts[1] === '') {
    return null;
  }
  return minutes * 60 + seconds;
}
