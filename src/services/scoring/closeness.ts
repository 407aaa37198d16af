/**
 * Closeness curve shared by the period and margin scorers.
 *
 * closeness(m) = 0.5 ^ (|m| / halfLife)
 *
 * 1 at a margin of 0, strictly decreasing in |m|, approaching 0 for blowouts.
 */
export function closeness(margin: number, halfLife: number): number {
  if (!isFinite(margin) || halfLife <= 0) return 0;
  return Math.pow(0.5, Math.abs(margin) / halfLife);
}
