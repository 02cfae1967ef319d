/** Event lengths the booking API accepts, ascending. */
export const ALLOWED_DURATIONS = [
  5, 10, 15, 20, 25, 30, 45, 50, 60, 75, 80, 90, 120, 150, 180, 240, 300, 360, 420, 480,
] as const;

export type AllowedDuration = (typeof ALLOWED_DURATIONS)[number];

/**
 * Snap a requested meeting length to the closest allowed one.
 * On an exact midpoint the shorter length wins.
 */
export function normalizeDuration(minutes: number): AllowedDuration {
  let closest: AllowedDuration = ALLOWED_DURATIONS[0];
  let bestDiff = Math.abs(closest - minutes);

  for (const candidate of ALLOWED_DURATIONS) {
    const diff = Math.abs(candidate - minutes);
    if (diff < bestDiff) {
      closest = candidate;
      bestDiff = diff;
    }
  }

  return closest;
}

export function isAllowedDuration(minutes: number): minutes is AllowedDuration {
  return ALLOWED_DURATIONS.some((d) => d === minutes);
}
