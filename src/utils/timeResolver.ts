import { DateTime, IANAZone } from 'luxon';
import { InvalidTimeFormatError, PastInstantError } from './errors';

const DATE_TIME_FORMAT = 'yyyy-MM-dd HH:mm';

export interface BookingWindow {
  start: DateTime;
  end: DateTime;
  timezone: string;
}

export function assertValidTimezone(timezone: string): void {
  if (!IANAZone.isValidZone(timezone)) {
    throw new InvalidTimeFormatError(`Unknown timezone: ${timezone}`);
  }
}

/**
 * Interpret a local calendar date and wall-clock time in `timezone`.
 * The returned DateTime keeps the zone, so `toISO()` carries its offset.
 */
export function resolveLocalDateTime(date: string, time: string, timezone: string): DateTime {
  assertValidTimezone(timezone);

  const resolved = DateTime.fromFormat(`${date.trim()} ${time.trim()}`, DATE_TIME_FORMAT, {
    zone: timezone,
  });

  if (!resolved.isValid) {
    throw new InvalidTimeFormatError();
  }

  return resolved;
}

export function resolveBookingWindow(
  date: string,
  time: string,
  timezone: string,
  durationMinutes: number
): BookingWindow {
  const start = resolveLocalDateTime(date, time, timezone);
  return { start, end: start.plus({ minutes: durationMinutes }), timezone };
}

/** Must be re-run right before every mutation; agent turns can be minutes apart. */
export function assertNotPast(
  start: DateTime,
  now: DateTime = DateTime.now(),
  message?: string
): void {
  if (start.toMillis() < now.toMillis()) {
    throw new PastInstantError(message);
  }
}

/** Parse an API timestamp and express it in `timezone`. */
export function toZone(isoTimestamp: string, timezone: string): DateTime {
  return DateTime.fromISO(isoTimestamp, { setZone: true }).setZone(timezone);
}

/** Minute-precision local key used to compare a booking against a requested slot. */
export function localMinuteKey(instant: DateTime): string {
  return instant.toFormat("yyyy-MM-dd'T'HH:mm");
}

/** Zone-free minute key for a requested local date and time. */
export function requestedMinuteKey(date: string, time: string): string {
  const parsed = DateTime.fromFormat(`${date.trim()} ${time.trim()}`, DATE_TIME_FORMAT, { zone: 'utc' });
  if (!parsed.isValid) {
    throw new InvalidTimeFormatError();
  }
  return localMinuteKey(parsed);
}
