import { DateTime, IANAZone } from "luxon";
import { UnknownTimezoneError } from "./errors.js";
import { listTimezones } from "./timezones.js";
import type { LocalWallClock } from "./types.js";

const LOCALE = "en-US";

export function isKnownTimezone(timezoneId: string) {
  return IANAZone.isValidZone(timezoneId);
}

export function assertTimezone(timezoneId: string): void {
  if (!isKnownTimezone(timezoneId)) throw new UnknownTimezoneError(timezoneId);
}

/**
 * The spelling a timezone id should be stored under. Zone lookup ignores case,
 * so `europe/london` and `Europe/London` name the same zone: catalog ids win,
 * then the zone database's own spelling when it differs only in case.
 * Throws `UnknownTimezoneError` for ids that do not resolve.
 */
export function canonicalTimezone(timezoneId: string): string {
  assertTimezone(timezoneId);
  const folded = timezoneId.toLowerCase();
  const listed = listTimezones().find((entry) => entry.id.toLowerCase() === folded);
  if (listed) return listed.id;
  // ICU may answer with an older alias (Asia/Calcutta); keep the caller's id then
  const resolved = new Intl.DateTimeFormat(LOCALE, { timeZone: timezoneId }).resolvedOptions()
    .timeZone;
  return resolved.toLowerCase() === folded ? resolved : timezoneId;
}

/** Luxon DateTime for `instant` in `timezoneId`; throws on an unresolvable zone. */
export function zonedDateTime(instant: Date, timezoneId: string) {
  // setZone alone would also accept "local" or "UTC+3"; only IANA names count
  assertTimezone(timezoneId);
  const local = DateTime.fromJSDate(instant)
    .setZone(IANAZone.create(timezoneId))
    .setLocale(LOCALE);
  if (!local.isValid) {
    // the zone resolved, so the instant itself is bad
    throw new RangeError(`Invalid instant: ${local.invalidReason}`);
  }
  return local;
}

export function toWallClock(local: DateTime, timezoneId: string): LocalWallClock {
  return {
    timezoneId,
    hour: local.hour,
    minute: local.minute,
    weekday: local.setLocale(LOCALE).toFormat("cccc"), // English names whatever the caller's locale
    isoDate: local.toFormat("yyyy-MM-dd"),
    offsetMinutes: local.offset,
    iso: local.toFormat("yyyy-MM-dd'T'HH:mm:ssZZ"),
  };
}

export function localize(instant: Date, timezoneId: string): LocalWallClock {
  return toWallClock(zonedDateTime(instant, timezoneId), timezoneId);
}

export function currentTime(
  timezoneId: string,
  now: Date = new Date(),
): LocalWallClock {
  return localize(now, timezoneId);
}
