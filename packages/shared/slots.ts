import { DateTime } from "luxon";

export const SLOTS_PER_DAY = 24;

function utcDayStart(reference: Date) {
  const start = DateTime.fromJSDate(reference, { zone: "utc" }).startOf("day");
  if (!start.isValid) {
    throw new Error(`Invalid reference instant: ${start.invalidReason}`);
  }
  return start;
}

/** The 24 hourly instants (00:00Z..23:00Z) of the UTC day containing `reference`. */
export function generateSlots(reference: Date): Date[] {
  const start = utcDayStart(reference);
  return Array.from({ length: SLOTS_PER_DAY }, (_, hour) =>
    start.plus({ hours: hour }).toJSDate(),
  );
}

/** `hour`:00Z on the UTC date of `now`. */
export function slotForHour(hour: number, now: Date): Date {
  return utcDayStart(now).set({ hour }).toJSDate();
}
