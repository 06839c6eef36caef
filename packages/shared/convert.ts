import { inWindow } from "./window.js";
import { localize, toWallClock, zonedDateTime } from "./time.js";
import type { LocalWallClock, ParticipantEntry } from "./types.js";

export const WALL_TIME = /^([01]?\d|2[0-3]):([0-5]\d)$/;

export interface Conversion {
  participant: ParticipantEntry;
  local: LocalWallClock;
  inWindow: boolean;
}

export interface ConversionResult {
  instant: string; // ISO Z
  source: LocalWallClock;
  conversions: Conversion[];
}

/**
 * Reads `wallTime` ("HH:mm") as a time on `reference`'s date in the source
 * zone and shows it in every participant's zone.
 */
export function convertAcross(
  wallTime: string,
  sourceTimezoneId: string,
  participants: readonly ParticipantEntry[],
  reference: Date,
): ConversionResult {
  const match = WALL_TIME.exec(wallTime);
  if (!match) {
    throw new RangeError(`Invalid wall time "${wallTime}", expected HH:mm`);
  }

  // Times inside a DST gap are pushed forward by luxon
  const source = zonedDateTime(reference, sourceTimezoneId).set({
    hour: Number(match[1]),
    minute: Number(match[2]),
    second: 0,
    millisecond: 0,
  });
  const instant = source.toJSDate();

  return {
    instant: instant.toISOString(),
    source: toWallClock(source, sourceTimezoneId),
    conversions: participants.map((participant) => {
      const local = localize(instant, participant.timezoneId);
      return {
        participant,
        local,
        inWindow: inWindow(
          local.hour,
          participant.preferredStart,
          participant.preferredEnd,
        ),
      };
    }),
  };
}
