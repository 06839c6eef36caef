import { localize } from "./time.js";
import { inWindow } from "./window.js";
import type { ParticipantWindow, Tier, ViabilityResult } from "./types.js";

export function tierFor(score: number): Tier {
  if (score === 1) return "FULL";
  // exactly 0.5 is PARTIAL
  if (score >= 0.5) return "PARTIAL";
  return "LOW";
}

/**
 * Fraction of participants whose local hour at `instant` falls inside their
 * preferred window. No participants scores (0, LOW).
 *
 * @throws UnknownTimezoneError if any entry's zone cannot be resolved
 */
export function scoreViability(
  instant: Date,
  entries: readonly ParticipantWindow[],
): ViabilityResult {
  if (entries.length === 0) return { score: 0, tier: "LOW" };

  let matches = 0;
  for (const entry of entries) {
    const { hour } = localize(instant, entry.timezoneId);
    if (inWindow(hour, entry.preferredStart, entry.preferredEnd)) matches++;
  }

  const score = matches / entries.length;
  return { score, tier: tierFor(score) };
}
