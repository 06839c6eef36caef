import { localize } from "./time.js";
import { inWindow } from "./window.js";
import { scoreViability } from "./viability.js";
import { generateSlots } from "./slots.js";
import { clockLabel, hourLabel, shortDateLabel } from "./format.js";
import type {
  ParticipantEntry,
  ParticipantSlotDetail,
  ParticipantWindow,
  SlotViability,
} from "./types.js";

// k/n * 100 can land just under an integer (29/50 → 57.99999999999999)
const toPercentage = (score: number) => Math.floor(score * 100 + 1e-9);

export function computeGrid(
  reference: Date,
  entries: readonly ParticipantWindow[],
): SlotViability[] {
  return generateSlots(reference).map((slot) => {
    const { score, tier } = scoreViability(slot, entries);
    const hour = slot.getUTCHours();
    return {
      hour,
      instant: slot.toISOString(),
      hourLabel: hourLabel(hour),
      score,
      percentage: toPercentage(score),
      tier,
    };
  });
}

/** Each participant's local time at `instant`, in store order. */
export function computeSlotDetail(
  instant: Date,
  participants: readonly ParticipantEntry[],
): ParticipantSlotDetail[] {
  return participants.map((participant) => {
    const local = localize(instant, participant.timezoneId);
    return {
      participant,
      local,
      localTimeLabel: clockLabel(local.hour, local.minute),
      localDateLabel: shortDateLabel(local),
      inWindow: inWindow(
        local.hour,
        participant.preferredStart,
        participant.preferredEnd,
      ),
    };
  });
}
