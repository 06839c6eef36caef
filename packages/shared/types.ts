// Single source of truth for domain types
export type Tier = "FULL" | "PARTIAL" | "LOW";

export type TimezoneCatalogEntry = {
  id: string; // IANA name, e.g. "Europe/London"
  label: string;
};

export type ParticipantEntry = {
  entryId: string;
  timezoneId: string;
  label: string;
  preferredStart: number; // 0..23
  preferredEnd: number; // 0..23, may be < start (wraps midnight)
};

/** What the scorer needs from a participant. */
export type ParticipantWindow = Pick<
  ParticipantEntry,
  "timezoneId" | "preferredStart" | "preferredEnd"
>;

export type LocalWallClock = {
  timezoneId: string;
  hour: number;
  minute: number;
  weekday: string; // "Saturday"
  isoDate: string; // "2024-06-01"
  offsetMinutes: number;
  iso: string; // ISO with offset, no ms
};

export interface ViabilityResult {
  score: number; // 0.0..1.0
  tier: Tier;
}

export interface SlotViability extends ViabilityResult {
  hour: number; // UTC hour 0..23
  instant: string; // ISO Z
  hourLabel: string; // "9AM"
  percentage: number; // floor(score * 100)
}

export interface ParticipantSlotDetail {
  participant: ParticipantEntry;
  local: LocalWallClock;
  localTimeLabel: string; // "9:00 AM"
  localDateLabel: string; // "Sat, Jun 01"
  inWindow: boolean;
}
