import { randomUUID } from "node:crypto";
import { timezoneLabel } from "./timezones.js";
import type { ParticipantEntry, ParticipantWindow } from "./types.js";

export const DEFAULT_PREFERRED_START = 9;
export const DEFAULT_PREFERRED_END = 17;

/**
 * Ordered participant list for one session.
 *
 * Mutations run synchronously, so on a single event loop no request can
 * observe a half-applied change. Lookups are linear scans by entry id.
 */
export class SelectionStore {
  private entries: ParticipantEntry[] = [];

  constructor(private readonly newEntryId: () => string = randomUUID) {}

  get size() {
    return this.entries.length;
  }

  /** Appends a participant with the default 9–17 window. Returns false if the timezone is already present. */
  add(timezoneId: string): boolean {
    if (this.entries.some((e) => e.timezoneId === timezoneId)) return false;
    this.entries.push({
      entryId: this.newEntryId(),
      timezoneId,
      label: timezoneLabel(timezoneId),
      preferredStart: DEFAULT_PREFERRED_START,
      preferredEnd: DEFAULT_PREFERRED_END,
    });
    return true;
  }

  /** Unknown ids are a no-op. */
  remove(entryId: string): boolean {
    const before = this.entries.length;
    this.entries = this.entries.filter((e) => e.entryId !== entryId);
    return this.entries.length !== before;
  }

  /** Replaces the window in place. Hours are not range-checked here; unknown ids are a no-op. */
  updateHours(entryId: string, start: number, end: number): boolean {
    const entry = this.entries.find((e) => e.entryId === entryId);
    if (!entry) return false;
    entry.preferredStart = start;
    entry.preferredEnd = end;
    return true;
  }

  get(entryId: string): ParticipantEntry | undefined {
    const entry = this.entries.find((e) => e.entryId === entryId);
    return entry && { ...entry };
  }

  list(): ParticipantEntry[] {
    return this.entries.map((e) => ({ ...e }));
  }

  windows(): ParticipantWindow[] {
    return this.entries.map(({ timezoneId, preferredStart, preferredEnd }) => ({
      timezoneId,
      preferredStart,
      preferredEnd,
    }));
  }

  clear() {
    this.entries = [];
  }
}
