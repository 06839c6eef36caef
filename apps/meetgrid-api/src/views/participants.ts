import { cardTimeLabel, windowHourLabel } from "@meetgrid/shared";
import type { LocalWallClock, ParticipantEntry } from "@meetgrid/shared";
import { EMPTY, html } from "./html.js";

export type ParticipantView = ParticipantEntry & { now: LocalWallClock };

function hourInput(name: "start" | "end", value: number) {
  return html`<input type="number" name="${name}" min="0" max="23" value="${value}">`;
}

export function renderParticipantCard(p: ParticipantView) {
  const { time, date } = cardTimeLabel(p.now);
  return html`<div class="timezone-card" data-entry-id="${p.entryId}">
  <div class="timezone-header">
    <div><strong>${p.label}</strong><br><small>${time} • ${date}</small></div>
    <button class="secondary outline" hx-delete="/fragments/participants/${p.entryId}"
      hx-target="#timezone-list" hx-swap="innerHTML">Remove</button>
  </div>
  <form class="timezone-controls" hx-patch="/fragments/participants/${p.entryId}/hours"
    hx-ext="json-enc" hx-trigger="change" hx-target="#timezone-list" hx-swap="innerHTML">
    <label>Preferred Start Time ${hourInput("start", p.preferredStart)}
      <small>${windowHourLabel(p.preferredStart)}</small></label>
    <label>Preferred End Time ${hourInput("end", p.preferredEnd)}
      <small>${windowHourLabel(p.preferredEnd)}</small></label>
  </form>
</div>`;
}

/** Empty list renders nothing so `#timezone-list:empty` shows its hint. */
export function renderParticipantList(items: readonly ParticipantView[]) {
  if (items.length === 0) return EMPTY;
  return html`${items.map(renderParticipantCard)}`;
}
