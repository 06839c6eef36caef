import { clockLabel } from "@meetgrid/shared";
import type { ParticipantSlotDetail, SlotViability, Tier } from "@meetgrid/shared";
import { html } from "./html.js";

const TIER_CLASS: Record<Tier, string> = {
  FULL: "green",
  PARTIAL: "yellow",
  LOW: "red",
};

const DETAIL_HINT = html`<p class="muted">Click on any time slot to see details for all timezones.</p>`;

function renderSlot(slot: SlotViability) {
  return html`<div class="time-slot ${TIER_CLASS[slot.tier]}" data-tier="${slot.tier}"
  hx-get="/fragments/grid/${slot.hour}" hx-target="#time-detail" hx-swap="innerHTML"
  title="${slot.percentage}% of timezones in preferred hours">
  <div class="time-slot-time">${slot.hourLabel}</div>
  <div class="time-slot-score">${slot.percentage}%</div>
</div>`;
}

export function renderGrid(slots: readonly SlotViability[], participantCount: number) {
  if (participantCount === 0) {
    return html`<div class="muted"><p>Please add at least one timezone to see the grid view.</p></div>`;
  }
  return html`<div>
<div class="grid-legend">
  <div class="legend-item"><div class="legend-color green"></div><span>All timezones in preferred hours</span></div>
  <div class="legend-item"><div class="legend-color yellow"></div><span>50%+ timezones in preferred hours</span></div>
  <div class="legend-item"><div class="legend-color red"></div><span>Less than 50% in preferred hours</span></div>
</div>
<div class="grid-container"><div class="time-grid">${slots.map(renderSlot)}</div></div>
<div id="time-detail">${DETAIL_HINT}</div>
</div>`;
}

function renderDetailRow(row: ParticipantSlotDetail) {
  return html`<div class="timezone-time-row ${row.inWindow ? "in-hours" : "out-hours"}">
  <div><strong>${row.participant.label}</strong><br><small>${row.localDateLabel}</small></div>
  <div><strong>${row.localTimeLabel}</strong><br><small>${row.inWindow ? "✓ In preferred hours" : "✗ Outside preferred hours"}</small></div>
</div>`;
}

export function renderSlotDetail(hour: number, rows: readonly ParticipantSlotDetail[]) {
  if (rows.length === 0) return html`<div>No timezones selected.</div>`;
  return html`<div class="time-detail">
<div class="time-detail-header">
  <h3>Details for ${clockLabel(hour)} UTC</h3>
  <button class="secondary outline" hx-get="/fragments/grid-detail-close" hx-target="#time-detail" hx-swap="innerHTML">Close</button>
</div>
${rows.map(renderDetailRow)}
</div>`;
}

export function renderDetailHint() {
  return DETAIL_HINT;
}
