import { clockLabel, shortDateLabel } from "@meetgrid/shared";
import type { ConversionResult, TimezoneCatalogEntry } from "@meetgrid/shared";
import { html } from "./html.js";

export function renderConverterForm(catalog: readonly TimezoneCatalogEntry[]) {
  return html`<form hx-get="/fragments/convert" hx-target="#conversion" hx-swap="innerHTML">
  <div class="converter-controls">
    <label>Time <input type="time" name="time" value="09:00" required></label>
    <label>From <select name="from" required>
      <option value="UTC">UTC</option>
      ${catalog.map((tz) => html`<option value="${tz.id}">${tz.label}</option>`)}
    </select></label>
  </div>
  <button type="submit">Convert</button>
</form>
<div id="conversion"></div>`;
}

export function renderConversion(result: ConversionResult, sourceLabel: string) {
  const { source } = result;
  const heading = `${clockLabel(source.hour, source.minute)} ${sourceLabel}`;
  if (result.conversions.length === 0) {
    return html`<div><h3>${heading}</h3><p>No timezones selected.</p></div>`;
  }
  return html`<div class="time-detail">
<h3>${heading}</h3>
${result.conversions.map(
  (c) => html`<div class="timezone-time-row ${c.inWindow ? "in-hours" : "out-hours"}">
  <div><strong>${c.participant.label}</strong><br><small>${shortDateLabel(c.local)}</small></div>
  <div><strong>${clockLabel(c.local.hour, c.local.minute)}</strong></div>
</div>`,
)}
</div>`;
}
