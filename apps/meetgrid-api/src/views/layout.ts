import type { TimezoneCatalogEntry } from "@meetgrid/shared";
import { html, SafeHtml } from "./html.js";

const STYLES = new SafeHtml(`
.timezone-card { margin-bottom: 1rem; padding: 1rem; border: 1px solid var(--pico-muted-border-color); border-radius: var(--pico-border-radius); }
.timezone-header { display: flex; justify-content: space-between; align-items: center; margin-bottom: 0.5rem; }
.timezone-controls, .converter-controls { display: grid; grid-template-columns: 1fr 1fr; gap: 1rem; margin-top: 0.5rem; }
.view-toggle { display: flex; gap: 0.5rem; margin: 1.5rem 0; }
.muted { text-align: center; padding: 2rem; color: var(--pico-muted-color); font-style: italic; }
#timezone-list:empty::before { content: "No timezones selected. Add some above to get started!"; display: block; padding: 2rem; text-align: center; color: var(--pico-muted-color); font-style: italic; }
.grid-container { overflow-x: auto; margin: 1rem 0; }
.time-grid { display: flex; gap: 0.25rem; min-width: max-content; padding: 1rem 0; }
.time-slot { flex: 0 0 80px; text-align: center; cursor: pointer; border-radius: var(--pico-border-radius); padding: 1rem 0.5rem; border: 2px solid transparent; }
.time-slot:hover { border-color: var(--pico-primary); }
.green { background-color: #d4edda; color: #155724; }
.yellow { background-color: #fff3cd; color: #856404; }
.red { background-color: #f8d7da; color: #721c24; }
.time-slot-time { font-weight: bold; font-size: 1.1rem; margin-bottom: 0.25rem; }
.time-slot-score { font-size: 0.85rem; }
.grid-legend { display: flex; gap: 1rem; justify-content: center; margin-bottom: 1rem; flex-wrap: wrap; }
.legend-item { display: flex; align-items: center; gap: 0.5rem; }
.legend-color { width: 20px; height: 20px; border-radius: 4px; }
.time-detail { margin-top: 1rem; padding: 1rem; border: 1px solid var(--pico-muted-border-color); border-radius: var(--pico-border-radius); }
.time-detail-header { display: flex; justify-content: space-between; align-items: center; margin-bottom: 1rem; }
.timezone-time-row { display: flex; justify-content: space-between; padding: 0.5rem; margin: 0.25rem 0; border-radius: var(--pico-border-radius); }
.timezone-time-row.in-hours { background-color: #d4edda; }
.timezone-time-row.out-hours { background-color: #f8d7da; }
`);

// Re-render whichever view is open after the participant list changes
const REFRESH_SCRIPT = new SafeHtml(`
document.addEventListener("htmx:afterRequest", function (evt) {
  var path = evt.detail.pathInfo.requestPath;
  var view = document.getElementById("view-content");
  if (path === "/fragments/grid" || path === "/fragments/converter") view.dataset.view = path;
  if (path.indexOf("/fragments/participants") === 0 && evt.detail.requestConfig.verb !== "get" && view.dataset.view) {
    htmx.ajax("GET", view.dataset.view, { target: "#view-content", swap: "innerHTML" });
  }
});
`);

export function renderIndexPage(catalog: readonly TimezoneCatalogEntry[]) {
  return html`<!doctype html>
<html>
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>Timezone Meeting Scheduler</title>
  <link rel="stylesheet" href="https://cdn.jsdelivr.net/npm/@picocss/pico@2/css/pico.min.css">
  <script src="https://unpkg.com/htmx.org@1.9.10"></script>
  <script src="https://unpkg.com/htmx.org@1.9.10/dist/ext/json-enc.js"></script>
  <script>${REFRESH_SCRIPT}</script>
  <style>${STYLES}</style>
</head>
<body>
<main class="container">
  <h1>Timezone Meeting Scheduler</h1>
  <p>Select timezones to find optimal meeting times across the globe.</p>
  <article>
    <h2>Add Timezone</h2>
    <form hx-post="/fragments/participants" hx-ext="json-enc" hx-target="#timezone-list" hx-swap="innerHTML">
      <div style="display: grid; grid-template-columns: 1fr auto; gap: 1rem;">
        <select name="timezone" required>
          <option value="">Select a timezone...</option>
          ${catalog.map((tz) => html`<option value="${tz.id}">${tz.label}</option>`)}
        </select>
        <button type="submit">Add Timezone</button>
      </div>
    </form>
  </article>
  <div class="view-toggle">
    <button hx-get="/fragments/grid" hx-target="#view-content">Grid View</button>
    <button hx-get="/fragments/converter" hx-target="#view-content">Converter View</button>
  </div>
  <article>
    <h2>Selected Timezones</h2>
    <div id="timezone-list" hx-get="/fragments/participants" hx-trigger="load" hx-swap="innerHTML"></div>
  </article>
  <article>
    <h2>Meeting Time Finder</h2>
    <div id="view-content"><p>Select a view above to analyze meeting times.</p></div>
  </article>
</main>
</body>
</html>`;
}
