import { describe, it, expect } from "vitest";
import { escapeHtml, html, SafeHtml } from "./html.js";
import { renderParticipantList } from "./participants.js";
import { localize } from "@meetgrid/shared";

describe("html", () => {
  it("escapes interpolated text", () => {
    expect(escapeHtml(`<a href="x">Tom & 'Jerry'</a>`)).toBe(
      "&lt;a href=&quot;x&quot;&gt;Tom &amp; &#39;Jerry&#39;&lt;/a&gt;",
    );
    expect(html`<b>${"<i>"}</b>`.value).toBe("<b>&lt;i&gt;</b>");
  });

  it("passes SafeHtml and arrays through and drops empty values", () => {
    const inner = html`<i>${1}</i>`;
    expect(html`<p>${inner}${[inner, "&"]}${null}${undefined}${false}</p>`.value).toBe(
      "<p><i>1</i><i>1</i>&amp;</p>",
    );
    expect(String(new SafeHtml("<br>"))).toBe("<br>");
  });

  it("escapes participant labels", () => {
    const out = renderParticipantList([
      {
        entryId: "e1",
        timezoneId: "Etc/Test",
        label: "<script>alert(1)</script>",
        preferredStart: 9,
        preferredEnd: 17,
        now: localize(new Date("2024-06-01T00:00:00Z"), "UTC"),
      },
    ]).value;
    expect(out).toContain("<strong>&lt;script&gt;alert(1)&lt;/script&gt;</strong>");
    expect(out).not.toContain("<script>");
    expect(out).toContain('hx-delete="/fragments/participants/e1"');
  });
});
