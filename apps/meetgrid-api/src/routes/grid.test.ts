import { describe, it, expect, beforeEach, afterEach } from "vitest";
import pino from "pino";
import type { FastifyInstance } from "fastify";
import { buildApp } from "../app.js";

const clock = () => new Date("2024-06-01T16:00:00Z");

describe("grid routes", () => {
  let app: FastifyInstance;

  beforeEach(async () => {
    app = await buildApp({
      logger: pino({ level: "silent" }),
      sessionMode: "per-session",
      sessionHeader: "x-session-id",
      clock,
    });
  });

  afterEach(async () => {
    await app.close();
  });

  const add = (timezone: string) =>
    app.inject({ method: "POST", url: "/api/participants", payload: { timezone } });

  it("scores 24 slots for the requested day", async () => {
    await add("UTC");
    await add("America/Los_Angeles");

    const res = await app.inject({ method: "GET", url: "/api/grid?at=2024-06-01T05:00:00Z" });
    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.reference).toBe("2024-06-01T05:00:00.000Z");
    expect(body.participants).toBe(2);
    expect(body.slots).toHaveLength(24);
    expect(body.slots[16]).toEqual({
      hour: 16,
      instant: "2024-06-01T16:00:00.000Z",
      hourLabel: "4PM",
      score: 1,
      percentage: 100,
      tier: "FULL",
    });
    expect(body.slots[2]).toMatchObject({ score: 0, tier: "LOW" });
    // UTC 10 in, LA 3 out
    expect(body.slots[10]).toMatchObject({ score: 0.5, percentage: 50, tier: "PARTIAL" });
  });

  it("defaults the reference to now", async () => {
    const res = await app.inject({ method: "GET", url: "/api/grid" });
    expect(res.json().reference).toBe("2024-06-01T16:00:00.000Z");
    expect(res.json().slots.every((s: { tier: string }) => s.tier === "LOW")).toBe(true);
  });

  it("rejects a malformed reference", async () => {
    const res = await app.inject({ method: "GET", url: "/api/grid?at=yesterday" });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe("validation");
  });

  it("details one hour for every participant", async () => {
    await add("UTC");
    await add("America/Los_Angeles");

    const res = await app.inject({ method: "GET", url: "/api/grid/2" });
    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.instant).toBe("2024-06-01T02:00:00.000Z");
    expect(body.label).toBe("2:00 AM UTC");
    expect(
      body.rows.map((r: { participant: { timezoneId: string }; localTimeLabel: string; localDateLabel: string; inWindow: boolean }) => [
        r.participant.timezoneId,
        r.localTimeLabel,
        r.localDateLabel,
        r.inWindow,
      ]),
    ).toEqual([
      ["UTC", "2:00 AM", "Sat, Jun 01", false],
      ["America/Los_Angeles", "7:00 PM", "Fri, May 31", false],
    ]);
  });

  it("rejects hours outside 0..23", async () => {
    expect((await app.inject({ method: "GET", url: "/api/grid/24" })).statusCode).toBe(400);
    expect((await app.inject({ method: "GET", url: "/api/grid/abc" })).statusCode).toBe(400);
  });

  it("renders the grid fragment with tier colours", async () => {
    await add("UTC");
    const res = await app.inject({ method: "GET", url: "/fragments/grid?at=2024-06-01T00:00:00Z" });
    expect(res.headers["content-type"]).toBe("text/html; charset=utf-8");
    expect(res.body.match(/class="time-slot /g)).toHaveLength(24);
    expect(res.body).toContain('<div class="time-slot green" data-tier="FULL"');
    expect(res.body).toContain('hx-get="/fragments/grid/9"');
    expect(res.body).toContain('title="0% of timezones in preferred hours"');
  });

  it("asks for a timezone when the grid is empty", async () => {
    const res = await app.inject({ method: "GET", url: "/fragments/grid" });
    expect(res.body).toContain("Please add at least one timezone to see the grid view.");
  });

  it("renders the detail fragment", async () => {
    await add("America/Los_Angeles");
    const res = await app.inject({ method: "GET", url: "/fragments/grid/16" });
    expect(res.body).toContain("<h3>Details for 4:00 PM UTC</h3>");
    expect(res.body).toContain('<div class="timezone-time-row in-hours">');
    expect(res.body).toContain("<strong>9:00 AM</strong>");

    const none = await app.inject({
      method: "GET",
      url: "/fragments/grid/16",
      headers: { "x-session-id": "someone-else" },
    });
    expect(none.body).toBe("<div>No timezones selected.</div>");
  });
});
