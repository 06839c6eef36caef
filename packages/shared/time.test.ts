import { describe, it, expect } from "vitest";
import {
  assertTimezone,
  canonicalTimezone,
  currentTime,
  isKnownTimezone,
  localize,
} from "./time.js";
import { UnknownTimezoneError } from "./errors.js";

describe("localize", () => {
  it("applies the summer offset for Los Angeles", () => {
    const local = localize(new Date("2024-06-01T16:00:00Z"), "America/Los_Angeles");
    expect(local).toEqual({
      timezoneId: "America/Los_Angeles",
      hour: 9,
      minute: 0,
      weekday: "Saturday",
      isoDate: "2024-06-01",
      offsetMinutes: -420,
      iso: "2024-06-01T09:00:00-07:00",
    });
  });

  it("applies the winter offset for Los Angeles", () => {
    const local = localize(new Date("2024-01-15T16:00:00Z"), "America/Los_Angeles");
    expect(local.hour).toBe(8);
    expect(local.offsetMinutes).toBe(-480);
  });

  it("keeps half-hour offsets", () => {
    const local = localize(new Date("2024-06-01T12:00:00Z"), "Asia/Kolkata");
    expect(local.hour).toBe(17);
    expect(local.minute).toBe(30);
    expect(local.offsetMinutes).toBe(330);
  });

  it("crosses the date line backwards", () => {
    const local = localize(new Date("2024-06-01T02:00:00Z"), "America/Los_Angeles");
    expect(local.hour).toBe(19);
    expect(local.isoDate).toBe("2024-05-31");
    expect(local.weekday).toBe("Friday");
  });

  it("throws UnknownTimezoneError for an unresolvable id", () => {
    const at = new Date("2024-06-01T00:00:00Z");
    expect(() => localize(at, "Mars/Olympus_Mons")).toThrow(UnknownTimezoneError);
    expect(() => localize(at, "local")).toThrow(UnknownTimezoneError);
    let caught: unknown;
    try {
      localize(at, "Nowhere/City");
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(UnknownTimezoneError);
    expect(caught).toMatchObject({ timezoneId: "Nowhere/City", code: "unknown_timezone" });
  });
});

describe("currentTime", () => {
  it("localizes the supplied now", () => {
    const local = currentTime("Asia/Tokyo", new Date("2024-06-01T16:00:00Z"));
    expect(local.hour).toBe(1);
    expect(local.isoDate).toBe("2024-06-02");
  });
});

describe("isKnownTimezone / assertTimezone", () => {
  it("accepts IANA names and rejects the rest", () => {
    expect(isKnownTimezone("Europe/London")).toBe(true);
    expect(isKnownTimezone("UTC")).toBe(true);
    expect(isKnownTimezone("")).toBe(false);
    expect(isKnownTimezone("Europe/Atlantis")).toBe(false);
    expect(() => assertTimezone("Europe/Atlantis")).toThrow(
      'Unknown timezone "Europe/Atlantis"',
    );
  });
});

describe("localize with a bad instant", () => {
  it("rejects an invalid instant in a valid zone", () => {
    expect(() => localize(new Date("nope"), "UTC")).toThrow(RangeError);
  });
});

describe("canonicalTimezone", () => {
  it("folds case variants onto the catalog id", () => {
    expect(canonicalTimezone("Europe/London")).toBe("Europe/London");
    expect(canonicalTimezone("europe/london")).toBe("Europe/London");
    expect(canonicalTimezone("EUROPE/LONDON")).toBe("Europe/London");
    expect(canonicalTimezone("asia/kolkata")).toBe("Asia/Kolkata");
  });

  it("uses the zone database spelling for ids outside the catalog", () => {
    expect(canonicalTimezone("etc/gmt+3")).toBe("Etc/GMT+3");
  });

  it("rejects ids that do not resolve", () => {
    expect(() => canonicalTimezone("Nowhere/City")).toThrow(UnknownTimezoneError);
  });
});
