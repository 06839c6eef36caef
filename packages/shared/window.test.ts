import { describe, it, expect } from "vitest";
import { inWindow } from "./window.js";

describe("inWindow", () => {
  it("is half-open when start < end", () => {
    expect(inWindow(9, 9, 17)).toBe(true);
    expect(inWindow(16, 9, 17)).toBe(true);
    expect(inWindow(17, 9, 17)).toBe(false);
    expect(inWindow(8, 9, 17)).toBe(false);
  });

  it("wraps past midnight when end < start", () => {
    expect(inWindow(22, 22, 6)).toBe(true);
    expect(inWindow(23, 22, 6)).toBe(true);
    expect(inWindow(0, 22, 6)).toBe(true);
    expect(inWindow(5, 22, 6)).toBe(true);
    expect(inWindow(6, 22, 6)).toBe(false);
    expect(inWindow(21, 22, 6)).toBe(false);
    expect(inWindow(12, 22, 6)).toBe(false);
  });

  it("treats start === end as an empty window", () => {
    for (let h = 0; h < 24; h++) expect(inWindow(h, 10, 10)).toBe(false);
  });

  it("covers the whole day for 0 → 23 except hour 23", () => {
    expect(inWindow(0, 0, 23)).toBe(true);
    expect(inWindow(22, 0, 23)).toBe(true);
    expect(inWindow(23, 0, 23)).toBe(false);
  });
});
