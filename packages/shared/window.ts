/**
 * Half-open [start, end) membership test for a local hour.
 * When end < start the window wraps past midnight (22 → 6 covers 22..23 and 0..5).
 * start === end is an empty window.
 */
export function inWindow(localHour: number, start: number, end: number) {
  if (end < start) return localHour >= start || localHour < end;
  return start <= localHour && localHour < end;
}
