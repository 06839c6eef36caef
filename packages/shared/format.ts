import { DateTime } from "luxon";
import type { LocalWallClock } from "./types.js";

const pad = (n: number) => String(n).padStart(2, "0");
const to12 = (hour: number) => hour % 12 || 12;
const meridiem = (hour: number) => (hour < 12 ? "AM" : "PM");

/** 13 → "1PM" */
export function hourLabel(hour: number) {
  return `${to12(hour)}${meridiem(hour)}`;
}

/** (13, 30) → "1:30 PM" */
export function clockLabel(hour: number, minute = 0) {
  return `${to12(hour)}:${pad(minute)} ${meridiem(hour)}`;
}

/** Hint shown under the hour inputs: 13 → "13:00 (1 PM)" */
export function windowHourLabel(hour: number) {
  return `${hour}:00 (${to12(hour)} ${meridiem(hour)})`;
}

function fromWallClock(local: LocalWallClock) {
  return DateTime.fromISO(local.iso, { setZone: true }).setLocale("en-US");
}

/** "Sat, Jun 01" */
export function shortDateLabel(local: LocalWallClock) {
  return fromWallClock(local).toFormat("ccc, LLL dd");
}

/** Card header: { time: "04:05 PM", date: "Saturday, June 01, 2024" } */
export function cardTimeLabel(local: LocalWallClock) {
  return {
    time: `${pad(to12(local.hour))}:${pad(local.minute)} ${meridiem(local.hour)}`,
    date: fromWallClock(local).toFormat("cccc, LLLL dd, yyyy"),
  };
}
