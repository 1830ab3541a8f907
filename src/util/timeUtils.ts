import {
  parseISO,
  addMilliseconds,
  addMinutes,
  differenceInMilliseconds,
} from "date-fns";
import type { Interval, TransitTimes } from "../types/index.js";
import { MS_PER_HOUR, SETUP_BUFFER_MINUTES } from "../constants.js";

export function parseTimestamp(isoString: string): number {
  return parseISO(isoString).getTime();
}

export function formatTimestamp(ms: number): string {
  return new Date(ms).toISOString();
}

export function hoursBetween(start: number, end: number): number {
  return differenceInMilliseconds(end, start) / MS_PER_HOUR;
}

export function intervalHours(interval: Interval): number {
  return hoursBetween(interval.start, interval.end);
}

export function doIntervalsOverlap(a: Interval, b: Interval): boolean {
  return a.start < b.end && b.start < a.end;
}

export function applySetupBuffer(
  transit: Interval,
  setupTime: boolean
): Interval {
  if (!setupTime) return transit;
  return {
    start: addMinutes(transit.start, -SETUP_BUFFER_MINUTES).getTime(),
    end: addMinutes(transit.end, SETUP_BUFFER_MINUTES).getTime(),
  };
}

/**
 * Derive the transit window (midpoint ± half the duration) and the schedule
 * window (the transit window padded by the setup buffer when enabled).
 *
 * The half-duration is rounded to whole milliseconds here and nowhere else,
 * so every later comparison sees the same instants.
 */
export function calculateTransitTimes(
  midpoint: number,
  durationHours: number,
  setupTime: boolean
): TransitTimes {
  const halfDuration = Math.round((durationHours * MS_PER_HOUR) / 2);
  const transit = {
    start: addMilliseconds(midpoint, -halfDuration).getTime(),
    end: addMilliseconds(midpoint, halfDuration).getTime(),
  };
  return { transit, schedule: applySetupBuffer(transit, setupTime) };
}
