import type {
  Interval,
  IntervalScheduleOutcome,
  ScheduleSlot,
} from "../types/index.js";
import { REJECTION_CAUSES } from "../constants.js";

/**
 * Single forward pass in the order given: keep an item when it starts at or
 * after the end of the last kept item. Touching windows do not overlap.
 */
export function greedyScan<T>(
  items: readonly T[],
  windowOf: (item: T) => Interval
): { kept: T[]; dropped: T[] } {
  const kept: T[] = [];
  const dropped: T[] = [];
  let lastEnd: number | null = null;

  for (const item of items) {
    const window = windowOf(item);
    if (lastEnd === null || window.start >= lastEnd) {
      kept.push(item);
      lastEnd = window.end;
    } else {
      dropped.push(item);
    }
  }

  return { kept, dropped };
}

/**
 * Earliest-finish-time selection over admitted slots. Equal end times go
 * earliest start first, so a zero-length transit follows the longer one it
 * touches; full ties keep their input order (Array.prototype.sort is stable).
 */
export function scheduleIntervals(
  admitted: readonly ScheduleSlot[]
): IntervalScheduleOutcome {
  const byEnd = [...admitted].sort(
    (a, b) =>
      a.schedule.end - b.schedule.end || a.schedule.start - b.schedule.start
  );
  const { kept, dropped } = greedyScan(byEnd, (slot) => slot.schedule);

  return {
    schedule: kept,
    rejected: dropped.map((slot) => ({
      event: slot.event,
      transit: slot.transit,
      schedule: slot.schedule,
      cause: REJECTION_CAUSES.overlap,
    })),
  };
}
