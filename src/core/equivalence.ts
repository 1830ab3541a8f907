import type { Interval } from "../types/index.js";
import { greedyScan } from "./intervalScheduler.js";

/**
 * Count the candidate orderings that, reduced by the same greedy
 * non-overlap pass (no re-sorting), keep exactly `maxCount` entries.
 */
export function countMaxSchedules(
  candidates: readonly (readonly Interval[])[],
  maxCount: number
): number {
  let matches = 0;
  for (const candidate of candidates) {
    const { kept } = greedyScan(candidate, (window) => window);
    if (kept.length === maxCount) matches++;
  }
  return matches;
}
