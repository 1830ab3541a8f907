import type {
  Input,
  ParsedInput,
  TargetRow,
  Settings,
  ScheduleResult,
  CandidateEvent,
  AdmissionConfig,
  SourceColumns,
  SourceColumn,
  ScheduleSlot,
  RejectedEntry,
  TargetFields,
  ScheduledTarget,
  CutEntry,
  KPIs,
  Interval,
} from "../types/index.js";
import { inputSchema } from "../types/schemas.js";
import { admitTargets } from "./admission.js";
import { scheduleIntervals } from "./intervalScheduler.js";
import { countMaxSchedules } from "./equivalence.js";
import {
  parseTimestamp,
  formatTimestamp,
  hoursBetween,
  intervalHours,
  doIntervalsOverlap,
} from "../util/timeUtils.js";
import { SCHEDULER_VERSION } from "../constants.js";

function normalizeTarget(row: TargetRow, index: number): CandidateEvent {
  return {
    index,
    name: row.name,
    durationHours: row.duration_hours,
    midpoint: parseTimestamp(row.midpoint),
    ra: row.ra,
    dec: row.dec,
    period: row.period ?? null,
    transitDepth: row.transit_depth,
    midAirMass: row.mid_air_mass ?? null,
    ingressAirMass: row.ingress_air_mass ?? null,
    egressAirMass: row.egress_air_mass ?? null,
    magnitude: row.magnitude,
  };
}

export function normalizeSettings(settings: Settings): AdmissionConfig {
  const [maxIngressAirMass, maxEgressAirMass] = settings.max_air_mass;
  const { start, end } = settings.time_window;
  return {
    magnitudeLimit: settings.magnitude_limit,
    airMassLimit: settings.air_mass_limit,
    setupTime: settings.setup_time,
    periodLimit: settings.period_limit,
    transitDepthLimit: settings.transit_depth_limit,
    maxIngressAirMass,
    maxEgressAirMass,
    ignoreMissingAirMass: settings.ignore_missing_air_mass,
    timeWindow: {
      start: start === null ? null : parseTimestamp(start),
      end: end === null ? null : parseTimestamp(end),
    },
  };
}

/**
 * A column counts as present when any row carries the key, even with a null
 * value: that is an empty cell, not a column the source never had.
 */
export function detectSourceColumns(
  targets: readonly TargetRow[]
): SourceColumns {
  const has = (key: SourceColumn) =>
    targets.some((row) => row[key] !== undefined);
  return {
    midAirMass: has("mid_air_mass"),
    ingressAirMass: has("ingress_air_mass"),
    egressAirMass: has("egress_air_mass"),
  };
}

export function listMissingColumns(
  columns: SourceColumns,
  targetCount: number
): SourceColumn[] {
  if (targetCount === 0) return [];
  const missing: SourceColumn[] = [];
  if (!columns.midAirMass) missing.push("mid_air_mass");
  if (!columns.ingressAirMass) missing.push("ingress_air_mass");
  if (!columns.egressAirMass) missing.push("egress_air_mass");
  return missing;
}

function resolveCandidates(
  candidateSchedules: number[][],
  admitted: readonly ScheduleSlot[]
): Interval[][] {
  const windowByIndex = new Map(
    admitted.map((slot) => [slot.event.index, slot.schedule])
  );
  return candidateSchedules.map((candidate) =>
    candidate.flatMap((targetIndex) => {
      const window = windowByIndex.get(targetIndex);
      return window ? [window] : [];
    })
  );
}

function targetFields(event: CandidateEvent): TargetFields {
  return {
    name: event.name,
    duration_hours: event.durationHours,
    midpoint: formatTimestamp(event.midpoint),
    ra: event.ra,
    dec: event.dec,
    period: event.period,
    transit_depth: event.transitDepth,
    mid_air_mass: event.midAirMass,
    ingress_air_mass: event.ingressAirMass,
    egress_air_mass: event.egressAirMass,
    magnitude: event.magnitude,
  };
}

function formatOptional(ms: number | undefined): string | null {
  return ms === undefined ? null : formatTimestamp(ms);
}

function denormalizeSlot(slot: ScheduleSlot): ScheduledTarget {
  return {
    ...targetFields(slot.event),
    transit_start: formatTimestamp(slot.transit.start),
    transit_end: formatTimestamp(slot.transit.end),
    schedule_start: formatTimestamp(slot.schedule.start),
    schedule_end: formatTimestamp(slot.schedule.end),
  };
}

function denormalizeRejection(entry: RejectedEntry): CutEntry {
  return {
    ...targetFields(entry.event),
    transit_start: formatOptional(entry.transit?.start),
    transit_end: formatOptional(entry.transit?.end),
    schedule_start: formatOptional(entry.schedule?.start),
    schedule_end: formatOptional(entry.schedule?.end),
    cause: entry.cause,
  };
}

function computeKpis(
  totalTargets: number,
  admittedCount: number,
  schedule: readonly ScheduleSlot[],
  cutList: readonly RejectedEntry[]
): KPIs {
  const rejectionsByCause: KPIs["rejections_by_cause"] = {};
  for (const entry of cutList) {
    rejectionsByCause[entry.cause] = (rejectionsByCause[entry.cause] ?? 0) + 1;
  }

  const observingHours = schedule.reduce(
    (sum, slot) => sum + intervalHours(slot.schedule),
    0
  );

  const first = schedule[0];
  const last = schedule[schedule.length - 1];
  const spanHours =
    first && last ? hoursBetween(first.schedule.start, last.schedule.end) : 0;

  return {
    total_targets: totalTargets,
    admitted_targets: admittedCount,
    scheduled_targets: schedule.length,
    rejected_targets: cutList.length,
    unique_scheduled_targets: new Set(schedule.map((s) => s.event.name)).size,
    observing_hours: observingHours,
    span_hours: spanHours,
    rejections_by_cause: rejectionsByCause,
  };
}

function findOverlap(schedule: readonly ScheduleSlot[]): string | null {
  for (let i = 1; i < schedule.length; i++) {
    const prev = schedule[i - 1];
    const curr = schedule[i];
    if (doIntervalsOverlap(prev.schedule, curr.schedule)) {
      return `${prev.event.name} (${formatTimestamp(
        prev.schedule.start
      )}-${formatTimestamp(prev.schedule.end)}) overlaps ${
        curr.event.name
      } (${formatTimestamp(curr.schedule.start)}-${formatTimestamp(
        curr.schedule.end
      )})`;
    }
  }
  return null;
}

/**
 * Plan one night: filter the targets, pick the largest non-overlapping set by
 * earliest finish time and report everything cut along the way.
 *
 * Throws ZodError when the input or its settings are malformed; nothing is
 * evaluated in that case.
 */
export function schedule(input: Input): ScheduleResult {
  const parsed: ParsedInput = inputSchema.parse(input);
  const config = normalizeSettings(parsed.settings);
  const events = parsed.targets.map(normalizeTarget);
  const columns = detectSourceColumns(parsed.targets);

  const { admitted, rejected } = admitTargets(events, columns, config);
  const planned = scheduleIntervals(admitted);

  const overlap = findOverlap(planned.schedule);
  if (overlap) {
    return {
      version: SCHEDULER_VERSION,
      success: false,
      error: "Validation failed: overlap detected",
      why: [overlap],
    };
  }

  const cutList = [...rejected, ...planned.rejected];

  return {
    version: SCHEDULER_VERSION,
    success: true,
    schedule: planned.schedule.map(denormalizeSlot),
    cut_list: cutList.map(denormalizeRejection),
    missing_columns: listMissingColumns(columns, events.length),
    kpis: computeKpis(
      events.length,
      admitted.length,
      planned.schedule,
      cutList
    ),
    ...(parsed.candidate_schedules && {
      equivalent_schedules: countMaxSchedules(
        resolveCandidates(parsed.candidate_schedules, admitted),
        planned.schedule.length
      ),
    }),
  };
}
