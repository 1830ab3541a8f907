/**
 * Type Definitions for Transit Scheduler
 *
 * NAMING CONVENTION:
 * - snake_case: Types that map to JSON (Input/Output, matches API contract)
 * - camelCase: Internal-only types (never serialized, idiomatic TypeScript)
 *
 * TIME/DURATION UNITS:
 * - Transit durations are in HOURS, periods in DAYS
 * - External timestamps use ISO 8601 strings (e.g., "2024-10-09T22:15:00Z")
 * - Internal timestamps are epoch milliseconds (normalized at input)
 */

import type { REJECTION_CAUSES } from "../constants.js";

export type { Input, ParsedInput, TargetRow, Settings } from "./schemas.js";

// Base Types

export interface Interval {
  readonly start: number;
  readonly end: number;
}

export type Range = readonly [min: number, max: number];

export type RejectionCause =
  (typeof REJECTION_CAUSES)[keyof typeof REJECTION_CAUSES];

export type SourceColumn = "mid_air_mass" | "ingress_air_mass" | "egress_air_mass";

// Output Types (JSON - snake_case)

export interface TargetFields {
  name: string;
  duration_hours: number | null;
  midpoint: string;
  ra: number;
  dec: number;
  period: number | null;
  transit_depth: number;
  mid_air_mass: number | null;
  ingress_air_mass: number | null;
  egress_air_mass: number | null;
  magnitude: number;
}

export interface ScheduledTarget extends TargetFields {
  transit_start: string;
  transit_end: string;
  schedule_start: string;
  schedule_end: string;
}

export interface CutEntry extends TargetFields {
  transit_start: string | null;
  transit_end: string | null;
  schedule_start: string | null;
  schedule_end: string | null;
  cause: RejectionCause;
}

export interface KPIs {
  total_targets: number;
  admitted_targets: number;
  scheduled_targets: number;
  rejected_targets: number;
  unique_scheduled_targets: number;
  observing_hours: number;
  span_hours: number;
  rejections_by_cause: Partial<Record<RejectionCause, number>>;
}

export interface SuccessOutput {
  version: string;
  success: true;
  schedule: ScheduledTarget[];
  cut_list: CutEntry[];
  missing_columns: SourceColumn[];
  kpis: KPIs;
  equivalent_schedules?: number;
}

export interface FailureOutput {
  version: string;
  success: false;
  error: string;
  why: string[];
}

export type ScheduleResult = SuccessOutput | FailureOutput;

// Internal Types (camelCase)

export interface CandidateEvent {
  /** Position of the row in the submitted target list. */
  readonly index: number;
  readonly name: string;
  readonly durationHours: number | null;
  readonly midpoint: number;
  readonly ra: number;
  readonly dec: number;
  readonly period: number | null;
  readonly transitDepth: number;
  readonly midAirMass: number | null;
  readonly ingressAirMass: number | null;
  readonly egressAirMass: number | null;
  readonly magnitude: number;
}

export interface TransitTimes {
  /** Midpoint ± half the duration. */
  readonly transit: Interval;
  /** Transit window plus the setup buffer; used for every overlap test. */
  readonly schedule: Interval;
}

export interface ScheduleSlot extends TransitTimes {
  readonly event: CandidateEvent;
}

export interface RejectedEntry {
  readonly event: CandidateEvent;
  readonly transit: Interval | null;
  readonly schedule: Interval | null;
  readonly cause: RejectionCause;
}

export type Admission =
  | { readonly status: "admitted"; readonly slot: ScheduleSlot }
  | { readonly status: "rejected"; readonly entry: RejectedEntry };

export interface SourceColumns {
  readonly midAirMass: boolean;
  readonly ingressAirMass: boolean;
  readonly egressAirMass: boolean;
}

export interface AdmissionConfig {
  readonly magnitudeLimit: Range | null;
  readonly airMassLimit: boolean;
  readonly setupTime: boolean;
  readonly periodLimit: Range | null;
  readonly transitDepthLimit: Range | null;
  readonly maxIngressAirMass: number;
  readonly maxEgressAirMass: number;
  readonly ignoreMissingAirMass: boolean;
  readonly timeWindow: {
    readonly start: number | null;
    readonly end: number | null;
  };
}

export interface AdmissionOutcome {
  readonly admitted: ScheduleSlot[];
  readonly rejected: RejectedEntry[];
}

export interface IntervalScheduleOutcome {
  readonly schedule: ScheduleSlot[];
  readonly rejected: RejectedEntry[];
}
