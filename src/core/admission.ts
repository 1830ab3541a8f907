import type {
  Admission,
  AdmissionConfig,
  AdmissionOutcome,
  CandidateEvent,
  Range,
  RejectionCause,
  SourceColumns,
  TransitTimes,
} from "../types/index.js";
import { calculateTransitTimes } from "../util/timeUtils.js";
import { AIR_MASS_CAP, REJECTION_CAUSES } from "../constants.js";

interface RuleContext {
  event: CandidateEvent;
  times: TransitTimes;
  config: AdmissionConfig;
  columns: SourceColumns;
}

/** Returns the rejection cause, or null when the event passes. */
type AdmissionRule = (ctx: RuleContext) => RejectionCause | null;

function outside(value: number, range: Range | null): boolean {
  if (!range) return false;
  return value < range[0] || value > range[1];
}

const beforeTimeWindow: AdmissionRule = ({ times, config }) =>
  config.timeWindow.start !== null &&
  times.schedule.start < config.timeWindow.start
    ? REJECTION_CAUSES.beforeTimeWindow
    : null;

const afterTimeWindow: AdmissionRule = ({ times, config }) =>
  config.timeWindow.end !== null && times.schedule.end > config.timeWindow.end
    ? REJECTION_CAUSES.afterTimeWindow
    : null;

const magnitudeLimit: AdmissionRule = ({ event, config }) =>
  outside(event.magnitude, config.magnitudeLimit)
    ? REJECTION_CAUSES.magnitudeLimit
    : null;

const airMassLimit: AdmissionRule = ({ event, config }) =>
  config.airMassLimit &&
  event.midAirMass !== null &&
  event.midAirMass > AIR_MASS_CAP
    ? REJECTION_CAUSES.airMassLimit
    : null;

const transitDepthLimit: AdmissionRule = ({ event, config }) =>
  outside(event.transitDepth, config.transitDepthLimit)
    ? REJECTION_CAUSES.transitDepthLimit
    : null;

const ingressEgressMissing: AdmissionRule = ({ event, config, columns }) => {
  if (config.ignoreMissingAirMass) return null;
  if (event.ingressAirMass !== null && event.egressAirMass !== null) {
    return null;
  }
  // A column present but empty is distinguishable from a column never sent.
  return columns.ingressAirMass && columns.egressAirMass
    ? REJECTION_CAUSES.nanIngressEgress
    : REJECTION_CAUSES.ingressEgressMissing;
};

const ingressEgressLimit: AdmissionRule = ({ event, config }) =>
  (event.ingressAirMass !== null &&
    event.ingressAirMass > config.maxIngressAirMass) ||
  (event.egressAirMass !== null &&
    event.egressAirMass > config.maxEgressAirMass)
    ? REJECTION_CAUSES.ingressEgressLimit
    : null;

/** Checked in order after the transit times are derived; first failure wins. */
export const ADMISSION_RULES: readonly AdmissionRule[] = [
  beforeTimeWindow,
  afterTimeWindow,
  magnitudeLimit,
  airMassLimit,
  transitDepthLimit,
  ingressEgressMissing,
  ingressEgressLimit,
];

function firstFailure(ctx: RuleContext): RejectionCause | null {
  for (const rule of ADMISSION_RULES) {
    const cause = rule(ctx);
    if (cause) return cause;
  }
  return null;
}

function rejectUntimed(event: CandidateEvent, cause: RejectionCause): Admission {
  return {
    status: "rejected",
    entry: { event, transit: null, schedule: null, cause },
  };
}

export function classifyEvent(
  event: CandidateEvent,
  columns: SourceColumns,
  config: AdmissionConfig
): Admission {
  if (event.durationHours === null) {
    return rejectUntimed(event, REJECTION_CAUSES.durationMissing);
  }

  if (event.period !== null && outside(event.period, config.periodLimit)) {
    return rejectUntimed(event, REJECTION_CAUSES.periodLimit);
  }

  const times = calculateTransitTimes(
    event.midpoint,
    event.durationHours,
    config.setupTime
  );

  const cause = firstFailure({ event, times, config, columns });
  if (cause) {
    return { status: "rejected", entry: { event, ...times, cause } };
  }

  return { status: "admitted", slot: { event, ...times } };
}

export function admitTargets(
  events: readonly CandidateEvent[],
  columns: SourceColumns,
  config: AdmissionConfig
): AdmissionOutcome {
  const admitted: AdmissionOutcome["admitted"] = [];
  const rejected: AdmissionOutcome["rejected"] = [];

  for (const event of events) {
    const admission = classifyEvent(event, columns, config);
    if (admission.status === "admitted") {
      admitted.push(admission.slot);
    } else {
      rejected.push(admission.entry);
    }
  }

  return { admitted, rejected };
}
