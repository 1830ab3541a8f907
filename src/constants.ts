export const SCHEDULER_VERSION = "1.0.0";

/** Padding applied on each side of a transit when setup time is enabled. */
export const SETUP_BUFFER_MINUTES = 30;

/** Mid-transit air mass above which a target is cut when the cap is on. */
export const AIR_MASS_CAP = 2;

export const MS_PER_HOUR = 3_600_000;

/** Longest accepted transit; keeps every derived window inside the Date range. */
export const MAX_DURATION_HOURS = 24 * 365;

export const REJECTION_CAUSES = {
  durationMissing: "Duration is NaN",
  periodLimit: "Period limit exceeded",
  beforeTimeWindow: "Transit start time is before the time window",
  afterTimeWindow: "Transit end time is after the time window",
  magnitudeLimit: "Magnitude limit exceeded",
  airMassLimit: "Air mass limit exceeded",
  transitDepthLimit: "Transit depth limit exceeded",
  nanIngressEgress: "NaN in ingress/egress air mass",
  ingressEgressMissing: "Ingress/Egress air mass data missing",
  ingressEgressLimit: "Ingress/Egress air mass limit exceeded",
  overlap: "Overlapping with another target",
} as const;
