export { schedule } from "./core/scheduler.js";
export { admitTargets, classifyEvent, ADMISSION_RULES } from "./core/admission.js";
export { scheduleIntervals, greedyScan } from "./core/intervalScheduler.js";
export { countMaxSchedules } from "./core/equivalence.js";
export { calculateTransitTimes } from "./util/timeUtils.js";
export { buildApp, startServer } from "./api/server.js";
export { inputSchema, scheduleResultSchema } from "./types/schemas.js";
export {
  SCHEDULER_VERSION,
  SETUP_BUFFER_MINUTES,
  AIR_MASS_CAP,
  REJECTION_CAUSES,
} from "./constants.js";
export type * from "./types/index.js";
