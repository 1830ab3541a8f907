import { z } from "zod";
import { parseISO } from "date-fns";
import { MAX_DURATION_HOURS, REJECTION_CAUSES } from "../constants.js";

const rangeSchema = z
  .tuple([z.number(), z.number()])
  .refine(([min, max]) => min <= max, {
    message: "minimum must not exceed maximum",
  });

const airMassSchema = z.number().finite().min(0).nullable().optional();

export const targetRowSchema = z.object({
  name: z.string().min(1),
  duration_hours: z
    .number()
    .finite()
    .min(0)
    .max(MAX_DURATION_HOURS)
    .nullable(),
  midpoint: z.string().datetime({ offset: true }),
  ra: z.number().finite(),
  dec: z.number().finite(),
  period: z.number().finite().nullable().optional(),
  transit_depth: z.number().finite(),
  mid_air_mass: airMassSchema,
  ingress_air_mass: airMassSchema,
  egress_air_mass: airMassSchema,
  magnitude: z.number().finite(),
});

export const timeWindowSchema = z
  .object({
    start: z.string().datetime({ offset: true }).nullable().default(null),
    end: z.string().datetime({ offset: true }).nullable().default(null),
  })
  .refine(
    ({ start, end }) =>
      start === null ||
      end === null ||
      parseISO(start).getTime() <= parseISO(end).getTime(),
    { message: "window end must not precede window start", path: ["end"] }
  );

export const settingsSchema = z.object({
  magnitude_limit: rangeSchema.nullable().default([0, 14.5]),
  air_mass_limit: z.boolean().default(true),
  setup_time: z.boolean().default(false),
  period_limit: rangeSchema.nullable().default(null),
  transit_depth_limit: rangeSchema.nullable().default([0, 0.5]),
  max_air_mass: z
    .tuple([z.number().min(0), z.number().min(0)])
    .default([2, 2]),
  ignore_missing_air_mass: z.boolean().default(false),
  time_window: timeWindowSchema.default({}),
});

export const inputSchema = z
  .object({
    targets: z.array(targetRowSchema),
    settings: settingsSchema.default({}),
    candidate_schedules: z
      .array(z.array(z.number().int().min(0)))
      .optional(),
  })
  .superRefine((input, ctx) => {
    input.candidate_schedules?.forEach((candidate, i) => {
      candidate.forEach((targetIndex, j) => {
        if (targetIndex >= input.targets.length) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["candidate_schedules", i, j],
            message: `index ${targetIndex} does not reference a target`,
          });
        }
      });
    });
  });

const causeSchema = z.nativeEnum(REJECTION_CAUSES);

const targetFieldsSchema = z.object({
  name: z.string(),
  duration_hours: z.number().nullable(),
  midpoint: z.string().datetime({ offset: true }),
  ra: z.number(),
  dec: z.number(),
  period: z.number().nullable(),
  transit_depth: z.number(),
  mid_air_mass: z.number().nullable(),
  ingress_air_mass: z.number().nullable(),
  egress_air_mass: z.number().nullable(),
  magnitude: z.number(),
});

export const scheduledTargetSchema = targetFieldsSchema.extend({
  transit_start: z.string().datetime(),
  transit_end: z.string().datetime(),
  schedule_start: z.string().datetime(),
  schedule_end: z.string().datetime(),
});

export const cutEntrySchema = targetFieldsSchema.extend({
  transit_start: z.string().datetime().nullable(),
  transit_end: z.string().datetime().nullable(),
  schedule_start: z.string().datetime().nullable(),
  schedule_end: z.string().datetime().nullable(),
  cause: causeSchema,
});

export const kpisSchema = z.object({
  total_targets: z.number().int().min(0),
  admitted_targets: z.number().int().min(0),
  scheduled_targets: z.number().int().min(0),
  rejected_targets: z.number().int().min(0),
  unique_scheduled_targets: z.number().int().min(0),
  observing_hours: z.number().min(0),
  span_hours: z.number().min(0),
  rejections_by_cause: z.record(causeSchema, z.number().int().min(0)),
});

export const successOutputSchema = z.object({
  version: z.string(),
  success: z.literal(true),
  schedule: z.array(scheduledTargetSchema),
  cut_list: z.array(cutEntrySchema),
  missing_columns: z.array(
    z.enum(["mid_air_mass", "ingress_air_mass", "egress_air_mass"])
  ),
  kpis: kpisSchema,
  equivalent_schedules: z.number().int().min(0).optional(),
});

export const failureOutputSchema = z.object({
  version: z.string(),
  success: z.literal(false),
  error: z.string(),
  why: z.array(z.string()),
});

export const scheduleResultSchema = z.discriminatedUnion("success", [
  successOutputSchema,
  failureOutputSchema,
]);

/** Request body as callers write it: settings and their fields may be omitted. */
export type Input = z.input<typeof inputSchema>;
/** Request body after validation, with every setting defaulted. */
export type ParsedInput = z.output<typeof inputSchema>;
export type TargetRow = z.output<typeof targetRowSchema>;
export type Settings = z.output<typeof settingsSchema>;
