import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { parseISO } from "date-fns";
import { schedule } from "../../src/index.js";
import { scheduleResultSchema } from "../../src/types/schemas.js";
import type { Input, SuccessOutput } from "../../src/types/index.js";
import {
  nightInput,
  nightTargets,
  target,
  withoutColumn,
} from "../helpers/targets.js";

function plan(input: Input): SuccessOutput {
  const result = schedule(input);
  if (!result.success) {
    throw new Error(`${result.error}: ${result.why.join("; ")}`);
  }
  return result;
}

const names = (rows: { name: string }[]) => rows.map((r) => r.name);

describe("Scheduler Acceptance Tests", () => {
  describe("Happy Path", () => {
    it("produces a valid result for a night of targets", () => {
      const result = schedule(nightInput);

      expect(result.success).toBe(true);
      expect(result.version).toBe("1.0.0");
      expect(() => scheduleResultSchema.parse(result)).not.toThrow();
    });

    it("schedules the largest set of non-overlapping transits", () => {
      const result = plan(nightInput);

      expect(names(result.schedule)).toEqual([
        "Kepler-A",
        "Kepler-C",
        "Kepler-H",
      ]);
      expect(result.schedule[0]).toEqual({
        name: "Kepler-A",
        duration_hours: 1,
        midpoint: "2024-10-10T02:30:00.000Z",
        ra: 150.2,
        dec: 12.4,
        period: 2.5,
        transit_depth: 0.02,
        mid_air_mass: 1.1,
        ingress_air_mass: 1.2,
        egress_air_mass: 1.3,
        magnitude: 11,
        transit_start: "2024-10-10T02:00:00.000Z",
        transit_end: "2024-10-10T03:00:00.000Z",
        schedule_start: "2024-10-10T02:00:00.000Z",
        schedule_end: "2024-10-10T03:00:00.000Z",
      });
    });

    it("lists filter rejections before overlap rejections", () => {
      const result = plan(nightInput);

      expect(result.cut_list.map((c) => [c.name, c.cause])).toEqual([
        ["Kepler-D", "Duration is NaN"],
        ["Kepler-E", "Magnitude limit exceeded"],
        ["Kepler-F", "Air mass limit exceeded"],
        ["Kepler-G", "NaN in ingress/egress air mass"],
        ["Kepler-B", "Overlapping with another target"],
      ]);
    });

    it("leaves times empty for a target without a duration", () => {
      const result = plan(nightInput);
      const cut = result.cut_list.find((c) => c.name === "Kepler-D");

      expect(cut).toMatchObject({
        duration_hours: null,
        transit_start: null,
        transit_end: null,
        schedule_start: null,
        schedule_end: null,
        cause: "Duration is NaN",
      });
    });

    it("reports KPIs for the night", () => {
      const result = plan(nightInput);

      expect(result.kpis).toEqual({
        total_targets: 8,
        admitted_targets: 4,
        scheduled_targets: 3,
        rejected_targets: 5,
        unique_scheduled_targets: 3,
        observing_hours: 4,
        span_hours: 4,
        rejections_by_cause: {
          "Duration is NaN": 1,
          "Magnitude limit exceeded": 1,
          "Air mass limit exceeded": 1,
          "NaN in ingress/egress air mass": 1,
          "Overlapping with another target": 1,
        },
      });
      expect(result.missing_columns).toEqual([]);
    });

    it("handles an empty target list", () => {
      const result = plan({ targets: [] });

      expect(result.schedule).toEqual([]);
      expect(result.cut_list).toEqual([]);
      expect(result.missing_columns).toEqual([]);
      expect(result.kpis.span_hours).toBe(0);
    });
  });

  describe("Constraint Validation", () => {
    it("produces no overlapping transits", () => {
      const result = plan({
        targets: nightTargets,
        settings: { setup_time: true },
      });

      for (let i = 1; i < result.schedule.length; i++) {
        const prevEnd = parseISO(result.schedule[i - 1].schedule_end);
        const currStart = parseISO(result.schedule[i].schedule_start);
        expect(currStart.getTime()).toBeGreaterThanOrEqual(prevEnd.getTime());
      }
    });

    it("places every target exactly once", () => {
      const result = plan(nightInput);
      const seen = [...names(result.schedule), ...names(result.cut_list)];

      expect(seen.slice().sort()).toEqual(names(nightTargets).sort());
    });

    it("is deterministic across runs", () => {
      expect(JSON.stringify(schedule(nightInput))).toBe(
        JSON.stringify(schedule(nightInput))
      );
    });

    it("picks the earlier of two identical transits", () => {
      const result = plan({
        targets: [
          target({ name: "twin" }),
          target({ name: "twin" }),
        ],
      });

      expect(result.schedule).toHaveLength(1);
      expect(result.cut_list).toHaveLength(1);
      expect(result.cut_list[0].cause).toBe("Overlapping with another target");
    });
  });

  describe("Setup time", () => {
    const buffered = () =>
      plan({ targets: nightTargets, settings: { setup_time: true } });

    it("pads every scheduled window by 30 minutes", () => {
      const result = buffered();

      expect(names(result.schedule)).toEqual(["Kepler-A", "Kepler-H"]);
      expect(result.schedule[0]).toMatchObject({
        transit_start: "2024-10-10T02:00:00.000Z",
        transit_end: "2024-10-10T03:00:00.000Z",
        schedule_start: "2024-10-10T01:30:00.000Z",
        schedule_end: "2024-10-10T03:30:00.000Z",
      });
      expect(result.schedule[1]).toMatchObject({
        schedule_start: "2024-10-10T03:30:00.000Z",
        schedule_end: "2024-10-10T06:30:00.000Z",
      });
    });

    it("does not change which targets pass the other filters", () => {
      const filterCauses = (r: SuccessOutput) =>
        r.cut_list
          .filter((c) => c.cause !== "Overlapping with another target")
          .map((c) => [c.name, c.cause]);

      expect(filterCauses(buffered())).toEqual(filterCauses(plan(nightInput)));
      expect(buffered().kpis.admitted_targets).toBe(4);
    });

    it("shifts both ends by exactly half an hour", () => {
      for (const row of buffered().schedule) {
        const pad = 30 * 60_000;
        expect(
          parseISO(row.transit_start).getTime() -
            parseISO(row.schedule_start).getTime()
        ).toBe(pad);
        expect(
          parseISO(row.schedule_end).getTime() -
            parseISO(row.transit_end).getTime()
        ).toBe(pad);
      }
    });
  });

  describe("Time window", () => {
    it("cuts transits outside the window", () => {
      const result = plan({
        targets: nightTargets,
        settings: {
          time_window: {
            start: "2024-10-10T02:15:00Z",
            end: "2024-10-10T05:00:00Z",
          },
        },
      });

      expect(names(result.schedule)).toEqual(["Kepler-B"]);
      expect(result.cut_list.map((c) => [c.name, c.cause])).toEqual([
        ["Kepler-A", "Transit start time is before the time window"],
        ["Kepler-D", "Duration is NaN"],
        ["Kepler-E", "Transit start time is before the time window"],
        ["Kepler-F", "Transit start time is before the time window"],
        ["Kepler-G", "Transit start time is before the time window"],
        ["Kepler-H", "Transit end time is after the time window"],
        ["Kepler-C", "Overlapping with another target"],
      ]);
    });
  });

  describe("Source columns", () => {
    it("distinguishes an absent ingress column from empty cells", () => {
      const result = plan({
        targets: [withoutColumn(target({ name: "solo" }), "ingress_air_mass")],
      });

      expect(result.missing_columns).toEqual(["ingress_air_mass"]);
      expect(result.cut_list.map((c) => c.cause)).toEqual([
        "Ingress/Egress air mass data missing",
      ]);
    });

    it("reports every absent air mass column once", () => {
      const bare = (name: string) =>
        withoutColumn(
          withoutColumn(
            withoutColumn(target({ name }), "mid_air_mass"),
            "ingress_air_mass"
          ),
          "egress_air_mass"
        );

      const result = plan({
        targets: [bare("one"), bare("two")],
        settings: { ignore_missing_air_mass: true },
      });

      expect(result.missing_columns).toEqual([
        "mid_air_mass",
        "ingress_air_mass",
        "egress_air_mass",
      ]);
      expect(names(result.schedule)).toEqual(["one"]);
      expect(result.schedule[0].mid_air_mass).toBeNull();
    });
  });

  describe("Equivalent schedules", () => {
    it("counts candidate orderings that tie the optimum", () => {
      const result = plan({
        ...nightInput,
        candidate_schedules: [
          [0, 1, 2, 7],
          [1, 0, 2, 7],
          [3, 0, 2, 7],
        ],
      });

      expect(result.kpis.scheduled_targets).toBe(3);
      expect(result.equivalent_schedules).toBe(2);
    });

    it("omits the count when no candidates are given", () => {
      expect("equivalent_schedules" in plan(nightInput)).toBe(false);
    });
  });

  describe("Invalid configuration", () => {
    it("rejects a range whose maximum is below its minimum", () => {
      expect(() =>
        schedule({
          targets: nightTargets,
          settings: { magnitude_limit: [14, 6] },
        })
      ).toThrow(ZodError);
    });

    it("rejects a time window ending before it starts", () => {
      expect(() =>
        schedule({
          targets: nightTargets,
          settings: {
            time_window: {
              start: "2024-10-10T06:00:00Z",
              end: "2024-10-10T01:00:00Z",
            },
          },
        })
      ).toThrow(ZodError);
    });

    it("rejects durations too long to place on the calendar", () => {
      for (const duration_hours of [1e10, Infinity]) {
        expect(() =>
          schedule({
            targets: [
              target({ name: "ok" }),
              target({ name: "huge", duration_hours }),
            ],
          })
        ).toThrow(ZodError);
      }
    });

    it("rejects candidate indices that name no target", () => {
      expect(() =>
        schedule({ ...nightInput, candidate_schedules: [[0, 8]] })
      ).toThrow(ZodError);
    });
  });
});
