import type { FastifyInstance } from "fastify";
import { ZodError } from "zod";
import type { Input } from "../types/index.js";
import { schedule } from "../core/scheduler.js";
import { SCHEDULER_VERSION } from "../constants.js";

export default async function routes(fastify: FastifyInstance) {
  fastify.post<{ Body: Input }>("/schedule", async (request, reply) => {
    try {
      const result = schedule(request.body);

      if (result.success) {
        if (result.missing_columns.length > 0) {
          request.log.warn(
            { missingColumns: result.missing_columns },
            "Air mass columns not found in source"
          );
        }
        request.log.info(
          {
            total: result.kpis.total_targets,
            admitted: result.kpis.admitted_targets,
            scheduled: result.kpis.scheduled_targets,
          },
          "Schedule computed"
        );
      } else {
        request.log.error({ why: result.why }, result.error);
      }

      return reply.send(result);
    } catch (error) {
      if (error instanceof ZodError) {
        return reply.status(400).send({
          version: SCHEDULER_VERSION,
          success: false,
          error: "Invalid input",
          why: error.errors.map((e) => `${e.path.join(".")}: ${e.message}`),
        });
      }

      request.log.error(error);
      return reply.status(500).send({
        version: SCHEDULER_VERSION,
        success: false,
        error: "Internal server error",
        why: ["An unexpected error occurred"],
      });
    }
  });

  fastify.get("/health", async (_request, reply) => {
    return reply.send({ status: "ok", version: SCHEDULER_VERSION });
  });
}
