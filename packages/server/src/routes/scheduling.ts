import { FastifyInstance } from "fastify";
import { parseCategory } from "@timeslot/core";
import type { SchedulingRunResult } from "@timeslot/core";

function toRunResponse(result: SchedulingRunResult) {
  return {
    category: result.category,
    startedAt: result.startedAt.toISOString(),
    scheduled: result.scheduled.map((placement) => ({
      taskId: placement.taskId,
      start: placement.start.toISOString(),
      end: placement.end.toISOString(),
    })),
    failed: result.failed,
    skipped: result.skipped,
  };
}

export async function registerSchedulingRoutes(
  fastify: FastifyInstance,
): Promise<void> {
  // POST /api/scheduling/run?category=work - omit category to run them all
  fastify.post<{ Querystring: { category?: string } }>(
    "/api/scheduling/run",
    async (request) => {
      const { category } = request.query;
      const results =
        category === undefined
          ? await fastify.scheduling.runAll()
          : [
              await fastify.scheduling.runCategory(
                parseCategory(fastify.categories, category),
              ),
            ];
      return { runs: results.map(toRunResponse) };
    },
  );
}
