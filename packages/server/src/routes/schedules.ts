/**
 * Schedule Window Routes
 *
 * Weekly availability per category. Edits take effect on the next
 * scheduling run; already placed tasks are not moved.
 */

import { FastifyInstance } from "fastify";
import {
  NotFoundError,
  parseCategory,
  parseScheduleWindowInput,
} from "@timeslot/core";

export async function registerScheduleRoutes(
  fastify: FastifyInstance,
): Promise<void> {
  // GET /api/schedules?category=work
  fastify.get<{ Querystring: { category?: string } }>(
    "/api/schedules",
    async (request) => {
      const { category } = request.query;
      const windows = fastify.db.listScheduleWindows(
        category === undefined ? undefined : parseCategory(fastify.categories, category),
      );
      return { schedules: windows };
    },
  );

  fastify.post("/api/schedules", async (request, reply) => {
    const input = parseScheduleWindowInput(request.body, fastify.categories);
    const window = fastify.db.createScheduleWindow(input);
    return reply.code(201).send(window);
  });

  fastify.delete<{ Params: { id: string } }>(
    "/api/schedules/:id",
    async (request, reply) => {
      if (!fastify.db.deleteScheduleWindow(request.params.id)) {
        throw new NotFoundError(`Schedule window ${request.params.id} not found`);
      }
      return reply.code(204).send();
    },
  );
}
