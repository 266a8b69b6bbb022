/**
 * Recurring Setting Routes
 *
 * A recurring setting ties a template task to a pattern. Expanding it
 * inserts one pending task per occurrence inside the horizon; occurrences
 * that already exist are left alone.
 */

import { FastifyInstance } from "fastify";
import {
  expandRecurrence,
  NotFoundError,
  parseExpandInput,
  parseRecurringSettingInput,
} from "@timeslot/core";
import { toTaskResponse } from "./tasks.js";
import type { RecurringSetting } from "@timeslot/core";

function toRecurringResponse(setting: RecurringSetting) {
  return {
    id: setting.id,
    userId: setting.userId,
    taskId: setting.taskId,
    pattern: setting.pattern,
    createdAt: setting.createdAt.toISOString(),
  };
}

export async function registerRecurringRoutes(
  fastify: FastifyInstance,
): Promise<void> {
  fastify.get<{ Querystring: { userId?: string } }>(
    "/api/recurring",
    async (request) => {
      const settings = fastify.db.listRecurringSettings(request.query.userId);
      return { recurring: settings.map(toRecurringResponse) };
    },
  );

  fastify.post("/api/recurring", async (request, reply) => {
    const input = parseRecurringSettingInput(request.body);
    const setting = fastify.db.createRecurringSetting(input);
    return reply.code(201).send(toRecurringResponse(setting));
  });

  fastify.delete<{ Params: { id: string } }>(
    "/api/recurring/:id",
    async (request, reply) => {
      if (!fastify.db.deleteRecurringSetting(request.params.id)) {
        throw new NotFoundError(
          `Recurring setting ${request.params.id} not found`,
        );
      }
      return reply.code(204).send();
    },
  );

  // POST /api/recurring/:id/expand - body: { start?, weeks? }
  fastify.post<{ Params: { id: string } }>(
    "/api/recurring/:id/expand",
    async (request, reply) => {
      const input = parseExpandInput(request.body);
      const setting = fastify.db.requireRecurringSetting(request.params.id);
      const template = fastify.db.requireTask(setting.taskId);
      const config = fastify.timeslotConfig;

      const created = fastify.db.insertTaskInstances(
        expandRecurrence(setting, template, {
          start: input.start ?? fastify.clock(),
          weeks: input.weeks ?? config.scheduling.horizonWeeks,
          zone: config.timezone,
        }),
      );

      request.log.info(
        { recurrenceId: setting.id, created: created.length },
        "Expanded recurring setting",
      );
      return reply.code(201).send({
        recurrenceId: setting.id,
        created: created.map(toTaskResponse),
      });
    },
  );
}
