/**
 * Task API Routes
 *
 * REST endpoints for tasks and their log. Start times are only ever
 * written by a scheduling run, so there is no endpoint to set one.
 */

import { FastifyInstance } from "fastify";
import {
  NotFoundError,
  parseListTasksQuery,
  parseStatusInput,
  parseTaskInput,
} from "@timeslot/core";
import type { LogEntry, Task } from "@timeslot/core";

/**
 * Convert task to API response format.
 */
export function toTaskResponse(task: Task) {
  return {
    id: task.id,
    name: task.name,
    kind: task.kind,
    category: task.category,
    startTime: task.startTime?.toISOString() ?? null,
    notBefore: task.notBefore?.toISOString() ?? null,
    deadline: task.deadline.toISOString(),
    duration: task.duration,
    priority: task.priority,
    status: task.status,
    recurrenceId: task.recurrenceId,
    occurrenceDate: task.occurrenceDate,
    createdAt: task.createdAt.toISOString(),
    updatedAt: task.updatedAt.toISOString(),
  };
}

function toLogResponse(entry: LogEntry) {
  return {
    id: entry.id,
    message: entry.message,
    loggedAt: entry.loggedAt.toISOString(),
  };
}

export async function registerTaskRoutes(
  fastify: FastifyInstance,
): Promise<void> {
  // GET /api/tasks - List tasks with optional filters
  fastify.get("/api/tasks", async (request) => {
    const filter = parseListTasksQuery(request.query, fastify.categories);
    const tasks = fastify.db.listTasks(filter);
    return { tasks: tasks.map(toTaskResponse) };
  });

  // GET /api/tasks/:id - Get single task
  fastify.get<{ Params: { id: string } }>(
    "/api/tasks/:id",
    async (request) => {
      return toTaskResponse(fastify.db.requireTask(request.params.id));
    },
  );

  // GET /api/tasks/:id/logs - Scheduling and status history
  fastify.get<{ Params: { id: string } }>(
    "/api/tasks/:id/logs",
    async (request) => {
      const task = fastify.db.requireTask(request.params.id);
      return {
        taskId: task.id,
        entries: fastify.db.listLogs(task.id).map(toLogResponse),
      };
    },
  );

  // POST /api/tasks - Create a new task
  fastify.post("/api/tasks", async (request, reply) => {
    const input = parseTaskInput(request.body, fastify.categories);
    const task = fastify.db.createTask(input);
    return reply.code(201).send(toTaskResponse(task));
  });

  // PATCH /api/tasks/:id/status - Complete or fail a pending task
  fastify.patch<{ Params: { id: string } }>(
    "/api/tasks/:id/status",
    async (request) => {
      const status = parseStatusInput(request.body);
      const task = fastify.db.requireTask(request.params.id);
      fastify.scheduling.markStatus(task.id, status);
      return toTaskResponse(fastify.db.requireTask(task.id));
    },
  );

  // DELETE /api/tasks/:id - Remove a task with its logs
  fastify.delete<{ Params: { id: string } }>(
    "/api/tasks/:id",
    async (request, reply) => {
      if (!fastify.db.deleteTask(request.params.id)) {
        throw new NotFoundError(`Task ${request.params.id} not found`);
      }
      return reply.code(204).send();
    },
  );
}
