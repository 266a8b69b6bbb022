import Fastify, { FastifyInstance } from "fastify";
import fastifyCors from "@fastify/cors";
import { isSchedulerError } from "@timeslot/core";
import { registerTaskRoutes } from "./routes/tasks.js";
import { registerScheduleRoutes } from "./routes/schedules.js";
import { registerUserRoutes } from "./routes/users.js";
import { registerRecurringRoutes } from "./routes/recurring.js";
import { registerSchedulingRoutes } from "./routes/scheduling.js";
import type {
  CategoryRegistry,
  SchedulerDatabase,
  SchedulerErrorCode,
  SchedulingService,
  TimeslotConfig,
} from "@timeslot/core";

export interface ServerOptions {
  db: SchedulerDatabase;
  scheduling: SchedulingService;
  categories: CategoryRegistry;
  config: TimeslotConfig;
  /** Request logging; false turns it off (tests) */
  logging?: boolean;
  clock?: () => Date;
}

// Augment Fastify types to include our custom decorators
declare module "fastify" {
  interface FastifyInstance {
    db: SchedulerDatabase;
    scheduling: SchedulingService;
    categories: CategoryRegistry;
    timeslotConfig: TimeslotConfig;
    clock: () => Date;
  }
}

const STATUS_BY_CODE: Record<SchedulerErrorCode, number> = {
  VALIDATION: 400,
  NOT_FOUND: 404,
  CONFLICT: 409,
  CONFIG: 422,
  UNSCHEDULABLE: 422,
};

export async function createServer(
  options: ServerOptions,
): Promise<FastifyInstance> {
  const { config } = options;

  const fastify = Fastify({
    logger:
      options.logging === false
        ? false
        : {
            level: config.log.level,
            ...(config.log.pretty
              ? {
                  transport: {
                    target: "pino-pretty",
                    options: {
                      translateTime: "HH:MM:ss Z",
                      ignore: "pid,hostname",
                    },
                  },
                }
              : {}),
          },
  });

  // Register CORS (allow all origins, local single-user API)
  await fastify.register(fastifyCors, {
    origin: true,
  });

  fastify.decorate("db", options.db);
  fastify.decorate("scheduling", options.scheduling);
  fastify.decorate("categories", options.categories);
  fastify.decorate("timeslotConfig", config);
  fastify.decorate("clock", options.clock ?? (() => new Date()));

  fastify.setErrorHandler((error, request, reply) => {
    if (isSchedulerError(error)) {
      const statusCode = STATUS_BY_CODE[error.code];
      if (statusCode >= 422) {
        request.log.error({ err: error }, error.message);
      }
      return reply
        .code(statusCode)
        .send({ error: error.message, code: error.code });
    }

    // Fastify's own errors (malformed JSON, oversized body) carry a status
    if (
      typeof error === "object" &&
      error !== null &&
      "statusCode" in error &&
      typeof error.statusCode === "number" &&
      error.statusCode < 500
    ) {
      const message = error instanceof Error ? error.message : "Bad request";
      return reply.code(error.statusCode).send({ error: message });
    }

    request.log.error({ err: error }, "Unhandled error");
    return reply.code(500).send({ error: "Internal server error" });
  });

  fastify.get("/api/health", async () => {
    return { status: "ok" };
  });

  fastify.get("/api/categories", async () => {
    return { categories: fastify.categories.list() };
  });

  // Register task routes
  await registerTaskRoutes(fastify);

  // Register schedule window routes
  await registerScheduleRoutes(fastify);

  // Register user routes
  await registerUserRoutes(fastify);

  // Register recurring setting routes
  await registerRecurringRoutes(fastify);

  // Register scheduling routes
  await registerSchedulingRoutes(fastify);

  return fastify;
}
