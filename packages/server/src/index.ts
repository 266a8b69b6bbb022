import {
  CategoryRegistry,
  createLogger,
  isSchedulerError,
  loadConfig,
  SchedulerDatabase,
  SchedulingService,
} from "@timeslot/core";
import { createServer } from "./server.js";

async function main() {
  const config = loadConfig();
  const logger = createLogger({
    name: "timeslot",
    level: config.log.level,
    pretty: config.log.pretty,
  });

  const categories = new CategoryRegistry(config.categories);
  const db = new SchedulerDatabase(config.dbPath, categories);
  const scheduling = new SchedulingService({
    store: db,
    categories,
    zone: config.timezone,
    slotMinutes: config.scheduling.slotMinutes,
    logger,
  });

  const server = await createServer({ db, scheduling, categories, config });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    console.log(`\n${signal} received. Shutting down...`);
    try {
      await server.close();
      db.close();
      process.exit(0);
    } catch (err) {
      console.error("Error during shutdown:", err);
      process.exit(1);
    }
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));

  await server.listen({ port: config.server.port, host: config.server.host });
  console.log(
    `timeslot server running at http://${config.server.host}:${config.server.port}`,
  );
  console.log(`Database: ${config.dbPath}`);
}

main().catch((err) => {
  if (isSchedulerError(err)) {
    console.error(`Error (${err.code}): ${err.message}`);
  } else {
    console.error("Fatal error:", err);
  }
  process.exit(1);
});
