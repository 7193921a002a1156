import { createApp, log } from "./app";
import { env } from "./config/env";
import { closeDb, getDb, getPool } from "./db";
import { logError } from "./errors";
import { applyMigrations } from "./migrate";
import { createServices } from "./services";

async function main() {
  const pool = getPool();
  await applyMigrations((sqlText) => pool.query(sqlText));

  const db = getDb();
  const services = createServices(db, env);
  const { server } = await createApp(services, db);

  if (env.JOBS_ENABLED) {
    services.scheduler.start();
    log("Job scheduler started", "jobs");
  }

  server.listen({ port: env.PORT, host: "0.0.0.0" }, () => {
    log(`serving on port ${env.PORT}`);
  });

  const shutdown = (signal: string) => {
    log(`${signal} received, shutting down`);
    services.scheduler.stop();
    server.close(() => {
      closeDb()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logError(error, "shutdown");
          process.exit(1);
        });
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((error: unknown) => {
  logError(error, "startup");
  process.exit(1);
});
