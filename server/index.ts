import "dotenv/config";
import { loadConfig } from "./config/appConfig";
import { createDatabase } from "./db";
import { DatabaseStorage } from "./storage";
import { createAppContext } from "./context";
import { createApp } from "./app";
import { logger } from "./logger";

async function main() {
  const config = loadConfig(process.env);
  logger.setLevel(config.logLevel);

  const { db, pool } = createDatabase(config.databaseUrl);
  const storage = new DatabaseStorage(db);
  const ctx = createAppContext(config, storage);

  if (config.firstSuperuser) {
    await ctx.users.ensureSuperuser(config.firstSuperuser.email, config.firstSuperuser.password);
  }

  const { server } = createApp(ctx);

  server.listen({ port: config.port, host: "0.0.0.0" }, () => {
    logger.info(`[Server] Serving on port ${config.port}`, { env: config.env, version: config.version });
  });

  const shutdown = (signal: string) => {
    logger.info(`[Server] ${signal} received, shutting down`);
    server.close(() => {
      pool.end().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error('[Server] Failed to close database pool', error);
          process.exit(1);
        },
      );
    });
  };
  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((error: unknown) => {
  logger.error('[Server] Startup failed', error);
  process.exit(1);
});
