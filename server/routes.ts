import type { Express } from "express";
import { createServer, type Server } from "http";
import type { AppContext } from "./context";
import { createAuthRouter } from "./routes/auth";
import { createMetricsRouter } from "./routes/metrics";
import { createGoalsRouter } from "./routes/goals";
import { createChatRouter } from "./routes/chat";
import { registerAdminRoutes } from "./routes/admin";
import { registerSystemRoutes } from "./routes/system";
import { NotFoundError } from "./errors";

export function registerRoutes(app: Express, ctx: AppContext): Server {
  registerSystemRoutes(app, ctx);

  app.use(createAuthRouter(ctx));
  app.use(createMetricsRouter(ctx));
  app.use(createGoalsRouter(ctx));
  app.use(createChatRouter(ctx));
  registerAdminRoutes(app, ctx);

  app.use('/api', (_req, _res, next) => {
    next(new NotFoundError("Not found"));
  });

  const httpServer = createServer(app);
  return httpServer;
}
