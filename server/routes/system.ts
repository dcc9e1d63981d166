import type { Express } from "express";
import type { AppContext } from "../context";

export function registerSystemRoutes(app: Express, ctx: AppContext) {
  app.get('/api/v1/system/health', (_req, res) => {
    res.json({ status: "healthy", version: ctx.config.version });
  });
}
