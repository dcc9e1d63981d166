import type { Express } from "express";
import { updateUserStatusSchema } from "@shared/schema";
import type { AppContext } from "../context";
import { requireAdmin } from "../middleware/rbac";
import { toPublicUser } from "../services/userService";
import { parseOrThrow } from "../utils/validation";

export function registerAdminRoutes(app: Express, ctx: AppContext) {
  app.get('/api/v1/admin/users', ctx.authenticate, requireAdmin, async (_req, res, next) => {
    try {
      const users = await ctx.users.listUsers();
      res.json({ users: users.map(toPublicUser), totalCount: users.length });
    } catch (error) {
      next(error);
    }
  });

  // Deactivation takes effect on the user's next request; the gateway reloads the account every time.
  app.patch('/api/v1/admin/users/:id', ctx.authenticate, requireAdmin, async (req, res, next) => {
    try {
      const body = parseOrThrow(updateUserStatusSchema, req.body);
      const user = await ctx.users.updateStatus(req.params.id, body);
      res.json(toPublicUser(user));
    } catch (error) {
      next(error);
    }
  });
}
