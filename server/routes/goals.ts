import { Router } from "express";
import {
  upsertGoalGeneralSchema,
  upsertGoalMacrosSchema,
  upsertGoalWeightSchema,
} from "@shared/schema";
import type { AppContext } from "../context";
import { currentUser } from "../middleware/auth";
import { parseOrThrow } from "../utils/validation";

export function createGoalsRouter(ctx: AppContext): Router {
  const router = Router();
  router.use("/api/v1/goal", ctx.authenticate);

  // ==================== GENERAL ====================

  router.get("/api/v1/goal/general", async (req, res, next) => {
    try {
      res.json(await ctx.goals.getGeneral(currentUser(req).id));
    } catch (error) {
      next(error);
    }
  });

  router.put("/api/v1/goal/general", async (req, res, next) => {
    try {
      const body = parseOrThrow(upsertGoalGeneralSchema, req.body);
      res.json(await ctx.goals.saveGeneral(currentUser(req).id, body));
    } catch (error) {
      next(error);
    }
  });

  router.delete("/api/v1/goal/general", async (req, res, next) => {
    try {
      await ctx.goals.deleteGeneral(currentUser(req).id);
      res.json({ message: "General goal deleted successfully", deletedCount: 1 });
    } catch (error) {
      next(error);
    }
  });

  // ==================== MACROS ====================

  router.get("/api/v1/goal/macros", async (req, res, next) => {
    try {
      res.json(await ctx.goals.getMacros(currentUser(req).id));
    } catch (error) {
      next(error);
    }
  });

  router.put("/api/v1/goal/macros", async (req, res, next) => {
    try {
      const body = parseOrThrow(upsertGoalMacrosSchema, req.body);
      res.json(await ctx.goals.saveMacros(currentUser(req).id, body));
    } catch (error) {
      next(error);
    }
  });

  router.delete("/api/v1/goal/macros", async (req, res, next) => {
    try {
      await ctx.goals.deleteMacros(currentUser(req).id);
      res.json({ message: "Macro goal deleted successfully", deletedCount: 1 });
    } catch (error) {
      next(error);
    }
  });

  // ==================== WEIGHT ====================

  router.get("/api/v1/goal/weight", async (req, res, next) => {
    try {
      const goals = await ctx.goals.listWeight(currentUser(req).id);
      res.json({ goals, totalCount: goals.length });
    } catch (error) {
      next(error);
    }
  });

  router.put("/api/v1/goal/weight", async (req, res, next) => {
    try {
      const body = parseOrThrow(upsertGoalWeightSchema, req.body);
      res.json(await ctx.goals.saveWeight(currentUser(req).id, body));
    } catch (error) {
      next(error);
    }
  });

  router.delete("/api/v1/goal/weight/:id", async (req, res, next) => {
    try {
      await ctx.goals.deleteWeight(currentUser(req).id, req.params.id);
      res.json({ message: "Weight goal deleted successfully", deletedCount: 1 });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
