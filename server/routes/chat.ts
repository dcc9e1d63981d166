import { Router } from "express";
import { chatRequestSchema } from "@shared/schema";
import type { AppContext } from "../context";
import { currentUser } from "../middleware/auth";
import { parseOrThrow } from "../utils/validation";

export function createChatRouter(ctx: AppContext): Router {
  const router = Router();

  router.post("/api/v1/chat/assistant", ctx.authenticate, async (req, res, next) => {
    try {
      const { message, conversationId } = parseOrThrow(chatRequestSchema, req.body);
      const reply = await ctx.chat.reply(currentUser(req).id, message, conversationId);
      res.json(reply);
    } catch (error) {
      next(error);
    }
  });

  router.get("/api/v1/chat/conversations", ctx.authenticate, async (req, res, next) => {
    try {
      const conversations = await ctx.chat.listConversations(currentUser(req).id);
      res.json({ conversations, totalCount: conversations.length });
    } catch (error) {
      next(error);
    }
  });

  router.get("/api/v1/chat/conversations/:id/messages", ctx.authenticate, async (req, res, next) => {
    try {
      const messages = await ctx.chat.listMessages(currentUser(req).id, req.params.id);
      res.json({ conversationId: req.params.id, messages });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
