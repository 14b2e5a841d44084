/**
 * Conversation routes.
 *
 * GET /conversations/user/:userId        — A user's conversations, most recent first
 * GET /conversations/:conversationId     — One conversation
 */

import { Router } from "express";
import type { Store } from "../db/index.js";
import { getConversation, listConversationsForUser } from "../services/conversations.js";
import { PagingSchema, sendError } from "./errors.js";

export function conversationRoutes(store: Store): Router {
  const router = Router();

  router.get("/user/:userId", async (req, res) => {
    try {
      const { page, limit } = PagingSchema.parse(req.query);
      const result = await listConversationsForUser(store, req.params.userId, page, limit);
      res.json(result);
    } catch (err) {
      sendError(res, err, "List conversations");
    }
  });

  router.get("/:conversationId", async (req, res) => {
    try {
      const conversation = await getConversation(store, req.params.conversationId);
      if (!conversation) {
        res.status(404).json({ error: { code: "NOT_FOUND", message: "Conversation not found" } });
        return;
      }
      res.json({ data: conversation });
    } catch (err) {
      sendError(res, err, "Get conversation");
    }
  });

  return router;
}
