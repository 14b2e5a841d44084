/**
 * Message routes.
 *
 * POST /messages                                       — Send a message (always fans out)
 * GET  /messages/conversation/:conversationId          — Messages, newest first
 * GET  /messages/conversation/:conversationId/before   — Messages before a timestamp
 */

import { Router } from "express";
import { z } from "zod";
import type { Store } from "../db/index.js";
import { listMessages, listMessagesBefore, sendMessage } from "../services/messages.js";
import { PagingSchema, sendError } from "./errors.js";

const SendSchema = z.object({
  senderId: z.string().min(1),
  receiverId: z.string().min(1),
  content: z.string().min(1).max(10_000),
});

const BeforeSchema = PagingSchema.extend({
  before: z.coerce.date(),
});

export function messageRoutes(store: Store): Router {
  const router = Router();

  // ───────────────────────────────────────────────────────────────────────────
  // POST /messages — Send a message
  // ───────────────────────────────────────────────────────────────────────────

  router.post("/", async (req, res) => {
    try {
      const body = SendSchema.parse(req.body);
      const message = await sendMessage(store, body);
      res.status(201).json({ data: message });
    } catch (err) {
      sendError(res, err, "Send message");
    }
  });

  // ───────────────────────────────────────────────────────────────────────────
  // GET /messages/conversation/:conversationId — Paged history
  // ───────────────────────────────────────────────────────────────────────────

  router.get("/conversation/:conversationId", async (req, res) => {
    try {
      const { page, limit } = PagingSchema.parse(req.query);
      const result = await listMessages(store, req.params.conversationId, page, limit);
      res.json(result);
    } catch (err) {
      sendError(res, err, "List messages");
    }
  });

  // ───────────────────────────────────────────────────────────────────────────
  // GET /messages/conversation/:conversationId/before — History before a time
  // ───────────────────────────────────────────────────────────────────────────

  router.get("/conversation/:conversationId/before", async (req, res) => {
    try {
      const { before, page, limit } = BeforeSchema.parse(req.query);
      // Fail-soft: the service answers with an empty page instead of throwing
      const result = await listMessagesBefore(
        store,
        req.params.conversationId,
        before,
        page,
        limit
      );
      res.json(result);
    } catch (err) {
      sendError(res, err, "List messages before");
    }
  });

  return router;
}
