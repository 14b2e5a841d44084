/**
 * Express app factory. The store is passed in so the same app runs on
 * Cassandra in production and on an in-process store in tests.
 */

import express, { type Express } from "express";
import cors from "cors";
import type { Store } from "./db/index.js";
import { conversationRoutes } from "./routes/conversations.js";
import { messageRoutes } from "./routes/messages.js";

export function createApp(store: Store): Express {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: "1mb" }));

  // Health
  app.get("/health", (_req, res) => {
    res.json({ status: "ok", service: "pairwise-relay", version: "0.1.0" });
  });

  // Core routes
  app.use("/messages", messageRoutes(store));
  app.use("/conversations", conversationRoutes(store));

  // 404 catch-all
  app.use((_req, res) => {
    res.status(404).json({
      error: { code: "NOT_FOUND", message: `Route not found` },
    });
  });

  return app;
}
