/**
 * Shared error responses for route handlers.
 *
 * Body shape: { error: { code, message } }
 */

import type { Response } from "express";
import { z } from "zod";
import { config } from "../config.js";
import { InvalidIdentifierError, ValidationError } from "../errors.js";

export const PagingSchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(config.maxPageSize).default(20),
});

export function sendError(res: Response, err: unknown, operation: string): void {
  if (err instanceof z.ZodError || err instanceof ValidationError) {
    res.status(400).json({ error: { code: "VALIDATION_ERROR", message: err.message } });
    return;
  }
  if (err instanceof InvalidIdentifierError) {
    res.status(400).json({ error: { code: err.code, message: err.message } });
    return;
  }
  console.error(`${operation} error:`, err);
  res.status(500).json({ error: { code: "INTERNAL_ERROR", message: `Failed to ${operation.toLowerCase()}` } });
}
