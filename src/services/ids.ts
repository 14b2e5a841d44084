/**
 * Identifier parsing and generation.
 */

import { randomUUID } from "crypto";
import cassandra from "cassandra-driver";
import { UUID_PATTERN } from "../db/rows.js";
import { InvalidIdentifierError } from "../errors.js";

/** Receiver reported when a sender is not one of the stored participants. */
export const NIL_ID = "00000000-0000-0000-0000-000000000000";

/**
 * Parse a caller-supplied identifier into its canonical lower-case form.
 * Throws InvalidIdentifierError before anything reaches the store.
 */
export function parseId(value: unknown, field: string): string {
  if (typeof value !== "string" || !UUID_PATTERN.test(value.trim())) {
    throw new InvalidIdentifierError(field, value);
  }
  return value.trim().toLowerCase();
}

export function newConversationId(): string {
  return randomUUID();
}

/** Version-1 time UUID carrying the same instant as the row's created_at. */
export function newMessageId(at: Date): string {
  return cassandra.types.TimeUuid.fromDate(at).toString();
}
