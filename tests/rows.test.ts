/**
 * Unit tests for row decoding
 *
 * Rows arrive either as plain records or as driver rows with get(column).
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import {
  RowDecodeError,
  decodeConversationDetails,
  decodeMessage,
  decodeRows,
  decodeUserConversation,
  toCount,
  toId,
} from "../src/db/rows.js";

const CONV = "aaaaaaaa-aaaa-4aaa-8aaa-aaaaaaaaaaaa";
const MSG = "bbbbbbbb-bbbb-1bbb-8bbb-bbbbbbbbbbbb";
const USER_A = "11111111-1111-4111-8111-111111111111";
const USER_B = "22222222-2222-4222-8222-222222222222";
const AT = new Date("2024-05-01T10:00:00.000Z");

const messageColumns = {
  conversation_id: CONV,
  message_id: MSG,
  sender_id: USER_A,
  message_text: "hello",
  created_at: AT,
};

afterEach(() => {
  vi.restoreAllMocks();
});

describe("decodeMessage", () => {
  const expected = {
    conversationId: CONV,
    messageId: MSG,
    senderId: USER_A,
    messageText: "hello",
    createdAt: AT,
  };

  it("reads columns from a plain record", () => {
    expect(decodeMessage(messageColumns)).toEqual(expected);
  });

  it("reads columns through get() when they are not properties", () => {
    const values: Record<string, unknown> = messageColumns;
    const row = { get: (column: string) => values[column] };

    expect(decodeMessage(row)).toEqual(expected);
  });

  it("canonicalizes driver uuid objects and upper-case ids", () => {
    const row = {
      ...messageColumns,
      conversation_id: { toString: () => CONV.toUpperCase() },
      sender_id: USER_A.toUpperCase(),
    };

    const decoded = decodeMessage(row);
    expect(decoded.conversationId).toBe(CONV);
    expect(decoded.senderId).toBe(USER_A);
  });

  it("throws RowDecodeError for a missing column", () => {
    const { message_text: _dropped, ...row } = messageColumns;
    expect(() => decodeMessage(row)).toThrow(RowDecodeError);
  });

  it("throws RowDecodeError for a bad timestamp", () => {
    expect(() => decodeMessage({ ...messageColumns, created_at: "yesterday" })).toThrow(
      RowDecodeError
    );
  });
});

describe("decodeConversationDetails", () => {
  it("reads a null participant list as empty", () => {
    const decoded = decodeConversationDetails({
      conversation_id: CONV,
      participants: null,
      created_at: AT,
    });
    expect(decoded.participants).toEqual([]);
  });
});

describe("decodeUserConversation", () => {
  it("keeps a null last message as null", () => {
    const decoded = decodeUserConversation({
      user_id: USER_A,
      last_message_time: AT,
      conversation_id: CONV,
      last_message: null,
      participants: [USER_A, USER_B],
    });

    expect(decoded).toEqual({
      userId: USER_A,
      lastMessageTime: AT,
      conversationId: CONV,
      lastMessage: null,
      participants: [USER_A, USER_B],
    });
  });
});

describe("column values", () => {
  it("rejects ids that are not uuids", () => {
    expect(() => toId("42")).toThrow(RowDecodeError);
    expect(() => toId(undefined)).toThrow(RowDecodeError);
  });

  it("reads counts from numbers, bigints and Long-like objects", () => {
    expect(toCount(7)).toBe(7);
    expect(toCount(3n)).toBe(3);
    expect(toCount({ toString: () => "12" })).toBe(12);
    expect(() => toCount("many")).toThrow(RowDecodeError);
    expect(() => toCount(-1)).toThrow(RowDecodeError);
  });
});

describe("decodeRows", () => {
  it("skips rows that do not decode and warns", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const rows = [messageColumns, { ...messageColumns, sender_id: "not-a-uuid" }];

    const decoded = decodeRows(rows, decodeMessage, "messages_by_conversation");

    expect(decoded).toHaveLength(1);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      "Skipping messages_by_conversation row: Cannot decode column sender_id: not a uuid (not-a-uuid)"
    );
  });

  it("skips a row whose column accessor throws", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const unreadable = {
      get(): unknown {
        throw new TypeError("column not readable");
      },
    };

    const decoded = decodeRows([unreadable, messageColumns], decodeMessage, "messages_by_conversation");

    expect(decoded).toEqual([
      {
        conversationId: CONV,
        messageId: MSG,
        senderId: USER_A,
        messageText: "hello",
        createdAt: AT,
      },
    ]);
    expect(warn).toHaveBeenCalledWith(
      "Skipping messages_by_conversation row: Cannot decode column conversation_id: not readable (column not readable)"
    );
  });

  it("rethrows errors that are not decode errors", () => {
    const boom = () => {
      throw new TypeError("boom");
    };
    expect(() => decodeRows([messageColumns], boom, "t")).toThrow(TypeError);
  });
});
