/**
 * Tests for environment parsing
 */

import { describe, it, expect } from "vitest";
import { parsePositiveInt } from "../src/config.js";

describe("parsePositiveInt", () => {
  it("uses the fallback when the variable is unset or empty", () => {
    expect(parsePositiveInt("MAX_SCAN_ROWS", undefined, 10000)).toBe(10000);
    expect(parsePositiveInt("MAX_SCAN_ROWS", "", 10000)).toBe(10000);
  });

  it("reads a positive integer", () => {
    expect(parsePositiveInt("MAX_PAGE_SIZE", "250", 100)).toBe(250);
  });

  it("rejects zero, negatives, fractions and text", () => {
    expect(() => parsePositiveInt("MAX_SCAN_ROWS", "0", 10000)).toThrow(
      "MAX_SCAN_ROWS must be a positive integer, got 0"
    );
    expect(() => parsePositiveInt("MAX_SCAN_ROWS", "-5", 10000)).toThrow(
      "MAX_SCAN_ROWS must be a positive integer, got -5"
    );
    expect(() => parsePositiveInt("MAX_PAGE_SIZE", "2.5", 100)).toThrow(
      "MAX_PAGE_SIZE must be a positive integer, got 2.5"
    );
    expect(() => parsePositiveInt("MAX_PAGE_SIZE", "lots", 100)).toThrow(
      "MAX_PAGE_SIZE must be a positive integer, got lots"
    );
  });
});
