/**
 * Tests for DynamoDB key helpers
 */

import { describe, it, expect } from "vitest";
import { generateShareLinkKeys, toTtlSeconds } from "./keys.js";

describe("generateShareLinkKeys", () => {
  it("partitions by link id", () => {
    expect(generateShareLinkKeys("abc")).toEqual({ pk: "SHARE#abc", sk: "LINK" });
  });
});

describe("toTtlSeconds", () => {
  it("converts ISO timestamps to epoch seconds", () => {
    expect(toTtlSeconds("2024-02-08T00:00:00.000Z")).toBe(1707350400);
  });

  it("truncates fractional seconds", () => {
    expect(toTtlSeconds("2024-02-08T00:00:00.999Z")).toBe(1707350400);
  });
});
