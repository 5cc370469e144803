import { describe, it, expect } from "vitest";
import { DEFAULT_PORT, parseEnvFile, resolveConfig } from "./setup.js";

describe("parseEnvFile", () => {
  it("reads KEY=VALUE lines and skips comments", () => {
    const content = [
      "# Local Development Configuration",
      "",
      "PORT=9000",
      "SHARE_BASE_URL=http://share.local/?a=b",
      "MALFORMED",
    ].join("\n");

    expect(parseEnvFile(content)).toEqual({
      PORT: "9000",
      SHARE_BASE_URL: "http://share.local/?a=b",
    });
  });
});

describe("resolveConfig", () => {
  it("defaults to the local port", () => {
    expect(resolveConfig({})).toEqual({
      port: DEFAULT_PORT,
      shareBaseUrl: "http://localhost:8787",
      shareLinkTtlHours: undefined,
    });
  });

  it("uses configured values", () => {
    expect(
      resolveConfig({ PORT: "9000", SHARE_BASE_URL: "https://share.example.test/", SHARE_LINK_TTL_HOURS: "2" })
    ).toEqual({
      port: 9000,
      shareBaseUrl: "https://share.example.test",
      shareLinkTtlHours: 2,
    });
  });

  it("rejects an invalid port", () => {
    expect(() => resolveConfig({ PORT: "http" })).toThrow('PORT must be an integer between 1 and 65535, got "http"');
  });

  it("rejects an invalid TTL", () => {
    expect(() => resolveConfig({ SHARE_LINK_TTL_HOURS: "-1" })).toThrow(
      'SHARE_LINK_TTL_HOURS must be a positive number, got "-1"'
    );
  });
});
