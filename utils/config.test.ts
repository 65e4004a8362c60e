import { describe, expect, it } from "vitest";
import { loadConfig } from "./config";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({ allowedOrigin: "*", minTextLength: 10 });
  });

  it("reads the environment", () => {
    expect(
      loadConfig({ ALLOWED_ORIGIN: "https://news.example", MIN_TEXT_LENGTH: "25" }),
    ).toEqual({ allowedOrigin: "https://news.example", minTextLength: 25 });
  });

  it("treats blank variables as unset", () => {
    expect(loadConfig({ ALLOWED_ORIGIN: "", MIN_TEXT_LENGTH: " " })).toEqual({
      allowedOrigin: "*",
      minTextLength: 10,
    });
  });

  it("rejects a malformed minimum length", () => {
    expect(() => loadConfig({ MIN_TEXT_LENGTH: "abc" })).toThrow(
      /^Invalid environment configuration: MIN_TEXT_LENGTH/,
    );
    expect(() => loadConfig({ MIN_TEXT_LENGTH: "-1" })).toThrow(/MIN_TEXT_LENGTH/);
  });
});
