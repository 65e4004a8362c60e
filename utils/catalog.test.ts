import { describe, expect, it } from "vitest";
import { CatalogError, DEFAULT_CATALOG, parseCatalog } from "./catalog";

function issuesOf(input: unknown): string[] {
  try {
    parseCatalog(input);
  } catch (error) {
    if (error instanceof CatalogError) return error.issues;
    throw error;
  }
  throw new Error("expected the catalog to be rejected");
}

describe("DEFAULT_CATALOG", () => {
  it("declares the bundled categories in order", () => {
    expect(DEFAULT_CATALOG.indicators.map((category) => category.name)).toEqual([
      "sensational",
      "emotional",
      "clickbait",
      "absolute",
      "conspiracy",
      "urgency",
      "unnamed_sources",
    ]);
    expect(DEFAULT_CATALOG.credibility.map((category) => category.name)).toEqual([
      "attribution",
      "sources",
      "dates",
    ]);
  });

  it("keeps the severity weights", () => {
    const weights = Object.fromEntries(
      DEFAULT_CATALOG.indicators.map((category) => [category.name, category.weight]),
    );

    expect(weights).toEqual({
      sensational: 2,
      emotional: 1.5,
      clickbait: 2.5,
      absolute: 1,
      conspiracy: 3,
      urgency: 1.5,
      unnamed_sources: 2,
    });
  });
});

describe("parseCatalog", () => {
  it("lowercases and trims phrases", () => {
    const catalog = parseCatalog({
      indicators: [{ name: "hype", weight: 1, phrases: [" To The Moon "] }],
      credibility: [],
    });

    expect(catalog.indicators[0].phrases).toEqual(["to the moon"]);
  });

  it("rejects a category without phrases", () => {
    expect(
      issuesOf({ indicators: [{ name: "hype", weight: 1, phrases: [] }], credibility: [] }),
    ).toEqual(["indicators.0.phrases: category needs at least one phrase"]);
  });

  it("rejects a non-positive weight", () => {
    expect(
      issuesOf({ indicators: [{ name: "hype", weight: 0, phrases: ["moon"] }], credibility: [] }),
    ).toEqual(["indicators.0.weight: weight must be greater than 0"]);
  });

  it("rejects duplicate phrases regardless of case", () => {
    expect(
      issuesOf({
        indicators: [{ name: "hype", weight: 1, phrases: ["Fake", "fake"] }],
        credibility: [],
      }),
    ).toEqual(['indicators.0.phrases.1: duplicate phrase "fake"']);
  });

  it("rejects duplicate category names", () => {
    expect(
      issuesOf({
        indicators: [{ name: "hype", weight: 1, phrases: ["moon"] }],
        credibility: [
          { name: "dates", phrases: ["monday"] },
          { name: "dates", phrases: ["friday"] },
        ],
      }),
    ).toEqual(['credibility.1.name: duplicate category "dates"']);
  });

  it("rejects a reserved category name", () => {
    expect(
      issuesOf({
        indicators: [{ name: "__proto__", weight: 1, phrases: ["moon"] }],
        credibility: [],
      }),
    ).toEqual(["indicators.0.name: category name is reserved"]);
  });

  it("requires an indicator category", () => {
    expect(issuesOf({ indicators: [], credibility: [] })).toEqual([
      "indicators: at least one indicator category is required",
    ]);
  });

  it("throws a CatalogError with a readable message", () => {
    expect(() => parseCatalog("not a catalog")).toThrow(CatalogError);
    expect(() => parseCatalog("not a catalog")).toThrow(/^Invalid detector catalog: /);
  });
});
