import { z } from "zod";
import bundledCatalog from "../data/catalog.json";
import type { DetectorCatalog } from "../types";

export class CatalogError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid detector catalog: ${issues.join("; ")}`);
    this.name = "CatalogError";
    this.issues = issues;
  }
}

// Matching runs on lowercased text, so phrases are lowercased here and
// duplicates are judged after that.
const PhraseListSchema = z
  .array(
    z
      .string()
      .trim()
      .min(1, "phrase must not be blank")
      .transform((phrase) => phrase.toLowerCase()),
  )
  .min(1, "category needs at least one phrase")
  .superRefine((phrases, ctx) => {
    const seen = new Set<string>();
    phrases.forEach((phrase, index) => {
      if (seen.has(phrase)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate phrase "${phrase}"`,
          path: [index],
        });
      }
      seen.add(phrase);
    });
  });

const CredibilityCategorySchema = z.object({
  name: z
    .string()
    .trim()
    .min(1, "category name must not be blank")
    .refine((name) => name !== "__proto__", "category name is reserved"),
  phrases: PhraseListSchema,
});

const IndicatorCategorySchema = CredibilityCategorySchema.extend({
  weight: z.number().finite().positive("weight must be greater than 0"),
});

function uniqueNames<T extends { name: string }>(categories: T[], ctx: z.RefinementCtx) {
  const seen = new Set<string>();
  categories.forEach((category, index) => {
    if (seen.has(category.name)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `duplicate category "${category.name}"`,
        path: [index, "name"],
      });
    }
    seen.add(category.name);
  });
}

export const CatalogSchema = z.object({
  indicators: z
    .array(IndicatorCategorySchema)
    .min(1, "at least one indicator category is required")
    .superRefine((categories, ctx) => uniqueNames(categories, ctx)),
  credibility: z
    .array(CredibilityCategorySchema)
    .superRefine((categories, ctx) => uniqueNames(categories, ctx)),
});

export function parseCatalog(input: unknown): DetectorCatalog {
  const parsed = CatalogSchema.safeParse(input);
  if (!parsed.success) {
    throw new CatalogError(
      parsed.error.issues.map((issue) => {
        const path = issue.path.join(".");
        return path ? `${path}: ${issue.message}` : issue.message;
      }),
    );
  }
  return parsed.data;
}

export const DEFAULT_CATALOG: DetectorCatalog = parseCatalog(bundledCatalog);
