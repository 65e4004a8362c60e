import { z } from "zod";

// An exported but empty variable reads as unset.
const blankAsUnset = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const EnvSchema = z.object({
  ALLOWED_ORIGIN: z.preprocess(blankAsUnset, z.string().default("*")),
  MIN_TEXT_LENGTH: z.preprocess(
    blankAsUnset,
    z.coerce.number().int().nonnegative().default(10),
  ),
});

export interface AppConfig {
  allowedOrigin: string;
  minTextLength: number;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment configuration: ${problems}`);
  }

  return {
    allowedOrigin: parsed.data.ALLOWED_ORIGIN,
    minTextLength: parsed.data.MIN_TEXT_LENGTH,
  };
}

let cached: AppConfig | undefined;

export function getConfig(): AppConfig {
  cached ??= loadConfig();
  return cached;
}
