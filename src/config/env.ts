import { z } from "zod";
import { ConfigError } from "../errors.js";

const envSchema = z.object({
  // Only needed by the GitHub adapter
  GITHUB_TOKEN: z.string().min(1).optional(),

  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("production"),
});

export type Env = z.infer<typeof envSchema>;

let _env: Env | null = null;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  if (_env && source === process.env) return _env;

  const result = envSchema.safeParse(source);
  if (!result.success) {
    throw new ConfigError(
      "Invalid environment variables",
      result.error.issues.map((i) => `  ${i.path.join(".")}: ${i.message}`)
    );
  }

  if (source === process.env) _env = result.data;
  return result.data;
}

/** Drops the cached environment so the next loadEnv() re-reads process.env */
export function resetEnv(): void {
  _env = null;
}
