import { z } from "zod";
import { ConfigError } from "../errors.js";

const renamePolicy = z.enum(["auto-correct", "strict"]);

const configSchema = z.object({
  validation: z
    .object({
      renamePolicy: renamePolicy.default("auto-correct"),
    })
    .default({}),
  comments: z
    .object({
      includeSeverityHeader: z.boolean().default(true),
      maxBodyLength: z.number().int().positive().default(65536),
    })
    .default({}),
  skipReport: z
    .object({
      maxRangesShown: z.number().int().positive().default(10),
      includeIssueBody: z.boolean().default(true),
    })
    .default({}),
});

export type HunkmapConfig = z.infer<typeof configSchema>;
export type HunkmapConfigInput = z.input<typeof configSchema>;

export function parseConfig(raw: unknown): HunkmapConfig {
  const result = configSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(
      "Invalid hunkmap config",
      result.error.issues.map((i) => `  ${i.path.join(".")}: ${i.message}`)
    );
  }
  return result.data;
}
