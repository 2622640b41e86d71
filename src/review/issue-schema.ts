import { z } from "zod";
import { ContractViolationError } from "../errors.js";
import type { Issue } from "./types.js";

// Line numbers are only checked for type here; the validator rejects non-positive ones per issue
const issueSchema = z.object({
  file: z.string().min(1),
  line: z.number(),
  severity: z.enum(["error", "warning", "info"]),
  category: z.string(),
  body: z.string(),
  suggestedFix: z.string().optional(),
});

const issueListSchema = z.array(issueSchema);

/** Validates issues arriving as untyped JSON from an issue producer */
export function parseIssues(raw: unknown): Issue[] {
  const result = issueListSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((i) => `  ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new ContractViolationError(`Invalid issue list:\n${details}`);
  }
  return result.data;
}
