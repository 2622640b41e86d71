import type { HunkmapConfig } from "../config-loader/schema.js";

export const CONFIG_FILENAME = ".hunkmap.yml";

export const DEFAULT_CONFIG: HunkmapConfig = {
  validation: {
    renamePolicy: "auto-correct",
  },
  comments: {
    includeSeverityHeader: true,
    // GitHub rejects review comment bodies above this size
    maxBodyLength: 65536,
  },
  skipReport: {
    maxRangesShown: 10,
    includeIssueBody: true,
  },
};
