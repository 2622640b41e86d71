import yaml from "js-yaml";
import type { GitHubClient } from "../github/client.js";
import { parseConfig, type HunkmapConfig } from "./schema.js";
import { CONFIG_FILENAME, DEFAULT_CONFIG } from "../config/defaults.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "config-loader" });

/** Parses `.hunkmap.yml` text; throws on invalid YAML or values */
export function parseConfigYaml(text: string): HunkmapConfig {
  return parseConfig(yaml.load(text));
}

/**
 * Loads `.hunkmap.yml` from the repository at `ref`. A missing or invalid
 * file falls back to the defaults.
 */
export async function loadRepoConfig(
  client: GitHubClient,
  owner: string,
  repo: string,
  ref: string
): Promise<HunkmapConfig> {
  let content: string | null;
  try {
    content = await client.getFileContent({ owner, repo, path: CONFIG_FILENAME, ref });
  } catch (err) {
    log.warn({ err, owner, repo }, `Failed to fetch ${CONFIG_FILENAME}, using defaults`);
    return DEFAULT_CONFIG;
  }

  if (content === null) {
    log.debug({ owner, repo }, `No ${CONFIG_FILENAME} found, using defaults`);
    return DEFAULT_CONFIG;
  }

  try {
    return parseConfigYaml(content);
  } catch (err) {
    log.warn({ err, owner, repo }, `Invalid ${CONFIG_FILENAME}, using defaults`);
    return DEFAULT_CONFIG;
  }
}
