import { describe, it, expect } from "vitest";
import { loadRepoConfig, parseConfigYaml } from "../../src/config-loader/loader.js";
import { DEFAULT_CONFIG } from "../../src/config/defaults.js";
import { ConfigError } from "../../src/errors.js";
import { SAMPLE_CONFIG_YAML } from "../fixtures/sample-diff.js";
import { createFakeClient, httpError } from "../fixtures/fake-client.js";

describe("parseConfigYaml", () => {
  it("parses YAML text into a config", () => {
    expect(parseConfigYaml(SAMPLE_CONFIG_YAML).validation.renamePolicy).toBe("strict");
  });

  it("treats an empty file as all defaults", () => {
    expect(parseConfigYaml("")).toEqual(DEFAULT_CONFIG);
  });

  it("throws on invalid values", () => {
    expect(() => parseConfigYaml("comments:\n  includeSeverityHeader: sometimes\n")).toThrow(ConfigError);
  });
});

describe("loadRepoConfig", () => {
  it("reads .hunkmap.yml at the given ref", async () => {
    const client = createFakeClient({ configYaml: SAMPLE_CONFIG_YAML });

    const config = await loadRepoConfig(client, "acme", "widgets", "abc123");

    expect(client.getFileContent).toHaveBeenCalledWith({
      owner: "acme",
      repo: "widgets",
      path: ".hunkmap.yml",
      ref: "abc123",
    });
    expect(config.validation.renamePolicy).toBe("strict");
    expect(config.skipReport.maxRangesShown).toBe(3);
  });

  it("falls back to defaults when the file is missing", async () => {
    const client = createFakeClient({ configYaml: null });

    expect(await loadRepoConfig(client, "acme", "widgets", "abc123")).toEqual(DEFAULT_CONFIG);
  });

  it("falls back to defaults when the file is invalid", async () => {
    const client = createFakeClient({ configYaml: "validation:\n  renamePolicy: lenient\n" });

    expect(await loadRepoConfig(client, "acme", "widgets", "abc123")).toEqual(DEFAULT_CONFIG);
  });

  it("falls back to defaults when the fetch fails", async () => {
    const client = createFakeClient();
    client.getFileContent.mockRejectedValue(httpError(500));

    expect(await loadRepoConfig(client, "acme", "widgets", "abc123")).toEqual(DEFAULT_CONFIG);
  });
});
