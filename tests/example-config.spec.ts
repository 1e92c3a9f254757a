import path from "node:path";
import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { loadRagConfig } from "../src/rag/config.js";

const exampleConfig = fileURLToPath(new URL("../config/pipeline.example.json", import.meta.url));

describe("example pipeline config", () => {
  it("loads and resolves paths beside the config folder", async () => {
    const config = await loadRagConfig(exampleConfig, {});
    const root = path.dirname(path.dirname(exampleConfig));

    expect(config.sourceDir).toBe(path.join(root, "data"));
    expect(config.manifestPath).toBe(path.join(root, ".rag-cache", "manifest.json"));
    expect(config.boilerplatePatterns).toEqual(["Page \\d+ of \\d+", "CONFIDENTIAL"]);
  });
});
