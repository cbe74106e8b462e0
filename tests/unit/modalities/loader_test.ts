/**
 * Unit tests for the modality file loader
 */

import assert from "node:assert/strict";
import { test } from "node:test";
import { fileURLToPath } from "node:url";
import { ConfigurationError } from "../../../src/errors/error-types.ts";
import { loadModalityRegistry, parseModalityFile } from "../../../src/modalities/loader.ts";
import { setupLogger } from "../../../src/telemetry/logger.ts";

setupLogger({ level: "silent" });

const FIXTURE = fileURLToPath(new URL("../../fixtures/modalities/custom.yaml", import.meta.url));

test("loadModalityRegistry - no path gives the built-in modalities", async () => {
  const registry = await loadModalityRegistry();
  assert.deepEqual(registry.names(), ["qa", "style", "semantic", "similar_code"]);
});

test("loadModalityRegistry - reads a YAML file", async () => {
  const registry = await loadModalityRegistry(FIXTURE);

  assert.deepEqual(registry.names(), ["semantic", "dot_notes"]);
  const notes = registry.resolve("dot_notes");
  assert.deepEqual(notes.strategy, { model: "test-model", prefix: "note: ", suffix: " [end]" });
  assert.equal(notes.task.name, "notes");
  assert.equal(notes.metric, "inner_product");
  assert.equal(registry.resolve("semantic").metric, "cosine");
});

test("loadModalityRegistry - missing file is a ConfigurationError", async () => {
  await assert.rejects(loadModalityRegistry("/nonexistent/modalities.yaml"), (error: unknown) => {
    assert.ok(error instanceof ConfigurationError);
    assert.equal(error.configKey, "RM_MODALITIES_FILE");
    assert.ok(error.message.startsWith("Cannot read modalities file /nonexistent/modalities.yaml"));
    return true;
  });
});

test("parseModalityFile - accepts JSON", () => {
  const registry = parseModalityFile(
    JSON.stringify({ modalities: [{ name: "qa", model: "m", description: "Q&A", metric: "l2" }] }),
  );
  assert.equal(registry.resolve("qa").metric, "l2");
});

test("parseModalityFile - rejects an unsupported metric", () => {
  assert.throws(
    () =>
      parseModalityFile(
        "modalities:\n  - name: qa\n    model: m\n    description: x\n    metric: hamming\n",
        "test.yaml",
      ),
    (error: unknown) => {
      assert.ok(error instanceof ConfigurationError);
      assert.ok(error.message.startsWith("Invalid test.yaml at modalities.0.metric: "));
      return true;
    },
  );
});

test("parseModalityFile - rejects an empty list and malformed YAML", () => {
  assert.throws(() => parseModalityFile("modalities: []\n"), ConfigurationError);
  assert.throws(() => parseModalityFile("modalities: [\n"), ConfigurationError);
});
