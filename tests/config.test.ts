import { describe, expect, it } from "vitest";

import { loadConfig } from "../src/pipeline/config.js";

describe("loadConfig", () => {
  it("uses the documented defaults for an empty environment", () => {
    const config = loadConfig({});

    expect(config).toMatchObject({
      maxRecords: 100,
      productionIntervalSec: 0.5,
      queueCapacity: 50,
      consumerPollTimeoutSec: 1,
      putTimeoutSec: 5,
      exportEnabled: true,
      exportPath: "pipeline_results.json",
      startupDelayMs: 100,
      monitorIntervalSec: 1,
      statusIntervalSec: 10,
      stopTimeoutSec: 5,
      drainTimeoutSec: 30,
      errorLogLimit: 1000,
      statusServerEnabled: false,
      statusServerPort: 9100,
      logLevel: "info",
      nodeEnv: "development",
      warnings: [],
    });
    expect(config.generatorSeed).toBeUndefined();
    expect(config.pipelineId).toMatch(/^pipeline-[0-9a-f]{8}$/);
  });

  it("reads and coerces provided values", () => {
    const config = loadConfig({
      MAX_RECORDS: "20",
      PRODUCTION_INTERVAL_SEC: "0",
      QUEUE_CAPACITY: " 5 ",
      EXPORT_ENABLED: "false",
      GENERATOR_SEED: "42",
      STATUS_SERVER_ENABLED: "yes",
      PIPELINE_ID: "pipeline-local",
      LOG_LEVEL: "debug",
    });

    expect(config).toMatchObject({
      maxRecords: 20,
      productionIntervalSec: 0,
      queueCapacity: 5,
      exportEnabled: false,
      generatorSeed: 42,
      statusServerEnabled: true,
      pipelineId: "pipeline-local",
      logLevel: "debug",
      warnings: [],
    });
  });

  it("falls back to defaults for invalid values and reports each one", () => {
    const config = loadConfig({
      MAX_RECORDS: "abc",
      QUEUE_CAPACITY: "0",
      EXPORT_ENABLED: "nope",
      ERROR_LOG_LIMIT: "3",
    });

    expect(config.maxRecords).toBe(100);
    expect(config.queueCapacity).toBe(50);
    expect(config.exportEnabled).toBe(true);
    expect(config.errorLogLimit).toBe(1000);
    expect(config.warnings).toHaveLength(4);
    expect(config.warnings[0]).toMatch(/^MAX_RECORDS is invalid \(abc\)/);
    expect(config.warnings[1]).toMatch(/^QUEUE_CAPACITY is invalid \(0\)/);
    expect(config.warnings[2]).toMatch(/^EXPORT_ENABLED is invalid \(nope\)/);
    expect(config.warnings[3]).toMatch(/^ERROR_LOG_LIMIT is invalid \(3\)/);
  });

  it("treats blank values as unset", () => {
    const config = loadConfig({ MAX_RECORDS: "   ", EXPORT_PATH: "" });

    expect(config.maxRecords).toBe(100);
    expect(config.exportPath).toBe("pipeline_results.json");
    expect(config.warnings).toEqual([]);
  });
});
