import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { PipelineController } from "../src/pipeline/controller.js";
import { PipelineStateError } from "../src/pipeline/errors.js";
import { PostGenerator } from "../src/pipeline/generator.js";
import type { PostSource } from "../src/pipeline/producer.js";
import type { ExportDocument } from "../src/pipeline/types.js";
import { FIXED_UNIX, fixedClock, testConfig } from "./fixtures.js";

/** Drops the engagement block from every `every`-th post. */
class LossySource implements PostSource {
  private readonly generator = new PostGenerator({ seed: 3, now: fixedClock });
  private count = 0;

  constructor(private readonly every: number) {}

  generate(): unknown {
    this.count += 1;
    const post = this.generator.generate();
    if (this.count % this.every !== 0) {
      return post;
    }
    const { engagement: _engagement, ...rest } = post;
    return rest;
  }
}

async function readExport(path: string): Promise<ExportDocument> {
  const parsed: ExportDocument = JSON.parse(await readFile(path, "utf8"));
  return parsed;
}

describe("PipelineController", () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), "social-stream-pipeline-"));
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it("runs to completion through a small channel and exports every post", async () => {
    const exportPath = join(workDir, "out", "results.json");
    const controller = new PipelineController({
      config: testConfig({ exportEnabled: true, exportPath }),
      now: fixedClock,
    });

    const result = await controller.run();

    expect(result.outcome).toBe("completed");
    expect(result.reason).toBeUndefined();
    expect(result.exportPath).toBe(exportPath);
    expect(result.analytics.summary.total_processed + result.analytics.summary.total_failed).toBe(20);
    expect(result.analytics.summary.total_processed).toBe(20);
    expect(result.status).toMatchObject({
      pipelineId: "pipeline-test",
      state: "stopped",
      producer: { published: 20, generated: 20, running: false },
      consumer: { processed: 20, failed: 0, running: false },
      channel: { size: 0, capacity: 5, pending: 0 },
    });
    expect(controller.currentState).toBe("stopped");

    const exported = await readExport(exportPath);
    expect(exported.processed_data.map((post) => post.post_id)).toEqual(
      Array.from({ length: 20 }, (_, index) => `post_${index + 1}_${FIXED_UNIX}`),
    );
    expect(exported.analytics).toEqual(result.analytics);
  });

  it("excludes malformed posts from the output and logs their errors", async () => {
    const exportPath = join(workDir, "results.json");
    const controller = new PipelineController({
      config: testConfig({ maxRecords: 10, exportEnabled: true, exportPath }),
      source: new LossySource(5),
      now: fixedClock,
    });

    const result = await controller.run();
    const { summary, error_summary: errors } = result.analytics;

    expect(result.outcome).toBe("completed");
    expect(summary).toMatchObject({ total_processed: 8, total_failed: 2, success_rate: 80 });
    expect(errors.total_errors).toBe(2);
    expect(errors.recent_errors.map((entry) => entry.post_id)).toEqual([`post_5_${FIXED_UNIX}`, `post_10_${FIXED_UNIX}`]);
    expect(errors.recent_errors[0].errors).toEqual(["Missing required fields: engagement"]);

    const exported = await readExport(exportPath);
    expect(exported.processed_data).toHaveLength(8);
    expect(exported.processed_data.map((post) => post.post_id)).not.toContain(`post_5_${FIXED_UNIX}`);
  });

  it("fails the run when the producer dies before its quota", async () => {
    const generator = new PostGenerator({ seed: 5, now: fixedClock });
    let calls = 0;
    const source = {
      generate: vi.fn(() => {
        calls += 1;
        if (calls === 3) {
          throw new Error("feed unavailable");
        }
        return generator.generate();
      }),
    };
    const controller = new PipelineController({ config: testConfig({ maxRecords: 10 }), source, now: fixedClock });

    const result = await controller.run();

    expect(result.outcome).toBe("failed");
    expect(result.reason).toBe("Producer exited after 2/10 posts");
    expect(result.analytics.summary.total_processed).toBe(2);
    expect(result.status.state).toBe("stopped");
    expect(result.status.consumer.running).toBe(false);
  });

  it("stops on request, drains what was published and reports the reason", async () => {
    const controller = new PipelineController({
      config: testConfig({ maxRecords: 1000, productionIntervalSec: 0.005 }),
      now: fixedClock,
    });

    await controller.start();
    await vi.waitFor(() => expect(controller.getStatus().producer.published).toBeGreaterThanOrEqual(5));
    const result = await controller.stop("operator request");

    expect(result?.outcome).toBe("interrupted");
    expect(result?.reason).toBe("operator request");
    const published = result?.status.producer.published ?? 0;
    expect(published).toBeLessThan(1000);
    expect((result?.analytics.summary.total_processed ?? 0) + (result?.analytics.summary.total_failed ?? 0)).toBe(published);
    expect(controller.currentState).toBe("stopped");
  });

  it("stops during the startup delay without producing anything", async () => {
    const controller = new PipelineController({
      config: testConfig({ startupDelayMs: 5000 }),
      now: fixedClock,
    });

    const starting = controller.start();
    const result = await controller.stop("early exit");
    await starting;

    expect(result?.outcome).toBe("interrupted");
    expect(result?.status.producer.generated).toBe(0);
    expect(result?.analytics.summary.total_processed).toBe(0);
  });

  it("finishes as soon as the producer completes however long the monitor interval", async () => {
    const controller = new PipelineController({
      config: testConfig({ maxRecords: 5, monitorIntervalSec: 60 }),
      now: fixedClock,
    });

    const result = await controller.run();

    expect(result.outcome).toBe("completed");
    expect(result.analytics.summary.total_processed).toBe(5);
    expect(result.durationMs).toBeLessThan(5000);
  });

  it("reacts to a stop between monitor ticks", async () => {
    const controller = new PipelineController({
      config: testConfig({ maxRecords: 1000, productionIntervalSec: 0.005, monitorIntervalSec: 60 }),
      now: fixedClock,
    });

    await controller.start();
    await vi.waitFor(() => expect(controller.getStatus().producer.published).toBeGreaterThanOrEqual(3));
    const result = await controller.stop("operator request");

    expect(result?.outcome).toBe("interrupted");
    expect(result?.reason).toBe("operator request");
    expect(result?.durationMs).toBeLessThan(5000);
  });

  it("moves straight to stopped when stopped before starting", async () => {
    const controller = new PipelineController({ config: testConfig(), now: fixedClock });

    await expect(controller.stop()).resolves.toBeNull();
    expect(controller.currentState).toBe("stopped");
    await expect(controller.start()).rejects.toBeInstanceOf(PipelineStateError);
  });

  it("refuses to wait for a run that never started", async () => {
    const controller = new PipelineController({ config: testConfig(), now: fixedClock });

    await expect(controller.waitForCompletion()).rejects.toBeInstanceOf(PipelineStateError);
  });

  it("keeps the result when the export fails", async () => {
    const blocker = join(workDir, "blocker");
    await writeFile(blocker, "not a directory");
    const controller = new PipelineController({
      config: testConfig({ maxRecords: 3, exportEnabled: true, exportPath: join(blocker, "results.json") }),
      now: fixedClock,
    });

    const result = await controller.run();

    expect(result.outcome).toBe("completed");
    expect(result.exportPath).toBeUndefined();
    expect(result.analytics.summary.total_processed).toBe(3);
  });
});
