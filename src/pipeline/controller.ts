import type { Logger } from "pino";

import { AnalyticsAggregator } from "./aggregator.js";
import { BoundedChannel, END_OF_STREAM } from "./channel.js";
import { config as defaultConfig, type PipelineConfig } from "./config.js";
import { PostConsumer } from "./consumer.js";
import {
  ChannelClosedError,
  ChannelFullError,
  DrainTimeoutError,
  LivenessFailureError,
  PipelineStateError,
  ShutdownTimeoutError,
  type PipelineWorker,
} from "./errors.js";
import { logStageError } from "./error_utils.js";
import { exportResults } from "./exporter.js";
import { PostGenerator } from "./generator.js";
import { logger as rootLogger } from "./logger.js";
import { channelDepth, memoryUsageBytes, pipelineRunning } from "./metrics.js";
import { PostProducer, type ChannelMessage, type PostSource } from "./producer.js";
import { buildFinalSummary } from "./summary_generator.js";
import type { Analytics, PipelineOutcome, PipelineResult, PipelineState, PipelineStatus } from "./types.js";
import { settlesWithin, sleep } from "./utils.js";

export interface PipelineControllerOptions {
  config?: PipelineConfig;
  /** Defaults to a `PostGenerator` seeded from the configuration. */
  source?: PostSource;
  now?: () => Date;
  logger?: Logger;
}

interface WorkerExit {
  error?: unknown;
}

interface MonitorVerdict {
  outcome: PipelineOutcome;
  reason?: string;
}

const NOT_STARTED: WorkerExit = {};

/**
 * Owns the channel, both worker loops and the analytics for one run.
 *
 * State moves strictly forward: idle -> running -> draining -> stopped.
 * A run ends when the producer reaches its quota, when `stop()` is called,
 * or when a loop exits before it should. Each path drains the channel
 * (bounded unless the run completed), halts both loops, then logs and
 * exports the final analytics.
 */
export class PipelineController {
  private readonly config: PipelineConfig;
  private readonly log: Logger;
  private readonly channel: BoundedChannel<ChannelMessage>;
  private readonly aggregator: AnalyticsAggregator;
  private readonly producer: PostProducer;
  private readonly consumer: PostConsumer;
  private state: PipelineState = "idle";
  private startedAt: number | null = null;
  private stopReason: string | null = null;
  private wakeSupervisor: (() => void) | null = null;
  private producerDone: Promise<WorkerExit> = Promise.resolve(NOT_STARTED);
  private consumerDone: Promise<WorkerExit> = Promise.resolve(NOT_STARTED);
  private producerExit: WorkerExit | null = null;
  private consumerExit: WorkerExit | null = null;
  private launched: Promise<void> | null = null;
  private completion: Promise<PipelineResult> | null = null;

  constructor(options: PipelineControllerOptions = {}) {
    this.config = options.config ?? defaultConfig;
    this.log = (options.logger ?? rootLogger).child({ component: "controller" });
    this.channel = new BoundedChannel<ChannelMessage>(this.config.queueCapacity);
    this.aggregator = new AnalyticsAggregator({ errorLogLimit: this.config.errorLogLimit });

    const source = options.source ?? new PostGenerator({ seed: this.config.generatorSeed, now: options.now });
    this.producer = new PostProducer({
      channel: this.channel,
      source,
      maxRecords: this.config.maxRecords,
      intervalSec: this.config.productionIntervalSec,
      putTimeoutSec: this.config.putTimeoutSec,
      logger: options.logger,
    });
    this.consumer = new PostConsumer({
      channel: this.channel,
      aggregator: this.aggregator,
      pollTimeoutSec: this.config.consumerPollTimeoutSec,
      now: options.now,
      logger: options.logger,
    });
  }

  get currentState(): PipelineState {
    return this.state;
  }

  /**
   * Starts the consumer, waits the startup delay, then starts the producer.
   * Resolves once both loops are launched; `waitForCompletion` resolves when
   * the run is over.
   */
  async start(): Promise<void> {
    if (this.state !== "idle") {
      throw new PipelineStateError(`Cannot start pipeline in state ${this.state}`);
    }
    this.setState("running");
    this.startedAt = Date.now();
    this.launched = this.launch();
    await this.launched;
  }

  private async launch(): Promise<void> {
    this.log.info(
      {
        maxRecords: this.config.maxRecords,
        intervalSec: this.config.productionIntervalSec,
        capacity: this.config.queueCapacity,
        exportPath: this.config.exportEnabled ? this.config.exportPath : null,
      },
      "Starting social stream pipeline",
    );

    this.consumerDone = this.watch("consumer", this.consumer.run());
    this.log.info("Consumer started");

    await this.pause(this.config.startupDelayMs / 1000);
    if (this.stopReason !== null) {
      this.producerExit = NOT_STARTED;
    } else {
      this.producerDone = this.watch("producer", this.producer.run());
      this.log.info("Producer started");
    }

    this.completion = this.supervise();
  }

  async waitForCompletion(): Promise<PipelineResult> {
    if (!this.completion) {
      throw new PipelineStateError("Pipeline has not been started");
    }
    return this.completion;
  }

  async run(): Promise<PipelineResult> {
    await this.start();
    return this.waitForCompletion();
  }

  /**
   * Requests shutdown. From idle this moves straight to stopped and resolves
   * null; otherwise it resolves with the result of the run once finalized.
   */
  async stop(reason = "stop requested"): Promise<PipelineResult | null> {
    if (this.state === "idle") {
      this.setState("stopped");
      this.log.info({ reason }, "Pipeline stopped before start");
      return null;
    }

    if (this.stopReason === null && this.state === "running") {
      this.stopReason = reason;
      this.log.info({ reason }, "Stop requested");
      this.producer.stop();
      this.wakeSupervisor?.();
    }

    if (this.launched) {
      await this.launched;
    }
    return this.completion;
  }

  getStatus(): PipelineStatus {
    const uptimeMs = this.startedAt === null ? 0 : Date.now() - this.startedAt;
    return {
      pipelineId: this.config.pipelineId,
      state: this.state,
      uptimeSeconds: Math.round(uptimeMs / 1000),
      producer: this.producer.getStats(),
      consumer: this.consumer.getStats(),
      channel: {
        size: this.channel.size,
        capacity: this.channel.capacity,
        pending: this.channel.pending,
      },
    };
  }

  getAnalytics(): Analytics {
    return this.aggregator.snapshot();
  }

  private async supervise(): Promise<PipelineResult> {
    const verdict = await this.monitor();
    this.setState("draining");
    this.producer.stop();
    await this.drain(verdict.outcome === "completed" ? undefined : this.config.drainTimeoutSec);
    await this.halt();
    return this.finalize(verdict);
  }

  private watch(worker: PipelineWorker, task: Promise<void>): Promise<WorkerExit> {
    return task.then(
      () => {
        const exit: WorkerExit = {};
        this.recordExit(worker, exit);
        return exit;
      },
      (error: unknown) => {
        const exit: WorkerExit = { error };
        this.recordExit(worker, exit);
        return exit;
      },
    );
  }

  private recordExit(worker: PipelineWorker, exit: WorkerExit): void {
    if (worker === "producer") {
      this.producerExit = exit;
    } else {
      this.consumerExit = exit;
    }
    this.wakeSupervisor?.();
  }

  /**
   * Sleeps up to `seconds`, ending early when a stop is requested or a loop
   * exits. Only one pause is pending at a time.
   */
  private async pause(seconds: number): Promise<void> {
    const tick = new AbortController();
    this.wakeSupervisor = () => tick.abort();
    try {
      await sleep(seconds, tick.signal);
    } finally {
      this.wakeSupervisor = null;
    }
  }

  private async monitor(): Promise<MonitorVerdict> {
    let lastStatusAt = Date.now();

    while (this.stopReason === null) {
      if (this.producerExit) {
        if (this.producer.quotaReached) {
          this.log.info({ published: this.producer.publishedCount }, "Producer completed successfully");
          return { outcome: "completed" };
        }
        return this.livenessFailure(
          "producer",
          `Producer exited after ${this.producer.publishedCount}/${this.config.maxRecords} posts`,
          this.producerExit,
        );
      }

      if (this.consumerExit) {
        return this.livenessFailure("consumer", "Consumer exited while the pipeline was running", this.consumerExit);
      }

      if (Date.now() - lastStatusAt >= this.config.statusIntervalSec * 1000) {
        this.logStatus();
        lastStatusAt = Date.now();
      }

      await this.pause(this.config.monitorIntervalSec);
    }

    return { outcome: "interrupted", reason: this.stopReason };
  }

  private livenessFailure(worker: PipelineWorker, message: string, exit: WorkerExit): MonitorVerdict {
    const failure = new LivenessFailureError(worker, message, { cause: exit.error });
    logStageError(this.log, failure, { stage: worker, step: "monitor" }, "Worker loop exited unexpectedly");
    return { outcome: "failed", reason: failure.message };
  }

  /**
   * Waits for the consumer to finish everything already in the channel. An
   * unbounded wait still ends if the consumer loop itself exits.
   */
  private async drain(timeoutSec?: number): Promise<void> {
    if (this.consumerExit) {
      this.log.warn({ pending: this.channel.pending }, "Consumer is not running; skipping drain");
      return;
    }

    this.log.info({ pending: this.channel.pending, timeoutSec: timeoutSec ?? null }, "Draining channel");
    const joined = this.channel.join(timeoutSec).then(
      () => "drained" as const,
      (error: unknown) => {
        if (error instanceof DrainTimeoutError) {
          return "timeout" as const;
        }
        throw error;
      },
    );
    const consumerGone = this.consumerDone.then(() => "consumer-exited" as const);

    const result = await Promise.race([joined, consumerGone]);
    switch (result) {
      case "drained":
        this.log.info("Channel drained");
        break;
      case "timeout":
        this.log.warn({ pending: this.channel.pending, timeoutSec }, "Channel did not drain in time; abandoning remaining posts");
        break;
      case "consumer-exited":
        this.log.error({ pending: this.channel.pending }, "Consumer exited before the channel drained");
        break;
    }
  }

  /**
   * Stops the producer, queues the end-of-stream sentinel for the consumer,
   * closes the channel, then clears the consumer flag and gives each loop a
   * bounded time to exit. The sentinel goes in before the consumer flag is
   * cleared so a consumer between polls still picks it up.
   */
  private async halt(): Promise<void> {
    this.producer.stop();

    try {
      await this.channel.put(END_OF_STREAM, 0);
    } catch (error) {
      if (error instanceof ChannelFullError || error instanceof ChannelClosedError) {
        this.log.debug({ reason: error.message }, "End-of-stream sentinel not delivered");
      } else {
        throw error;
      }
    }
    this.channel.close();
    this.consumer.stop();

    await Promise.all([this.awaitExit("producer", this.producerDone), this.awaitExit("consumer", this.consumerDone)]);

    if (this.channel.size > 0) {
      this.log.warn({ abandoned: this.channel.size }, "Posts left in channel at shutdown");
    }
  }

  private async awaitExit(worker: PipelineWorker, done: Promise<WorkerExit>): Promise<void> {
    const exited = await settlesWithin(done, this.config.stopTimeoutSec);
    if (!exited) {
      const timeout = new ShutdownTimeoutError(worker, this.config.stopTimeoutSec);
      this.log.warn({ worker, timeoutSec: timeout.timeoutSec }, timeout.message);
    }
  }

  private async finalize(verdict: MonitorVerdict): Promise<PipelineResult> {
    const analytics = this.aggregator.snapshot();
    buildFinalSummary(analytics).forEach((line) => this.log.info(line));

    let exportPath: string | undefined;
    if (this.config.exportEnabled) {
      try {
        const exported = await exportResults(this.config.exportPath, {
          processed_data: this.aggregator.processedPosts(),
          analytics,
        });
        exportPath = exported.path;
        this.log.info({ path: exported.path, bytes: exported.bytes }, "Results exported");
      } catch (error) {
        logStageError(this.log, error, { stage: "controller", step: "export" }, "Failed to export results");
      }
    }

    this.setState("stopped");
    const durationMs = this.startedAt === null ? 0 : Date.now() - this.startedAt;
    this.log.info({ outcome: verdict.outcome, reason: verdict.reason, durationMs }, "Pipeline stopped");

    return {
      outcome: verdict.outcome,
      reason: verdict.reason,
      status: this.getStatus(),
      analytics,
      exportPath,
      durationMs,
    };
  }

  private logStatus(): void {
    const status = this.getStatus();
    memoryUsageBytes.set(process.memoryUsage().rss);
    channelDepth.set(status.channel.size);
    this.log.info(
      {
        published: status.producer.published,
        processed: status.consumer.processed,
        failed: status.consumer.failed,
        channelSize: status.channel.size,
        completion: status.producer.completionPercentage,
      },
      "Pipeline status",
    );
  }

  private setState(next: PipelineState): void {
    this.state = next;
    pipelineRunning.set(next === "running" || next === "draining" ? 1 : 0);
    this.log.debug({ state: next }, "Pipeline state changed");
  }
}
