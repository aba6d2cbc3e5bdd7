import { performance } from "node:perf_hooks";
import type { Logger } from "pino";

import type { AnalyticsAggregator } from "./aggregator.js";
import { END_OF_STREAM, type BoundedChannel } from "./channel.js";
import { ChannelClosedError, ChannelEmptyError } from "./errors.js";
import { errorMessage, logStageError } from "./error_utils.js";
import { logger as rootLogger } from "./logger.js";
import { channelDepth, postsFailedTotal, postsProcessedTotal, processingTimeSeconds } from "./metrics.js";
import type { ChannelMessage, PostEnvelope } from "./producer.js";
import { transformPost } from "./transformer.js";
import type { ConsumerStats, ProcessedPost } from "./types.js";
import { validatePost } from "./validator.js";

export interface ConsumerOptions {
  channel: BoundedChannel<ChannelMessage>;
  aggregator: AnalyticsAggregator;
  pollTimeoutSec: number;
  now?: () => Date;
  logger?: Logger;
}

export class PostConsumer {
  private readonly channel: BoundedChannel<ChannelMessage>;
  private readonly aggregator: AnalyticsAggregator;
  private readonly pollTimeoutSec: number;
  private readonly now: () => Date;
  private readonly log: Logger;
  private running = false;
  private stopped = false;

  constructor(options: ConsumerOptions) {
    this.channel = options.channel;
    this.aggregator = options.aggregator;
    this.pollTimeoutSec = options.pollTimeoutSec;
    this.now = options.now ?? (() => new Date());
    this.log = (options.logger ?? rootLogger).child({ component: "consumer" });
  }

  get isRunning(): boolean {
    return this.running;
  }

  async run(): Promise<void> {
    if (this.stopped) {
      return;
    }
    this.running = true;
    this.log.info({ pollTimeoutSec: this.pollTimeoutSec }, "Starting post consumption");

    try {
      while (this.running) {
        let message: ChannelMessage;
        try {
          message = await this.channel.get(this.pollTimeoutSec);
        } catch (error) {
          if (error instanceof ChannelEmptyError) {
            continue;
          }
          if (error instanceof ChannelClosedError) {
            break;
          }
          throw error;
        }

        if (message === END_OF_STREAM) {
          this.channel.markDone();
          this.log.debug("Received end of stream");
          break;
        }

        const processed = this.process(message);
        this.channel.markDone();
        channelDepth.set(this.channel.size);

        if (processed && this.aggregator.processedCount % 10 === 0) {
          this.log.info({ processed: this.aggregator.processedCount }, `Processed ${this.aggregator.processedCount} posts`);
        }
      }
    } finally {
      this.running = false;
      this.log.info(
        { processed: this.aggregator.processedCount, failed: this.aggregator.failedCount },
        "Consumption completed",
      );
    }
  }

  /**
   * Validates, transforms and aggregates one post. Failures of any kind are
   * recorded against the post and never escape.
   */
  process(envelope: PostEnvelope): ProcessedPost | null {
    const start = performance.now();
    const { payload } = envelope;

    try {
      const validation = validatePost(payload);
      if (!validation.valid) {
        const entry = this.aggregator.recordFailure(payload, validation.errors, this.now());
        postsFailedTotal.inc({ reason: "validation" });
        this.log.warn({ postId: entry.post_id, errors: validation.errors }, "Post validation failed");
        return null;
      }

      const processed = transformPost(validation.post, this.now());
      const latencyMs = performance.now() - start;
      this.aggregator.update(processed, latencyMs);
      postsProcessedTotal.inc({ platform: processed.platform });
      processingTimeSeconds.observe(latencyMs / 1000);
      this.log.debug({ postId: processed.post_id, sequence: envelope.sequence }, "Processed post");
      return processed;
    } catch (error) {
      const entry = this.aggregator.recordFailure(payload, [errorMessage(error)], this.now());
      postsFailedTotal.inc({ reason: "processing" });
      logStageError(
        this.log,
        error,
        { stage: "consumer", step: "process", postId: entry.post_id, sequence: envelope.sequence },
        "Error processing post",
      );
      return null;
    }
  }

  stop(): void {
    this.stopped = true;
    this.running = false;
  }

  getStats(): ConsumerStats {
    return {
      processed: this.aggregator.processedCount,
      failed: this.aggregator.failedCount,
      running: this.running,
      successRate: this.aggregator.successRate,
    };
  }
}
