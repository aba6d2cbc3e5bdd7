import { performance } from "node:perf_hooks";
import type { Logger } from "pino";

import type { BoundedChannel, EndOfStream } from "./channel.js";
import { ChannelClosedError, ChannelFullError } from "./errors.js";
import { logStageError } from "./error_utils.js";
import { logger as rootLogger } from "./logger.js";
import { channelDepth, channelFullRetriesTotal, postsGeneratedTotal, postsPublishedTotal } from "./metrics.js";
import type { ProducerStats } from "./types.js";
import { percentage, sleep } from "./utils.js";

/** Anything that can hand out raw posts. The consumer validates whatever comes out. */
export interface PostSource {
  generate(): unknown;
}

export interface PostEnvelope {
  /** 1-based generation order. */
  sequence: number;
  payload: unknown;
  enqueuedAt: number;
}

export type ChannelMessage = PostEnvelope | EndOfStream;

export interface ProducerOptions {
  channel: BoundedChannel<ChannelMessage>;
  source: PostSource;
  maxRecords: number;
  intervalSec: number;
  putTimeoutSec: number;
  logger?: Logger;
}

export class PostProducer {
  private readonly channel: BoundedChannel<ChannelMessage>;
  private readonly source: PostSource;
  private readonly maxRecords: number;
  private readonly intervalSec: number;
  private readonly putTimeoutSec: number;
  private readonly log: Logger;
  private readonly pacing = new AbortController();
  private running = false;
  private stopped = false;
  private generated = 0;
  private published = 0;
  private retries = 0;

  constructor(options: ProducerOptions) {
    this.channel = options.channel;
    this.source = options.source;
    this.maxRecords = options.maxRecords;
    this.intervalSec = options.intervalSec;
    this.putTimeoutSec = options.putTimeoutSec;
    this.log = (options.logger ?? rootLogger).child({ component: "producer" });
  }

  get publishedCount(): number {
    return this.published;
  }

  get quotaReached(): boolean {
    return this.published >= this.maxRecords;
  }

  async run(): Promise<void> {
    if (this.stopped) {
      return;
    }
    this.running = true;
    this.log.info({ intervalSec: this.intervalSec, maxRecords: this.maxRecords }, "Starting post production");

    try {
      while (this.running && !this.quotaReached) {
        const payload = this.source.generate();
        this.generated += 1;
        postsGeneratedTotal.inc();

        const envelope: PostEnvelope = { sequence: this.generated, payload, enqueuedAt: performance.now() };
        const accepted = await this.publish(envelope);
        if (!accepted) {
          break;
        }

        this.published += 1;
        postsPublishedTotal.inc();
        channelDepth.set(this.channel.size);
        this.log.debug({ sequence: envelope.sequence, published: this.published }, "Published post");
        if (this.published % 10 === 0) {
          this.log.info({ published: this.published }, `Generated ${this.published} posts`);
        }

        await sleep(this.intervalSec, this.pacing.signal);
      }
    } catch (error) {
      logStageError(this.log, error, { stage: "producer", step: "produce", sequence: this.generated }, "Error in post production");
      throw error;
    } finally {
      this.running = false;
      this.log.info({ published: this.published, generated: this.generated }, "Production completed");
    }
  }

  /**
   * Puts the envelope, retrying the same post after a back-off whenever the
   * channel stays full. Returns false when production was stopped first.
   */
  private async publish(envelope: PostEnvelope): Promise<boolean> {
    while (this.running) {
      try {
        await this.channel.put(envelope, this.putTimeoutSec);
        return true;
      } catch (error) {
        if (error instanceof ChannelClosedError) {
          return false;
        }
        if (!(error instanceof ChannelFullError)) {
          throw error;
        }
        this.retries += 1;
        channelFullRetriesTotal.inc();
        this.log.warn({ sequence: envelope.sequence, retries: this.retries }, "Channel is full, waiting before retry");
        await sleep(this.intervalSec * 2, this.pacing.signal);
      }
    }
    return false;
  }

  stop(): void {
    this.stopped = true;
    this.running = false;
    this.pacing.abort();
  }

  getStats(): ProducerStats {
    return {
      generated: this.generated,
      published: this.published,
      maxRecords: this.maxRecords,
      retries: this.retries,
      running: this.running,
      completionPercentage: percentage(this.published, this.maxRecords),
    };
  }
}
