import { describe, expect, it } from "vitest";

import { AnalyticsAggregator } from "../src/pipeline/aggregator.js";
import { BoundedChannel, END_OF_STREAM } from "../src/pipeline/channel.js";
import { PostConsumer } from "../src/pipeline/consumer.js";
import type { ChannelMessage, PostEnvelope } from "../src/pipeline/producer.js";
import { FIXED_NOW, buildRecord, fixedClock } from "./fixtures.js";

function envelope(sequence: number, payload: unknown): PostEnvelope {
  return { sequence, payload, enqueuedAt: 0 };
}

function createConsumer() {
  const channel = new BoundedChannel<ChannelMessage>(10);
  const aggregator = new AnalyticsAggregator();
  const consumer = new PostConsumer({ channel, aggregator, pollTimeoutSec: 0.02, now: fixedClock });
  return { channel, aggregator, consumer };
}

describe("PostConsumer", () => {
  it("processes a valid post into the aggregator", () => {
    const { aggregator, consumer } = createConsumer();

    const processed = consumer.process(envelope(1, buildRecord({ post_id: "post_ok" })));

    expect(processed).toMatchObject({ post_id: "post_ok", processed_at: FIXED_NOW.toISOString() });
    expect(aggregator.processedCount).toBe(1);
    expect(aggregator.failedCount).toBe(0);
  });

  it("records a validation failure and excludes the post", () => {
    const { aggregator, consumer } = createConsumer();

    const processed = consumer.process(envelope(1, buildRecord({ post_id: "post_bad", platform: "myspace" })));

    expect(processed).toBeNull();
    expect(aggregator.processedPosts()).toEqual([]);
    expect(aggregator.snapshot().error_summary.recent_errors).toEqual([
      { post_id: "post_bad", errors: ["Invalid platform: myspace"], timestamp: FIXED_NOW.toISOString() },
    ]);
  });

  it("drains the channel in order and exits on end of stream", async () => {
    const { channel, aggregator, consumer } = createConsumer();
    await channel.put(envelope(1, buildRecord({ post_id: "post_a" })), 0);
    await channel.put(envelope(2, { post_id: "post_b" }), 0);
    await channel.put(envelope(3, buildRecord({ post_id: "post_c" })), 0);
    await channel.put(END_OF_STREAM, 0);

    await consumer.run();

    expect(aggregator.processedPosts().map((post) => post.post_id)).toEqual(["post_a", "post_c"]);
    expect(consumer.getStats()).toEqual({ processed: 2, failed: 1, running: false, successRate: 66.67 });
    expect(channel.pending).toBe(0);
    await expect(channel.join(0.01)).resolves.toBeUndefined();
  });

  it("keeps polling an empty channel until stopped", async () => {
    const { channel, consumer } = createConsumer();

    const running = consumer.run();
    await new Promise((resolve) => setTimeout(resolve, 50));
    expect(consumer.isRunning).toBe(true);

    consumer.stop();
    channel.close();
    await running;
    expect(consumer.isRunning).toBe(false);
  });
});
