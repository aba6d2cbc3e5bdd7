import { loadConfig, type PipelineConfig } from "../src/pipeline/config.js";
import type { ProcessedPost, SocialPost } from "../src/pipeline/types.js";
import { transformPost } from "../src/pipeline/transformer.js";

export const FIXED_NOW = new Date("2024-03-10T12:00:00.000Z");
export const FIXED_UNIX = 1710072000;
export const fixedClock = (): Date => FIXED_NOW;

export function buildSocialPost(overrides: Partial<SocialPost> = {}): SocialPost {
  return {
    post_id: "post_1_1700000000",
    user_id: 4242,
    username: "test_user",
    platform: "twitter",
    content: "Tutorial: How to master testing in 5 simple steps",
    topic: "testing",
    engagement: { likes: 120, shares: 15, comments: 8, views: 5000 },
    metadata: {
      timestamp: "2024-03-10T14:25:00Z",
      language: "en",
      verified_user: false,
      has_media: true,
      hashtags: ["#Testing", "#QA"],
      mentions: 2,
    },
    sentiment: "positive",
    category: "educational",
    ...overrides,
  };
}

/** An untyped record for feeding the validator malformed input. */
export function buildRecord(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return { ...buildSocialPost(), ...overrides };
}

export function buildProcessedPost(overrides: Partial<SocialPost> = {}): ProcessedPost {
  return transformPost(buildSocialPost(overrides), FIXED_NOW);
}

export function testConfig(overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  return {
    ...loadConfig({}),
    maxRecords: 20,
    productionIntervalSec: 0,
    queueCapacity: 5,
    consumerPollTimeoutSec: 0.05,
    putTimeoutSec: 0.05,
    exportEnabled: false,
    startupDelayMs: 0,
    monitorIntervalSec: 0.01,
    statusIntervalSec: 60,
    stopTimeoutSec: 1,
    drainTimeoutSec: 1,
    generatorSeed: 1,
    pipelineId: "pipeline-test",
    ...overrides,
  };
}
