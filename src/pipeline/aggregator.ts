import type { Analytics, ErrorLogEntry, ProcessedPost, TopPost } from "./types.js";
import { average, percentage, roundTo2 } from "./utils.js";

export const RECENT_ERROR_COUNT = 5;
export const TOP_POST_COUNT = 5;

export interface AggregatorOptions {
  /** Oldest entries are dropped past this size. Never below RECENT_ERROR_COUNT. */
  errorLogLimit?: number;
}

function increment(counts: Map<string, number>, key: string): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

function toRecord(counts: Map<string, number>): Record<string, number> {
  return Object.fromEntries(counts);
}

function postIdOf(input: unknown): string {
  if (typeof input === "object" && input !== null && "post_id" in input) {
    const { post_id: postId } = input;
    if (typeof postId === "string" && postId.length > 0) {
      return postId;
    }
  }
  return "unknown";
}

/**
 * Running analytics for one pipeline run. Owned by the consumer loop, which
 * is the only caller of `update` and `recordFailure`; everything else reads
 * through `snapshot`.
 */
export class AnalyticsAggregator {
  private readonly errorLogLimit: number;
  private processed = 0;
  private failed = 0;
  private totalErrors = 0;
  private readonly platformCounts = new Map<string, number>();
  private readonly topicCounts = new Map<string, number>();
  private readonly sentimentCounts = new Map<string, number>();
  private readonly categoryCounts = new Map<string, number>();
  private readonly hourlyCounts = new Map<string, number>();
  private readonly engagementRates = new Map<string, number[]>();
  private readonly latenciesMs: number[] = [];
  private readonly posts: ProcessedPost[] = [];
  private errorLog: ErrorLogEntry[] = [];

  constructor(options: AggregatorOptions = {}) {
    this.errorLogLimit = Math.max(RECENT_ERROR_COUNT, options.errorLogLimit ?? 1000);
  }

  get processedCount(): number {
    return this.processed;
  }

  get failedCount(): number {
    return this.failed;
  }

  get successRate(): number {
    return percentage(this.processed, this.processed + this.failed);
  }

  update(post: ProcessedPost, latencyMs: number): void {
    increment(this.platformCounts, post.platform);
    increment(this.topicCounts, post.topic);
    increment(this.sentimentCounts, post.sentiment);
    increment(this.categoryCounts, post.category);
    increment(this.hourlyCounts, String(post.post_hour));

    const rates = this.engagementRates.get(post.platform) ?? [];
    rates.push(post.engagement_rate);
    this.engagementRates.set(post.platform, rates);

    this.latenciesMs.push(latencyMs);
    this.posts.push(post);
    this.processed += 1;
  }

  recordFailure(input: unknown, errors: string[], at: Date = new Date()): ErrorLogEntry {
    const entry: ErrorLogEntry = {
      post_id: postIdOf(input),
      errors: [...errors],
      timestamp: at.toISOString(),
    };

    this.failed += 1;
    this.totalErrors += 1;
    this.errorLog.push(entry);
    if (this.errorLog.length > this.errorLogLimit) {
      this.errorLog = this.errorLog.slice(-this.errorLogLimit);
    }
    return entry;
  }

  processedPosts(): ProcessedPost[] {
    return [...this.posts];
  }

  snapshot(): Analytics {
    const avgEngagementByPlatform: Record<string, number> = {};
    for (const [platform, rates] of this.engagementRates) {
      if (rates.length > 0) {
        avgEngagementByPlatform[platform] = roundTo2(average(rates));
      }
    }

    const topPosts: TopPost[] = [...this.posts]
      .sort((a, b) => b.popularity_score - a.popularity_score)
      .slice(0, TOP_POST_COUNT)
      .map((post) => ({
        post_id: post.post_id,
        platform: post.platform,
        popularity_score: post.popularity_score,
        engagement_rate: post.engagement_rate,
      }));

    return {
      summary: {
        total_processed: this.processed,
        total_failed: this.failed,
        success_rate: this.successRate,
        avg_processing_time_ms: roundTo2(average(this.latenciesMs)),
      },
      platform_distribution: toRecord(this.platformCounts),
      topic_distribution: toRecord(this.topicCounts),
      sentiment_distribution: toRecord(this.sentimentCounts),
      category_distribution: toRecord(this.categoryCounts),
      engagement_analytics: {
        avg_engagement_by_platform: avgEngagementByPlatform,
        hourly_post_distribution: toRecord(this.hourlyCounts),
      },
      top_performing_posts: topPosts,
      error_summary: {
        total_errors: this.totalErrors,
        recent_errors: this.errorLog.slice(-RECENT_ERROR_COUNT).map((entry) => ({ ...entry, errors: [...entry.errors] })),
      },
    };
  }
}
