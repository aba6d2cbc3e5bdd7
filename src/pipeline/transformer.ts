import { TransformError } from "./errors.js";
import { extractHour } from "./timestamps.js";
import type { ContentMetrics, Engagement, PostSize, ProcessedPost, SocialPost } from "./types.js";
import { roundTo2 } from "./utils.js";
import { characterCount } from "./validator.js";

export const POPULARITY_WEIGHTS: Readonly<Engagement> = {
  likes: 1.0,
  shares: 3.0,
  comments: 2.0,
  views: 0.1,
};

export function engagementRate({ likes, shares, comments, views }: Engagement): number {
  if (views === 0) {
    return 0;
  }
  return roundTo2(((likes + shares + comments) / views) * 100);
}

export function popularityScore(engagement: Engagement): number {
  return (
    engagement.likes * POPULARITY_WEIGHTS.likes +
    engagement.shares * POPULARITY_WEIGHTS.shares +
    engagement.comments * POPULARITY_WEIGHTS.comments +
    engagement.views * POPULARITY_WEIGHTS.views
  );
}

export function classifySize(charCount: number): PostSize {
  if (charCount < 50) return "short";
  if (charCount < 200) return "medium";
  return "long";
}

function countWords(content: string): number {
  return content.split(/\s+/).filter((word) => word.length > 0).length;
}

export function contentMetrics(post: SocialPost): ContentMetrics {
  return {
    char_count: characterCount(post.content),
    word_count: countWords(post.content),
    hashtag_count: post.metadata.hashtags?.length ?? 0,
    mention_count: post.metadata.mentions ?? 0,
  };
}

/**
 * Enriches a validated post with derived analytics fields. Only
 * `processed_at` depends on the clock.
 */
export function transformPost(post: SocialPost, now: Date = new Date()): ProcessedPost {
  const postHour = extractHour(post.metadata.timestamp);
  if (postHour === null) {
    throw new TransformError(`Post ${post.post_id} has an unparseable timestamp: ${post.metadata.timestamp}`);
  }

  const metrics = contentMetrics(post);

  return {
    ...post,
    processed_at: now.toISOString(),
    engagement_rate: engagementRate(post.engagement),
    content_metrics: metrics,
    popularity_score: popularityScore(post.engagement),
    post_size: classifySize(metrics.char_count),
    post_hour: postHour,
  };
}
