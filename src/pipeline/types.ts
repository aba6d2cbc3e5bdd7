export const PLATFORMS = ["twitter", "facebook", "instagram", "linkedin", "tiktok"] as const;
export const SENTIMENTS = ["positive", "neutral", "negative"] as const;
export const CATEGORIES = ["educational", "news", "discussion", "advice", "general"] as const;
export const ENGAGEMENT_FIELDS = ["likes", "shares", "comments", "views"] as const;

export type Platform = (typeof PLATFORMS)[number];
export type Sentiment = (typeof SENTIMENTS)[number];
export type Category = (typeof CATEGORIES)[number];
export type EngagementField = (typeof ENGAGEMENT_FIELDS)[number];

export type Engagement = Record<EngagementField, number>;

export interface PostMetadata {
  timestamp: string;
  language?: string;
  verified_user?: boolean;
  has_media?: boolean;
  hashtags?: string[];
  mentions?: number;
}

/**
 * A generated social media post. Keys are snake_case because posts are
 * serialized as-is into the exported results document.
 */
export interface SocialPost {
  post_id: string;
  user_id: number;
  username: string;
  platform: Platform;
  content: string;
  topic: string;
  engagement: Engagement;
  metadata: PostMetadata;
  sentiment: Sentiment;
  category: Category;
}

export type PostSize = "short" | "medium" | "long";

export interface ContentMetrics {
  char_count: number;
  word_count: number;
  hashtag_count: number;
  mention_count: number;
}

export interface ProcessedPost extends SocialPost {
  processed_at: string;
  engagement_rate: number;
  content_metrics: ContentMetrics;
  popularity_score: number;
  post_size: PostSize;
  post_hour: number;
}

export interface ErrorLogEntry {
  post_id: string;
  errors: string[];
  timestamp: string;
}

export interface TopPost {
  post_id: string;
  platform: Platform;
  popularity_score: number;
  engagement_rate: number;
}

export interface Analytics {
  summary: {
    total_processed: number;
    total_failed: number;
    success_rate: number;
    avg_processing_time_ms: number;
  };
  platform_distribution: Record<string, number>;
  topic_distribution: Record<string, number>;
  sentiment_distribution: Record<string, number>;
  category_distribution: Record<string, number>;
  engagement_analytics: {
    avg_engagement_by_platform: Record<string, number>;
    hourly_post_distribution: Record<string, number>;
  };
  top_performing_posts: TopPost[];
  error_summary: {
    total_errors: number;
    recent_errors: ErrorLogEntry[];
  };
}

export interface ExportDocument {
  processed_data: ProcessedPost[];
  analytics: Analytics;
}

export type PipelineState = "idle" | "running" | "draining" | "stopped";

export type PipelineOutcome = "completed" | "interrupted" | "failed";

export interface ProducerStats {
  generated: number;
  published: number;
  maxRecords: number;
  retries: number;
  running: boolean;
  completionPercentage: number;
}

export interface ConsumerStats {
  processed: number;
  failed: number;
  running: boolean;
  successRate: number;
}

export interface PipelineStatus {
  pipelineId: string;
  state: PipelineState;
  uptimeSeconds: number;
  producer: ProducerStats;
  consumer: ConsumerStats;
  channel: {
    size: number;
    capacity: number;
    pending: number;
  };
}

export interface PipelineResult {
  outcome: PipelineOutcome;
  reason?: string;
  status: PipelineStatus;
  analytics: Analytics;
  exportPath?: string;
  durationMs: number;
}
