import type { Analytics } from "./types.js";

const HIGHLIGHT_COUNT = 3;

export function buildFinalSummary(analytics: Analytics): string[] {
  const { summary, platform_distribution: platforms, top_performing_posts: topPosts, error_summary: errors } = analytics;
  const lines: string[] = [];

  lines.push("=== FINAL RESULTS ===");
  lines.push(`Total posts processed: ${summary.total_processed}`);
  lines.push(`Total posts failed: ${summary.total_failed}`);
  lines.push(`Success rate: ${summary.success_rate}%`);
  lines.push(`Average processing time: ${summary.avg_processing_time_ms}ms`);

  const platformEntries = Object.entries(platforms);
  if (platformEntries.length > 0) {
    lines.push(`Platform distribution: ${platformEntries.map(([platform, count]) => `${platform}=${count}`).join(", ")}`);
  }

  if (errors.total_errors > 0) {
    lines.push(`Errors recorded: ${errors.total_errors}`);
  }

  if (topPosts.length > 0) {
    lines.push("Top performing posts:");
    topPosts.slice(0, HIGHLIGHT_COUNT).forEach((post, index) => {
      lines.push(`${index + 1}. ${post.post_id} (${post.platform}) - Score: ${post.popularity_score.toFixed(1)}`);
    });
  }

  return lines;
}
