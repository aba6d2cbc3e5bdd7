import { Counter, Gauge, Histogram, Registry } from "prom-client";

export const registry = new Registry();
registry.setDefaultLabels({ service: "social-stream-pipeline" });

export const postsGeneratedTotal = new Counter({
  name: "pipeline_posts_generated_total",
  help: "Total number of posts generated by the producer",
  registers: [registry],
});

export const postsPublishedTotal = new Counter({
  name: "pipeline_posts_published_total",
  help: "Total number of posts accepted by the channel",
  registers: [registry],
});

export const channelFullRetriesTotal = new Counter({
  name: "pipeline_channel_full_retries_total",
  help: "Puts that timed out on a full channel and were retried",
  registers: [registry],
});

export const postsProcessedTotal = new Counter({
  name: "pipeline_posts_processed_total",
  help: "Total number of posts validated, transformed and aggregated",
  labelNames: ["platform"],
  registers: [registry],
});

export const postsFailedTotal = new Counter({
  name: "pipeline_posts_failed_total",
  help: "Total number of posts rejected by validation or processing",
  labelNames: ["reason"],
  registers: [registry],
});

export const processingTimeSeconds = new Histogram({
  name: "pipeline_processing_time_seconds",
  help: "Validation, transform and aggregation time per post",
  buckets: [0.00005, 0.0001, 0.0005, 0.001, 0.005, 0.01, 0.05, 0.1],
  registers: [registry],
});

export const channelDepth = new Gauge({
  name: "pipeline_channel_depth",
  help: "Posts waiting in the channel",
  registers: [registry],
});

export const pipelineRunning = new Gauge({
  name: "pipeline_running",
  help: "1 while the pipeline is running or draining, 0 otherwise",
  registers: [registry],
});

export const memoryUsageBytes = new Gauge({
  name: "pipeline_memory_usage_bytes",
  help: "Resident set size (RSS) memory usage of the pipeline process",
  registers: [registry],
});
