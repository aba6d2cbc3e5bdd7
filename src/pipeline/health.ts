import type { PipelineStatus } from "./types.js";

export interface HealthPayload {
  status: "ok" | "degraded";
  pipelineId: string;
  state: PipelineStatus["state"];
  uptimeSeconds: number;
  published: number;
  processed: number;
  failed: number;
  successRate: number;
  channelSize: number;
  channelCapacity: number;
  producerRunning: boolean;
  consumerRunning: boolean;
}

/**
 * Degraded means the pipeline is still meant to be running but the consumer
 * loop is gone, so nothing in the channel will be drained.
 */
export function buildHealthPayload(status: PipelineStatus): HealthPayload {
  const consumerLost = status.state === "running" && !status.consumer.running;

  return {
    status: consumerLost ? "degraded" : "ok",
    pipelineId: status.pipelineId,
    state: status.state,
    uptimeSeconds: status.uptimeSeconds,
    published: status.producer.published,
    processed: status.consumer.processed,
    failed: status.consumer.failed,
    successRate: status.consumer.successRate,
    channelSize: status.channel.size,
    channelCapacity: status.channel.capacity,
    producerRunning: status.producer.running,
    consumerRunning: status.consumer.running,
  };
}
