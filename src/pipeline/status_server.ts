import Fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest } from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import type { Logger } from "pino";

import { buildHealthPayload } from "./health.js";
import { logger as rootLogger } from "./logger.js";
import { memoryUsageBytes, registry } from "./metrics.js";
import type { Analytics, PipelineStatus } from "./types.js";

export interface StatusProvider {
  getStatus(): PipelineStatus;
  getAnalytics(): Analytics;
}

/**
 * Read-only HTTP view of a running pipeline: `/health`, `/status`,
 * `/analytics` and Prometheus `/metrics`.
 */
export async function buildStatusServer(provider: StatusProvider): Promise<FastifyInstance> {
  const server = Fastify({ logger: false });
  await server.register(cors, { origin: true });
  await server.register(helmet, { global: true });

  server.get("/health", async () => buildHealthPayload(provider.getStatus()));

  server.get("/status", async () => provider.getStatus());

  server.get("/analytics", async () => provider.getAnalytics());

  server.get("/metrics", async (_request: FastifyRequest, reply: FastifyReply) => {
    memoryUsageBytes.set(process.memoryUsage().rss);
    const body = await registry.metrics();
    reply.header("Content-Type", registry.contentType);
    return reply.send(body);
  });

  return server;
}

export class StatusServer {
  private server: FastifyInstance | null = null;
  private readonly log: Logger;

  constructor(
    private readonly provider: StatusProvider,
    private readonly port: number,
    logger: Logger = rootLogger,
  ) {
    this.log = logger.child({ component: "status-server" });
  }

  async start(): Promise<void> {
    if (this.server) return;

    const server = await buildStatusServer(this.provider);
    await server.listen({ port: this.port, host: "0.0.0.0" });
    this.log.info({ port: this.port }, "Status server listening");
    this.server = server;
  }

  async stop(): Promise<void> {
    if (!this.server) return;
    await this.server.close();
    this.server = null;
    this.log.info("Status server stopped");
  }
}
