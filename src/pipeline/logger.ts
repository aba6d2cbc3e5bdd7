import pino from "pino";
import { config } from "./config.js";

const usePrettyTransport = config.nodeEnv !== "production" && config.nodeEnv !== "test";

export const logger = pino({
  level: config.logLevel,
  base: {
    pipelineId: config.pipelineId,
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  transport: usePrettyTransport
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          singleLine: true,
          translateTime: "SYS:standard",
        },
      }
    : undefined,
});

