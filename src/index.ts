import closeWithGrace from "close-with-grace";

import { config } from "./pipeline/config.js";
import { PipelineController } from "./pipeline/controller.js";
import { summariseError } from "./pipeline/error_utils.js";
import { logger } from "./pipeline/logger.js";
import { StatusServer } from "./pipeline/status_server.js";

async function main(): Promise<void> {
  config.warnings.forEach((warning) => {
    logger.warn({ warning }, "Configuration warning");
  });

  const controller = new PipelineController();
  const statusServer = config.statusServerEnabled ? new StatusServer(controller, config.statusServerPort) : null;

  const shutdownDelayMs = (config.drainTimeoutSec + 2 * config.stopTimeoutSec + 5) * 1000;
  const listeners = closeWithGrace(
    { delay: shutdownDelayMs },
    async ({ signal, err }: { signal?: string | number; err?: unknown; manual?: boolean }) => {
      if (err) {
        logger.error({ err, signal }, "Graceful shutdown due to error");
      } else {
        logger.info({ signal }, "Graceful shutdown initiated");
      }
      await controller.stop(signal === undefined ? "shutdown" : String(signal));
      await statusServer?.stop();
    },
  );

  try {
    await statusServer?.start();
    await controller.start();
  } catch (error) {
    logger.error({ error: summariseError(error) }, "Failed to start pipeline");
    listeners.uninstall();
    await statusServer?.stop();
    process.exit(1);
  }

  const result = await controller.waitForCompletion();
  await statusServer?.stop();
  listeners.uninstall();

  logger.info(
    {
      outcome: result.outcome,
      reason: result.reason,
      processed: result.analytics.summary.total_processed,
      failed: result.analytics.summary.total_failed,
      exportPath: result.exportPath ?? null,
      durationMs: result.durationMs,
    },
    "Pipeline finished",
  );
}

void main();
