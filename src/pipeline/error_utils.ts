import type { Logger } from "pino";

import { PipelineError, type PipelineWorker } from "./errors.js";

export type PipelineStage = PipelineWorker | "controller";

/** Where in the pipeline a failure surfaced. */
export interface StageContext {
  readonly stage: PipelineStage;
  readonly step: "produce" | "process" | "monitor" | "export";
  readonly postId?: string;
  /** Generation order of the post being handled, when there is one. */
  readonly sequence?: number;
}

export interface ErrorSummary {
  readonly type: string;
  readonly message: string;
  /** True for the pipeline's own error classes. */
  readonly expected: boolean;
  readonly cause?: string;
  readonly stack?: string;
}

function describeValue(value: unknown): string {
  try {
    return JSON.stringify(value, (_key, item: unknown) => (typeof item === "bigint" ? item.toString() : item)) ?? String(value);
  } catch {
    return String(value);
  }
}

/**
 * Flattens a thrown value for the log. Stacks are kept only for unexpected
 * errors; a `PipelineError` names its own failure.
 */
export function summariseError(error: unknown): ErrorSummary {
  if (error instanceof PipelineError) {
    return {
      type: error.name,
      message: error.message,
      expected: true,
      cause: error.cause === undefined ? undefined : errorMessage(error.cause),
    };
  }

  if (error instanceof Error) {
    return {
      type: error.name,
      message: error.message,
      expected: false,
      cause: error.cause === undefined ? undefined : errorMessage(error.cause),
      stack: error.stack,
    };
  }

  return {
    type: typeof error,
    message: typeof error === "string" ? error : describeValue(error),
    expected: false,
  };
}

/** The text stored in a post's error log entry. */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === "string" ? error : describeValue(error);
}

export function logStageError(logger: Logger, error: unknown, context: StageContext, message: string): void {
  logger.error({ ...context, error: summariseError(error) }, message);
}
