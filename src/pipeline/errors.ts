export class PipelineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/** Raised by `put` when the channel stays full for the whole timeout. */
export class ChannelFullError extends PipelineError {
  constructor(public readonly timeoutSec: number) {
    super(`Channel full after waiting ${timeoutSec}s`);
  }
}

/** Raised by `get` when nothing arrives before the timeout. */
export class ChannelEmptyError extends PipelineError {
  constructor(public readonly timeoutSec: number) {
    super(`Channel empty after waiting ${timeoutSec}s`);
  }
}

export class ChannelClosedError extends PipelineError {
  constructor(message = "Channel is closed") {
    super(message);
  }
}

export class ChannelStateError extends PipelineError {}

export class DrainTimeoutError extends PipelineError {
  constructor(public readonly timeoutSec: number, public readonly pending: number) {
    super(`Channel did not drain within ${timeoutSec}s (${pending} items still in flight)`);
  }
}

export type PipelineWorker = "producer" | "consumer";

/** A worker loop ended before its expected completion condition. */
export class LivenessFailureError extends PipelineError {
  constructor(public readonly worker: PipelineWorker, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** A worker loop did not exit within the stop bound. Reported, never escalated. */
export class ShutdownTimeoutError extends PipelineError {
  constructor(public readonly worker: PipelineWorker, public readonly timeoutSec: number) {
    super(`${worker} loop did not exit within ${timeoutSec}s`);
  }
}

export class PipelineStateError extends PipelineError {}

export class TransformError extends PipelineError {}

export class ExportError extends PipelineError {
  constructor(public readonly path: string, options?: { cause?: unknown }) {
    super(`Failed to export results to ${path}`, options);
  }
}
