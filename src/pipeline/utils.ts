import { setTimeout as delay } from "node:timers/promises";

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

/**
 * Sleeps for the given number of seconds. An aborted signal ends the sleep
 * early without rejecting.
 */
export async function sleep(seconds: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return;
  }
  try {
    await delay(Math.max(0, seconds) * 1000, undefined, { signal });
  } catch (error) {
    if (!isAbortError(error)) {
      throw error;
    }
  }
}

/**
 * Waits for `promise` for at most `seconds`. Resolves true when it settled in
 * time and false otherwise; the timer is always cleared.
 */
export async function settlesWithin(promise: Promise<unknown>, seconds: number): Promise<boolean> {
  const timer = new AbortController();
  try {
    return await Promise.race([
      promise.then(
        () => true,
        () => true,
      ),
      sleep(seconds, timer.signal).then(() => false),
    ]);
  } finally {
    timer.abort();
  }
}

export function roundTo2(value: number): number {
  return Number(value.toFixed(2));
}

export function average(values: readonly number[]): number {
  if (values.length === 0) {
    return 0;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export function percentage(part: number, total: number): number {
  return total === 0 ? 0 : roundTo2((part / total) * 100);
}

export type RandomSource = () => number;

/**
 * mulberry32: a small seeded generator for reproducible runs. Without a seed
 * it falls back to `Math.random`.
 */
export function createRng(seed?: number): RandomSource {
  if (seed == null) {
    return () => Math.random();
  }
  let value = seed >>> 0;
  return () => {
    value |= 0;
    value = (value + 0x6d2b79f5) | 0;
    let t = Math.imul(value ^ (value >>> 15), 1 | value);
    t ^= t + Math.imul(t ^ (t >>> 7), 61 | t);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
