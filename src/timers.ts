import { setTimeout as delay } from "timers/promises";
import { MAX_TICK_SECONDS } from "./config.js";
import { createLogger } from "./logger.js";
import type { IntervalKind, ProgressSink, Sleep, TimerOutcome } from "./types.js";

const logger = createLogger("timer");

export const sleepWithSignal: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export interface IntervalRunOptions {
  durationSeconds: number;
  kind: IntervalKind;
  onProgress: ProgressSink;
  signal: AbortSignal;
  tickSeconds?: number;
  sleep?: Sleep;
}

/**
 * Counts down one interval, reporting the remaining seconds once at start and
 * after every tick until zero. Every sleep is `min(tick, remaining)` so the
 * last one lands exactly on zero.
 */
export async function runInterval(options: IntervalRunOptions): Promise<TimerOutcome> {
  const { durationSeconds, kind, onProgress, signal, tickSeconds = 1, sleep = sleepWithSignal } = options;
  if (!Number.isSafeInteger(durationSeconds) || durationSeconds <= 0) {
    throw new Error("Duration must be a positive whole number of seconds.");
  }
  if (!Number.isInteger(tickSeconds) || tickSeconds <= 0 || tickSeconds > MAX_TICK_SECONDS) {
    throw new Error(`Tick period must be a whole number of seconds between 1 and ${MAX_TICK_SECONDS}.`);
  }

  if (signal.aborted) {
    return "cancelled";
  }

  let remaining = durationSeconds;
  await report(onProgress, remaining, kind);

  while (remaining > 0) {
    if (signal.aborted) {
      return "cancelled";
    }

    const step = Math.min(tickSeconds, remaining);
    try {
      await sleep(step * 1000, signal);
    } catch (error) {
      if (signal.aborted) {
        return "cancelled";
      }
      throw error;
    }
    remaining -= step;

    if (signal.aborted) {
      return "cancelled";
    }
    if (remaining > 0) {
      await report(onProgress, remaining, kind);
    }
  }

  return signal.aborted ? "cancelled" : "completed";
}

async function report(onProgress: ProgressSink, remaining: number, kind: IntervalKind): Promise<void> {
  try {
    await onProgress(remaining, kind);
  } catch (error) {
    logger.debug(`Progress update for ${kind} at ${remaining}s failed`, error);
  }
}
