import { z } from "zod";
import type { UserIntervals } from "./types.js";

export const SERVER_INFO = {
  name: "pomodoro-cycle-server",
  version: "1.0.0"
};

export const DEFAULT_INTERVALS: UserIntervals = {
  pomodoro: 25 * 60,
  shortBreak: 5 * 60,
  longBreak: 15 * 60
};

export const POMODOROS_PER_LONG_BREAK = 4;

/** Longest single delay a Node timer accepts, in whole seconds. */
export const MAX_TICK_SECONDS = Math.floor(2147483647 / 1000);

const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const configSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(2091),
  TICK_SECONDS: z.coerce.number().int().positive().max(MAX_TICK_SECONDS).default(1),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  MESSAGE_HISTORY_LIMIT: z.coerce.number().int().positive().default(50)
});

export interface AppConfig {
  port: number;
  tickSeconds: number;
  logLevel: LogLevel;
  messageHistoryLimit: number;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }

  return {
    port: parsed.data.PORT,
    tickSeconds: parsed.data.TICK_SECONDS,
    logLevel: parsed.data.LOG_LEVEL,
    messageHistoryLimit: parsed.data.MESSAGE_HISTORY_LIMIT
  };
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}
