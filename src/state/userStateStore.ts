import { z } from "zod";
import { DEFAULT_INTERVALS } from "../config.js";
import type { IntervalKind, UserIntervals, UserStats } from "../types.js";

interface UserStateStoreOptions {
  defaultIntervals?: Partial<UserIntervals>;
}

interface UserRecord {
  stats: UserStats;
  intervals: UserIntervals;
}

export type IntervalUpdateResult =
  | { status: "ok"; intervals: UserIntervals }
  | { status: "invalid_value" };

// Durations are counted down in seconds, so minutes * 60 must stay a safe integer.
const MAX_MINUTES = Math.floor(Number.MAX_SAFE_INTEGER / 60);

const minutesSchema = z.preprocess(value => {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return /^[+-]?\d+$/.test(trimmed) ? Number(trimmed) : value;
  }
  return value;
}, z.number().int().positive().max(MAX_MINUTES));

const INTERVAL_FIELD: Record<IntervalKind, keyof UserIntervals> = {
  pomodoro: "pomodoro",
  short_break: "shortBreak",
  long_break: "longBreak"
};

const STATS_FIELD: Record<IntervalKind, keyof UserStats> = {
  pomodoro: "pomodoros",
  short_break: "shortBreaks",
  long_break: "longBreaks"
};

export function intervalFor(intervals: UserIntervals, kind: IntervalKind): number {
  return intervals[INTERVAL_FIELD[kind]];
}

export class UserStateStore {
  private readonly users = new Map<number, UserRecord>();
  private readonly defaults: UserIntervals;

  constructor(options: UserStateStoreOptions = {}) {
    this.defaults = { ...DEFAULT_INTERVALS, ...options.defaultIntervals };
    for (const field of Object.values(INTERVAL_FIELD)) {
      const value = this.defaults[field];
      if (!Number.isSafeInteger(value) || value <= 0) {
        throw new Error(`Default ${field} interval must be a positive whole number of seconds.`);
      }
    }
  }

  getOrInitStats(userId: number): UserStats {
    return { ...this.requireUser(userId).stats };
  }

  getOrInitIntervals(userId: number): UserIntervals {
    return { ...this.requireUser(userId).intervals };
  }

  /** Reads the duration for one phase; callers read it once when the phase starts. */
  durationFor(userId: number, kind: IntervalKind): number {
    return intervalFor(this.requireUser(userId).intervals, kind);
  }

  updateInterval(userId: number, kind: IntervalKind, minutes: unknown): IntervalUpdateResult {
    const parsed = minutesSchema.safeParse(minutes);
    if (!parsed.success) {
      return { status: "invalid_value" };
    }

    const user = this.requireUser(userId);
    user.intervals = {
      ...user.intervals,
      [INTERVAL_FIELD[kind]]: parsed.data * 60
    };

    return { status: "ok", intervals: { ...user.intervals } };
  }

  recordCompletion(userId: number, kind: IntervalKind): UserStats {
    const user = this.requireUser(userId);
    const field = STATS_FIELD[kind];
    user.stats = {
      ...user.stats,
      [field]: user.stats[field] + 1
    };
    return { ...user.stats };
  }

  private requireUser(userId: number): UserRecord {
    const existing = this.users.get(userId);
    if (existing) {
      return existing;
    }

    const created: UserRecord = {
      stats: { pomodoros: 0, shortBreaks: 0, longBreaks: 0 },
      intervals: { ...this.defaults }
    };
    this.users.set(userId, created);
    return created;
  }
}
