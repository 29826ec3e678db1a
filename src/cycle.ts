import { POMODOROS_PER_LONG_BREAK } from "./config.js";
import { createLogger } from "./logger.js";
import { guardNotifier } from "./notifier.js";
import { createProgressSink } from "./progress.js";
import type { UserStateStore } from "./state/userStateStore.js";
import { runInterval } from "./timers.js";
import type { ChatRef, IntervalKind, MessageView, Notifier, Sleep, TimerOutcome, UserStats } from "./types.js";
import { buildBreakAnnouncement, buildWorkAnnouncement } from "./ui/builders.js";

const logger = createLogger("cycle");

export type CyclePhase = "starting" | "running_work" | "running_break" | "stopped";

export type CycleEvent =
  | { type: "phase"; phase: "running_work"; pomodoroNumber: number; durationSeconds: number }
  | { type: "phase"; phase: "running_break"; kind: IntervalKind; afterPomodoro: number; durationSeconds: number }
  | { type: "completed"; kind: IntervalKind; stats: UserStats }
  | { type: "stopped"; pomodoros: number };

export interface CycleReport {
  pomodoros: number;
}

export interface CycleSchedulerOptions {
  userId: number;
  chat: ChatRef;
  signal: AbortSignal;
  store: UserStateStore;
  notifier: Notifier;
  tickSeconds?: number;
  sleep?: Sleep;
  onEvent?: (event: CycleEvent) => void;
}

export function nextBreakKind(completedPomodoros: number): IntervalKind {
  return completedPomodoros % POMODOROS_PER_LONG_BREAK === 0 ? "long_break" : "short_break";
}

/**
 * Runs Pomodoros and breaks back to back until the signal aborts. The only
 * way out is cancellation, which yields the number of Pomodoros finished in
 * this cycle.
 */
export class CycleScheduler {
  private currentPhase: CyclePhase = "starting";
  private completed = 0;
  private readonly notifier: Notifier;

  constructor(private readonly options: CycleSchedulerOptions) {
    this.notifier = guardNotifier(options.notifier);
  }

  get phase(): CyclePhase {
    return this.currentPhase;
  }

  get pomodoros(): number {
    return this.completed;
  }

  async run(): Promise<CycleReport> {
    if (this.currentPhase !== "starting") {
      throw new Error("A cycle can only be run once.");
    }
    const { userId, store } = this.options;

    while (!this.cancelled()) {
      const workSeconds = store.durationFor(userId, "pomodoro");
      this.enter({ type: "phase", phase: "running_work", pomodoroNumber: this.completed + 1, durationSeconds: workSeconds });
      await this.announce(buildWorkAnnouncement(this.completed + 1, workSeconds));
      if ((await this.runPhase("pomodoro", workSeconds)) === "cancelled") {
        break;
      }

      this.completed += 1;
      this.record("pomodoro");
      if (this.cancelled()) {
        break;
      }

      const breakKind = nextBreakKind(this.completed);
      const breakSeconds = store.durationFor(userId, breakKind);
      this.enter({
        type: "phase",
        phase: "running_break",
        kind: breakKind,
        afterPomodoro: this.completed,
        durationSeconds: breakSeconds
      });
      await this.announce(buildBreakAnnouncement(breakKind, this.completed, breakSeconds));
      if ((await this.runPhase(breakKind, breakSeconds)) === "cancelled") {
        break;
      }

      this.record(breakKind);
    }

    this.currentPhase = "stopped";
    this.options.onEvent?.({ type: "stopped", pomodoros: this.completed });
    logger.info(`Cycle for user ${userId} stopped after ${this.completed} pomodoro(s)`);
    return { pomodoros: this.completed };
  }

  private cancelled(): boolean {
    return this.options.signal.aborted;
  }

  private enter(event: Extract<CycleEvent, { type: "phase" }>): void {
    this.currentPhase = event.phase;
    this.options.onEvent?.(event);
  }

  private record(kind: IntervalKind): void {
    const stats = this.options.store.recordCompletion(this.options.userId, kind);
    this.options.onEvent?.({ type: "completed", kind, stats });
  }

  private async announce(view: MessageView): Promise<void> {
    const result = await this.notifier.announce(this.options.chat, view);
    if (!result.ok) {
      logger.debug(`Phase announcement failed: ${result.reason}`);
    }
  }

  private runPhase(kind: IntervalKind, durationSeconds: number): Promise<TimerOutcome> {
    const { chat, signal, tickSeconds, sleep } = this.options;
    return runInterval({
      durationSeconds,
      kind,
      signal,
      tickSeconds,
      sleep,
      onProgress: createProgressSink(this.notifier, chat)
    });
  }
}
