import { z } from "zod";
import { CycleScheduler, type CycleEvent, type CycleReport } from "../cycle.js";
import { createLogger } from "../logger.js";
import { guardNotifier } from "../notifier.js";
import { createProgressSink } from "../progress.js";
import { MessageBoard } from "../state/messageBoard.js";
import { SessionRegistry, type RunHandle } from "../state/sessionRegistry.js";
import { UserStateStore, intervalFor } from "../state/userStateStore.js";
import { runInterval } from "../timers.js";
import type {
  ChatRef,
  IntervalKind,
  MessageHandle,
  MessageView,
  Notifier,
  RunKind,
  Sleep,
  TimerOutcome,
  UserIntervals,
  UserStats
} from "../types.js";
import {
  KIND_COPY,
  buildCompletionView,
  buildCycleLaunchView,
  buildCycleStoppedView,
  buildHelpView,
  buildIntervalPrompt,
  buildMenuView,
  buildStatsView,
  buildStoppedView,
  buildTimerStartView,
  buildWelcomeView,
  toMinutes
} from "../ui/builders.js";

const logger = createLogger("toolset");

export const intervalKindSchema = z.enum(["pomodoro", "short_break", "long_break"]);

const userShape = {
  userId: z.number().int().nonnegative(),
  chatId: z.number().int().optional()
};

export const userInput = z.object(userShape);

export const startTimerInput = z.object({
  ...userShape,
  kind: intervalKindSchema.default("pomodoro")
});

export const setIntervalShape = {
  userId: userShape.userId,
  kind: intervalKindSchema,
  minutes: z.union([z.number(), z.string()]).optional()
};

export const setIntervalInput = z.object(setIntervalShape);

const ALREADY_RUNNING_MESSAGE = "⏸ You already have a timer or cycle running! Stop it before starting a new one.";
const NOT_RUNNING_MESSAGE = "❌ You have no active timer or cycle!";
const SETTINGS_LOCKED_MESSAGE = "⏸ Stop the active timer or cycle before changing settings!";
const INVALID_VALUE_MESSAGE = "❌ The value must be a positive whole number of minutes. Try again:";

export interface TimerRunReport {
  outcome: TimerOutcome | "failed";
  stats: UserStats;
}

export type StartResult<TReport> =
  | { status: "started"; runId: string; message: string; completion: Promise<TReport> }
  | { status: "already_running"; active: RunKind; message: string };

export type StopResult =
  | { status: "stopped"; message: string; view: MessageView }
  | { status: "not_running"; message: string };

export type SetIntervalResult =
  | { status: "ok"; message: string; intervals: UserIntervals; view: MessageView }
  | { status: "prompt"; message: string; view: MessageView }
  | { status: "invalid_value"; message: string }
  | { status: "run_active"; message: string };

export interface PomodoroToolsetOptions {
  store?: UserStateStore;
  registry?: SessionRegistry;
  notifier?: Notifier;
  tickSeconds?: number;
  sleep?: Sleep;
  onCycleEvent?: (userId: number, event: CycleEvent) => void;
}

export class PomodoroToolset {
  readonly store: UserStateStore;
  readonly registry: SessionRegistry;
  readonly notifier: Notifier;
  private readonly tickSeconds?: number;
  private readonly sleep?: Sleep;
  private readonly onCycleEvent?: (userId: number, event: CycleEvent) => void;

  constructor(options: PomodoroToolsetOptions = {}) {
    this.store = options.store ?? new UserStateStore();
    this.registry = options.registry ?? new SessionRegistry();
    this.notifier = guardNotifier(options.notifier ?? new MessageBoard());
    this.tickSeconds = options.tickSeconds;
    this.sleep = options.sleep;
    this.onCycleEvent = options.onCycleEvent;
  }

  async startTimer(input: z.input<typeof startTimerInput>): Promise<StartResult<TimerRunReport>> {
    const parsed = startTimerInput.parse(input);
    const start = this.registry.tryStart(parsed.userId, "timer");
    if (start.status === "already_running") {
      return { status: "already_running", active: start.active.kind, message: ALREADY_RUNNING_MESSAGE };
    }

    const durationSeconds = this.store.durationFor(parsed.userId, parsed.kind);
    const chat = parsed.chatId ?? parsed.userId;
    const completion = this.runTimer(start.handle, chat, parsed.kind, durationSeconds);
    logger.info(`User ${parsed.userId} started a ${parsed.kind} timer (${durationSeconds}s)`);

    return {
      status: "started",
      runId: start.handle.id,
      message: buildTimerStartView(parsed.kind, durationSeconds).text,
      completion
    };
  }

  async startCycle(input: z.input<typeof userInput>): Promise<StartResult<CycleReport>> {
    const parsed = userInput.parse(input);
    const start = this.registry.tryStart(parsed.userId, "cycle");
    if (start.status === "already_running") {
      return { status: "already_running", active: start.active.kind, message: ALREADY_RUNNING_MESSAGE };
    }

    const chat = parsed.chatId ?? parsed.userId;
    const completion = this.runCycle(start.handle, chat);
    logger.info(`User ${parsed.userId} started a Pomodoro cycle`);

    return {
      status: "started",
      runId: start.handle.id,
      message: "🔄 Full Pomodoro cycle started!",
      completion
    };
  }

  async stopRun(input: z.input<typeof userInput>): Promise<StopResult> {
    const parsed = userInput.parse(input);
    if (this.registry.cancel(parsed.userId) === "not_running") {
      return { status: "not_running", message: NOT_RUNNING_MESSAGE };
    }

    logger.info(`User ${parsed.userId} stopped their run`);
    return {
      status: "stopped",
      message: "⏹️ Stopped!",
      view: buildStoppedView(this.store.getOrInitIntervals(parsed.userId))
    };
  }

  async setInterval(input: z.input<typeof setIntervalInput>): Promise<SetIntervalResult> {
    const parsed = setIntervalInput.parse(input);
    if (this.registry.active(parsed.userId)) {
      return { status: "run_active", message: SETTINGS_LOCKED_MESSAGE };
    }

    if (parsed.minutes === undefined) {
      const view = buildIntervalPrompt(parsed.kind, this.store.durationFor(parsed.userId, parsed.kind));
      return { status: "prompt", message: view.text, view };
    }

    const result = this.store.updateInterval(parsed.userId, parsed.kind, parsed.minutes);
    if (result.status === "invalid_value") {
      return { status: "invalid_value", message: INVALID_VALUE_MESSAGE };
    }

    const minutes = toMinutes(intervalFor(result.intervals, parsed.kind));
    return {
      status: "ok",
      message: `✅ ${KIND_COPY[parsed.kind].label} interval set: ${minutes} minute${minutes === 1 ? "" : "s"}`,
      intervals: result.intervals,
      view: buildMenuView(result.intervals)
    };
  }

  async queryStats(input: z.input<typeof userInput>): Promise<{ stats: UserStats; intervals: UserIntervals; view: MessageView }> {
    const parsed = userInput.parse(input);
    const stats = this.store.getOrInitStats(parsed.userId);
    const intervals = this.store.getOrInitIntervals(parsed.userId);
    return { stats, intervals, view: buildStatsView(stats, intervals) };
  }

  async queryIntervals(input: z.input<typeof userInput>): Promise<{ intervals: UserIntervals; view: MessageView }> {
    const parsed = userInput.parse(input);
    const intervals = this.store.getOrInitIntervals(parsed.userId);
    return { intervals, view: buildMenuView(intervals) };
  }

  async showMenu(input: z.input<typeof userInput>): Promise<MessageView> {
    const parsed = userInput.parse(input);
    return buildWelcomeView(this.store.getOrInitIntervals(parsed.userId));
  }

  async showHelp(input: z.input<typeof userInput>): Promise<MessageView> {
    const parsed = userInput.parse(input);
    return buildHelpView(this.store.getOrInitIntervals(parsed.userId));
  }

  private async runTimer(handle: RunHandle, chat: ChatRef, kind: IntervalKind, durationSeconds: number): Promise<TimerRunReport> {
    const { userId } = handle;
    try {
      const announced = await this.notifier.announce(chat, buildTimerStartView(kind, durationSeconds));
      const target = announced.ok ? announced.value : undefined;
      const outcome = await runInterval({
        durationSeconds,
        kind,
        signal: handle.signal,
        tickSeconds: this.tickSeconds,
        sleep: this.sleep,
        onProgress: createProgressSink(this.notifier, chat, target)
      });

      if (outcome === "cancelled") {
        this.registry.release(handle, "cancelled");
        return { outcome, stats: this.store.getOrInitStats(userId) };
      }

      const stats = this.store.recordCompletion(userId, kind);
      this.registry.release(handle, "completed");
      await this.deliver(chat, target, buildCompletionView(kind, stats, this.store.getOrInitIntervals(userId)));
      return { outcome, stats };
    } catch (error) {
      logger.error(`Timer for user ${userId} failed`, error);
      this.registry.release(handle, "failed");
      return { outcome: "failed", stats: this.store.getOrInitStats(userId) };
    }
  }

  private async runCycle(handle: RunHandle, chat: ChatRef): Promise<CycleReport> {
    const { userId } = handle;
    const scheduler = new CycleScheduler({
      userId,
      chat,
      signal: handle.signal,
      store: this.store,
      notifier: this.notifier,
      tickSeconds: this.tickSeconds,
      sleep: this.sleep,
      onEvent: event => this.onCycleEvent?.(userId, event)
    });

    try {
      const launched = await this.notifier.announce(chat, buildCycleLaunchView(this.store.getOrInitIntervals(userId)));
      const report = await scheduler.run();
      this.registry.release(handle, "cancelled");
      const target = launched.ok ? launched.value : undefined;
      await this.deliver(chat, target, buildCycleStoppedView(report.pomodoros, this.store.getOrInitIntervals(userId)));
      return report;
    } catch (error) {
      logger.error(`Cycle for user ${userId} failed`, error);
      this.registry.release(handle, "failed");
      return { pomodoros: scheduler.pomodoros };
    }
  }

  /** Edits `target` in place, or posts a new message when the edit is not possible. */
  private async deliver(chat: ChatRef, target: MessageHandle | undefined, view: MessageView): Promise<void> {
    if (target) {
      const edited = await this.notifier.update(target, view);
      if (edited.ok) {
        return;
      }
      logger.debug(`Falling back to a new message: ${edited.reason}`);
    }

    const sent = await this.notifier.announce(chat, view);
    if (!sent.ok) {
      logger.warn(`Could not deliver message to chat ${chat}: ${sent.reason}`);
    }
  }
}
