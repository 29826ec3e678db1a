export type IntervalKind = "pomodoro" | "short_break" | "long_break";

export interface UserStats {
  pomodoros: number;
  shortBreaks: number;
  longBreaks: number;
}

/** Durations in seconds. */
export interface UserIntervals {
  pomodoro: number;
  shortBreak: number;
  longBreak: number;
}

export type RunKind = "timer" | "cycle";

export type RunStatus = "running" | "completed" | "cancelled" | "failed";

export type TimerOutcome = "completed" | "cancelled";

export type ControlAction =
  | "start_cycle"
  | "set_pomodoro"
  | "set_short_break"
  | "set_long_break"
  | "show_stats"
  | "stop_run"
  | "back_to_menu";

export interface Control {
  label: string;
  action: ControlAction;
}

export interface MessageView {
  text: string;
  controls: Control[];
}

export type ChatRef = number;

export type MessageHandle = string;

export type NotifyResult<T = void> = { ok: true; value: T } | { ok: false; reason: string };

export interface Notifier {
  announce(chat: ChatRef, view: MessageView): Promise<NotifyResult<MessageHandle>>;
  update(handle: MessageHandle, view: MessageView): Promise<NotifyResult>;
}

export type ProgressSink = (remainingSeconds: number, kind: IntervalKind) => Promise<void> | void;

/** Resolves after `ms`, rejects once `signal` aborts. */
export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;
