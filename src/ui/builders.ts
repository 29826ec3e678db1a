import { POMODOROS_PER_LONG_BREAK } from "../config.js";
import type { Control, IntervalKind, MessageView, UserIntervals, UserStats } from "../types.js";

export const KIND_COPY: Record<IntervalKind, { emoji: string; label: string }> = {
  pomodoro: { emoji: "🍅", label: "Pomodoro" },
  short_break: { emoji: "☕", label: "Short break" },
  long_break: { emoji: "🌴", label: "Long break" }
};

export const STOP_CONTROLS: Control[] = [{ label: "⏹️ Stop cycle", action: "stop_run" }];

export const BACK_CONTROLS: Control[] = [{ label: "🔙 Back", action: "back_to_menu" }];

/** `45 sec` below a minute, `MM:SS` otherwise. */
export function formatTime(seconds: number): string {
  if (seconds < 60) {
    return `${seconds} sec`;
  }
  const minutes = Math.floor(seconds / 60);
  const rest = seconds % 60;
  return `${String(minutes).padStart(2, "0")}:${String(rest).padStart(2, "0")}`;
}

export function toMinutes(seconds: number): number {
  return Math.floor(seconds / 60);
}

export function buildMenuControls(intervals: UserIntervals): Control[] {
  return [
    { label: "🔄 Start full Pomodoro cycle", action: "start_cycle" },
    { label: `🍅 Set Pomodoro (${toMinutes(intervals.pomodoro)} min)`, action: "set_pomodoro" },
    { label: `☕ Set short break (${toMinutes(intervals.shortBreak)} min)`, action: "set_short_break" },
    { label: `🌴 Set long break (${toMinutes(intervals.longBreak)} min)`, action: "set_long_break" },
    { label: "📊 Statistics", action: "show_stats" },
    { label: "⏹️ Stop timer/cycle", action: "stop_run" }
  ];
}

function settingsLines(intervals: UserIntervals): string[] {
  return [
    `• Pomodoro: ${toMinutes(intervals.pomodoro)} min`,
    `• Short break: ${toMinutes(intervals.shortBreak)} min`,
    `• Long break: ${toMinutes(intervals.longBreak)} min`
  ];
}

export function buildProgressView(remainingSeconds: number, kind: IntervalKind): MessageView {
  const { emoji, label } = KIND_COPY[kind];
  return {
    text: `${emoji} ${label}\n\n⏱ Time left: ${formatTime(remainingSeconds)}`,
    controls: STOP_CONTROLS
  };
}

export function buildCycleLaunchView(intervals: UserIntervals): MessageView {
  return {
    text: ["🔄 Full Pomodoro cycle started!", "", "⚙️ Settings:", ...settingsLines(intervals), "", "The cycle runs until you stop it."].join("\n"),
    controls: []
  };
}

export function buildWorkAnnouncement(pomodoroNumber: number, durationSeconds: number): MessageView {
  const heading = pomodoroNumber === 1 ? "🔔 POMODORO CYCLE STARTED!" : "🔔 BACK TO WORK!";
  const intro = pomodoroNumber === 1 ? "🍅 First Pomodoro is starting!" : `🍅 Pomodoro #${pomodoroNumber} is starting!`;
  return {
    text: `${heading}\n\n${intro}\n\n⏱ Time left: ${formatTime(durationSeconds)}\n\n💪 Time to focus.`,
    controls: STOP_CONTROLS
  };
}

export function buildBreakAnnouncement(kind: IntervalKind, afterPomodoro: number, durationSeconds: number): MessageView {
  const { emoji, label } = KIND_COPY[kind];
  return {
    text: `🔔 TIME TO REST!\n\n${emoji} ${label} after Pomodoro #${afterPomodoro}\n\n⏱ Time left: ${formatTime(durationSeconds)}\n\n😌 Relax and recharge.`,
    controls: STOP_CONTROLS
  };
}

export function buildCycleStoppedView(pomodoros: number, intervals: UserIntervals): MessageView {
  return {
    text: `⏹️ Pomodoro cycle stopped.\n\n✅ Pomodoros completed: ${pomodoros}`,
    controls: buildMenuControls(intervals)
  };
}

export function buildTimerStartView(kind: IntervalKind, durationSeconds: number): MessageView {
  const { emoji, label } = KIND_COPY[kind];
  return {
    text: `${emoji} ${label} started for ${formatTime(durationSeconds)}.`,
    controls: STOP_CONTROLS
  };
}

export function buildCompletionView(kind: IntervalKind, stats: UserStats, intervals: UserIntervals): MessageView {
  const { label } = KIND_COPY[kind];
  let text = `✅ ${label} finished!\n\n`;
  if (kind === "pomodoro") {
    text += `🎉 Congratulations! You have completed ${stats.pomodoros} Pomodoro session${stats.pomodoros === 1 ? "" : "s"}!`;
    if (stats.pomodoros % POMODOROS_PER_LONG_BREAK === 0) {
      text += "\n\n💡 Time for a long break!";
    }
  } else {
    text += "💪 Ready to get back to work?";
  }
  return { text, controls: buildMenuControls(intervals) };
}

export function buildStoppedView(intervals: UserIntervals): MessageView {
  return {
    text: "⏹️ Timer/cycle stopped.\n\nChoose an action:",
    controls: buildMenuControls(intervals)
  };
}

export function buildStatsView(stats: UserStats, intervals: UserIntervals): MessageView {
  const lines = [
    "📊 Your statistics:",
    "",
    `🍅 Pomodoros completed: ${stats.pomodoros}`,
    `☕ Short breaks: ${stats.shortBreaks}`,
    `🌴 Long breaks: ${stats.longBreaks}`,
    "",
    "⚙️ Current settings:",
    ...settingsLines(intervals),
    ""
  ];
  if (stats.pomodoros > 0) {
    lines.push(`⏱ Total focus time: ${formatTime(stats.pomodoros * intervals.pomodoro)}`);
  } else {
    lines.push("💡 Start your first Pomodoro!");
  }
  return { text: lines.join("\n"), controls: buildMenuControls(intervals) };
}

export function buildMenuView(intervals: UserIntervals): MessageView {
  return {
    text: ["🍅 Main menu", "", "⚙️ Current settings:", ...settingsLines(intervals)].join("\n"),
    controls: buildMenuControls(intervals)
  };
}

export function buildWelcomeView(intervals: UserIntervals): MessageView {
  return {
    text: [
      "🍅 Welcome to the Pomodoro timer!",
      "",
      "The Pomodoro technique helps you stay productive:",
      `• 🍅 Pomodoro: ${toMinutes(intervals.pomodoro)} minutes`,
      `• ☕ Short break: ${toMinutes(intervals.shortBreak)} minutes`,
      `• 🌴 Long break: ${toMinutes(intervals.longBreak)} minutes`,
      "",
      "Use the buttons below to control your timers.",
      "You can adjust the intervals any time!"
    ].join("\n"),
    controls: buildMenuControls(intervals)
  };
}

export function buildIntervalPrompt(kind: IntervalKind, currentSeconds: number): MessageView {
  const { emoji, label } = KIND_COPY[kind];
  return {
    text: `${emoji} ${label} interval\n\nCurrent value: ${toMinutes(currentSeconds)} minutes\n\nEnter a new value in minutes:`,
    controls: BACK_CONTROLS
  };
}

export function buildHelpView(intervals: UserIntervals): MessageView {
  return {
    text: [
      "📖 How to use this timer:",
      "",
      "🔄 Start full cycle: run Pomodoros and breaks until you stop",
      "🍅 Set Pomodoro: change the work interval",
      "☕ Set short break: change the short break",
      "🌴 Set long break: change the long break",
      "📊 Statistics: see your completed intervals",
      "⏹️ Stop: stop the current timer or cycle",
      "",
      "💡 Every 4th Pomodoro is followed by a long break."
    ].join("\n"),
    controls: buildMenuControls(intervals)
  };
}
