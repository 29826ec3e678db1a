import { test } from "node:test";
import assert from "node:assert/strict";
import { runInterval } from "../src/timers.js";
import type { Sleep } from "../src/types.js";
import { fastSleep, sum } from "./helpers.js";

test("a 3 second interval reports 3, 2, 1 and completes", async () => {
  const progress: number[] = [];
  const slept: number[] = [];

  const outcome = await runInterval({
    durationSeconds: 3,
    kind: "pomodoro",
    signal: new AbortController().signal,
    onProgress: remaining => {
      progress.push(remaining);
    },
    sleep: fastSleep(slept)
  });

  assert.equal(outcome, "completed");
  assert.deepEqual(progress, [3, 2, 1]);
  assert.deepEqual(slept, [1000, 1000, 1000]);
});

test("sleeps add up to the duration for every tested length", async () => {
  for (const durationSeconds of [1, 2, 7, 60]) {
    const progress: number[] = [];
    const slept: number[] = [];
    const outcome = await runInterval({
      durationSeconds,
      kind: "short_break",
      signal: new AbortController().signal,
      onProgress: remaining => {
        progress.push(remaining);
      },
      sleep: fastSleep(slept)
    });

    assert.equal(outcome, "completed");
    assert.equal(sum(slept), durationSeconds * 1000);
    assert.equal(slept.length, durationSeconds);
    assert.equal(progress.length, durationSeconds);
    assert.ok(progress.every(remaining => remaining > 0));
  }
});

test("the last tick is shortened so it lands on zero", async () => {
  const progress: number[] = [];
  const slept: number[] = [];

  const outcome = await runInterval({
    durationSeconds: 5,
    kind: "long_break",
    tickSeconds: 2,
    signal: new AbortController().signal,
    onProgress: remaining => {
      progress.push(remaining);
    },
    sleep: fastSleep(slept)
  });

  assert.equal(outcome, "completed");
  assert.deepEqual(slept, [2000, 2000, 1000]);
  assert.deepEqual(progress, [5, 3, 1]);
});

test("cancelling during a sleep returns cancelled without further progress", async () => {
  const controller = new AbortController();
  const progress: number[] = [];
  let calls = 0;
  const sleep: Sleep = async (_ms, signal) => {
    calls += 1;
    if (calls === 2) {
      controller.abort();
    }
    if (signal.aborted) {
      throw new Error("aborted");
    }
  };

  const outcome = await runInterval({
    durationSeconds: 5,
    kind: "pomodoro",
    signal: controller.signal,
    onProgress: remaining => {
      progress.push(remaining);
    },
    sleep
  });

  assert.equal(outcome, "cancelled");
  assert.deepEqual(progress, [5, 4]);
  assert.equal(calls, 2);
});

test("the default sleep notices cancellation within a tick", async () => {
  const controller = new AbortController();
  const started = Date.now();
  setTimeout(() => controller.abort(), 20);

  const outcome = await runInterval({
    durationSeconds: 60,
    kind: "pomodoro",
    signal: controller.signal,
    onProgress: () => undefined
  });

  assert.equal(outcome, "cancelled");
  assert.ok(Date.now() - started < 1000);
});

test("an already cancelled signal skips the countdown entirely", async () => {
  const controller = new AbortController();
  controller.abort();
  const progress: number[] = [];

  const outcome = await runInterval({
    durationSeconds: 3,
    kind: "pomodoro",
    signal: controller.signal,
    onProgress: remaining => {
      progress.push(remaining);
    },
    sleep: fastSleep()
  });

  assert.equal(outcome, "cancelled");
  assert.deepEqual(progress, []);
});

test("failing progress updates do not disturb the countdown", async () => {
  const slept: number[] = [];
  let attempts = 0;

  const outcome = await runInterval({
    durationSeconds: 3,
    kind: "short_break",
    signal: new AbortController().signal,
    onProgress: async () => {
      attempts += 1;
      throw new Error("message is not editable");
    },
    sleep: fastSleep(slept)
  });

  assert.equal(outcome, "completed");
  assert.equal(attempts, 3);
  assert.equal(sum(slept), 3000);
});

test("non-positive or fractional durations are rejected", async () => {
  for (const durationSeconds of [0, -3, 1.5]) {
    await assert.rejects(
      runInterval({
        durationSeconds,
        kind: "pomodoro",
        signal: new AbortController().signal,
        onProgress: () => undefined,
        sleep: fastSleep()
      }),
      /positive whole number of seconds/
    );
  }
});

test("tick periods beyond the longest timer delay are rejected", async () => {
  await assert.rejects(
    runInterval({
      durationSeconds: 5,
      kind: "short_break",
      signal: new AbortController().signal,
      onProgress: () => undefined,
      tickSeconds: 2147484,
      sleep: fastSleep()
    }),
    /Tick period must be a whole number of seconds between 1 and 2147483/
  );
});
