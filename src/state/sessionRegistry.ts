import { v4 as uuid } from "uuid";
import type { RunKind, RunStatus } from "../types.js";

type SettledStatus = Exclude<RunStatus, "running">;

export class RunHandle {
  readonly id = uuid();
  private readonly controller = new AbortController();
  private currentStatus: RunStatus = "running";

  constructor(
    readonly userId: number,
    readonly kind: RunKind
  ) {}

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get status(): RunStatus {
    return this.currentStatus;
  }

  /** Returns false when the run had already settled. */
  cancel(): boolean {
    if (this.currentStatus !== "running") {
      return false;
    }
    this.controller.abort();
    this.settle("cancelled");
    return true;
  }

  settle(status: SettledStatus): void {
    if (this.currentStatus !== "running") {
      return;
    }
    this.currentStatus = status;
  }
}

export type StartResult =
  | { status: "acquired"; handle: RunHandle }
  | { status: "already_running"; active: RunHandle };

export class SessionRegistry {
  private readonly runs = new Map<number, RunHandle>();

  get size(): number {
    return this.runs.size;
  }

  tryStart(userId: number, kind: RunKind): StartResult {
    const existing = this.runs.get(userId);
    if (existing && existing.status === "running") {
      return { status: "already_running", active: existing };
    }

    const handle = new RunHandle(userId, kind);
    this.runs.set(userId, handle);
    return { status: "acquired", handle };
  }

  active(userId: number): RunHandle | undefined {
    const handle = this.runs.get(userId);
    return handle?.status === "running" ? handle : undefined;
  }

  cancel(userId: number): "cancelled" | "not_running" {
    const handle = this.runs.get(userId);
    if (!handle) {
      return "not_running";
    }
    this.runs.delete(userId);
    return handle.cancel() ? "cancelled" : "not_running";
  }

  /** Deregisters a finished run. Safe to call more than once or after `cancel`. */
  release(handle: RunHandle, status: SettledStatus = "completed"): void {
    handle.settle(status);
    if (this.runs.get(handle.userId) === handle) {
      this.runs.delete(handle.userId);
    }
  }

  cancelAll(): number {
    let cancelled = 0;
    for (const userId of [...this.runs.keys()]) {
      if (this.cancel(userId) === "cancelled") {
        cancelled += 1;
      }
    }
    return cancelled;
  }
}
