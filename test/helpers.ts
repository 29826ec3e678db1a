import type { ChatRef, MessageHandle, MessageView, Notifier, NotifyResult, Sleep } from "../src/types.js";

/**
 * Resolves on the next macrotask instead of waiting `ms`, recording each
 * requested delay. Rejects when the signal aborts, like the real sleep.
 */
export function fastSleep(log: number[] = []): Sleep {
  return (ms, signal) =>
    new Promise<void>((resolve, reject) => {
      if (signal.aborted) {
        reject(new Error("aborted"));
        return;
      }
      const onAbort = () => {
        clearImmediate(timer);
        reject(new Error("aborted"));
      };
      const timer = setImmediate(() => {
        signal.removeEventListener("abort", onAbort);
        log.push(ms);
        resolve();
      });
      signal.addEventListener("abort", onAbort, { once: true });
    });
}

export function sum(values: number[]): number {
  return values.reduce((total, value) => total + value, 0);
}

export interface NotifierCall {
  type: "announce" | "update";
  target: ChatRef | MessageHandle;
  text: string;
}

export interface RecordingNotifierOptions {
  /** Updates whose text matches are answered with `{ ok: false }`. */
  rejectUpdate?: (text: string) => boolean;
  /** Announcements whose text matches throw, like a dropped connection. */
  throwOnAnnounce?: (text: string) => boolean;
}

export class RecordingNotifier implements Notifier {
  readonly calls: NotifierCall[] = [];
  private nextId = 1;

  constructor(private readonly options: RecordingNotifierOptions = {}) {}

  async announce(chat: ChatRef, view: MessageView): Promise<NotifyResult<MessageHandle>> {
    this.calls.push({ type: "announce", target: chat, text: view.text });
    if (this.options.throwOnAnnounce?.(view.text)) {
      throw new Error("network");
    }
    const id = `message-${this.nextId}`;
    this.nextId += 1;
    return { ok: true, value: id };
  }

  async update(handle: MessageHandle, view: MessageView): Promise<NotifyResult> {
    this.calls.push({ type: "update", target: handle, text: view.text });
    if (this.options.rejectUpdate?.(view.text)) {
      return { ok: false, reason: "message_not_modified" };
    }
    return { ok: true, value: undefined };
  }

  announcements(): string[] {
    return this.calls.filter(call => call.type === "announce").map(call => call.text);
  }

  updatesTo(handle: MessageHandle): string[] {
    return this.calls.filter(call => call.type === "update" && call.target === handle).map(call => call.text);
  }
}
