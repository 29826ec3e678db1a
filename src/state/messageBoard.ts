import { formatISO } from "date-fns";
import { v4 as uuid } from "uuid";
import type { ChatRef, Control, MessageHandle, MessageView, Notifier, NotifyResult } from "../types.js";

export interface RenderedMessage {
  id: MessageHandle;
  chatId: ChatRef;
  text: string;
  controls: Control[];
  createdAt: string;
  updatedAt: string;
}

interface MessageBoardOptions {
  historyLimit?: number;
}

const DEFAULT_HISTORY_LIMIT = 50;

/**
 * In-memory chat surface. Keeps the newest `historyLimit` messages per chat;
 * edits to evicted or unknown handles fail, as do edits that change nothing.
 */
export class MessageBoard implements Notifier {
  private readonly messages = new Map<MessageHandle, RenderedMessage>();
  private readonly chats = new Map<ChatRef, MessageHandle[]>();
  private readonly historyLimit: number;

  constructor(options: MessageBoardOptions = {}) {
    this.historyLimit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT;
  }

  async announce(chat: ChatRef, view: MessageView): Promise<NotifyResult<MessageHandle>> {
    const now = formatISO(new Date());
    const message: RenderedMessage = {
      id: uuid(),
      chatId: chat,
      text: view.text,
      controls: [...view.controls],
      createdAt: now,
      updatedAt: now
    };

    this.messages.set(message.id, message);
    const order = this.chats.get(chat) ?? [];
    order.push(message.id);
    while (order.length > this.historyLimit) {
      const evicted = order.shift();
      if (evicted) {
        this.messages.delete(evicted);
      }
    }
    this.chats.set(chat, order);

    return { ok: true, value: message.id };
  }

  async update(handle: MessageHandle, view: MessageView): Promise<NotifyResult> {
    const existing = this.messages.get(handle);
    if (!existing) {
      return { ok: false, reason: "message_not_found" };
    }
    if (existing.text === view.text && sameControls(existing.controls, view.controls)) {
      return { ok: false, reason: "message_not_modified" };
    }

    const updated: RenderedMessage = {
      ...existing,
      text: view.text,
      controls: [...view.controls],
      updatedAt: formatISO(new Date())
    };
    this.messages.set(handle, updated);

    return { ok: true, value: undefined };
  }

  get(handle: MessageHandle): RenderedMessage | undefined {
    return this.messages.get(handle);
  }

  list(chat: ChatRef): RenderedMessage[] {
    return (this.chats.get(chat) ?? [])
      .map(id => this.messages.get(id))
      .filter((value): value is RenderedMessage => Boolean(value));
  }
}

function sameControls(left: Control[], right: Control[]): boolean {
  return left.length === right.length && left.every((control, index) => {
    const other = right[index];
    return other !== undefined && control.label === other.label && control.action === other.action;
  });
}
