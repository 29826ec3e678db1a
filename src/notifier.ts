import { createLogger } from "./logger.js";
import type { ChatRef, MessageHandle, MessageView, Notifier, NotifyResult } from "./types.js";

const logger = createLogger("notifier");

/** Wraps a Notifier so a thrown transport error becomes a failed `NotifyResult`. */
export function guardNotifier(notifier: Notifier): Notifier {
  return {
    announce: (chat: ChatRef, view: MessageView) => attempt("announce", () => notifier.announce(chat, view)),
    update: (handle: MessageHandle, view: MessageView) => attempt("update", () => notifier.update(handle, view))
  };
}

async function attempt<T>(operation: string, send: () => Promise<NotifyResult<T>>): Promise<NotifyResult<T>> {
  try {
    return await send();
  } catch (error) {
    logger.debug(`Notifier ${operation} threw`, error);
    return { ok: false, reason: error instanceof Error ? error.message : String(error) };
  }
}
