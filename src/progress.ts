import { createLogger } from "./logger.js";
import { buildProgressView } from "./ui/builders.js";
import type { ChatRef, MessageHandle, Notifier, ProgressSink } from "./types.js";

const logger = createLogger("progress");

/**
 * Renders countdown ticks into one message. With no `target` the first tick
 * creates the message and later ticks edit it.
 */
export function createProgressSink(notifier: Notifier, chat: ChatRef, target?: MessageHandle): ProgressSink {
  let handle = target;
  let announced = target !== undefined;

  return async (remaining, kind) => {
    const view = buildProgressView(remaining, kind);
    if (!handle) {
      if (announced) {
        return;
      }
      announced = true;
      const created = await notifier.announce(chat, view);
      if (created.ok) {
        handle = created.value;
      } else {
        logger.debug(`Could not create progress message in chat ${chat}: ${created.reason}`);
      }
      return;
    }

    const result = await notifier.update(handle, view);
    if (!result.ok) {
      logger.debug(`Progress update skipped (${result.reason}) at ${remaining}s`);
    }
  };
}
