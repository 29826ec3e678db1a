import { test } from "node:test";
import assert from "node:assert/strict";
import { MessageBoard } from "../src/state/messageBoard.js";
import type { MessageView } from "../src/types.js";

const view = (text: string): MessageView => ({ text, controls: [{ label: "⏹️ Stop cycle", action: "stop_run" }] });

async function announceOrFail(board: MessageBoard, chat: number, text: string): Promise<string> {
  const result = await board.announce(chat, view(text));
  if (!result.ok) {
    throw new Error(`announce failed: ${result.reason}`);
  }
  return result.value;
}

test("announced messages can be edited", async () => {
  const board = new MessageBoard();
  const handle = await announceOrFail(board, 10, "first");

  const edited = await board.update(handle, view("second"));

  assert.deepEqual(edited, { ok: true, value: undefined });
  assert.deepEqual(board.list(10).map(message => message.text), ["second"]);
  assert.equal(board.get(handle)?.chatId, 10);
});

test("edits that change nothing are reported as failures", async () => {
  const board = new MessageBoard();
  const handle = await announceOrFail(board, 10, "same");

  assert.deepEqual(await board.update(handle, view("same")), { ok: false, reason: "message_not_modified" });
});

test("unknown handles cannot be edited", async () => {
  const board = new MessageBoard();

  assert.deepEqual(await board.update("missing", view("text")), { ok: false, reason: "message_not_found" });
});

test("old messages fall out of the history and become stale", async () => {
  const board = new MessageBoard({ historyLimit: 2 });
  const oldest = await announceOrFail(board, 11, "one");
  await announceOrFail(board, 11, "two");
  await announceOrFail(board, 11, "three");

  assert.deepEqual(board.list(11).map(message => message.text), ["two", "three"]);
  assert.deepEqual(await board.update(oldest, view("edited")), { ok: false, reason: "message_not_found" });
});

test("chats are kept apart", async () => {
  const board = new MessageBoard();
  await announceOrFail(board, 1, "for one");
  await announceOrFail(board, 2, "for two");

  assert.deepEqual(board.list(1).map(message => message.text), ["for one"]);
  assert.deepEqual(board.list(3), []);
});
