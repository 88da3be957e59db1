import test from "node:test";
import assert from "node:assert/strict";
import { InlineKeyboard, type Api } from "grammy";
import type { Update } from "grammy/types";
import { TelegramClient, toChatEvent, toInlineKeyboard } from "./TelegramClient.js";

const config = { TELEGRAM_API_BASE: "http://telegram.test/", TELEGRAM_POLL_TIMEOUT_S: 1 };
const user = { id: 7, is_bot: false, first_name: "Test" };

test("toChatEvent: text message", () => {
  const update: Update = {
    update_id: 1,
    message: { message_id: 10, date: 1_700_000_000, chat: { id: -100, type: "supergroup", title: "Alliance" }, from: user, text: "/lw" }
  };
  assert.deepEqual(toChatEvent(update), {
    kind: "message",
    chatId: "-100",
    chatType: "supergroup",
    userId: "7",
    messageId: "10",
    text: "/lw",
    timestampMs: 1_700_000_000_000
  });
});

test("toChatEvent: button press", () => {
  const update: Update = {
    update_id: 2,
    callback_query: {
      id: "cb1",
      from: user,
      chat_instance: "ci",
      data: "lw:truck",
      message: { message_id: 11, date: 1_700_000_000, chat: { id: 5, type: "private", first_name: "Test" } }
    }
  };
  const evt = toChatEvent(update);
  assert.equal(evt?.kind, "button");
  if (evt?.kind !== "button") return;
  assert.equal(evt.callbackId, "cb1");
  assert.equal(evt.data, "lw:truck");
  assert.equal(evt.chatId, "5");
  assert.equal(evt.chatType, "private");
  assert.equal(evt.messageId, "11");
});

test("toChatEvent: updates without text or data are skipped", () => {
  const noText: Update = {
    update_id: 3,
    message: { message_id: 1, date: 1, chat: { id: 1, type: "private", first_name: "Test" }, from: user }
  };
  assert.equal(toChatEvent(noText), null);
  assert.equal(toChatEvent({ update_id: 4 }), null);
});

test("toInlineKeyboard: one keyboard row per button row", () => {
  const kb = toInlineKeyboard([
    [
      { text: "1h", data: "lw:dur:1h" },
      { text: "2h", data: "lw:dur:2h" }
    ],
    [{ text: "Cancel", data: "lw:cancel" }]
  ]);
  assert.deepEqual(kb.inline_keyboard, [
    [
      { text: "1h", callback_data: "lw:dur:1h" },
      { text: "2h", callback_data: "lw:dur:2h" }
    ],
    [{ text: "Cancel", callback_data: "lw:cancel" }]
  ]);
});

test("TelegramClient.sendText: sends the text with an inline keyboard", async (t) => {
  const client = new TelegramClient(config, "test-token");
  const send = t.mock.method(client.bot.api, "sendMessage", async (..._args: Parameters<Api["sendMessage"]>) => ({
    message_id: 99,
    date: 1,
    chat: { id: 5, type: "private", first_name: "Test" },
    text: "hi"
  }));
  const sent = await client.sendText("5", "hi", [[{ text: "1h", data: "lw:dur:1h" }]]);
  assert.deepEqual(sent, { chatId: "5", messageId: "99", text: "hi" });

  assert.equal(send.mock.callCount(), 1);
  const [chatId, text, other] = send.mock.calls[0].arguments;
  assert.equal(chatId, "5");
  assert.equal(text, "hi");
  const markup = other?.reply_markup;
  assert.ok(markup instanceof InlineKeyboard);
  assert.deepEqual(markup.inline_keyboard, [[{ text: "1h", callback_data: "lw:dur:1h" }]]);
});

test("TelegramClient.sendText: no keyboard means no reply markup", async (t) => {
  const client = new TelegramClient(config, "test-token");
  const send = t.mock.method(client.bot.api, "sendMessage", async (..._args: Parameters<Api["sendMessage"]>) => ({
    message_id: 3,
    date: 1,
    chat: { id: 5, type: "private", first_name: "Test" },
    text: "plain"
  }));
  await client.sendText("5", "plain");
  assert.equal(send.mock.calls[0].arguments[2], undefined);
});

test("TelegramClient.sendText: API errors propagate", async (t) => {
  const client = new TelegramClient(config, "test-token");
  t.mock.method(client.bot.api, "sendMessage", async (..._args: Parameters<Api["sendMessage"]>) => {
    throw new Error("Bad Request: chat not found");
  });
  await assert.rejects(client.sendText("5", "hi"), /chat not found/);
});

test("TelegramClient.editText and answerButton call the matching Bot API methods", async (t) => {
  const client = new TelegramClient(config, "test-token");
  const edit = t.mock.method(client.bot.api, "editMessageText", async (..._args: Parameters<Api["editMessageText"]>) => true);
  const answer = t.mock.method(client.bot.api, "answerCallbackQuery", async (..._args: Parameters<Api["answerCallbackQuery"]>) => true);

  await client.editText("5", "42", "done");
  await client.answerButton("cb9");

  assert.deepEqual(edit.mock.calls[0].arguments, ["5", 42, "done"]);
  assert.deepEqual(answer.mock.calls[0].arguments, ["cb9"]);
});
